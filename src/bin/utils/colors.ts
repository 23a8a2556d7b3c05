/**
 * Styling for task output: bold table headings, dim table dividers and the
 * red `Error:` prefix. Plain text when stdout is not a TTY or NO_COLOR is set.
 */

/** Checked on every call. */
export function shouldUseColor(): boolean {
  return Boolean(process.stdout.isTTY && !process.env.NO_COLOR);
}

const red = (s: string) => (shouldUseColor() ? `\x1b[31m${s}\x1b[0m` : s);
const dim = (s: string) => (shouldUseColor() ? `\x1b[2m${s}\x1b[0m` : s);
const bold = (s: string) => (shouldUseColor() ? `\x1b[1m${s}\x1b[0m` : s);

export const colors = {
  red,
  dim,
  bold,
};
