import { homedir } from 'node:os';
import { join } from 'node:path';
import type { TikeConfig } from '../types';

export interface LoadConfigOptions {
  /** Override the home directory (for testing) */
  homeDir?: string;
}

/**
 * Settings are fixed: the task database always lives at ~/.tike.db.
 */
export function loadConfig(options: LoadConfigOptions = {}): TikeConfig {
  return { dbPath: getDefaultDbPath(options.homeDir) };
}

export function getDefaultDbPath(home: string = homedir()): string {
  return join(home, '.tike.db');
}
