import type { ArgError, ArgErrorKind } from '../../types';

function argError(kind: ArgErrorKind, subject: string, message: string): ArgError {
  return { kind, subject, message };
}

export function unknownArgument(token: string): ArgError {
  return argError('UnknownArgument', token, `Unknown argument: ${token}`);
}

export function missingValue(token: string): ArgError {
  return argError('MissingValue', token, `Missing value for argument: ${token}`);
}

export function missingRequiredArgument(name: string): ArgError {
  return argError('MissingRequiredArgument', name, `Missing required argument: --${name}`);
}

export function unexpectedPositional(token: string): ArgError {
  return argError('UnexpectedPositional', token, `Unexpected positional argument: ${token}`);
}

export function malformedDashToken(token: string): ArgError {
  return argError('MalformedDashToken', token, `Unexpected \`${token}\` without argument.`);
}

export function argNotFound(name: string): ArgError {
  return argError('NotFound', name, `Argument not found with name: --${name}`);
}
