import { ConfigError } from '@askdb/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'NOT_FOUND'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'SCHEMA_UNAVAILABLE'
  | 'POLICY_BLOCKED'
  | 'CONFIRMATION_FAILED'
  | 'OPENAI_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown, code: CliErrorCode = 'POLICY_BLOCKED'): CliError {
  return new CliError('policy', code, message, details);
}

/** Config problems are usage errors; anything else unknown is a runtime error. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigError) return usageError(error.message, 'CONFIG_INVALID', { problems: error.problems });
  const message = error instanceof Error ? error.message : String(error);
  return new CliError('runtime', 'INTERNAL_ERROR', message);
}

export function toExitCode(error: unknown): number {
  const cliError = toCliError(error);
  if (cliError.kind === 'usage') return EXIT_CODE_USAGE;
  if (cliError.kind === 'policy') return EXIT_CODE_POLICY;
  return EXIT_CODE_RUNTIME;
}
