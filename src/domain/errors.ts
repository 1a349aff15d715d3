/**
 * Error taxonomy of the alerting core.
 *
 * Registration-time errors (`ParseError`, `ConfigError`) are thrown to the
 * caller. Runtime errors (`EvaluationError`, `DeliveryError`) are caught by
 * the component that raised them and surfaced through logs and counters.
 */

export type CoreErrorCode = 'PARSE_ERROR' | 'EVALUATION_ERROR' | 'CONFIG_ERROR' | 'DELIVERY_ERROR';

export abstract class CoreError extends Error {
  abstract readonly code: CoreErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed rule condition. `position` is the 0-based column of the offending token. */
export class ParseError extends CoreError {
  readonly code = 'PARSE_ERROR';

  constructor(message: string, readonly position: number) {
    super(`${message} (at column ${position + 1})`);
  }
}

/** Type mismatch while evaluating a condition. */
export class EvaluationError extends CoreError {
  readonly code = 'EVALUATION_ERROR';
}

/** Invalid window spec, unknown field reference or duplicate rule id. */
export class ConfigError extends CoreError {
  readonly code = 'CONFIG_ERROR';
}

/** A notification transport could not deliver an alert. */
export class DeliveryError extends CoreError {
  readonly code = 'DELIVERY_ERROR';

  constructor(message: string, readonly channel: string, readonly status?: number) {
    super(message);
  }
}

export function isCoreError(err: unknown): err is CoreError {
  return err instanceof CoreError;
}
