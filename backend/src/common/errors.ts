/**
 * Error taxonomy shared by the identity client, the tool registry and the
 * dialogue orchestrator.
 */
export type ErrorKind = 'validation' | 'upstream' | 'configuration';

export abstract class SupportBotError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed tool arguments or an unusable chat message.
 */
export class ValidationError extends SupportBotError {
  readonly kind = 'validation';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * The LLM provider or the identity-management API was unreachable, timed out
 * or answered with a non-success status.
 */
export class UpstreamError extends SupportBotError {
  readonly kind = 'upstream';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * A required credential or setting is missing or invalid.
 */
export class ConfigurationError extends SupportBotError {
  readonly kind = 'configuration';
}

export function isSupportBotError(error: unknown): error is SupportBotError {
  return error instanceof SupportBotError;
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
