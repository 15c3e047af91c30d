export type InteractionErrorCode =
  | 'CONFIGURATION'
  | 'TRANSIENT_ACTION'
  | 'PLATFORM_UNAVAILABLE';

/**
 * Invalid input to a prompt or menu (empty or duplicate emoji, non-positive
 * timeout, bad page index). Thrown before any network call is made.
 */
export class ConfigurationError extends Error {
  readonly code: InteractionErrorCode = 'CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A single platform call (add/remove reaction, send, edit, delete) failed.
 * Fatal during a blocking initial attach or a render; logged and swallowed
 * during cleanup and background work.
 */
export class TransientActionError extends Error {
  readonly code: InteractionErrorCode = 'TRANSIENT_ACTION';
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'TransientActionError';
    this.operation = operation;
  }
}

/** The event stream refused a new subscription (hub closed, gateway gone). */
export class PlatformUnavailableError extends Error {
  readonly code: InteractionErrorCode = 'PLATFORM_UNAVAILABLE';

  constructor(message: string) {
    super(message);
    this.name = 'PlatformUnavailableError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
