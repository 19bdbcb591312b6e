export type SessionErrorKind =
  | 'KEY_NOT_FOUND'
  | 'AUTHENTICATION_FAILED'
  | 'HOST_UNREACHABLE'
  | 'SSH_ERROR'
  | 'UNEXPECTED'
  | 'OVERALL_TIMEOUT'
  | 'LOST_CONNECTION'
  | 'COMMAND_FAILED'
  | 'UNEXPECTED_REBOOT'
  | 'RECONNECTION_EXHAUSTED'
  | 'RECOVERY_UNAVAILABLE';

/**
 * Every failure surfaced by a remote session. The `kind` tag is closed;
 * `UNEXPECTED` is the catch-all for anything the transport did not classify.
 */
export class SessionError extends Error {
  constructor(
    public readonly kind: SessionErrorKind,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

export function isSessionError(
  value: unknown,
  kind?: SessionErrorKind
): value is SessionError {
  return value instanceof SessionError && (kind === undefined || value.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
