/**
 * Errors that end a client session.
 *
 * Expected conditions (absent chunk, absent neighbor) never produce these;
 * they are handled locally with defaults.
 */

export type SessionErrorKind =
  /** Server sent something this client cannot apply (unknown block id, chunk before game data, bad frame). */
  | 'protocol_desync'
  /** Transport reported the peer is gone. */
  | 'disconnected'
  /** The session already ended; no further ticks are possible. */
  | 'session_closed';

export class SessionError extends Error {
  readonly kind: SessionErrorKind;

  constructor(kind: SessionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
    this.kind = kind;
  }
}

export function isSessionError(err: unknown, kind?: SessionErrorKind): err is SessionError {
  return err instanceof SessionError && (kind === undefined || err.kind === kind);
}
