/**
 * Result values and the error taxonomy shared by every Dropbox operation.
 *
 * Nothing in the binding throws for an expected failure: callers get a
 * `Result` and decide what the user sees.
 */

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// token_type present but not "bearer"
export interface AuthError {
  kind: 'unsupported-token-type';
  tokenType: string;
  message: string;
}

export interface DecodeError {
  kind: 'malformed-response';
  message: string;
  issues: string[];
}

export type TransportError =
  | { kind: 'transport'; message: string; cause: unknown }
  | { kind: 'http-status'; status: number; message: string; body: string };

export type DropboxError = AuthError | DecodeError | TransportError;

/**
 * One-line description of any binding error.
 */
export function describeError(error: DropboxError): string {
  switch (error.kind) {
    case 'unsupported-token-type':
      return error.message;
    case 'malformed-response':
      return error.issues.length > 0
        ? `${error.message}: ${error.issues.join('; ')}`
        : error.message;
    case 'transport':
      return `Transport error: ${error.message}`;
    case 'http-status':
      return `Dropbox API error ${error.status}: ${error.message}`;
  }
}
