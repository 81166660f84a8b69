export type LibraryErrorCode =
  | "DUPLICATE_KEY"
  | "NOT_FOUND"
  | "CONSTRAINT_VIOLATION"
  | "INVALID_INPUT";

export class LibraryError extends Error {
  constructor(readonly code: LibraryErrorCode, message: string) {
    super(message);
    this.name = "LibraryError";
  }
}

export type LibraryFailure = { ok: false; error: LibraryError };

export type LibraryResult<T> = { ok: true; data: T } | LibraryFailure;

export const success = <T>(data: T): LibraryResult<T> => ({ ok: true, data });

export const failure = (
  code: LibraryErrorCode,
  message: string
): LibraryFailure => ({ ok: false, error: new LibraryError(code, message) });
