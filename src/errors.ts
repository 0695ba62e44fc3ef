/**
 * Error type for PAK parsing, validation and mutation failures.
 *
 * File system failures are not wrapped: they surface as the Node error thrown
 * by `node:fs/promises`, with its own `code` (ENOENT, EACCES, ...).
 */

/** Stable PAK error codes. */
export type PakErrorCode =
  | 'MALFORMED_HEADER'
  | 'MALFORMED_DIRECTORY'
  | 'OUT_OF_BOUNDS'
  | 'NAME_TOO_LONG'
  | 'INVALID_NAME'
  | 'NOT_FOUND'
  | 'UNSAFE_PATH'
  | 'ARCHIVE_TOO_LARGE'
  | 'INVALID_ARGUMENT';

export class PakError extends Error {
  /** Machine-readable error code. */
  readonly code: PakErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Byte offset related to the error, if available. */
  readonly offset?: number | undefined;

  constructor(
    code: PakErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      offset?: number | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PakError';
    this.code = code;
    this.entryName = options?.entryName;
    this.offset = options?.offset;
  }

  /**
   * Narrows an unknown thrown value, optionally to a single code.
   */
  static is(value: unknown, code?: PakErrorCode): value is PakError {
    return value instanceof PakError && (code === undefined || value.code === code);
  }
}
