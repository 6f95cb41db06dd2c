/**
 * Inbound payload could not be read as a JSON object.
 * Non-fatal: the message is dropped and the listener keeps going.
 */
export class ParseError extends Error {
  override readonly name = 'ParseError';

  constructor(
    message: string,
    readonly payload: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type StorageOperation = 'insert' | 'query';

/** The reading store was unreachable or rejected the operation. */
export class StorageError extends Error {
  override readonly name = 'StorageError';
  readonly status = 503;

  constructor(
    readonly operation: StorageOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
