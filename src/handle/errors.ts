/**
 * @file FileHandle error types
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

/** Thrown when an operation cannot be asked of this kind of handle (path on web). Caller error; not retryable. */
export class InvalidOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidOperationError";
  }
}

/** Thrown when a handle carries no usable data source. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}
