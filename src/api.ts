/**
 * Error status codes. Codes in the 4000s indicate a problem with the caller's
 * input; codes in the 5000s indicate a problem in the storage backend.
 * @category API
 */
export enum QuadStoreErrorStatus {
  'No error' = 0,
  /**
   * A required term is missing, or a term cannot be used in its position, where
   * an operation requires a fully-bound quadruple.
   */
  'Invalid argument' = 4000,
  /**
   * The kind of an object term (resource or literal) cannot be determined, or a
   * lookup constrains the object without constraining its flavor.
   */
  'Ambiguous object flavor' = 4001,
  /**
   * The backing store failed. The original error is available as the `cause`.
   */
  'Executor failure' = 5000,
  'Executor closed' = 5001
}

/**
 * Utility wrapper for exceptions thrown by a store or its executor.
 * @category API
 */
export class QuadStoreError extends Error {
  readonly status: QuadStoreErrorStatus;

  constructor(
    status: keyof typeof QuadStoreErrorStatus | QuadStoreErrorStatus,
    detail?: unknown,
    cause?: unknown
  ) {
    super((typeof status == 'string' ? status :
      QuadStoreErrorStatus[status]) + (detail != null ? `: ${detail}` : ''),
    cause != null ? { cause } : undefined);
    this.status = typeof status == 'string' ? QuadStoreErrorStatus[status] : status;
  }

  /**
   * Normalises anything thrown by a backend. Errors which are already
   * {@link QuadStoreError}s pass through; anything else becomes an executor
   * failure, carrying the original as its cause.
   */
  static from(err: unknown): QuadStoreError {
    if (err == null)
      return new QuadStoreError('No error');
    else if (err instanceof QuadStoreError)
      return err;
    else
      return new QuadStoreError('Executor failure',
        err instanceof Error ? err.message : err, err);
  }
}
