/**
 * Error types for the batcher.
 * @module errors
 */

/**
 * Error kinds for categorizing batcher errors.
 */
export enum BatcherErrorKind {
  /** Job submitted after shutdown was requested. */
  SubmissionRejected = 'submission_rejected',
  /** Batcher constructed with an invalid configuration. */
  InvalidConfiguration = 'invalid_configuration',
  /** The processor threw or rejected for a job. */
  ProcessingFailed = 'processing_failed',
  /** A job result was written more than once. */
  ResultAlreadySettled = 'result_already_settled',
}

/**
 * Batcher error with a machine-readable kind.
 */
export class BatcherError extends Error {
  /** Error kind. */
  public readonly kind: BatcherErrorKind;
  /** Job the error relates to, if any. */
  public readonly jobId?: string | number;

  constructor(
    kind: BatcherErrorKind,
    message: string,
    options?: {
      jobId?: string | number;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BatcherError';
    this.kind = kind;
    this.jobId = options?.jobId;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BatcherError);
    }
  }

  /**
   * Creates the error returned to submitters once shutdown has begun.
   */
  static submissionRejected(jobId: string | number): BatcherError {
    return new BatcherError(
      BatcherErrorKind.SubmissionRejected,
      'Failed to add job; batcher is shutting down',
      { jobId }
    );
  }

  /**
   * Wraps a processor failure for delivery through the job's result.
   */
  static processingFailed(jobId: string | number, cause: unknown): BatcherError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new BatcherError(
      BatcherErrorKind.ProcessingFailed,
      `Processing failed for job ${jobId}: ${reason}`,
      { jobId, cause }
    );
  }

  /**
   * Returns a plain object suitable for structured logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      jobId: this.jobId,
    };
  }
}

/**
 * Checks whether a value is a BatcherError, optionally of a given kind.
 */
export function isBatcherError(error: unknown, kind?: BatcherErrorKind): error is BatcherError {
  if (!(error instanceof BatcherError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}
