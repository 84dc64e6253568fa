/**
 * Sentinel answers and ingestion errors.
 *
 * Per-question failures never throw past the question boundary: they become
 * one of these strings in the question's answer slot.
 */

export const TIMEOUT_ANSWER = 'Processing timed out for this question.';
export const GENERATION_FAILED_ANSWER = 'Answer generation failed after multiple retries.';
export const INGESTION_FAILED_ANSWER = 'Error: Could not process document.';

const UNEXPECTED_ERROR_PREFIX = 'An error occurred: ';

export function unexpectedErrorAnswer(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `${UNEXPECTED_ERROR_PREFIX}${message}`;
}

/**
 * Whether an answer is a failure sentinel rather than generated text.
 */
export function isSentinel(answer: string): boolean {
  return (
    answer === TIMEOUT_ANSWER ||
    answer === GENERATION_FAILED_ANSWER ||
    answer === INGESTION_FAILED_ANSWER ||
    answer.startsWith(UNEXPECTED_ERROR_PREFIX)
  );
}

/**
 * Document could not be fetched or extracted. Fatal for the whole request.
 */
export class IngestionError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly documentUrl: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'IngestionError';
    this.cause = cause;
  }
}
