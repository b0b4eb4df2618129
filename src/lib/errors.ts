/**
 * Raised when a single odds row cannot be turned into a priced observation.
 * Callers skip the row and keep processing the batch.
 */
export class InvalidObservationError extends Error {
  constructor(message: string, public readonly row?: unknown) {
    super(message);
    this.name = 'InvalidObservationError';
  }
}

export class OddsApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'OddsApiError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
