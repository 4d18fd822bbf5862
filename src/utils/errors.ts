/**
 * Raised by the aggregation engine when a persisted rating for a known option
 * is outside the -2..+2 integer scale. It means the submission validator let
 * something through, so the computation is rejected as a whole.
 */
export class DataIntegrityError extends Error {
  readonly code = "DATA_INTEGRITY_ERROR";
  readonly statusCode = 500;

  constructor(
    readonly optionId: string,
    readonly rating: unknown
  ) {
    super(`Rating ${String(rating)} for option ${optionId} is outside the -2..2 scale`);
    this.name = "DataIntegrityError";
  }
}

export const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === 11000;
