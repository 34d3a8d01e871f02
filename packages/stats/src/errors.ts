export type CuzickErrorCode =
  | "InvalidShape"
  | "NonIntegerLabel"
  | "NonConsecutiveLabels"
  | "ScoreLengthMismatch"
  | "DegenerateScore"
  | "DegenerateVariance";

export type CuzickErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Fatal input or computation error. Carries the offending value and the
 * expected range in `details`.
 */
export class CuzickError extends Error {
  public readonly code: CuzickErrorCode;
  public readonly details: CuzickErrorDetails;

  public constructor(code: CuzickErrorCode, message: string, details: CuzickErrorDetails = {}) {
    super(message);
    this.name = "CuzickError";
    this.code = code;
    this.details = details;
  }
}

export const isCuzickError = (value: unknown): value is CuzickError => {
  return value instanceof CuzickError;
};
