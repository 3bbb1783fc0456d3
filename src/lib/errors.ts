/**
 * Error hierarchy for the analysis pipeline.
 *
 * Empty results (no records, no themes) are not errors: they travel as a
 * `Notice` next to the result. Everything here aborts the operation that
 * raised it.
 */

export type ErrorCode =
  | "INVALID_PARAMETERS"
  | "VALIDATION_FAILURE"
  | "UNKNOWN_THEME"
  | "PERSISTENCE_FAILURE"
  | "SESSION_STATE";

export abstract class ThemeAnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean = false,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidParametersError extends ThemeAnalysisError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETERS");
  }
}

export interface GroupValidationProblem {
  group: string;
  problems: string[];
}

/**
 * Malformed input rows. Raised before extraction so no partial taxonomy
 * is ever built from a subset of the groups.
 */
export class ValidationFailureError extends ThemeAnalysisError {
  constructor(public readonly failures: GroupValidationProblem[]) {
    super(
      `Validation failed for ${failures.map(f => `${f.group} (${f.problems.join("; ")})`).join(", ")}`,
      "VALIDATION_FAILURE"
    );
  }
}

export class UnknownThemeError extends ThemeAnalysisError {
  constructor(public readonly theme: string) {
    super(`Theme "${theme}" is not part of the active taxonomy`, "UNKNOWN_THEME");
  }
}

export class PersistenceError extends ThemeAnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, "PERSISTENCE_FAILURE", true, cause);
  }
}

export class SessionStateError extends ThemeAnalysisError {
  constructor(message: string) {
    super(message, "SESSION_STATE", true);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
