// Error types raised by the ratio and layout code.

export type VisualizationErrorCode = "INVALID_INPUT" | "ARITHMETIC_DEGENERATE";

export class VisualizationError extends Error {
  readonly code: VisualizationErrorCode;
  constructor(code: VisualizationErrorCode, message: string) {
    super(message);
    this.name = "VisualizationError";
    this.code = code;
  }
}

/** A value is non-numeric, non-positive or otherwise outside what a request accepts. */
export class InvalidInputError extends VisualizationError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/** Division by zero; callers validate first, so this signals a bug upstream. */
export class ArithmeticDegenerateError extends VisualizationError {
  constructor(message: string) {
    super("ARITHMETIC_DEGENERATE", message);
    this.name = "ArithmeticDegenerateError";
  }
}

export function isVisualizationError(e: unknown): e is VisualizationError {
  return e instanceof VisualizationError;
}
