import { DiagnosticCode, MatrixDiagnostic, MatrixDimensions } from "../types";

export type ArithmeticOperation = "add" | "multiply";

/**
 * Shapes are structurally incompatible; there is no partial result.
 * Returned inside an OperationResult, never thrown.
 */
export class DimensionMismatchError extends Error {
  readonly code = "DIMENSION_MISMATCH";
  readonly operation: ArithmeticOperation;
  readonly left: MatrixDimensions;
  readonly right: MatrixDimensions;

  constructor(
    operation: ArithmeticOperation,
    message: string,
    left: MatrixDimensions,
    right: MatrixDimensions
  ) {
    super(message);
    this.name = "DimensionMismatchError";
    this.operation = operation;
    this.left = left;
    this.right = right;
  }
}

export function makeDiagnostic(
  code: DiagnosticCode,
  op: string,
  reason: string,
  details?: Record<string, unknown>
): MatrixDiagnostic {
  const diagnostic: MatrixDiagnostic = { code, op, reason };
  if (details && Object.keys(details).length > 0) {
    diagnostic.details = details;
  }
  return diagnostic;
}
