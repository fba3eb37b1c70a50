import type BN from "bn.js";

/**
 * Row-major grid of 32-bit signed integers.
 * All rows are expected to have the same length.
 */
export type Matrix = number[][];

export type ReadonlyMatrix = ReadonlyArray<ReadonlyArray<number>>;

export interface MatrixDimensions {
  height: number;
  width: number;
}

export type OperationResult<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type DiagnosticCode =
  | "EMPTY_MATRIX"
  | "NOT_SQUARE"
  | "JAGGED_MATRIX"
  | "ROW_OUT_OF_BOUNDS"
  | "COLUMN_OUT_OF_BOUNDS"
  | "ELEMENT_OUT_OF_BOUNDS"
  | "INVALID_VALUE";

/**
 * Non-fatal validation failure. The operation was skipped and the
 * matrix left as it was.
 */
export interface MatrixDiagnostic {
  code: DiagnosticCode;
  op: string;
  reason: string;
  details?: Record<string, unknown>;
}

export type MutationOutcome =
  | { status: "applied" }
  | { status: "unchanged" }
  | { status: "rejected"; diagnostic: MatrixDiagnostic };

export interface DiagonalSums {
  main: BN;
  secondary: BN;
}

export interface LoadedMatrices {
  size: number;
  matrixA: Matrix;
  matrixB: Matrix;
}

export interface MatrixConfig {
  inputFile?: string;
  fieldWidth: number;
  rowSwap: [number, number];
  columnSwap: [number, number];
  elementUpdate: {
    row: number;
    col: number;
    value: number;
  };
}
