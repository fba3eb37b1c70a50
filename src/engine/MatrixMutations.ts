/**
 * Matrix Mutations
 * In-place row swap, column swap and element update.
 *
 * Invalid input is reported and skipped: the matrix is left exactly as
 * it was and the caller gets a "rejected" outcome carrying the
 * diagnostic. Callers that need the original preserved should mutate a
 * cloneMatrix() copy.
 */

import { Matrix, MatrixDiagnostic, MutationOutcome } from "../types";
import { getLogger } from "../utils/Logger";
import {
  getDimensions,
  isEmptyMatrix,
  isIndexInRange,
  isInt32,
  isRectangular,
} from "../utils/matrixHelper";
import { makeDiagnostic } from "./errors";

const logger = getLogger(module);

const APPLIED: MutationOutcome = { status: "applied" };
const UNCHANGED: MutationOutcome = { status: "unchanged" };

function reject(diagnostic: MatrixDiagnostic): MutationOutcome {
  logger.warn(`MatrixMutations: ${diagnostic.reason}`);
  return { status: "rejected", diagnostic };
}

/**
 * Exchange two whole rows.
 */
export function swapRows(matrix: Matrix, row1: number, row2: number): MutationOutcome {
  if (matrix.length === 0) {
    return reject(
      makeDiagnostic("EMPTY_MATRIX", "swapRows", "Cannot swap rows in an empty matrix")
    );
  }

  const { height } = getDimensions(matrix);
  if (!isIndexInRange(row1, height) || !isIndexInRange(row2, height)) {
    return reject(
      makeDiagnostic(
        "ROW_OUT_OF_BOUNDS",
        "swapRows",
        `Row index out of bounds (${row1}, ${row2}). Valid range is 0 to ${height - 1}`,
        { row1, row2, height }
      )
    );
  }

  if (row1 === row2) {
    return UNCHANGED;
  }

  const row = matrix[row1];
  matrix[row1] = matrix[row2];
  matrix[row2] = row;
  return APPLIED;
}

/**
 * Exchange two columns, one element per row.
 */
export function swapCols(matrix: Matrix, col1: number, col2: number): MutationOutcome {
  if (isEmptyMatrix(matrix)) {
    return reject(
      makeDiagnostic("EMPTY_MATRIX", "swapCols", "Cannot swap columns in an empty matrix")
    );
  }

  if (!isRectangular(matrix)) {
    return reject(
      makeDiagnostic(
        "JAGGED_MATRIX",
        "swapCols",
        "Cannot swap columns in a matrix whose rows differ in length",
        { rowLengths: matrix.map((row) => row.length) }
      )
    );
  }

  const { height, width } = getDimensions(matrix);
  if (!isIndexInRange(col1, width) || !isIndexInRange(col2, width)) {
    return reject(
      makeDiagnostic(
        "COLUMN_OUT_OF_BOUNDS",
        "swapCols",
        `Column index out of bounds (${col1}, ${col2}). Valid range is 0 to ${width - 1}`,
        { col1, col2, width }
      )
    );
  }

  if (col1 === col2) {
    return UNCHANGED;
  }

  for (let i = 0; i < height; i++) {
    const value = matrix[i][col1];
    matrix[i][col1] = matrix[i][col2];
    matrix[i][col2] = value;
  }
  return APPLIED;
}

export function updateElement(
  matrix: Matrix,
  row: number,
  col: number,
  value: number
): MutationOutcome {
  if (isEmptyMatrix(matrix)) {
    return reject(
      makeDiagnostic(
        "EMPTY_MATRIX",
        "updateElement",
        "Cannot update element in an empty matrix"
      )
    );
  }

  const { height, width } = getDimensions(matrix);
  if (!isIndexInRange(row, height) || !isIndexInRange(col, width)) {
    return reject(
      makeDiagnostic(
        "ELEMENT_OUT_OF_BOUNDS",
        "updateElement",
        `Index (${row}, ${col}) out of bounds. Valid row range 0 to ${
          height - 1
        }, valid col range 0 to ${width - 1}`,
        { row, col, height, width }
      )
    );
  }

  if (!isInt32(value)) {
    return reject(
      makeDiagnostic(
        "INVALID_VALUE",
        "updateElement",
        `Value ${value} is not a 32-bit signed integer`,
        { value }
      )
    );
  }

  matrix[row][col] = value;
  return APPLIED;
}
