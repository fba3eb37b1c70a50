/**
 * Matrix Arithmetic
 * Element-wise addition and row-by-column multiplication
 */

import BN from "bn.js";
import { Matrix, OperationResult, ReadonlyMatrix } from "../types";
import { getLogger } from "../utils/Logger";
import {
  createMatrix,
  formatDimensions,
  getDimensions,
  isEmptyMatrix,
  isRectangular,
  toInt32,
} from "../utils/matrixHelper";
import { DimensionMismatchError } from "./errors";

const logger = getLogger(module);

/**
 * Add two matrices of identical shape.
 *
 * Both operands must be non-empty. Only the height and the first-row
 * width are compared; the result
 * has the first operand's height and first-row width. Sums wrap to
 * int32 range.
 */
export function add(
  matrixA: ReadonlyMatrix,
  matrixB: ReadonlyMatrix
): OperationResult<Matrix, DimensionMismatchError> {
  const dimsA = getDimensions(matrixA);
  const dimsB = getDimensions(matrixB);

  if (
    isEmptyMatrix(matrixA) ||
    isEmptyMatrix(matrixB) ||
    dimsA.height !== dimsB.height ||
    dimsA.width !== dimsB.width
  ) {
    const error = new DimensionMismatchError(
      "add",
      `Matrix dimensions must match for addition (A is ${formatDimensions(
        matrixA
      )}, B is ${formatDimensions(matrixB)})`,
      dimsA,
      dimsB
    );
    logger.error(`MatrixArithmetic: ${error.message}`);
    return { ok: false, error };
  }

  const result = createMatrix(dimsA.height, dimsA.width);
  for (let i = 0; i < dimsA.height; i++) {
    for (let j = 0; j < dimsA.width; j++) {
      result[i][j] = (matrixA[i][j] + matrixB[i][j]) | 0;
    }
  }

  logger.debug(`MatrixArithmetic: Added two ${formatDimensions(matrixA)} matrices`);
  return { ok: true, value: result };
}

/**
 * Multiply A (n×m) by B (m×p) into a new n×p matrix.
 *
 * Each element is accumulated over k in arbitrary precision and
 * stored wrapped to int32 range.
 */
export function multiply(
  matrixA: ReadonlyMatrix,
  matrixB: ReadonlyMatrix
): OperationResult<Matrix, DimensionMismatchError> {
  const dimsA = getDimensions(matrixA);
  const dimsB = getDimensions(matrixB);

  const fail = (reason: string): OperationResult<Matrix, DimensionMismatchError> => {
    const error = new DimensionMismatchError(
      "multiply",
      `${reason} (A is ${formatDimensions(matrixA)}, B is ${formatDimensions(matrixB)})`,
      dimsA,
      dimsB
    );
    logger.error(`MatrixArithmetic: ${error.message}`);
    return { ok: false, error };
  };

  if (dimsA.height === 0 || dimsB.height === 0) {
    return fail("Cannot multiply an empty matrix");
  }
  if (!isRectangular(matrixA) || !isRectangular(matrixB)) {
    return fail("Cannot multiply a jagged matrix");
  }
  if (dimsA.width !== dimsB.height) {
    return fail(
      "Matrix dimensions incompatible for multiplication (A's cols must equal B's rows)"
    );
  }

  const rows = dimsA.height;
  const cols = dimsB.width;
  const inner = dimsA.width;
  const result = createMatrix(rows, cols, 0);

  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      let sum = new BN(0);
      for (let k = 0; k < inner; k++) {
        sum = sum.add(new BN(matrixA[i][k]).mul(new BN(matrixB[k][j])));
      }
      result[i][j] = toInt32(sum);
    }
  }

  logger.debug(
    `MatrixArithmetic: Multiplied ${formatDimensions(matrixA)} by ${formatDimensions(
      matrixB
    )}`
  );
  return { ok: true, value: result };
}
