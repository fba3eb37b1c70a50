import _ from "lodash";
import BN from "bn.js";
import invariant from "tiny-invariant";
import { INT32_MAX, INT32_MIN, TWO_POW_31, TWO_POW_32 } from "../constants";
import { Matrix, MatrixDimensions, ReadonlyMatrix } from "../types";

/**
 * Height is the row count, width the length of the first row.
 */
export function getDimensions(matrix: ReadonlyMatrix): MatrixDimensions {
  return {
    height: matrix.length,
    width: matrix.length > 0 ? matrix[0].length : 0,
  };
}

export function formatDimensions(matrix: ReadonlyMatrix): string {
  const { height, width } = getDimensions(matrix);
  return `${height}x${width}`;
}

export function isEmptyMatrix(matrix: ReadonlyMatrix): boolean {
  return matrix.length === 0 || matrix[0].length === 0;
}

export function isRectangular(matrix: ReadonlyMatrix): boolean {
  const { width } = getDimensions(matrix);
  return matrix.every((row) => row.length === width);
}

export function isSquare(matrix: ReadonlyMatrix): boolean {
  const { height, width } = getDimensions(matrix);
  return isRectangular(matrix) && height === width;
}

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isIndexInRange(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

export function createMatrix(height: number, width: number, fill = 0): Matrix {
  invariant(Number.isInteger(height) && height >= 0, "invalid height");
  invariant(Number.isInteger(width) && width >= 0, "invalid width");
  return _.times(height, () => _.fill(new Array<number>(width), fill));
}

export function identityMatrix(size: number): Matrix {
  const matrix = createMatrix(size, size);
  for (let i = 0; i < size; i++) {
    matrix[i][i] = 1;
  }
  return matrix;
}

/**
 * Deep copy, used before running an in-place mutation on a matrix
 * that must be kept intact.
 */
export function cloneMatrix(matrix: ReadonlyMatrix): Matrix {
  return matrix.map((row) => [...row]);
}

export function matrixEquals(a: ReadonlyMatrix, b: ReadonlyMatrix): boolean {
  return _.isEqual(a, b);
}

/**
 * Two's complement wrap of an arbitrary-precision sum into int32 range.
 */
export function toInt32(value: BN): number {
  const wrapped = value.umod(TWO_POW_32);
  return wrapped.gte(TWO_POW_31)
    ? wrapped.sub(TWO_POW_32).toNumber()
    : wrapped.toNumber();
}
