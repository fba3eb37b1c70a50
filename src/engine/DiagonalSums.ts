import BN from "bn.js";
import { DiagonalSums, MatrixDiagnostic, OperationResult, ReadonlyMatrix } from "../types";
import { getLogger } from "../utils/Logger";
import { formatDimensions, getDimensions, isRectangular, isSquare } from "../utils/matrixHelper";
import { makeDiagnostic } from "./errors";

const logger = getLogger(module);

/**
 * Sum of the main diagonal M[i][i] and the secondary diagonal
 * M[i][n-1-i] of a square matrix.
 */
export function diagonalSums(
  matrix: ReadonlyMatrix
): OperationResult<DiagonalSums, MatrixDiagnostic> {
  const { height, width } = getDimensions(matrix);

  if (height === 0 || width === 0) {
    return report(
      makeDiagnostic(
        "EMPTY_MATRIX",
        "diagonalSums",
        "Cannot calculate diagonals of an empty matrix"
      )
    );
  }

  if (!isRectangular(matrix)) {
    return report(
      makeDiagnostic(
        "JAGGED_MATRIX",
        "diagonalSums",
        "Matrix rows must all have the same length to calculate diagonals",
        { rowLengths: matrix.map((row) => row.length) }
      )
    );
  }

  if (!isSquare(matrix)) {
    return report(
      makeDiagnostic(
        "NOT_SQUARE",
        "diagonalSums",
        `Matrix must be square to calculate diagonals (got ${formatDimensions(matrix)})`,
        { height, width }
      )
    );
  }

  const n = height;
  let main = new BN(0);
  let secondary = new BN(0);
  for (let i = 0; i < n; i++) {
    main = main.add(new BN(matrix[i][i]));
    secondary = secondary.add(new BN(matrix[i][n - 1 - i]));
  }

  return { ok: true, value: { main, secondary } };
}

function report(
  diagnostic: MatrixDiagnostic
): OperationResult<DiagonalSums, MatrixDiagnostic> {
  logger.warn(`DiagonalSums: ${diagnostic.reason}`);
  return { ok: false, error: diagnostic };
}
