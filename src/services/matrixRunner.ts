import { add, diagonalSums, multiply, swapCols, swapRows, updateElement } from '../engine';
import { DimensionMismatchError } from '../engine/errors';
import { LoadedMatrices, Matrix, MatrixConfig, OperationResult } from '../types';
import { getLogger } from '../utils/Logger';
import { cloneMatrix } from '../utils/matrixHelper';
import { addSentryBreadcrumb, captureException } from '../utils/sentry';
import { loadMatrices, MatrixLoadError } from './matrixLoader';
import { MatrixPrinter } from './matrixPrinter';

const logger = getLogger(module);

export type MatrixSource = (
  fileName: string
) => OperationResult<LoadedMatrices, MatrixLoadError>;

export interface MatrixRunnerOptions {
  printer?: MatrixPrinter;
  source?: MatrixSource;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Runs the full demonstration: load, print, add, multiply, diagonal
 * sums, then row swap, column swap and element update on copies.
 *
 * Dimension mismatches in add/multiply end the run; rejected mutations
 * are reported by the engine and the run carries on.
 */
export class MatrixRunner {
  private config: MatrixConfig;
  private printer: MatrixPrinter;
  private source: MatrixSource;

  constructor(config: MatrixConfig, options: MatrixRunnerOptions = {}) {
    this.config = config;
    this.printer = options.printer ?? new MatrixPrinter(config.fieldWidth);
    this.source = options.source ?? loadMatrices;
  }

  run(fileName: string): number {
    const loaded = this.source(fileName);
    if (!loaded.ok) {
      logger.error(`Error loading matrices from file: ${fileName}`);
      return EXIT_FAILURE;
    }

    const { matrixA, matrixB } = loaded.value;
    addSentryBreadcrumb(`Loaded ${loaded.value.size}x${loaded.value.size} matrices`, 'load', {
      fileName,
    });

    this.printer.printLine('\nMatrices loaded');
    this.printer.printMatrix(matrixA, 'Matrix A:');
    this.printer.printMatrix(matrixB, 'Matrix B:');

    this.printer.printLine('\nMatrix Addition');
    const sum = add(matrixA, matrixB);
    if (!sum.ok) {
      return this.abort(sum.error, fileName);
    }
    this.printer.printMatrix(sum.value, 'Result (A + B):');

    this.printer.printLine('\nMatrix Multiplication');
    const product = multiply(matrixA, matrixB);
    if (!product.ok) {
      return this.abort(product.error, fileName);
    }
    this.printer.printMatrix(product.value, 'Result (A * B):');

    this.printer.printLine('\nDiagonal Sums (Matrix A)');
    const diagonals = diagonalSums(matrixA);
    if (diagonals.ok) {
      this.printer.printLine(
        `Sum of main diagonal elements: ${diagonals.value.main.toString()}`
      );
      this.printer.printLine(
        `Sum of secondary diagonal elements: ${diagonals.value.secondary.toString()}`
      );
    }

    this.runMutations(matrixA, matrixB);

    return EXIT_SUCCESS;
  }

  private runMutations(matrixA: Matrix, matrixB: Matrix): void {
    const [row1, row2] = this.config.rowSwap;
    this.printer.printLine(`\nSwapping Rows ${row1} and ${row2} of Matrix A`);
    const rowsSwapped = cloneMatrix(matrixA);
    swapRows(rowsSwapped, row1, row2);
    this.printer.printMatrix(rowsSwapped, 'Matrix A after row swap:');

    const [col1, col2] = this.config.columnSwap;
    this.printer.printLine(`\nSwapping Columns ${col1} and ${col2} of Matrix B`);
    const colsSwapped = cloneMatrix(matrixB);
    swapCols(colsSwapped, col1, col2);
    this.printer.printMatrix(colsSwapped, 'Matrix B after column swap:');

    const { row, col, value } = this.config.elementUpdate;
    this.printer.printLine(`\nUpdating Element (${row}, ${col}) in Matrix A to ${value}`);
    const updated = cloneMatrix(matrixA);
    updateElement(updated, row, col, value);
    this.printer.printMatrix(updated, 'Matrix A after update:');
  }

  private abort(error: DimensionMismatchError, fileName: string): number {
    logger.error(`Fatal: ${error.message}`);
    captureException(error, { inputFile: fileName, stage: error.operation });
    return EXIT_FAILURE;
  }
}
