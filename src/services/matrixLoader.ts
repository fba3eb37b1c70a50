import fs from 'fs';
import { LoadedMatrices, Matrix, OperationResult } from '../types';
import { getLogger } from '../utils/Logger';
import { isInt32 } from '../utils/matrixHelper';

const logger = getLogger(module);

const INTEGER_TOKEN = /^[+-]?\d+$/;

export type MatrixLoadErrorKind = 'FILE_UNREADABLE' | 'INVALID_SIZE' | 'INVALID_ELEMENT';

export type MatrixLabel = 'A' | 'B';

export interface ElementLocation {
  matrix: MatrixLabel;
  row: number;
  col: number;
}

export class MatrixLoadError extends Error {
  readonly kind: MatrixLoadErrorKind;
  readonly fileName: string;
  readonly location?: ElementLocation;

  constructor(
    kind: MatrixLoadErrorKind,
    message: string,
    fileName: string,
    location?: ElementLocation
  ) {
    super(message);
    this.name = 'MatrixLoadError';
    this.kind = kind;
    this.fileName = fileName;
    this.location = location;
  }
}

type LoadResult = OperationResult<LoadedMatrices, MatrixLoadError>;

function parseInteger(token: string | undefined): number | null {
  if (token === undefined || !INTEGER_TOKEN.test(token)) {
    return null;
  }
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}

function fail(error: MatrixLoadError): LoadResult {
  logger.error(`Error: ${error.message}`);
  return { ok: false, error };
}

/**
 * Parse the "N, then N*N elements of A, then N*N elements of B" format.
 * Whitespace between tokens is insignificant and anything after the
 * second block is ignored.
 */
export function parseMatrices(content: string, fileName: string): LoadResult {
  const tokens = content.split(/\s+/).filter((token) => token.length > 0);

  const size = parseInteger(tokens[0]);
  if (size === null || size <= 0) {
    return fail(
      new MatrixLoadError(
        'INVALID_SIZE',
        `Invalid or missing matrix size N in file ${fileName}`,
        fileName
      )
    );
  }

  const n: number = size;
  let cursor = 1;
  const readMatrix = (label: MatrixLabel): Matrix | MatrixLoadError => {
    const matrix: Matrix = [];
    for (let i = 0; i < n; i++) {
      const row: number[] = [];
      for (let j = 0; j < n; j++) {
        const value = parseInteger(tokens[cursor]);
        if (value === null || !isInt32(value)) {
          return new MatrixLoadError(
            'INVALID_ELEMENT',
            `Failed to read element for Matrix ${label} at [${i}][${j}]`,
            fileName,
            { matrix: label, row: i, col: j }
          );
        }
        row.push(value);
        cursor++;
      }
      matrix.push(row);
    }
    return matrix;
  };

  const matrixA = readMatrix('A');
  if (matrixA instanceof MatrixLoadError) {
    return fail(matrixA);
  }
  const matrixB = readMatrix('B');
  if (matrixB instanceof MatrixLoadError) {
    return fail(matrixB);
  }

  logger.debug(`Parsed two ${size}x${size} matrices from ${fileName}`);
  return { ok: true, value: { size: n, matrixA, matrixB } };
}

/**
 * Read and parse the input file. The file is read in a single call,
 * so nothing stays open once this returns.
 */
export function loadMatrices(fileName: string): LoadResult {
  let content: string;
  try {
    content = fs.readFileSync(fileName, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.debug(`readFileSync failed: ${reason}`);
    return fail(
      new MatrixLoadError('FILE_UNREADABLE', `Could not open file ${fileName}`, fileName)
    );
  }

  return parseMatrices(content, fileName);
}
