import _ from 'lodash';
import { DEFAULT_FIELD_WIDTH, EMPTY_MATRIX_PLACEHOLDER } from '../constants';
import { ReadonlyMatrix } from '../types';
import { isEmptyMatrix } from '../utils/matrixHelper';

export type OutputSink = (text: string) => void;

const stdoutSink: OutputSink = (text) => {
  process.stdout.write(text);
};

/**
 * Render a matrix as its label, one line per row with every element
 * right-aligned in fieldWidth characters, then an empty line.
 */
export function formatMatrix(
  matrix: ReadonlyMatrix,
  label: string,
  fieldWidth: number = DEFAULT_FIELD_WIDTH
): string[] {
  if (isEmptyMatrix(matrix)) {
    return [label, EMPTY_MATRIX_PLACEHOLDER];
  }

  const rows = matrix.map((row) =>
    row.map((value) => _.padStart(String(value), fieldWidth)).join('')
  );
  return [label, ...rows, ''];
}

export class MatrixPrinter {
  private fieldWidth: number;
  private sink: OutputSink;

  constructor(fieldWidth: number = DEFAULT_FIELD_WIDTH, sink: OutputSink = stdoutSink) {
    this.fieldWidth = fieldWidth;
    this.sink = sink;
  }

  printLine(text: string): void {
    this.sink(`${text}\n`);
  }

  printMatrix(matrix: ReadonlyMatrix, label: string): void {
    this.sink(`${formatMatrix(matrix, label, this.fieldWidth).join('\n')}\n`);
  }
}
