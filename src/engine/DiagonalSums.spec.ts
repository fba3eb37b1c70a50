import { diagonalSums } from './DiagonalSums';

describe('DiagonalSums', () => {
  it('should sum the main and secondary diagonals of a 2x2 matrix', () => {
    const result = diagonalSums([
      [1, 2],
      [3, 4],
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.main.toString()).toBe('5');
      expect(result.value.secondary.toString()).toBe('5');
    }
  });

  it('should sum the diagonals of a 3x3 matrix', () => {
    const result = diagonalSums([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 10],
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.main.toString()).toBe('16');
      expect(result.value.secondary.toString()).toBe('15');
    }
  });

  it('should not overflow int32 while accumulating', () => {
    const result = diagonalSums([
      [2147483647, -2147483648],
      [-2147483648, 2147483647],
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.main.toString()).toBe('4294967294');
      expect(result.value.secondary.toString()).toBe('-4294967296');
    }
  });

  it('should report an empty matrix', () => {
    const result = diagonalSums([]);

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'EMPTY_MATRIX',
        op: 'diagonalSums',
        reason: 'Cannot calculate diagonals of an empty matrix',
      },
    });
  });

  it('should report a non-square matrix with its dimensions', () => {
    const result = diagonalSums([[1, 2, 3], [4, 5, 6]]);

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'NOT_SQUARE',
        op: 'diagonalSums',
        reason: 'Matrix must be square to calculate diagonals (got 2x3)',
        details: { height: 2, width: 3 },
      },
    });
  });

  it('should report jagged rows separately from a non-square shape', () => {
    const result = diagonalSums([[1, 2], [3]]);

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'JAGGED_MATRIX',
        op: 'diagonalSums',
        reason: 'Matrix rows must all have the same length to calculate diagonals',
        details: { rowLengths: [2, 1] },
      },
    });
  });
});
