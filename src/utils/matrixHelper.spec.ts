import BN from "bn.js";
import {
  cloneMatrix,
  createMatrix,
  getDimensions,
  identityMatrix,
  isEmptyMatrix,
  isInt32,
  isRectangular,
  isSquare,
  matrixEquals,
  toInt32,
} from "./matrixHelper";

describe("#matrixHelper", () => {
  describe("#getDimensions", () => {
    it("should take the width from the first row", () => {
      expect(getDimensions([[1, 2, 3], [4, 5, 6]])).toEqual({ height: 2, width: 3 });
    });

    it("should report zero width for a matrix without rows", () => {
      expect(getDimensions([])).toEqual({ height: 0, width: 0 });
    });
  });

  describe("#shape predicates", () => {
    it("should treat no rows or an empty first row as empty", () => {
      expect(isEmptyMatrix([])).toBe(true);
      expect(isEmptyMatrix([[]])).toBe(true);
      expect(isEmptyMatrix([[0]])).toBe(false);
    });

    it("should detect jagged rows", () => {
      expect(isRectangular([[1, 2], [3, 4]])).toBe(true);
      expect(isRectangular([[1, 2], [3]])).toBe(false);
    });

    it("should only call rectangular matrices with equal sides square", () => {
      expect(isSquare([[1, 2], [3, 4]])).toBe(true);
      expect(isSquare([[1, 2, 3], [4, 5, 6]])).toBe(false);
      expect(isSquare([[1, 2], [3]])).toBe(false);
    });
  });

  describe("#isInt32", () => {
    it("should accept the int32 bounds and reject anything past them", () => {
      expect(isInt32(-2147483648)).toBe(true);
      expect(isInt32(2147483647)).toBe(true);
      expect(isInt32(2147483648)).toBe(false);
      expect(isInt32(0.5)).toBe(false);
    });
  });

  describe("#createMatrix", () => {
    it("should build independent rows filled with the given value", () => {
      const matrix = createMatrix(2, 3, 7);
      matrix[0][0] = 1;

      expect(matrix).toEqual([
        [1, 7, 7],
        [7, 7, 7],
      ]);
    });

    it("should throw on a negative size", () => {
      expect(() => createMatrix(-1, 2)).toThrow("invalid height");
    });
  });

  describe("#identityMatrix", () => {
    it("should put ones on the main diagonal", () => {
      expect(identityMatrix(3)).toEqual([
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
      ]);
    });
  });

  describe("#cloneMatrix", () => {
    it("should return a copy that does not share rows with the source", () => {
      const source = [
        [1, 2],
        [3, 4],
      ];
      const copy = cloneMatrix(source);
      copy[0][0] = 100;

      expect(source[0][0]).toBe(1);
      expect(matrixEquals(copy, [[100, 2], [3, 4]])).toBe(true);
    });
  });

  describe("#toInt32", () => {
    it("should leave in-range values as they are", () => {
      expect(toInt32(new BN(-42))).toBe(-42);
      expect(toInt32(new BN(2147483647))).toBe(2147483647);
    });

    it("should wrap values past the int32 bounds", () => {
      expect(toInt32(new BN(2147483648))).toBe(-2147483648);
      expect(toInt32(new BN(-2147483649))).toBe(2147483647);
      expect(toInt32(new BN("4294967296"))).toBe(0);
    });
  });
});
