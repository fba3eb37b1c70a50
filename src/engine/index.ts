/**
 * Engine Layer
 * Pure matrix arithmetic, diagonal sums and in-place mutations
 */

export * from './errors';
export * from './MatrixArithmetic';
export * from './DiagonalSums';
export * from './MatrixMutations';
