/**
 * Fixed-length numeric arrays
 */

export { FixedArray } from './fixed-array';
export type { BinaryOperand, ElementwiseOp } from './fixed-array';
