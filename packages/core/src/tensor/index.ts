/**
 * Tensor module exports
 *
 * @module tensor
 *
 * The rank-4 tensor, the generation protocol it builds on and the helpers
 * shared by every rank.
 */

export { Tensor4, isTensor4 } from './tensor4';
export type { TensorOperand, MulOperand, DivOperand, ForEachFn } from './tensor4';
export { GenericTensor, generateTensor } from './generic';
export type { GenerateOptions } from './generic';
export { classifyOperand, classifyDivisor, operandValue } from './operand';
export type { Operand, DivisorOperand } from './operand';
export {
  TensorError,
  IndexOutOfRangeError,
  ShapeMismatchError,
  RankMismatchError,
  UnsupportedOperandError,
  InvalidShapeError,
  EmptyTensorError,
} from './errors';
export { StructuralHasher, hashValues } from './hash';
export {
  formatValue,
  formatInline,
  formatNested,
  FORMAT_MAX_ELEMENTS,
  FORMAT_EDGE_ITEMS,
} from './format';
export type { FormatOptions } from './format';
export { assertExhaustiveSwitch } from './utils';
export type {
  Storage4,
  ReadonlyStorage4,
  NestedNumbers,
  IndexGenerator,
  MapFn,
  ReduceFn,
  PredicateFn,
  TensorBase,
} from './types';
