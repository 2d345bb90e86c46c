/**
 * Arithmetic operand classification
 *
 * Multiplication accepts three unrelated operand kinds. Values are sorted into
 * a closed tagged union once, so operators can match on `kind` exhaustively;
 * anything outside the union is rejected with UnsupportedOperandError.
 */

import { Scalar } from '../number/scalar';
import { UnsupportedOperandError } from './errors';

/**
 * A right-hand operand accepted by multiplication
 *
 * @template T - Tensor type of the receiving rank
 */
export type Operand<T> =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'tensor'; readonly tensor: T }
  | { readonly kind: 'scalar'; readonly scalar: Scalar };

/**
 * A right-hand operand accepted by division (no tensor-by-tensor division)
 */
export type DivisorOperand = Exclude<Operand<never>, { readonly kind: 'tensor' }>;

/**
 * Sort a multiplication operand into its kind
 *
 * @param operation - Operation name used in the error message
 * @param value - Operand as received from the caller
 * @param isTensor - Guard recognising tensors of the receiving rank
 * @throws UnsupportedOperandError for any other value
 */
export function classifyOperand<T>(
  operation: string,
  value: unknown,
  isTensor: (value: unknown) => value is T,
): Operand<T> {
  if (typeof value === 'number') {
    return { kind: 'number', value };
  }
  if (value instanceof Scalar) {
    return { kind: 'scalar', scalar: value };
  }
  if (isTensor(value)) {
    return { kind: 'tensor', tensor: value };
  }
  throw new UnsupportedOperandError(operation, value);
}

/**
 * Sort a division operand into its kind
 *
 * @throws UnsupportedOperandError for tensors and any other non-scalar value
 */
export function classifyDivisor(value: unknown): DivisorOperand {
  if (typeof value === 'number') {
    return { kind: 'number', value };
  }
  if (value instanceof Scalar) {
    return { kind: 'scalar', scalar: value };
  }
  throw new UnsupportedOperandError('divide', value);
}

/**
 * Numeric value carried by a scalar-like operand
 */
export function operandValue(operand: DivisorOperand): number {
  return operand.kind === 'number' ? operand.value : operand.scalar.data;
}
