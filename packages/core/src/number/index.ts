/**
 * Number module exports
 *
 * @module number
 */

export { Scalar } from './scalar';
export { DivisionByZeroError } from './errors';
