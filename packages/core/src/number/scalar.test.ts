/**
 * Runtime tests for the scalar wrapper
 */

import { describe, it, expect } from 'vitest';
import { Scalar } from './scalar';
import { DivisionByZeroError } from './errors';

describe('Scalar', () => {
  it('should expose its value as data', () => {
    const s = new Scalar(2.5);
    expect(s.data).toBe(2.5);
    expect(s.valueOf()).toBe(2.5);
    expect(s.toString()).toBe('2.5');
  });

  it('should compare by value', () => {
    expect(new Scalar(1).equals(new Scalar(1))).toBe(true);
    expect(new Scalar(0).equals(new Scalar(-0))).toBe(true);
    expect(new Scalar(1).equals(new Scalar(2))).toBe(false);
    expect(new Scalar(1).equals(1)).toBe(false);
  });
});

describe('DivisionByZeroError', () => {
  it('should be a named Error', () => {
    const error = new DivisionByZeroError();
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DivisionByZeroError');
    expect(error.message).toBe('Division by zero');
  });

  it('should describe the dividend when given', () => {
    expect(new DivisionByZeroError('scalar 6').message).toBe('Division by zero: cannot divide scalar 6');
  });
});
