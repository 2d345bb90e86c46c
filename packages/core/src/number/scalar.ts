/**
 * Scalar number wrapper
 *
 * A single numeric value that other algebraic types accept as an operand,
 * e.g. `tensor.mul(new Scalar(2))`. Operators read it through `data`.
 */

export class Scalar {
  constructor(public readonly data: number) {}

  equals(other: unknown): boolean {
    return other instanceof Scalar && other.data === this.data;
  }

  valueOf(): number {
    return this.data;
  }

  toString(): string {
    return this.data.toString();
  }
}
