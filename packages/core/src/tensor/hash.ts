/**
 * Structural hashing for tensors
 *
 * Hashes are 32-bit unsigned integers built from a tensor's shape followed by
 * its values in nesting order. Values that `sameValue` treats as equal hash
 * equal: `0` and `-0` share a hash, and so does every NaN.
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const scratch = new DataView(new ArrayBuffer(8));

/**
 * Avalanche a 32-bit value
 */
export function mix32(value: number): number {
  let v = value >>> 0;
  v ^= v >>> 16;
  v = Math.imul(v, 0x7feb352d);
  v ^= v >>> 15;
  v = Math.imul(v, 0x846ca68b);
  v ^= v >>> 16;
  return v >>> 0;
}

/**
 * Fold one 32-bit word into a running FNV-1a state
 */
function combineWord(state: number, word: number): number {
  return Math.imul(state ^ word, FNV_PRIME) >>> 0;
}

/**
 * Fold a number's IEEE-754 bits into a running hash state
 */
export function combineNumber(state: number, value: number): number {
  // +0 and -0 compare equal, as do all NaNs whatever their payload
  scratch.setFloat64(0, value === 0 ? 0 : Number.isNaN(value) ? Number.NaN : value);
  return combineWord(combineWord(state, scratch.getUint32(0)), scratch.getUint32(4));
}

/**
 * Incremental structural hasher
 *
 * @example
 * const hasher = new StructuralHasher();
 * hasher.addShape([2, 2]);
 * values.forEach((v) => hasher.add(v));
 * const hash = hasher.digest();
 */
export class StructuralHasher {
  private state = FNV_OFFSET;

  addShape(dims: readonly number[]): this {
    this.state = combineWord(this.state, dims.length);
    for (const dim of dims) {
      this.state = combineWord(this.state, dim);
    }
    return this;
  }

  add(value: number): this {
    this.state = combineNumber(this.state, value);
    return this;
  }

  digest(): number {
    return mix32(this.state);
  }
}

/**
 * Hash a shape and its flattened values in one call
 */
export function hashValues(dims: readonly number[], values: Iterable<number>): number {
  const hasher = new StructuralHasher().addShape(dims);
  for (const value of values) {
    hasher.add(value);
  }
  return hasher.digest();
}
