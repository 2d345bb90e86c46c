/**
 * Storage helpers for rank-4 tensors
 *
 * Extent reading, rectangularity validation, copying and flattening of the
 * nested `length → width → depth → depth2` layout.
 */

import type { Shape4 } from '../shape/types';
import { InvalidShapeError } from './errors';
import type { ReadonlyStorage4, Storage4 } from './types';

/**
 * Helper for exhaustive switch statements
 *
 * @example
 * switch (operand.kind) {
 *   case 'number': ...
 *   case 'tensor': ...
 *   case 'scalar': ...
 *   default:
 *     return assertExhaustiveSwitch(operand); // TypeScript error if cases missing
 * }
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}

/**
 * Value equality used by tensor `equals`: `===`, except that NaN equals NaN
 *
 * Keeps `equals` reflexive, so a tensor holding NaN can be found again as a
 * key of a hash-based container. `0` and `-0` stay equal.
 */
export function sameValue(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Read the axis sizes along the first element chain
 *
 * Once a level is empty, every inner axis reads as 0.
 */
export function readExtents(data: ReadonlyStorage4): Shape4 {
  const rows = data[0];
  const columns = rows?.[0];
  const depths = columns?.[0];
  return [data.length, rows?.length ?? 0, columns?.length ?? 0, depths?.length ?? 0];
}

/**
 * Validate that every sibling array at each level has the same length
 *
 * @throws InvalidShapeError naming the first jagged position (0-based)
 */
export function assertRectangular(data: ReadonlyStorage4): void {
  const [length, width, depth, depth2] = readExtents(data);

  for (let l = 0; l < length; l++) {
    const row = data[l];
    if (row === undefined || row.length !== width) {
      throw jagged([l], width, row?.length);
    }
    for (let w = 0; w < width; w++) {
      const column = row[w];
      if (column === undefined || column.length !== depth) {
        throw jagged([l, w], depth, column?.length);
      }
      for (let d = 0; d < depth; d++) {
        const cell = column[d];
        if (cell === undefined || cell.length !== depth2) {
          throw jagged([l, w, d], depth2, cell?.length);
        }
      }
    }
  }
}

function jagged(position: number[], expected: number, actual: number | undefined): InvalidShapeError {
  return new InvalidShapeError(
    `Jagged tensor data: expected ${expected.toString()} items at [${position.join(', ')}] but found ${String(actual)}`,
  );
}

/**
 * Independent deep copy of nested rank-4 data
 */
export function copyStorage(data: ReadonlyStorage4): Storage4 {
  return data.map((row) => row.map((column) => column.map((cell) => cell.slice())));
}

/**
 * Deep copy with every value passed through `f`
 */
export function mapStorage(data: ReadonlyStorage4, f: (value: number) => number): Storage4 {
  return data.map((row) => row.map((column) => column.map((cell) => cell.map((v) => f(v)))));
}

/**
 * Iterate values in nesting order without allocating a flat copy
 */
export function* iterateStorage(data: ReadonlyStorage4): Generator<number, void, undefined> {
  for (const row of data) {
    for (const column of row) {
      for (const cell of column) {
        yield* cell;
      }
    }
  }
}

/**
 * Values in nesting order
 */
export function flattenStorage(data: ReadonlyStorage4): number[] {
  const out: number[] = [];
  for (const row of data) {
    for (const column of row) {
      for (const cell of column) {
        for (const value of cell) {
          out.push(value);
        }
      }
    }
  }
  return out;
}
