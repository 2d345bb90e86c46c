/**
 * Text rendering of nested tensor data
 *
 * Debug-oriented output only; not a stable serialization format.
 */

import { computeSize } from '../shape/runtime';
import type { Shape } from '../shape/types';
import type { NestedNumbers } from './types';

/**
 * Item count above which `format` truncates long axes
 */
export const FORMAT_MAX_ELEMENTS = 1000;

/**
 * Number of items kept at each end of a truncated axis
 */
export const FORMAT_EDGE_ITEMS = 3;

export interface FormatOptions {
  /** Truncate when the tensor holds more items than this */
  maxElements?: number;
  /** Items kept at each end of a truncated axis */
  edgeItems?: number;
}

/**
 * Format a single value for display
 *
 * Integers print as-is; other values are rounded to 4 decimal places with
 * trailing zeros dropped.
 */
export function formatValue(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }
  return value.toFixed(4).replace(/\.?0+$/, '');
}

/**
 * Single-line rendering, e.g. `[[1, 2], [3, 4]]`
 */
export function formatInline(data: NestedNumbers): string {
  if (typeof data === 'number') {
    return formatValue(data);
  }
  return `[${data.map((item) => formatInline(item)).join(', ')}]`;
}

/**
 * Multi-line rendering similar to PyTorch's tensor printing
 *
 * @example
 * formatNested('Tensor4', [[[[1, 2], [3, 4]]]], [1, 1, 2, 2]);
 * // Tensor4([[[[1, 2],
 * //            [3, 4]]]])
 */
export function formatNested(
  label: string,
  data: NestedNumbers,
  dims: Shape,
  options: FormatOptions = {},
): string {
  const size = computeSize(dims);
  if (size === 0) {
    return `${label}(${formatInline(data)})`;
  }

  const maxElements = options.maxElements ?? FORMAT_MAX_ELEMENTS;
  const edgeItems = options.edgeItems ?? FORMAT_EDGE_ITEMS;
  const prefix = `${label}(`;

  return `${prefix}${formatBlock(data, dims.length, prefix.length, size > maxElements, edgeItems)})`;
}

/**
 * Format one nested level whose opening bracket sits at column `indent`
 */
function formatBlock(
  data: NestedNumbers,
  rank: number,
  indent: number,
  truncate: boolean,
  edgeItems: number,
): string {
  if (typeof data === 'number') {
    return formatValue(data);
  }

  const parts = visibleIndices(data.length, truncate, edgeItems).map((index) => {
    if (index === null) {
      return '...';
    }
    const item = data[index];
    return item === undefined ? '' : formatBlock(item, rank - 1, indent + 1, truncate, edgeItems);
  });

  // Inner rows share a line; outer blocks are separated by one blank line per remaining level
  const separator =
    rank <= 1 ? ', ' : `,${'\n'.repeat(rank - 1)}${' '.repeat(indent + 1)}`;
  return `[${parts.join(separator)}]`;
}

/**
 * Indices shown along an axis, with `null` marking the elided middle
 */
function visibleIndices(size: number, truncate: boolean, edgeItems: number): (number | null)[] {
  if (!truncate || size <= 2 * edgeItems) {
    return Array.from({ length: size }, (_, i) => i);
  }
  const head = Array.from({ length: edgeItems }, (_, i) => i);
  const tail = Array.from({ length: edgeItems }, (_, i) => size - edgeItems + i);
  return [...head, null, ...tail];
}
