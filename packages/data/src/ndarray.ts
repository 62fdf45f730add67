/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Dense row-major arrays backing mesh and data fields
 */

export type ElementKind = 'float' | 'int';

/** A dimension is either fixed or '*' (any length) */
export type Dimension = number | '*';
export type ShapeSpec = readonly Dimension[];

export interface FloatArray {
  kind: 'float';
  shape: readonly number[];
  data: Float64Array;
}

export interface IntArray {
  kind: 'int';
  shape: readonly number[];
  data: Int32Array;
}

export type NdArray = FloatArray | IntArray;

export function elementCount(shape: readonly number[]): number {
  let n = 1;
  for (const dim of shape) n *= dim;
  return n;
}

/**
 * Create an array from flat row-major values
 */
export function ndarray(kind: ElementKind, shape: readonly number[], values: ArrayLike<number>): NdArray {
  if (values.length !== elementCount(shape)) {
    throw new RangeError(`Expected ${elementCount(shape)} values for shape ${formatShape(shape)}, got ${values.length}`);
  }
  if (kind === 'int') {
    return { kind, shape: [...shape], data: Int32Array.from(values) };
  }
  return { kind, shape: [...shape], data: Float64Array.from(values) };
}

/** Length along the first dimension */
export function length(arr: NdArray): number {
  return arr.shape.length === 0 ? 0 : arr.shape[0];
}

/** Width of one row (product of trailing dimensions) */
export function rowSize(arr: NdArray): number {
  return elementCount(arr.shape.slice(1));
}

/**
 * Get row i as a plain number array
 */
export function row(arr: NdArray, i: number): number[] {
  const size = rowSize(arr);
  return Array.from(arr.data.subarray(i * size, (i + 1) * size));
}

/**
 * Convert to nested JS arrays (rank 1 or rank 2)
 */
export function toNested(arr: NdArray): number[] | number[][] {
  if (arr.shape.length <= 1) {
    return Array.from(arr.data);
  }
  const rows: number[][] = [];
  for (let i = 0; i < length(arr); i++) {
    rows.push(row(arr, i));
  }
  return rows;
}

export function cloneArray<T extends NdArray>(arr: T): T {
  return { ...arr, shape: [...arr.shape], data: arr.data.slice() };
}

/**
 * Content equality: same kind, same shape, same elements (NaN equals NaN)
 */
export function arraysEqual(a: NdArray, b: NdArray): boolean {
  if (a.kind !== b.kind) return false;
  if (a.shape.length !== b.shape.length) return false;
  for (let i = 0; i < a.shape.length; i++) {
    if (a.shape[i] !== b.shape[i]) return false;
  }
  if (a.data.length !== b.data.length) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (!Object.is(a.data[i], b.data[i]) && a.data[i] !== b.data[i]) return false;
  }
  return true;
}

/** Format a shape the way error messages show it, e.g. "(*, 3)" */
export function formatShape(shape: readonly Dimension[]): string {
  if (shape.length === 1) return `(${shape[0]},)`;
  return `(${shape.join(', ')})`;
}

export function matchesShape(shape: readonly number[], spec: ShapeSpec): boolean {
  if (shape.length !== spec.length) return false;
  return spec.every((dim, i) => dim === '*' || dim === shape[i]);
}
