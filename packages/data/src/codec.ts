/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Binary codecs for array fields
 *
 * Arrays are stored little-endian at a fixed element width:
 * - float fields as float32 (4 bytes)
 * - int fields as int32 (4 bytes)
 *
 * The encoding carries no header; shape comes from the field declaration.
 */

import { DecodeError, PayloadTooLargeError } from './errors.js';
import type { ElementKind, NdArray, ShapeSpec } from './ndarray.js';
import { elementCount, formatShape } from './ndarray.js';

export type DType = 'Float32Array' | 'Int32Array';

export interface ArrayCodec {
  readonly kind: ElementKind;
  /** Wire dtype tag sent alongside uploaded files */
  readonly dtype: DType;
  /** Bytes per element */
  readonly itemSize: number;
  encode(arr: NdArray): Uint8Array;
  decode(bytes: Uint8Array, shape: ShapeSpec): NdArray;
  byteSize(arr: NdArray): number;
}

/**
 * Resolve a declared shape against an element count.
 * At most one '*' is allowed; it absorbs whatever the fixed dimensions leave.
 */
function resolveShape(count: number, spec: ShapeSpec, byteLength: number, itemSize: number): number[] {
  const wildcards = spec.filter(dim => dim === '*').length;
  if (wildcards > 1) {
    throw new DecodeError(
      `Cannot decode into ${formatShape(spec)}: more than one open dimension`,
      byteLength,
      itemSize,
      formatShape(spec)
    );
  }

  let fixed = 1;
  for (const dim of spec) {
    if (dim !== '*') fixed *= dim;
  }

  if (wildcards === 0) {
    if (count !== fixed) {
      throw new DecodeError(
        `Expected ${fixed * itemSize} bytes for shape ${formatShape(spec)}, got ${byteLength}`,
        byteLength,
        itemSize,
        formatShape(spec)
      );
    }
    return spec.map(dim => (dim === '*' ? 0 : dim));
  }

  if (fixed === 0 ? count !== 0 : count % fixed !== 0) {
    throw new DecodeError(
      `${byteLength} bytes is not a whole number of ${formatShape(spec)} rows`,
      byteLength,
      itemSize,
      formatShape(spec)
    );
  }
  const open = fixed === 0 ? 0 : count / fixed;
  return spec.map(dim => (dim === '*' ? open : dim));
}

function countItems(bytes: Uint8Array, itemSize: number, spec: ShapeSpec): number {
  if (bytes.byteLength % itemSize !== 0) {
    throw new DecodeError(
      `${bytes.byteLength} bytes is not a multiple of the ${itemSize}-byte element width`,
      bytes.byteLength,
      itemSize,
      formatShape(spec)
    );
  }
  return bytes.byteLength / itemSize;
}

export const FLOAT32_CODEC: ArrayCodec = {
  kind: 'float',
  dtype: 'Float32Array',
  itemSize: 4,

  encode(arr: NdArray): Uint8Array {
    const out = new Uint8Array(arr.data.length * 4);
    const view = new DataView(out.buffer);
    for (let i = 0; i < arr.data.length; i++) {
      view.setFloat32(i * 4, arr.data[i], true);
    }
    return out;
  },

  decode(bytes: Uint8Array, spec: ShapeSpec): NdArray {
    const count = countItems(bytes, 4, spec);
    const shape = resolveShape(count, spec, bytes.byteLength, 4);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const data = new Float64Array(count);
    for (let i = 0; i < count; i++) {
      data[i] = view.getFloat32(i * 4, true);
    }
    return { kind: 'float', shape, data };
  },

  byteSize(arr: NdArray): number {
    return elementCount(arr.shape) * 4;
  },
};

export const INT32_CODEC: ArrayCodec = {
  kind: 'int',
  dtype: 'Int32Array',
  itemSize: 4,

  encode(arr: NdArray): Uint8Array {
    const out = new Uint8Array(arr.data.length * 4);
    const view = new DataView(out.buffer);
    for (let i = 0; i < arr.data.length; i++) {
      view.setInt32(i * 4, arr.data[i], true);
    }
    return out;
  },

  decode(bytes: Uint8Array, spec: ShapeSpec): NdArray {
    const count = countItems(bytes, 4, spec);
    const shape = resolveShape(count, spec, bytes.byteLength, 4);
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const data = new Int32Array(count);
    for (let i = 0; i < count; i++) {
      data[i] = view.getInt32(i * 4, true);
    }
    return { kind: 'int', shape, data };
  },

  byteSize(arr: NdArray): number {
    return elementCount(arr.shape) * 4;
  },
};

export function codecFor(kind: ElementKind): ArrayCodec {
  return kind === 'int' ? INT32_CODEC : FLOAT32_CODEC;
}

/**
 * Fail fast when an array would exceed the per-file limit
 */
export function checkSize(name: string, arr: NdArray, limit: number): void {
  const size = codecFor(arr.kind).byteSize(arr);
  if (size > limit) {
    throw new PayloadTooLargeError(name, size, limit);
  }
}
