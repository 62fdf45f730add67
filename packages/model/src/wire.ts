/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wire format types and narrowing helpers for downloaded resource JSON
 *
 * Array-valued fields travel as references (URLs) next to the JSON; the
 * bytes behind each reference are the canonical codec encoding.
 */

import { InvalidWireFormatError } from '@meshsync/data';
import type { DType } from '@meshsync/data';

/**
 * Resolves an array reference to its encoded bytes.
 * Implemented by the transport (HTTP) and by archives (zip entries).
 */
export interface ArrayFetcher {
  fetchArray(ref: string): Promise<Uint8Array>;
}

/** One encoded array of a dirty-file set */
export interface EncodedArray {
  bytes: Uint8Array;
  dtype: DType;
  shape: number[];
}

/** Array identifier -> encoded bytes */
export type DirtyFileSet = Map<string, EncodedArray>;

export type ResourceKind = 'line' | 'point';

/** Title/description handed to mesh builders by their owning resource */
export interface ResourceMeta {
  title?: string;
  description?: string;
}

export interface MeshJson {
  title?: string;
  description?: string;
  vertices: string;
  segments?: string;
  meta?: Record<string, unknown>;
}

export interface DataArrayJson {
  title?: string;
  description?: string;
  array: string;
  order?: string;
}

export interface BinderJson {
  location: string;
  data: DataArrayJson;
}

export interface ResourceJson {
  title?: string;
  description?: string;
  mesh: MeshJson;
  data?: BinderJson[];
  meta?: Record<string, unknown>;
}

// ============================================================================
// Narrowing helpers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

export function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new InvalidWireFormatError(path, `expected an object, got ${describeValue(value)}`);
  }
  return value;
}

export function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new InvalidWireFormatError(path, `expected a string, got ${describeValue(value)}`);
  }
  return value;
}

export function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined || value === null ? undefined : expectString(value, path);
}

export function optionalRecord(value: unknown, path: string): Record<string, unknown> | undefined {
  return value === undefined || value === null ? undefined : expectRecord(value, path);
}

export function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidWireFormatError(path, `expected an array, got ${describeValue(value)}`);
  }
  return value;
}

/**
 * Narrow raw JSON to a MeshJson; `arrays` lists the reference keys it must carry
 */
export function parseMeshJson(value: unknown, path: string, arrays: readonly string[]): MeshJson {
  const json = expectRecord(value, path);
  const mesh: MeshJson = {
    title: optionalString(json.title, `${path}.title`),
    description: optionalString(json.description, `${path}.description`),
    vertices: expectString(json.vertices, `${path}.vertices`),
    meta: optionalRecord(json.meta, `${path}.meta`),
  };
  if (arrays.includes('segments')) {
    mesh.segments = expectString(json.segments, `${path}.segments`);
  }
  return mesh;
}

export function parseDataArrayJson(value: unknown, path: string): DataArrayJson {
  const json = expectRecord(value, path);
  return {
    title: optionalString(json.title, `${path}.title`),
    description: optionalString(json.description, `${path}.description`),
    array: expectString(json.array, `${path}.array`),
    order: optionalString(json.order, `${path}.order`),
  };
}

export function parseResourceJson(value: unknown, meshArrays: readonly string[]): ResourceJson {
  const json = expectRecord(value, 'resource');
  const data = json.data === undefined || json.data === null ? [] : expectArray(json.data, 'resource.data');
  return {
    title: optionalString(json.title, 'resource.title'),
    description: optionalString(json.description, 'resource.description'),
    mesh: parseMeshJson(json.mesh, 'resource.mesh', meshArrays),
    meta: optionalRecord(json.meta, 'resource.meta'),
    data: data.map((entry, i) => {
      const binder = expectRecord(entry, `resource.data[${i}]`);
      return {
        location: expectString(binder.location, `resource.data[${i}].location`),
        data: parseDataArrayJson(binder.data, `resource.data[${i}].data`),
      };
    }),
  };
}
