/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Field type factories
 *
 * Each factory returns a FieldType that entity classes attach to their
 * TypedFields. Codecs are picked here, when the schema is declared.
 */

import {
  KindMismatchError,
  ShapeMismatchError,
  arraysEqual,
  cloneArray,
  codecFor,
  formatShape,
  matchesShape,
  toNested,
} from '@meshsync/data';
import type { ArrayCodec, ElementKind, NdArray, ShapeSpec } from '@meshsync/data';
import type { FieldType, JsonValue } from './field.js';
import type { PropertyObject } from './property-object.js';
import { describeValue, isPlainObject, isRecord } from './wire.js';

// ============================================================================
// Arrays
// ============================================================================

export interface ArrayFieldType extends FieldType<NdArray> {
  readonly shape: ShapeSpec;
  readonly elementKind: ElementKind;
  readonly codec: ArrayCodec;
}

type NumericTypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return (
    value instanceof Float64Array ||
    value instanceof Float32Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof Int16Array ||
    value instanceof Uint16Array ||
    value instanceof Int8Array ||
    value instanceof Uint8Array ||
    value instanceof Uint8ClampedArray
  );
}

export function isNdArray(value: unknown): value is NdArray {
  if (!isRecord(value)) return false;
  if (!Array.isArray(value.shape)) return false;
  return (
    (value.kind === 'float' && value.data instanceof Float64Array) ||
    (value.kind === 'int' && value.data instanceof Int32Array)
  );
}

/**
 * Walk nested JS arrays, checking they are rectangular and collecting leaves
 */
function flattenNested(field: string, value: readonly unknown[], out: unknown[]): number[] {
  if (value.length === 0) return [0];
  const first = value[0];
  if (!Array.isArray(first)) {
    for (const item of value) {
      if (Array.isArray(item)) {
        throw new ShapeMismatchError(field, 'a rectangular array', 'a ragged array');
      }
      out.push(item);
    }
    return [value.length];
  }

  let inner: number[] | null = null;
  for (const item of value) {
    if (!Array.isArray(item)) {
      throw new ShapeMismatchError(field, 'a rectangular array', 'a ragged array');
    }
    const shape = flattenNested(field, item, out);
    if (inner && (inner.length !== shape.length || inner.some((dim, i) => dim !== shape[i]))) {
      throw new ShapeMismatchError(field, 'a rectangular array', 'a ragged array');
    }
    inner = shape;
  }
  return [value.length, ...(inner ?? [])];
}

function toElements(field: string, kind: ElementKind, values: ArrayLike<unknown>): number[] {
  const elements: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (typeof v !== 'number') {
      throw new KindMismatchError(field, kind === 'int' ? 'integer elements' : 'numeric elements', describeValue(v));
    }
    if (kind === 'int' && (!Number.isInteger(v) || v < -2147483648 || v > 2147483647)) {
      throw new KindMismatchError(field, 'int32 elements', String(v));
    }
    elements.push(v);
  }
  return elements;
}

function coerceArray(field: string, value: unknown, spec: ShapeSpec, kind: ElementKind): NdArray {
  let shape: number[];
  let elements: number[];

  if (isNdArray(value)) {
    shape = [...value.shape];
    elements = toElements(field, kind, value.data);
  } else if (isNumericTypedArray(value)) {
    shape = [value.length];
    elements = toElements(field, kind, value);
  } else if (Array.isArray(value)) {
    const leaves: unknown[] = [];
    shape = flattenNested(field, value, leaves);
    if (value.length === 0) {
      // An empty list takes the declared trailing dimensions
      shape = [0, ...spec.slice(1).map(dim => (dim === '*' ? 0 : dim))];
    }
    elements = toElements(field, kind, leaves);
  } else {
    throw new KindMismatchError(field, 'an array', describeValue(value));
  }

  if (!matchesShape(shape, spec)) {
    throw new ShapeMismatchError(field, formatShape(spec), formatShape(shape));
  }

  if (kind === 'int') {
    return { kind, shape, data: Int32Array.from(elements) };
  }
  return { kind, shape, data: Float64Array.from(elements) };
}

export function arrayType(options: { shape: ShapeSpec; kind: ElementKind }): ArrayFieldType {
  const { shape, kind } = options;
  return {
    kind: 'array',
    expects: `${kind} array of shape ${formatShape(shape)}`,
    shape,
    elementKind: kind,
    codec: codecFor(kind),
    coerce: (field, value) => coerceArray(field, value, shape, kind),
    equals: arraysEqual,
    snapshot: cloneArray,
    toJson: value => toNested(value),
  };
}

// ============================================================================
// Scalars
// ============================================================================

export function stringType(): FieldType<string> {
  return {
    kind: 'string',
    expects: 'string',
    coerce(field, value) {
      if (typeof value !== 'string') {
        throw new KindMismatchError(field, 'string', describeValue(value));
      }
      return value;
    },
    equals: (a, b) => a === b,
    snapshot: value => value,
    toJson: value => value,
  };
}

export function numberType(options: { min?: number; max?: number } = {}): FieldType<number> {
  const min = options.min ?? -Infinity;
  const max = options.max ?? Infinity;
  const expects = Number.isFinite(min) || Number.isFinite(max) ? `number in [${min}, ${max}]` : 'number';
  return {
    kind: 'number',
    expects,
    coerce(field, value) {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new KindMismatchError(field, expects, describeValue(value));
      }
      if (value < min || value > max) {
        throw new KindMismatchError(field, expects, String(value));
      }
      return value;
    },
    equals: (a, b) => a === b,
    snapshot: value => value,
    toJson: value => value,
  };
}

/**
 * Enumerated string with aliases. Matching is case-insensitive and
 * always resolves to the canonical key.
 *
 * @example
 * ```typescript
 * const viewType = choiceType({ line: ['lines', 'thin'], tube: ['tubes'] });
 * viewType.coerce('viewType', 'TUBES'); // 'tube'
 * ```
 */
export function choiceType<C extends string>(choices: Record<C, readonly string[]>): FieldType<C> {
  const isChoice = (key: string): key is C => Object.prototype.hasOwnProperty.call(choices, key);
  const lookup = new Map<string, C>();
  for (const key of Object.keys(choices)) {
    if (!isChoice(key)) continue;
    lookup.set(key.toUpperCase(), key);
    for (const alias of choices[key]) {
      lookup.set(alias.toUpperCase(), key);
    }
  }
  const expects = `one of ${Object.keys(choices).map(c => `'${c}'`).join(', ')}`;

  return {
    kind: 'choice',
    expects,
    coerce(field, value) {
      if (typeof value !== 'string') {
        throw new KindMismatchError(field, expects, describeValue(value));
      }
      const resolved = lookup.get(value.toUpperCase());
      if (resolved === undefined) {
        throw new KindMismatchError(field, expects, `'${value}'`);
      }
      return resolved;
    },
    equals: (a, b) => a === b,
    snapshot: value => value,
    toJson: value => value,
  };
}

export type Rgb = readonly [number, number, number];

function parseHex(hex: string): Rgb | null {
  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i.exec(hex);
  if (short) {
    return [parseInt(short[1] + short[1], 16), parseInt(short[2] + short[2], 16), parseInt(short[3] + short[3], 16)];
  }
  const long = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (long) {
    return [parseInt(long[1], 16), parseInt(long[2], 16), parseInt(long[3], 16)];
  }
  return null;
}

/**
 * Color given as [r, g, b] (0-255) or '#rgb' / '#rrggbb'. Serialized as '#rrggbb'.
 */
export function colorType(): FieldType<Rgb> {
  const expects = "color as [r, g, b] or '#rrggbb'";
  return {
    kind: 'color',
    expects,
    coerce(field, value) {
      if (typeof value === 'string') {
        const rgb = parseHex(value);
        if (!rgb) throw new KindMismatchError(field, expects, `'${value}'`);
        return rgb;
      }
      if (Array.isArray(value) && value.length === 3) {
        const channels: number[] = [];
        for (const c of value) {
          if (typeof c === 'number' && Number.isInteger(c) && c >= 0 && c <= 255) channels.push(c);
        }
        if (channels.length === 3) {
          return [channels[0], channels[1], channels[2]];
        }
      }
      throw new KindMismatchError(field, expects, describeValue(value));
    },
    equals: (a, b) => a[0] === b[0] && a[1] === b[1] && a[2] === b[2],
    snapshot: value => value,
    toJson: value => `#${value.map(c => c.toString(16).padStart(2, '0')).join('')}`,
  };
}

// ============================================================================
// Nested entities
// ============================================================================

function coerceInstance<O extends PropertyObject>(field: string, value: unknown, cls: new () => O): O {
  if (value instanceof cls) {
    return value;
  }
  if (isPlainObject(value)) {
    const instance = new cls();
    instance.update(value);
    return instance;
  }
  throw new KindMismatchError(field, cls.name, describeValue(value));
}

/**
 * A single owned entity. Plain objects are coerced by constructing `cls`
 * and assigning their keys.
 */
export function instanceType<O extends PropertyObject>(cls: new () => O): FieldType<O> {
  return {
    kind: 'instance',
    expects: cls.name,
    coerce: (field, value) => coerceInstance(field, value, cls),
    // Identity here; nested changes are picked up through children()
    equals: (a, b) => a === b,
    snapshot: value => value,
    toJson: value => value.toJson(),
    children: value => [value],
  };
}

export function listType<O extends PropertyObject>(cls: new () => O): FieldType<O[]> {
  return {
    kind: 'list',
    expects: `list of ${cls.name}`,
    coerce(field, value) {
      if (!Array.isArray(value)) {
        throw new KindMismatchError(field, `list of ${cls.name}`, describeValue(value));
      }
      return value.map((item, i) => coerceInstance(`${field}[${i}]`, item, cls));
    },
    equals: (a, b) => a.length === b.length && a.every((item, i) => item === b[i]),
    snapshot: value => [...value],
    toJson: (value): JsonValue => value.map(item => item.toJson()),
    children: value => value,
  };
}
