/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Typed fields with dirty tracking
 *
 * A FieldType is the static declaration (shape, kind, choices...).
 * A TypedField is one entity's slot for that declaration: it holds the
 * current value and a snapshot of the last value confirmed as synced.
 */

import { MissingFieldError } from '@meshsync/data';
import type { PropertyObject } from './property-object.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type FieldKind = 'array' | 'string' | 'number' | 'boolean' | 'choice' | 'color' | 'instance' | 'list';

export interface FieldType<T> {
  readonly kind: FieldKind;
  /** Human readable description of what the field expects */
  readonly expects: string;
  /**
   * Validate and normalize an assigned value.
   * Throws ShapeMismatchError / KindMismatchError naming `field`.
   */
  coerce(field: string, value: unknown): T;
  /** Content equality between a value and a snapshot */
  equals(a: T, b: T): boolean;
  /** Copy taken when the owning entity is marked synced */
  snapshot(value: T): T;
  toJson(value: T): JsonValue;
  /** Nested entities owned through this field */
  children?(value: T): PropertyObject[];
}

export interface FieldOptions<T> {
  doc?: string;
  required?: boolean;
  /** Called once when the owning entity is constructed */
  default?: () => T;
  /** Key used in metadata JSON when it differs from the field name */
  jsonKey?: string;
}

export class TypedField<T> {
  readonly doc: string;
  readonly required: boolean;
  readonly jsonKey: string;
  private current: T | undefined;
  private synced: T | undefined;
  private hasSynced = false;

  constructor(
    readonly name: string,
    readonly type: FieldType<T>,
    options: FieldOptions<T> = {}
  ) {
    this.doc = options.doc ?? '';
    this.required = options.required ?? false;
    this.jsonKey = options.jsonKey ?? name;
    if (options.default) {
      this.current = options.default();
    }
  }

  get value(): T | undefined {
    return this.current;
  }

  /**
   * Assign a new value. Validation happens here, not at sync time.
   * `undefined` clears an optional field.
   */
  set(value: unknown): void {
    if (value === undefined) {
      this.current = undefined;
      return;
    }
    this.current = this.type.coerce(this.name, value);
  }

  /** Current value, or throw if the field was never assigned */
  require(owner: string): T {
    if (this.current === undefined) {
      throw new MissingFieldError(this.name, owner);
    }
    return this.current;
  }

  /**
   * Whether the value differs from the last synced one. Compared by content,
   * so in-place edits of an array are detected too.
   */
  get isDirty(): boolean {
    return this.isReassigned || this.children().some(child => child.isDirty);
  }

  /**
   * Whether the field now holds a different value than at the last sync,
   * ignoring edits inside nested entities. For instance and list fields
   * this means a child was replaced, added, removed or moved.
   */
  get isReassigned(): boolean {
    if (!this.hasSynced) {
      return this.current !== undefined;
    }
    if (this.current === undefined || this.synced === undefined) {
      return this.current !== this.synced;
    }
    return !this.type.equals(this.current, this.synced);
  }

  /** Value recorded at the last sync */
  get syncedValue(): T | undefined {
    return this.synced;
  }

  /**
   * Snapshot the current value now and return a commit that records it as
   * synced. Later assignments stay dirty after the commit runs.
   */
  capture(): () => void {
    const snapshot = this.current === undefined ? undefined : this.type.snapshot(this.current);
    return () => {
      this.synced = snapshot;
      this.hasSynced = true;
    };
  }

  /** Only call after the owning entity was confirmed written remotely */
  clearDirty(): void {
    this.capture()();
  }

  isRequiredButMissing(): boolean {
    return this.required && this.current === undefined;
  }

  children(): PropertyObject[] {
    if (this.current === undefined || !this.type.children) return [];
    return this.type.children(this.current);
  }

  toJson(): JsonValue | undefined {
    return this.current === undefined ? undefined : this.type.toJson(this.current);
  }
}
