/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { checkSize, length } from '@meshsync/data';
import type { NdArray } from '@meshsync/data';
import { TypedField } from './field.js';
import type { FieldOptions } from './field.js';
import type { ArrayFieldType } from './field-types.js';
import type { ArrayFetcher, EncodedArray } from './wire.js';

/** Anything an array field accepts on assignment */
export type ArrayInput = NdArray | ArrayLike<number> | ReadonlyArray<ArrayLike<number>>;

/**
 * A TypedField holding a binary array. Knows its codec, so it can encode
 * itself for upload and materialize itself from a downloaded reference.
 */
export class ArrayField extends TypedField<NdArray> {
  constructor(
    name: string,
    readonly spec: ArrayFieldType,
    options: FieldOptions<NdArray> = {}
  ) {
    super(name, spec, options);
  }

  /** Length along the first dimension; 0 when unset */
  get length(): number {
    return this.value === undefined ? 0 : length(this.value);
  }

  byteSize(): number {
    return this.value === undefined ? 0 : this.spec.codec.byteSize(this.value);
  }

  checkSize(limit: number): void {
    if (this.value !== undefined) {
      checkSize(this.name, this.value, limit);
    }
  }

  encode(owner: string): EncodedArray {
    const value = this.require(owner);
    return {
      bytes: this.spec.codec.encode(value),
      dtype: this.spec.codec.dtype,
      shape: [...value.shape],
    };
  }

  /** Fetch and decode a remote array, then assign it */
  async load(ref: string, fetcher: ArrayFetcher): Promise<void> {
    const bytes = await fetcher.fetchArray(ref);
    this.set(this.spec.codec.decode(bytes, this.spec.shape));
  }
}
