/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Bound data: a named 1D array and the binder that places it on a mesh
 */

import { ArrayField } from './array-field.js';
import type { ArrayInput } from './array-field.js';
import { TypedField } from './field.js';
import { arrayType, choiceType, instanceType } from './field-types.js';
import { LOCATION_CHOICES } from './mesh.js';
import type { DataLocation } from './mesh.js';
import type { OmfScalarData } from './omf-types.js';
import { PropertyObject } from './property-object.js';
import { BaseResource } from './resource.js';
import type { ResourceInit } from './resource.js';
import { parseDataArrayJson } from './wire.js';
import type { ArrayFetcher } from './wire.js';

export type DataOrder = 'c' | 'f';

export interface DataArrayInit extends ResourceInit {
  array?: ArrayInput;
  order?: DataOrder;
}

export class DataArray extends BaseResource {
  readonly array = new ArrayField('array', arrayType({ shape: ['*'], kind: 'float' }), {
    doc: 'Data, as a 1D array',
    required: true,
  });
  readonly order = new TypedField('order', choiceType<DataOrder>({ c: ['row-major'], f: ['column-major'] }), {
    doc: 'Array order of the data relative to the mesh',
    default: () => 'c',
  });

  constructor(init: DataArrayInit = {}) {
    super();
    this.update(init);
  }

  get length(): number {
    return this.array.length;
  }

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.array, this.order];
  }

  arrayFields(): ArrayField[] {
    return [this.array];
  }

  static async fromJson(value: unknown, fetcher: ArrayFetcher, path = 'data'): Promise<DataArray> {
    const json = parseDataArrayJson(value, path);
    const data = new DataArray({ title: json.title, description: json.description });
    if (json.order !== undefined) {
      data.order.set(json.order);
    }
    await data.array.load(json.array, fetcher);
    return data;
  }

  static fromOmf(scalar: OmfScalarData): DataArray {
    return new DataArray({
      title: scalar.name,
      description: scalar.description,
      array: scalar.array.array,
    });
  }
}

export interface DataBinderInit {
  location?: DataLocation | string;
  data?: DataArray | DataArrayInit;
}

/**
 * Pairs a DataArray with its location on the owning resource's mesh.
 * Lengths are checked by the owning resource, not here.
 */
export class DataBinder extends PropertyObject {
  readonly location = new TypedField('location', choiceType<DataLocation>(LOCATION_CHOICES), {
    doc: 'Location of the data on mesh',
    required: true,
  });
  readonly data = new TypedField('data', instanceType(DataArray), {
    doc: 'Data',
    required: true,
    default: () => new DataArray(),
  });

  constructor(init: DataBinderInit = {}) {
    super();
    this.update(init);
  }

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.location, this.data];
  }

  /** The bound DataArray (always present unless explicitly cleared) */
  get dataArray(): DataArray {
    return this.data.require(this.entityName);
  }
}
