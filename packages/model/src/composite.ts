/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Composite resources: one mesh, its bound data and display options,
 * synced together as a single unit.
 *
 * The resource never performs I/O. A transport asks for dirtyFileSet(),
 * uploads it, and calls markSynced() only once the remote write is
 * confirmed, so a failed upload leaves every dirty flag in place.
 */

import { DataLengthMismatchError, KindMismatchError } from '@meshsync/data';
import type { DataLengthFailure } from '@meshsync/data';
import type { ArrayFetcher, BinderJson, DirtyFileSet, ResourceKind } from './wire.js';
import { DataArray, DataBinder } from './data-array.js';
import type { DataBinderInit } from './data-array.js';
import { TypedField } from './field.js';
import { listType } from './field-types.js';
import type { Mesh } from './mesh.js';
import type { Options } from './options.js';
import type { Validator } from './property-object.js';
import { BaseResource } from './resource.js';
import type { ResourceInit } from './resource.js';

export interface CompositeInit<M, MInit, O, OInit> extends ResourceInit {
  mesh?: M | MInit;
  data?: Array<DataBinder | DataBinderInit>;
  opts?: O | OInit;
}

export abstract class CompositeResource<M extends Mesh, O extends Options> extends BaseResource {
  /** Remote endpoint name for this resource type */
  abstract readonly resourceKind: ResourceKind;
  abstract readonly mesh: TypedField<M>;
  abstract readonly opts: TypedField<O>;

  readonly data = new TypedField('data', listType(DataBinder), {
    doc: 'Data bound to the mesh',
    default: () => [],
  });

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.mesh, this.data, this.opts];
  }

  /** The owned mesh (auto-created on construction) */
  get geometry(): M {
    return this.mesh.require(this.entityName);
  }

  get bindings(): DataBinder[] {
    return this.data.value ?? [];
  }

  nbytes(): number {
    return this.geometry.nbytes() + this.bindings.reduce((sum, binder) => sum + binder.dataArray.nbytes(), 0);
  }

  protected validators(): Validator[] {
    return [...super.validators(), () => this.validateDataLengths()];
  }

  /**
   * Every binding is checked before failing. Unsupported locations are
   * reported together ahead of length mismatches; the length error carries
   * all mismatches and reports the first one in its message.
   */
  private validateDataLengths(): void {
    const mesh = this.geometry;
    const unsupported: Array<{ index: number; location: string }> = [];
    const failures: DataLengthFailure[] = [];

    this.bindings.forEach((binder, index) => {
      const location = binder.location.require(binder.entityName);
      if (!mesh.locations.includes(location)) {
        unsupported.push({ index, location });
        return;
      }
      const expected = mesh.countFor(location);
      const actual = binder.dataArray.length;
      if (actual !== expected) {
        failures.push({ index, actual, expected, location });
      }
    });

    if (unsupported.length > 0) {
      throw new KindMismatchError(
        unsupported.map(u => `data[${u.index}].location`).join(', '),
        `one of ${mesh.locations.map(l => `'${l}'`).join(', ')}`,
        unsupported.map(u => `'${u.location}'`).join(', ')
      );
    }
    if (failures.length > 0) {
      throw new DataLengthMismatchError(failures);
    }
  }

  /**
   * A mesh or data array that now sits under a key it was not synced under
   * (replaced, or moved by a removal or reorder) is sent whole, even when
   * its own arrays are clean.
   */
  collectFiles(force: boolean, prefix: string, files: DirtyFileSet): void {
    super.collectFiles(force, prefix, files);
    this.geometry.collectFiles(force || this.mesh.isReassigned, `${prefix}mesh.`, files);

    const synced = this.data.syncedValue ?? [];
    this.bindings.forEach((binder, i) => {
      const moved = synced[i] !== binder || binder.data.isReassigned;
      binder.dataArray.collectFiles(force || moved, `${prefix}data.${i}.`, files);
    });
  }
}

/**
 * Materialize downloaded bindings, fetching each data array
 */
export async function loadBinders(entries: readonly BinderJson[], fetcher: ArrayFetcher): Promise<DataBinder[]> {
  const binders: DataBinder[] = [];
  for (const [i, entry] of entries.entries()) {
    const data = await DataArray.fromJson(entry.data, fetcher, `resource.data[${i}].data`);
    binders.push(new DataBinder({ location: entry.location, data }));
  }
  return binders;
}
