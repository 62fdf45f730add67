/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Point sets: PointMesh geometry and the Point composite resource.
 * Points have no cells, so data can only be bound per node.
 */

import { KindMismatchError } from '@meshsync/data';
import { ArrayField } from './array-field.js';
import type { ArrayInput } from './array-field.js';
import { CompositeResource, loadBinders } from './composite.js';
import type { CompositeInit } from './composite.js';
import type { ValidationOptions } from './config.js';
import { DataArray, DataBinder } from './data-array.js';
import { TypedField } from './field.js';
import { arrayType, instanceType } from './field-types.js';
import { Mesh } from './mesh.js';
import type { DataLocation } from './mesh.js';
import { isLineSetGeometry, offsetVertices } from './omf-types.js';
import type { OmfElement, OmfPointSetGeometry, OmfProject } from './omf-types.js';
import { PointMeshOptions, PointOptions } from './options.js';
import type { ColorOptionsInit, OptionsInit } from './options.js';
import type { ResourceInit } from './resource.js';
import { parseMeshJson, parseResourceJson } from './wire.js';
import type { ArrayFetcher, ResourceMeta } from './wire.js';

export interface PointMeshInit extends ResourceInit {
  vertices?: ArrayInput;
  opts?: PointMeshOptions | OptionsInit;
}

export class PointMesh extends Mesh {
  readonly locations: readonly DataLocation[] = ['N'];

  readonly vertices = new ArrayField('vertices', arrayType({ shape: ['*', 3], kind: 'float' }), {
    doc: 'Point locations',
    required: true,
  });
  readonly opts = new TypedField('opts', instanceType(PointMeshOptions), {
    doc: 'Options',
    default: () => new PointMeshOptions(),
    jsonKey: 'meta',
  });

  constructor(init: PointMeshInit = {}) {
    super();
    this.update(init);
  }

  get nodeCount(): number {
    return this.vertices.length;
  }

  get cellCount(): number {
    return 0;
  }

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.vertices, this.opts];
  }

  arrayFields(): ArrayField[] {
    return [this.vertices];
  }

  static async fromJson(
    value: unknown,
    fetcher: ArrayFetcher,
    meta: ResourceMeta = {},
    options: ValidationOptions = {}
  ): Promise<PointMesh> {
    const json = parseMeshJson(value, 'mesh', ['vertices']);
    const mesh = new PointMesh({
      title: meta.title ?? json.title,
      description: meta.description ?? json.description,
    });
    await mesh.vertices.load(json.vertices, fetcher);
    if (json.meta) {
      mesh.opts.require(mesh.entityName).update(json.meta, { strict: false });
    }
    mesh.validate(options);
    mesh.markSynced();
    return mesh;
  }

  static fromOmf(geometry: OmfPointSetGeometry, project: OmfProject = {}): PointMesh {
    const mesh = new PointMesh({
      vertices: offsetVertices(geometry.vertices.array, geometry.origin, project.origin),
    });
    mesh.validate();
    return mesh;
  }
}

export type PointInit = CompositeInit<PointMesh, PointMeshInit, PointOptions, ColorOptionsInit>;

export class Point extends CompositeResource<PointMesh, PointOptions> {
  readonly resourceKind = 'point';

  readonly mesh = new TypedField('mesh', instanceType(PointMesh), {
    doc: 'Mesh',
    required: true,
    default: () => new PointMesh(),
  });
  readonly opts = new TypedField('opts', instanceType(PointOptions), {
    doc: 'Options',
    default: () => new PointOptions(),
    jsonKey: 'meta',
  });

  constructor(init: PointInit = {}) {
    super();
    this.update(init);
  }

  static async fromJson(value: unknown, fetcher: ArrayFetcher, options: ValidationOptions = {}): Promise<Point> {
    const json = parseResourceJson(value, ['vertices']);
    const point = new Point({
      title: json.title,
      description: json.description,
      mesh: await PointMesh.fromJson(json.mesh, fetcher, {}, options),
      data: await loadBinders(json.data ?? [], fetcher),
    });
    if (json.meta) {
      point.opts.require(point.entityName).update(json.meta, { strict: false });
    }
    point.validate(options);
    point.markSynced();
    return point;
  }

  static fromOmf(element: OmfElement, project: OmfProject = {}): Point {
    const geometry = element.geometry;
    if (isLineSetGeometry(geometry)) {
      throw new KindMismatchError('geometry', 'an OMF point set', 'a line set');
    }
    const point = new Point({
      title: element.name,
      description: element.description,
      mesh: PointMesh.fromOmf(geometry, project),
      data: (element.data ?? []).map((scalar, i) => {
        if (scalar.location !== 'vertices') {
          throw new KindMismatchError(`data[${i}].location`, "'vertices'", `'${scalar.location}'`);
        }
        return new DataBinder({ location: 'N', data: DataArray.fromOmf(scalar) });
      }),
      opts: { color: element.color },
    });
    point.validate();
    return point;
  }
}
