/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * 1D line sets: LineMesh geometry and the Line composite resource
 */

import { InvalidConnectivityError, KindMismatchError } from '@meshsync/data';
import { ArrayField } from './array-field.js';
import type { ArrayInput } from './array-field.js';
import { CompositeResource, loadBinders } from './composite.js';
import type { CompositeInit } from './composite.js';
import { DataArray, DataBinder } from './data-array.js';
import type { ValidationOptions } from './config.js';
import { TypedField } from './field.js';
import { arrayType, instanceType } from './field-types.js';
import { Mesh } from './mesh.js';
import type { DataLocation } from './mesh.js';
import { isLineSetGeometry, offsetVertices } from './omf-types.js';
import type { OmfElement, OmfLineSetGeometry, OmfProject } from './omf-types.js';
import { LineMeshOptions, LineOptions } from './options.js';
import type { ColorOptionsInit, LineMeshOptionsInit } from './options.js';
import type { Validator } from './property-object.js';
import type { ResourceInit } from './resource.js';
import { parseMeshJson, parseResourceJson } from './wire.js';
import type { ArrayFetcher, ResourceMeta } from './wire.js';

export interface LineMeshInit extends ResourceInit {
  vertices?: ArrayInput;
  segments?: ArrayInput;
  opts?: LineMeshOptions | LineMeshOptionsInit;
}

export class LineMesh extends Mesh {
  readonly locations: readonly DataLocation[] = ['N', 'CC'];

  readonly vertices = new ArrayField('vertices', arrayType({ shape: ['*', 3], kind: 'float' }), {
    doc: 'Mesh vertices',
    required: true,
  });
  readonly segments = new ArrayField('segments', arrayType({ shape: ['*', 2], kind: 'int' }), {
    doc: 'Segment endpoint indices',
    required: true,
  });
  readonly opts = new TypedField('opts', instanceType(LineMeshOptions), {
    doc: 'Options',
    default: () => new LineMeshOptions(),
    jsonKey: 'meta',
  });

  constructor(init: LineMeshInit = {}) {
    super();
    this.update(init);
  }

  get nodeCount(): number {
    return this.vertices.length;
  }

  get cellCount(): number {
    return this.segments.length;
  }

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.vertices, this.segments, this.opts];
  }

  arrayFields(): ArrayField[] {
    return [this.segments, this.vertices];
  }

  protected validators(): Validator[] {
    // Connectivity first, then the per-array size checks
    return [() => this.validateSegments(), ...super.validators()];
  }

  private validateSegments(): void {
    const segments = this.segments.require(this.entityName).data;
    const nodeCount = this.nodeCount;
    for (let i = 0; i < segments.length; i++) {
      if (segments[i] < 0) {
        throw new InvalidConnectivityError('negative', i, segments[i], nodeCount);
      }
    }
    for (let i = 0; i < segments.length; i++) {
      if (segments[i] >= nodeCount) {
        throw new InvalidConnectivityError('out-of-range', i, segments[i], nodeCount);
      }
    }
  }

  /**
   * Build from downloaded JSON (`{ vertices: <ref>, segments: <ref>, meta }`).
   * The result is validated and starts clean.
   */
  static async fromJson(
    value: unknown,
    fetcher: ArrayFetcher,
    meta: ResourceMeta = {},
    options: ValidationOptions = {}
  ): Promise<LineMesh> {
    const json = parseMeshJson(value, 'mesh', ['vertices', 'segments']);
    const mesh = new LineMesh({
      title: meta.title ?? json.title,
      description: meta.description ?? json.description,
    });
    await mesh.vertices.load(json.vertices, fetcher);
    if (json.segments !== undefined) {
      await mesh.segments.load(json.segments, fetcher);
    }
    if (json.meta) {
      mesh.opts.require(mesh.entityName).update(json.meta, { strict: false });
    }
    mesh.validate(options);
    mesh.markSynced();
    return mesh;
  }

  /**
   * Build from an OMF line set. Vertices are shifted by the geometry
   * origin and the project origin.
   */
  static fromOmf(geometry: OmfLineSetGeometry, project: OmfProject = {}): LineMesh {
    const mesh = new LineMesh({
      vertices: offsetVertices(geometry.vertices.array, geometry.origin, project.origin),
      segments: geometry.segments.array,
    });
    mesh.validate();
    return mesh;
  }
}

export type LineInit = CompositeInit<LineMesh, LineMeshInit, LineOptions, ColorOptionsInit>;

/**
 * A line set with data bound to its vertices ('N') or segments ('CC')
 *
 * @example
 * ```typescript
 * const line = new Line({
 *   mesh: { vertices: [[0, 0, 0], [1, 0, 0], [2, 0, 0]], segments: [[0, 1], [1, 2]] },
 *   data: [{ location: 'CC', data: { title: 'Grade', array: [0.4, 0.7] } }],
 * });
 * const files = line.dirtyFileSet(); // mesh.segments, mesh.vertices, data.0.array
 * ```
 */
export class Line extends CompositeResource<LineMesh, LineOptions> {
  readonly resourceKind = 'line';

  readonly mesh = new TypedField('mesh', instanceType(LineMesh), {
    doc: 'Mesh',
    required: true,
    default: () => new LineMesh(),
  });
  readonly opts = new TypedField('opts', instanceType(LineOptions), {
    doc: 'Options',
    default: () => new LineOptions(),
    jsonKey: 'meta',
  });

  constructor(init: LineInit = {}) {
    super();
    this.update(init);
  }

  static async fromJson(value: unknown, fetcher: ArrayFetcher, options: ValidationOptions = {}): Promise<Line> {
    const json = parseResourceJson(value, ['vertices', 'segments']);
    const line = new Line({
      title: json.title,
      description: json.description,
      mesh: await LineMesh.fromJson(json.mesh, fetcher, {}, options),
      data: await loadBinders(json.data ?? [], fetcher),
    });
    if (json.meta) {
      line.opts.require(line.entityName).update(json.meta, { strict: false });
    }
    line.validate(options);
    line.markSynced();
    return line;
  }

  static fromOmf(element: OmfElement, project: OmfProject = {}): Line {
    const geometry = element.geometry;
    if (!isLineSetGeometry(geometry)) {
      throw new KindMismatchError('geometry', 'an OMF line set', 'a point set');
    }
    const line = new Line({
      title: element.name,
      description: element.description,
      mesh: LineMesh.fromOmf(geometry, project),
      data: (element.data ?? []).map(
        (scalar, i) =>
          new DataBinder({
            location: omfLineLocation(scalar.location, i),
            data: DataArray.fromOmf(scalar),
          })
      ),
      opts: { color: element.color },
    });
    line.validate();
    return line;
  }
}

function omfLineLocation(location: string, index: number): DataLocation {
  if (location === 'vertices') return 'N';
  if (location === 'segments') return 'CC';
  throw new KindMismatchError(`data[${index}].location`, "'vertices' or 'segments'", `'${location}'`);
}
