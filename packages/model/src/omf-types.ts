/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Open Mining Format (OMF) interchange shapes accepted by the importers
 *
 * Only the subset needed to build line and point resources is modelled.
 * Geometry is stored relative to an origin; both the element origin and
 * the project origin are added to vertices on import.
 */

import type { NdArray } from '@meshsync/data';
import type { ArrayInput } from './array-field.js';
import { arrayType } from './field-types.js';
import type { Rgb } from './field-types.js';

export type Vector3 = readonly [number, number, number];

export interface OmfArray {
  array: ArrayInput;
}

export interface OmfLineSetGeometry {
  vertices: OmfArray;
  segments: OmfArray;
  origin?: Vector3;
}

export interface OmfPointSetGeometry {
  vertices: OmfArray;
  origin?: Vector3;
}

export type OmfDataLocation = 'vertices' | 'segments';

export interface OmfScalarData {
  name?: string;
  description?: string;
  array: OmfArray;
  location: OmfDataLocation | string;
}

export interface OmfElement {
  name?: string;
  description?: string;
  geometry: OmfLineSetGeometry | OmfPointSetGeometry;
  data?: OmfScalarData[];
  color?: Rgb | string;
}

export interface OmfProject {
  name?: string;
  description?: string;
  origin?: Vector3;
  elements?: OmfElement[];
}

export function isLineSetGeometry(geometry: OmfLineSetGeometry | OmfPointSetGeometry): geometry is OmfLineSetGeometry {
  return 'segments' in geometry;
}

const VERTICES = arrayType({ shape: ['*', 3], kind: 'float' });

/**
 * Validate OMF vertices as (*, 3) floats and shift them by every origin given
 */
export function offsetVertices(vertices: ArrayInput, ...origins: Array<Vector3 | undefined>): NdArray {
  const arr = VERTICES.coerce('vertices', vertices);
  const shift = [0, 0, 0];
  for (const origin of origins) {
    if (!origin) continue;
    shift[0] += origin[0];
    shift[1] += origin[1];
    shift[2] += origin[2];
  }
  for (let i = 0; i < arr.data.length; i++) {
    arr.data[i] += shift[i % 3];
  }
  return arr;
}
