/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { BaseResource } from './resource.js';

/**
 * Where bound data lives on a mesh:
 * - 'N': one value per node (vertex)
 * - 'CC': one value per cell (segment, face...)
 */
export type DataLocation = 'N' | 'CC';

export const LOCATION_CHOICES: Record<DataLocation, readonly string[]> = {
  N: ['NODE', 'VERTEX', 'ENDPOINT'],
  CC: ['CELLCENTER', 'SEGMENT', 'LINE', 'FACE', 'EDGE'],
};

/**
 * Pure geometry. Bound data is validated against nodeCount / cellCount.
 */
export abstract class Mesh extends BaseResource {
  /** Locations bound data may use on this mesh type */
  abstract readonly locations: readonly DataLocation[];

  abstract get nodeCount(): number;

  abstract get cellCount(): number;

  countFor(location: DataLocation): number {
    return location === 'CC' ? this.cellCount : this.nodeCount;
  }
}
