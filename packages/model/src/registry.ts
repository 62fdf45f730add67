/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ValidationOptions } from './config.js';
import { Line } from './line.js';
import { Point } from './point.js';
import type { ArrayFetcher, ResourceKind } from './wire.js';

/** Every concrete composite resource */
export type AnyResource = Line | Point;

export const RESOURCE_KINDS: readonly ResourceKind[] = ['line', 'point'];

export function isResourceKind(value: unknown): value is ResourceKind {
  return value === 'line' || value === 'point';
}

/**
 * Build the resource of the given kind from its wire JSON. The result is
 * validated and starts clean.
 */
export function loadResource(
  kind: ResourceKind,
  json: unknown,
  fetcher: ArrayFetcher,
  options: ValidationOptions = {}
): Promise<AnyResource> {
  switch (kind) {
    case 'line':
      return Line.fromJson(json, fetcher, options);
    case 'point':
      return Point.fromJson(json, fetcher, options);
  }
}
