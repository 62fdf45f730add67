/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Foreign format importers
 */

import { createLogger } from '@meshsync/data';
import { Line } from './line.js';
import { isLineSetGeometry } from './omf-types.js';
import type { OmfElement, OmfProject } from './omf-types.js';
import { Point } from './point.js';

const log = createLogger('OmfImporter');

/**
 * Convert one OMF element into the matching composite resource
 */
export function importOmfElement(element: OmfElement, project: OmfProject = {}): Line | Point {
  return isLineSetGeometry(element.geometry) ? Line.fromOmf(element, project) : Point.fromOmf(element, project);
}

/**
 * Convert every element of an OMF project. Element errors propagate;
 * nothing is returned for a project with a bad element.
 */
export function importOmfProject(project: OmfProject): Array<Line | Point> {
  const elements = project.elements ?? [];
  const resources = elements.map(element => importOmfElement(element, project));
  log.info(`Imported ${resources.length} element(s)`, {
    operation: 'importOmfProject',
    data: { project: project.name },
  });
  return resources;
}
