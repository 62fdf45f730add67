/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Archive layout
 *
 * resource.json        manifest: kind, wire JSON, array index
 * arrays/<key>.bin     one encoded array per dirty-file key
 */

import type { DType } from '@meshsync/data';
import type { AnyResource, ArrayField, ResourceKind } from '@meshsync/model';

export const ARCHIVE_FORMAT = 'meshsync-archive';
export const ARCHIVE_VERSION = 1;
export const MANIFEST_PATH = 'resource.json';

export interface ArchivedArray {
  path: string;
  dtype: DType;
  shape: number[];
}

export interface ArchiveManifest {
  format: typeof ARCHIVE_FORMAT;
  version: typeof ARCHIVE_VERSION;
  kind: ResourceKind;
  /** Wire JSON; array fields hold archive paths */
  resource: unknown;
  arrays: Record<string, ArchivedArray>;
}

export function arrayPath(key: string): string {
  return `arrays/${key}.bin`;
}

/** Every array of a resource under its dirty-file key */
export function arrayFieldsByKey(resource: AnyResource): Map<string, ArrayField> {
  const fields = new Map<string, ArrayField>();
  for (const field of resource.geometry.arrayFields()) {
    fields.set(`mesh.${field.name}`, field);
  }
  resource.bindings.forEach((binder, i) => {
    for (const field of binder.dataArray.arrayFields()) {
      fields.set(`data.${i}.${field.name}`, field);
    }
  });
  return fields;
}
