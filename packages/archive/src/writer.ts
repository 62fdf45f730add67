/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Archive writer
 *
 * Snapshots a resource as a zip of its wire JSON and every encoded array.
 * Writing an archive is not a sync: dirty state is left untouched.
 */

import JSZip from 'jszip';
import { createLogger } from '@meshsync/data';
import type { AnyResource, DirtyFileSet, JsonValue, ValidationOptions } from '@meshsync/model';
import { ARCHIVE_FORMAT, ARCHIVE_VERSION, MANIFEST_PATH, arrayPath } from './types.js';
import type { ArchiveManifest, ArchivedArray } from './types.js';

const log = createLogger('Archive');

type JsonObject = { [key: string]: JsonValue };

/**
 * Write a resource to a zip archive
 *
 * @returns Zip bytes
 */
export async function writeArchive(resource: AnyResource, options: ValidationOptions = {}): Promise<Uint8Array> {
  const files = resource.dirtyFileSet(true, options);
  const zip = new JSZip();

  const arrays: Record<string, ArchivedArray> = {};
  for (const [key, file] of files) {
    const path = arrayPath(key);
    zip.file(path, file.bytes);
    arrays[key] = { path, dtype: file.dtype, shape: file.shape };
  }

  const manifest: ArchiveManifest = {
    format: ARCHIVE_FORMAT,
    version: ARCHIVE_VERSION,
    kind: resource.resourceKind,
    resource: wireJson(resource, files),
    arrays,
  };
  zip.file(MANIFEST_PATH, JSON.stringify(manifest, null, 2));

  const bytes = await zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
  log.info(`Wrote ${files.size} array(s)`, {
    operation: 'writeArchive',
    resourceKind: resource.resourceKind,
    data: { bytes: bytes.byteLength },
  });
  return bytes;
}

/**
 * Resource metadata JSON with each array replaced by its archive path
 */
function wireJson(resource: AnyResource, files: DirtyFileSet): JsonObject {
  const mesh: JsonObject = resource.geometry.toJson();
  for (const field of resource.geometry.arrayFields()) {
    const key = `mesh.${field.name}`;
    if (files.has(key)) mesh[field.name] = arrayPath(key);
  }

  const data = resource.bindings.map((binder, i): JsonObject => {
    const array: JsonObject = binder.dataArray.toJson();
    const key = `data.${i}.array`;
    if (files.has(key)) array.array = arrayPath(key);
    return { ...binder.toJson(), data: array };
  });

  return { ...resource.toJson(), mesh, data };
}
