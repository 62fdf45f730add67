/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Archive reader
 *
 * Rebuilds a resource from a zip written by writeArchive(). Arrays are
 * fetched from zip entries through the same builders a download uses, then
 * checked against the dtype and shape recorded in the manifest index.
 */

import JSZip from 'jszip';
import { InvalidWireFormatError, createLogger } from '@meshsync/data';
import { expectArray, expectRecord, expectString, isResourceKind, loadResource } from '@meshsync/model';
import type { AnyResource, ArrayFetcher, ResourceKind, ValidationOptions } from '@meshsync/model';
import { ARCHIVE_FORMAT, ARCHIVE_VERSION, MANIFEST_PATH, arrayFieldsByKey } from './types.js';

const log = createLogger('Archive');

/**
 * Read a resource from a zip archive. The result is validated and starts clean.
 *
 * @param data - Archive as bytes, ArrayBuffer or Blob
 */
export async function readArchive(
  data: Uint8Array | ArrayBuffer | Blob,
  options: ValidationOptions = {}
): Promise<AnyResource> {
  const zip = await JSZip.loadAsync(data);
  const { kind, resource, index } = await readManifest(zip);

  const fetcher: ArrayFetcher = {
    async fetchArray(ref: string): Promise<Uint8Array> {
      const entry = zip.file(ref);
      if (!entry) {
        throw new InvalidWireFormatError(ref, 'missing from archive');
      }
      return entry.async('uint8array');
    },
  };

  const result = await loadResource(kind, resource, fetcher, options);
  checkIndex(result, index);
  log.info('Read archive', { operation: 'readArchive', resourceKind: kind });
  return result;
}

interface IndexedArray {
  dtype: string;
  shape: number[];
}

interface Manifest {
  kind: ResourceKind;
  resource: unknown;
  index: Map<string, IndexedArray>;
}

async function readManifest(zip: JSZip): Promise<Manifest> {
  const file = zip.file(MANIFEST_PATH);
  if (!file) {
    throw new InvalidWireFormatError(MANIFEST_PATH, 'missing from archive');
  }

  const content = await file.async('string');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new InvalidWireFormatError(MANIFEST_PATH, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const manifest = expectRecord(parsed, 'manifest');
  if (manifest.format !== ARCHIVE_FORMAT) {
    throw new InvalidWireFormatError('manifest.format', `expected '${ARCHIVE_FORMAT}'`);
  }
  if (manifest.version !== ARCHIVE_VERSION) {
    throw new InvalidWireFormatError('manifest.version', `unsupported version ${String(manifest.version)}`);
  }
  if (!isResourceKind(manifest.kind)) {
    throw new InvalidWireFormatError('manifest.kind', `unknown resource kind ${String(manifest.kind)}`);
  }
  return { kind: manifest.kind, resource: manifest.resource, index: parseIndex(manifest.arrays) };
}

function parseIndex(value: unknown): Map<string, IndexedArray> {
  const index = new Map<string, IndexedArray>();
  for (const [key, entry] of Object.entries(expectRecord(value, 'manifest.arrays'))) {
    const path = `manifest.arrays.${key}`;
    const json = expectRecord(entry, path);
    const shape = expectArray(json.shape, `${path}.shape`).map((dim, i) => {
      if (typeof dim !== 'number' || !Number.isInteger(dim) || dim < 0) {
        throw new InvalidWireFormatError(`${path}.shape[${i}]`, 'expected a non-negative integer');
      }
      return dim;
    });
    index.set(key, { dtype: expectString(json.dtype, `${path}.dtype`), shape });
  }
  return index;
}

/** Every decoded array must match its index entry */
function checkIndex(resource: AnyResource, index: Map<string, IndexedArray>): void {
  for (const [key, field] of arrayFieldsByKey(resource)) {
    const path = `manifest.arrays.${key}`;
    const entry = index.get(key);
    if (!entry) {
      throw new InvalidWireFormatError(path, 'missing from the array index');
    }
    const dtype = field.spec.codec.dtype;
    if (entry.dtype !== dtype) {
      throw new InvalidWireFormatError(`${path}.dtype`, `expected ${dtype}, got ${entry.dtype}`);
    }
    const shape = field.value?.shape ?? [];
    if (shape.length !== entry.shape.length || shape.some((dim, i) => dim !== entry.shape[i])) {
      throw new InvalidWireFormatError(
        `${path}.shape`,
        `decoded [${shape.join(', ')}], index records [${entry.shape.join(', ')}]`
      );
    }
  }
}
