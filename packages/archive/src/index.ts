/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshsync/archive - Offline zip snapshots of meshsync resources
 *
 * @example
 * ```typescript
 * import { readArchive, writeArchive } from '@meshsync/archive';
 *
 * const bytes = await writeArchive(line);
 * const copy = await readArchive(bytes); // clean Line
 * ```
 */

export { writeArchive } from './writer.js';
export { readArchive } from './reader.js';
export { ARCHIVE_FORMAT, ARCHIVE_VERSION, MANIFEST_PATH, arrayPath } from './types.js';
export type { ArchiveManifest, ArchivedArray } from './types.js';
