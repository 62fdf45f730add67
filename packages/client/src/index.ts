/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshsync/client - HTTP transport and sync for meshsync resources
 *
 * @example
 * ```typescript
 * import { ResourceClient, createSession, uploadResource } from '@meshsync/client';
 *
 * const client = new ResourceClient({ baseUrl, session: createSession(apiKey) });
 * const { id } = await uploadResource(client, line);
 * line.geometry.vertices.set(moved);
 * await uploadResource(client, line); // PUT with only mesh.vertices
 * ```
 */

export { ResourceClient, CLIENT_VERSION } from './client.js';
export { ApiError } from './errors.js';
export { isApiKey, createSession } from './session.js';
export type { Session } from './session.js';
export { uploadResource, downloadResource, remoteIdOf } from './sync.js';
export type { ClientConfig, UploadOptions, UploadResult } from './types.js';
