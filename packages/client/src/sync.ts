/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Sync orchestration
 *
 * Upload: validate -> resource size check -> dirty-file set -> capture ->
 * upload -> commit. Any failure before the server confirms leaves every dirty
 * flag in place so the same call can be retried.
 */

import { PayloadTooLargeError, createLogger } from '@meshsync/data';
import { loadResource, resolveLimits } from '@meshsync/model';
import type { AnyResource, Line, Point, ResourceKind, ValidationOptions } from '@meshsync/model';
import type { ResourceClient } from './client.js';
import type { UploadOptions, UploadResult } from './types.js';

const log = createLogger('Sync');

// Remote ids are tracked per client; the same resource may live on several servers
const remoteIds = new WeakMap<ResourceClient, WeakMap<AnyResource, string>>();

function idsFor(client: ResourceClient): WeakMap<AnyResource, string> {
  let ids = remoteIds.get(client);
  if (!ids) {
    ids = new WeakMap();
    remoteIds.set(client, ids);
  }
  return ids;
}

/** Remote id of a resource previously uploaded or downloaded through `client` */
export function remoteIdOf(client: ResourceClient, resource: AnyResource): string | undefined {
  return idsFor(client).get(resource);
}

/**
 * Upload a resource. The first upload POSTs; later uploads through the
 * same client PUT only what changed. A resource that is already in sync
 * is not sent again unless `force` is set.
 */
export async function uploadResource(
  client: ResourceClient,
  resource: AnyResource,
  options: UploadOptions = {}
): Promise<UploadResult> {
  const force = options.force ?? false;
  const validation: ValidationOptions = { limits: client.session.limits };
  const limits = resolveLimits(validation);
  const ids = idsFor(client);
  const id = ids.get(resource);

  resource.validate(validation);
  const size = resource.nbytes();
  if (size > limits.resourceSizeLimit) {
    throw new PayloadTooLargeError(resource.entityName, size, limits.resourceSizeLimit);
  }

  if (id !== undefined && !force && !resource.isDirty) {
    log.debug('Already in sync', {
      operation: 'upload',
      resourceId: id,
      resourceKind: resource.resourceKind,
    });
    return { id, locations: {} };
  }

  // A new remote resource needs every array
  const files = resource.dirtyFileSet(force || id === undefined, validation);
  const metadata = resource.toJson();
  // Only the state encoded above is committed; edits made during the request stay dirty
  const commit = resource.captureSync();
  const result = await client.upload(resource.resourceKind, files, metadata, id);

  commit();
  ids.set(resource, result.id);
  return result;
}

/**
 * Download a resource and its arrays. The result is validated against
 * the session limits and starts clean.
 */
export function downloadResource(client: ResourceClient, kind: 'line', id: string): Promise<Line>;
export function downloadResource(client: ResourceClient, kind: 'point', id: string): Promise<Point>;
export function downloadResource(client: ResourceClient, kind: ResourceKind, id: string): Promise<AnyResource>;
export async function downloadResource(
  client: ResourceClient,
  kind: ResourceKind,
  id: string
): Promise<AnyResource> {
  const json = await client.download(kind, id);
  const resource = await loadResource(kind, json, client, { limits: client.session.limits });
  idsFor(client).set(resource, id);
  return resource;
}
