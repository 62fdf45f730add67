/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Resource API HTTP client
 *
 * Thin wrapper around fetch() with:
 * - Bearer token authentication from the session API key
 * - Multipart uploads of encoded arrays plus metadata JSON
 * - Binary array downloads (implements ArrayFetcher)
 */

import { InvalidWireFormatError, createLogger } from '@meshsync/data';
import { expectRecord, expectString, isRecord } from '@meshsync/model';
import type { ArrayFetcher, DirtyFileSet, JsonValue, ResourceKind } from '@meshsync/model';
import { ApiError } from './errors.js';
import type { Session } from './session.js';
import type { ClientConfig, UploadResult } from './types.js';

const log = createLogger('ResourceClient');

export const CLIENT_VERSION = '0.1.0';
const CLIENT_HEADER = `meshsync:${CLIENT_VERSION}`;
const DEFAULT_TIMEOUT = 60000;

/** Copy into a standalone ArrayBuffer so the bytes can back a Blob */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Client for the resource API.
 *
 * @example
 * ```typescript
 * const client = new ResourceClient({
 *   baseUrl: 'https://meshes.example.com',
 *   session: createSession(apiKey),
 * });
 * const { id } = await client.upload('line', line.dirtyFileSet(), line.toJson());
 * ```
 */
export class ResourceClient implements ArrayFetcher {
  readonly baseUrl: string;
  readonly session: Session;
  private timeout: number;

  constructor(config: ClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.session = config.session;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
  }

  /** Build the full URL of a resource endpoint */
  resourceUrl(kind: ResourceKind, id?: string): string {
    const base = `${this.baseUrl}/api/resource/${kind}`;
    return id === undefined ? base : `${base}/${encodeURIComponent(id)}`;
  }

  /** Common headers for all requests */
  private headers(accept?: string): Record<string, string> {
    const h: Record<string, string> = {
      Authorization: `Bearer ${this.session.apiKey}`,
      'X-Client': CLIENT_HEADER,
    };
    if (accept) {
      h.Accept = accept;
    }
    return h;
  }

  /**
   * Core fetch wrapper: auth headers, timeout, ApiError on non-OK responses
   */
  private async request(url: string, init: RequestInit, accept?: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        headers: this.headers(accept),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (err) {
      log.error(`${init.method ?? 'GET'} ${url} failed`, err, { operation: 'request' });
      throw err;
    }

    if (!response.ok) {
      const bodyText = await response.text().catch((err: unknown) => {
        log.warn(`Could not read the error body of ${url}`, {
          operation: 'request',
          data: { reason: err instanceof Error ? err.message : String(err) },
        });
        return '';
      });
      log.error(`${init.method ?? 'GET'} ${url} returned ${response.status}`, undefined, {
        operation: 'request',
        data: { status: response.status },
      });
      throw new ApiError(
        `API error: ${response.status} ${response.statusText}`,
        response.status,
        response.statusText,
        bodyText
      );
    }

    return response;
  }

  /**
   * Upload metadata and encoded arrays. POST creates a new resource;
   * passing `id` PUTs over an existing one.
   */
  async upload(
    kind: ResourceKind,
    files: DirtyFileSet,
    metadata: { [key: string]: JsonValue },
    id?: string
  ): Promise<UploadResult> {
    const form = new FormData();
    form.append('json', JSON.stringify(metadata));
    for (const [name, file] of files) {
      form.append(name, new Blob([toArrayBuffer(file.bytes)], { type: 'application/octet-stream' }), `${name}.bin`);
      form.append(`${name}Type`, file.dtype);
      form.append(`${name}Shape`, file.shape.join(','));
    }

    const method = id === undefined ? 'POST' : 'PUT';
    const url = this.resourceUrl(kind, id);
    const response = await this.request(url, { method, body: form });
    const result = parseUploadResult(await response.json());

    log.info(`${method} ${kind} ${result.id}`, {
      operation: 'upload',
      resourceId: result.id,
      resourceKind: kind,
      data: { files: files.size },
    });
    return result;
  }

  /** GET the metadata JSON of a remote resource */
  async download(kind: ResourceKind, id: string): Promise<unknown> {
    const response = await this.request(this.resourceUrl(kind, id), { method: 'GET' }, 'application/json');
    const json: unknown = await response.json();
    log.info(`GET ${kind} ${id}`, { operation: 'download', resourceId: id, resourceKind: kind });
    return json;
  }

  /** GET an encoded array. Relative references resolve against the base URL. */
  async fetchArray(ref: string): Promise<Uint8Array> {
    const url = new URL(ref, `${this.baseUrl}/`).toString();
    const response = await this.request(url, { method: 'GET' }, 'application/octet-stream');
    return new Uint8Array(await response.arrayBuffer());
  }
}

function parseUploadResult(value: unknown): UploadResult {
  const json = expectRecord(value, 'upload');
  const locations: Record<string, string> = {};
  if (json.locations !== undefined) {
    if (!isRecord(json.locations)) {
      throw new InvalidWireFormatError('upload.locations', 'expected an object');
    }
    for (const [key, url] of Object.entries(json.locations)) {
      locations[key] = expectString(url, `upload.locations.${key}`);
    }
  }
  return { id: expectString(json.id, 'upload.id'), locations };
}
