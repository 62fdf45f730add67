/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Session } from './session.js';

/**
 * Resource client configuration
 */
export interface ClientConfig {
  /** Server base URL (e.g., "https://meshes.example.com") */
  baseUrl: string;
  session: Session;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
}

/**
 * Server reply to an upload
 */
export interface UploadResult {
  /** Remote id; later uploads of the same resource PUT to it */
  id: string;
  /** Array identifier -> URL the server stored it at */
  locations: Record<string, string>;
}

export interface UploadOptions {
  /** Upload every array, not only the ones changed since the last sync */
  force?: boolean;
}
