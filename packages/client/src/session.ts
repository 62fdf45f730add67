/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Sessions
 *
 * A session is an explicit value handed to the client; there is no
 * process-wide logged-in state.
 */

import { KindMismatchError } from '@meshsync/data';
import type { SizeLimits } from '@meshsync/model';

const KEY_SECRET_LENGTH = 36;

export interface Session {
  /** `<username>//<36 characters>` */
  apiKey: string;
  username: string;
  /** Overrides for the default size limits, applied while syncing */
  limits?: Partial<SizeLimits>;
}

/**
 * Check the API key format: a username, `//`, then exactly 36 characters
 */
export function isApiKey(key: string): boolean {
  const parts = key.split('//');
  return parts.length === 2 && parts[1].length === KEY_SECRET_LENGTH;
}

/**
 * Build a session from an API key; the username is the part before `//`
 */
export function createSession(apiKey: string, limits?: Partial<SizeLimits>): Session {
  if (!isApiKey(apiKey)) {
    throw new KindMismatchError('apiKey', 'username//<36 characters>', 'a malformed key');
  }
  return {
    apiKey,
    username: apiKey.split('//')[0],
    limits,
  };
}
