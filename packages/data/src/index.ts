/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshsync/data - Array values, binary codecs, errors and logging
 */

export * from './ndarray.js';
export * from './codec.js';
export * from './errors.js';
export { createLogger } from './logger.js';
export type { LogContext } from './logger.js';
