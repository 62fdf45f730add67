/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Size limits enforced before any upload
 */

export interface SizeLimits {
  /** Maximum encoded size of a single array, in bytes */
  fileSizeLimit: number;
  /** Maximum encoded size of a whole resource (mesh + bound data), in bytes */
  resourceSizeLimit: number;
}

export const DEFAULT_SIZE_LIMITS: Readonly<SizeLimits> = {
  fileSizeLimit: 5_000_000,
  resourceSizeLimit: 25_000_000,
};

export interface ValidationOptions {
  limits?: Partial<SizeLimits>;
}

export function resolveLimits(options: ValidationOptions = {}): SizeLimits {
  return { ...DEFAULT_SIZE_LIMITS, ...options.limits };
}
