/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Resources: entities that carry a title/description and may own
 * binary arrays that are uploaded as separate files.
 */

import type { ArrayField } from './array-field.js';
import type { ValidationOptions } from './config.js';
import { TypedField } from './field.js';
import { stringType } from './field-types.js';
import { PropertyObject } from './property-object.js';
import type { Validator } from './property-object.js';
import type { DirtyFileSet } from './wire.js';

export interface ResourceInit {
  title?: string;
  description?: string;
}

export class BaseResource extends PropertyObject {
  readonly title = new TypedField('title', stringType(), { doc: 'Title' });
  readonly description = new TypedField('description', stringType(), { doc: 'Description' });

  fields(): TypedField<unknown>[] {
    return [...super.fields(), this.title, this.description];
  }

  /** Array fields, in the order their size limits are checked */
  arrayFields(): ArrayField[] {
    return [];
  }

  protected validators(): Validator[] {
    return [
      ...super.validators(),
      limits => {
        for (const field of this.arrayFields()) {
          field.checkSize(limits.fileSizeLimit);
        }
      },
    ];
  }

  /** Encoded size of every array this resource uploads */
  nbytes(): number {
    return this.arrayFields().reduce((sum, field) => sum + field.byteSize(), 0);
  }

  /**
   * Validate, then encode the arrays that changed since the last sync
   * (all of them when `force` is set). Keys are stable array identifiers.
   */
  dirtyFileSet(force = false, options: ValidationOptions = {}): DirtyFileSet {
    this.validate(options);
    const files: DirtyFileSet = new Map();
    this.collectFiles(force, '', files);
    return files;
  }

  /** Encode without validating; owners call this after validating themselves */
  collectFiles(force: boolean, prefix: string, files: DirtyFileSet): void {
    for (const field of this.arrayFields()) {
      if (field.value === undefined) continue;
      if (force || field.isDirty) {
        files.set(prefix + field.name, field.encode(this.entityName));
      }
    }
  }
}
