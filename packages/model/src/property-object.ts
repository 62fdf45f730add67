/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Base class for every entity in the resource model
 *
 * Subclasses declare their schema explicitly:
 * - fields(): the TypedFields owned by the entity
 * - validators(): cross-field checks, run after required/nested checks
 *
 * Validation never touches dirty state, so a failed sync attempt can
 * simply be retried after the caller fixes the data.
 */

import { KindMismatchError, MissingFieldError, createLogger } from '@meshsync/data';
import type { SizeLimits, ValidationOptions } from './config.js';
import { resolveLimits } from './config.js';
import type { JsonValue, TypedField } from './field.js';

const log = createLogger('PropertyObject');

export type Validator = (limits: SizeLimits) => void;

/** Marks a captured state as synced */
export type SyncCommit = () => void;

export interface UpdateOptions {
  /** Throw on keys that are not fields (default). When false they are skipped. */
  strict?: boolean;
}

export class PropertyObject {
  /** Entity type name used in error messages */
  get entityName(): string {
    return this.constructor.name;
  }

  fields(): TypedField<unknown>[] {
    return [];
  }

  protected validators(): Validator[] {
    return [];
  }

  field(name: string): TypedField<unknown> | undefined {
    return this.fields().find(f => f.name === name);
  }

  /**
   * Assign several fields by name. Each assignment is validated as it happens.
   */
  update(values: object, options: UpdateOptions = {}): void {
    const strict = options.strict ?? true;
    const entries: Array<[string, unknown]> = Object.entries(values);
    for (const [name, value] of entries) {
      const field = this.field(name);
      if (!field) {
        if (strict) {
          throw new KindMismatchError(name, `a field of ${this.entityName}`, 'an unknown field');
        }
        log.debug(`Skipping unknown key '${name}'`, { operation: 'update', entity: this.entityName });
        continue;
      }
      field.set(value);
    }
  }

  /**
   * Run required-field checks, nested entity validation and cross-field
   * validators. Throws the first failure.
   */
  validate(options: ValidationOptions = {}): void {
    const limits = resolveLimits(options);
    try {
      this.runValidation(limits);
    } catch (err) {
      log.debug(`Validation failed: ${err instanceof Error ? err.message : String(err)}`, {
        operation: 'validate',
        entity: this.entityName,
      });
      throw err;
    }
  }

  protected runValidation(limits: SizeLimits): void {
    const fields = this.fields();
    for (const field of fields) {
      if (field.isRequiredButMissing()) {
        throw new MissingFieldError(field.name, this.entityName);
      }
    }
    for (const field of fields) {
      for (const child of field.children()) {
        child.runValidation(limits);
      }
    }
    for (const validator of this.validators()) {
      validator(limits);
    }
  }

  get isDirty(): boolean {
    return this.fields().some(f => f.isDirty);
  }

  dirtyFieldNames(): string[] {
    return this.fields()
      .filter(f => f.isDirty)
      .map(f => f.name);
  }

  /**
   * Snapshot every field, nested entities included, and return a commit
   * that marks exactly that state as synced. A transport captures when it
   * encodes and commits once the remote write is confirmed, so edits made
   * while the request is in flight stay dirty.
   */
  captureSync(): SyncCommit {
    const commits: SyncCommit[] = [];
    for (const field of this.fields()) {
      for (const child of field.children()) {
        commits.push(child.captureSync());
      }
      commits.push(field.capture());
    }
    return () => {
      for (const commit of commits) commit();
    };
  }

  /** Record the current state as written remotely */
  markSynced(): void {
    this.captureSync()();
  }

  /**
   * Metadata JSON. Array fields are omitted; they travel as binary files.
   */
  toJson(): { [key: string]: JsonValue } {
    const json: { [key: string]: JsonValue } = {};
    for (const field of this.fields()) {
      if (field.type.kind === 'array') continue;
      const value = field.toJson();
      if (value !== undefined) {
        json[field.jsonKey] = value;
      }
    }
    return json;
  }
}
