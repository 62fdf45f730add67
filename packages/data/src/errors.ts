/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error types shared across meshsync packages
 */

export class MeshSyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeshSyncError';
  }
}

// ============================================================================
// Assignment-time errors
// ============================================================================

export class ShapeMismatchError extends MeshSyncError {
  constructor(
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`${field}: expected shape ${expected}, got ${actual}`);
    this.name = 'ShapeMismatchError';
  }
}

export class KindMismatchError extends MeshSyncError {
  constructor(
    public readonly field: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`${field}: expected ${expected}, got ${actual}`);
    this.name = 'KindMismatchError';
  }
}

// ============================================================================
// Pre-sync validation errors
// ============================================================================

export class MissingFieldError extends MeshSyncError {
  constructor(
    public readonly field: string,
    public readonly owner: string
  ) {
    super(`${owner}.${field} is required`);
    this.name = 'MissingFieldError';
  }
}

export type ConnectivityViolation = 'negative' | 'out-of-range';

export class InvalidConnectivityError extends MeshSyncError {
  constructor(
    public readonly reason: ConnectivityViolation,
    /** Flat position of the offending entry in the connectivity array */
    public readonly index: number,
    public readonly value: number,
    public readonly nodeCount: number
  ) {
    super(
      reason === 'negative'
        ? `Connectivity may only contain non-negative indices (found ${value} at position ${index})`
        : `Connectivity index ${value} at position ${index} is out of range for ${nodeCount} vertices`
    );
    this.name = 'InvalidConnectivityError';
  }
}

export class PayloadTooLargeError extends MeshSyncError {
  constructor(
    public readonly arrayName: string,
    public readonly byteSize: number,
    public readonly limit: number
  ) {
    super(`${arrayName} is ${byteSize} bytes, which exceeds the limit of ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export interface DataLengthFailure {
  index: number;
  actual: number;
  expected: number;
  location: string;
}

/**
 * Bound data length disagrees with the mesh. The first failure is reported
 * in the message; `failures` lists every mismatching binding.
 */
export class DataLengthMismatchError extends MeshSyncError {
  public readonly index: number;
  public readonly actual: number;
  public readonly expected: number;
  public readonly location: string;

  constructor(public readonly failures: readonly DataLengthFailure[]) {
    const [first] = failures;
    const extra = failures.length > 1 ? ` (${failures.length - 1} more binding(s) also mismatch)` : '';
    super(
      `data[${first.index}] length ${first.actual} does not match ${first.location} length ${first.expected}${extra}`
    );
    this.name = 'DataLengthMismatchError';
    this.index = first.index;
    this.actual = first.actual;
    this.expected = first.expected;
    this.location = first.location;
  }
}

// ============================================================================
// Input errors
// ============================================================================

export class DecodeError extends MeshSyncError {
  constructor(
    message: string,
    public readonly byteLength: number,
    public readonly itemSize: number,
    public readonly shape: string
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class InvalidWireFormatError extends MeshSyncError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Invalid resource JSON at ${path}: ${reason}`);
    this.name = 'InvalidWireFormatError';
  }
}
