/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshsync/model - Validated, dirty-tracked resource model
 *
 * @example
 * ```typescript
 * import { Line } from '@meshsync/model';
 *
 * const line = new Line({
 *   mesh: { vertices: [[0, 0, 0], [1, 0, 0]], segments: [[0, 1]] },
 * });
 * const files = line.dirtyFileSet(); // validated, only changed arrays
 * // ...upload files...
 * line.markSynced();
 * ```
 */

export { TypedField } from './field.js';
export type { FieldType, FieldKind, FieldOptions, JsonValue } from './field.js';
export {
  arrayType,
  stringType,
  numberType,
  choiceType,
  colorType,
  instanceType,
  listType,
  isNdArray,
} from './field-types.js';
export type { ArrayFieldType, Rgb } from './field-types.js';
export { ArrayField } from './array-field.js';
export type { ArrayInput } from './array-field.js';
export { PropertyObject } from './property-object.js';
export type { Validator, UpdateOptions, SyncCommit } from './property-object.js';
export { DEFAULT_SIZE_LIMITS, resolveLimits } from './config.js';
export type { SizeLimits, ValidationOptions } from './config.js';
export { BaseResource } from './resource.js';
export type { ResourceInit } from './resource.js';
export {
  Options,
  ColorOptions,
  LineMeshOptions,
  LineOptions,
  PointMeshOptions,
  PointOptions,
} from './options.js';
export type { OptionsInit, ColorOptionsInit, LineMeshOptionsInit, LineViewType } from './options.js';
export { Mesh, LOCATION_CHOICES } from './mesh.js';
export type { DataLocation } from './mesh.js';
export { DataArray, DataBinder } from './data-array.js';
export type { DataArrayInit, DataBinderInit, DataOrder } from './data-array.js';
export { CompositeResource, loadBinders } from './composite.js';
export type { CompositeInit } from './composite.js';
export { LineMesh, Line } from './line.js';
export type { LineMeshInit, LineInit } from './line.js';
export { PointMesh, Point } from './point.js';
export type { PointMeshInit, PointInit } from './point.js';
export { RESOURCE_KINDS, isResourceKind, loadResource } from './registry.js';
export type { AnyResource } from './registry.js';
export { importOmfElement, importOmfProject } from './importers.js';
export { offsetVertices, isLineSetGeometry } from './omf-types.js';
export type {
  OmfArray,
  OmfElement,
  OmfLineSetGeometry,
  OmfPointSetGeometry,
  OmfProject,
  OmfScalarData,
  OmfDataLocation,
  Vector3,
} from './omf-types.js';
export {
  isRecord,
  isPlainObject,
  expectRecord,
  expectString,
  expectArray,
  parseMeshJson,
  parseDataArrayJson,
  parseResourceJson,
} from './wire.js';
export type {
  ArrayFetcher,
  EncodedArray,
  DirtyFileSet,
  ResourceKind,
  ResourceMeta,
  MeshJson,
  DataArrayJson,
  BinderJson,
  ResourceJson,
} from './wire.js';
