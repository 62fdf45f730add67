/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Line / LineMesh tests
 *
 * Covers connectivity and size validation, data length checks across
 * bindings, and dirty-file sets around markSynced().
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DataLengthMismatchError,
  DecodeError,
  FLOAT32_CODEC,
  INT32_CODEC,
  InvalidConnectivityError,
  MissingFieldError,
  PayloadTooLargeError,
  arraysEqual,
  ndarray,
  toNested,
} from '@meshsync/data';
import { DataArray, DataBinder } from './data-array.js';
import { Line, LineMesh } from './line.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

const VERTICES = [
  [0, 0, 0],
  [1, 0, 0],
  [2, 0, 0],
];
const SEGMENTS = [
  [0, 1],
  [1, 2],
];

function createLine(data: Array<{ location: string; array: number[] }> = []): Line {
  return new Line({
    title: 'Survey',
    mesh: { vertices: VERTICES, segments: SEGMENTS },
    data: data.map(({ location, array }) => ({ location, data: { title: 'Grade', array } })),
  });
}

describe('LineMesh', () => {
  it('derives node and cell counts', () => {
    const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
    expect(mesh.nodeCount).toBe(3);
    expect(mesh.cellCount).toBe(2);
  });

  it('auto-creates options', () => {
    const mesh = new LineMesh();
    expect(mesh.opts.require('LineMesh').viewType.value).toBe('line');
  });

  it('requires vertices and segments', () => {
    const err = catchError(() => new LineMesh({ vertices: VERTICES }).validate());
    expect(err).toBeInstanceOf(MissingFieldError);
    expect(err).toMatchObject({ field: 'segments', owner: 'LineMesh' });
  });

  describe('connectivity', () => {
    it('accepts the last vertex index', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: [[0, 2]] });
      expect(() => mesh.validate()).not.toThrow();
    });

    it('rejects an index equal to the node count', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: [[0, 3]] });
      expect(() => mesh.validate()).toThrow(InvalidConnectivityError);
    });

    it('reports the offending index and node count', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: [[0, 5]] });
      const err = catchError(() => mesh.validate());
      expect(err).toBeInstanceOf(InvalidConnectivityError);
      expect(err).toMatchObject({ reason: 'out-of-range', index: 1, value: 5, nodeCount: 3 });
      expect(err).toHaveProperty('message', 'Connectivity index 5 at position 1 is out of range for 3 vertices');
    });

    it('distinguishes negative indices', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: [[0, 1], [-1, 2]] });
      const err = catchError(() => mesh.validate());
      expect(err).toMatchObject({ reason: 'negative', index: 2, value: -1 });
    });
  });

  describe('size limits', () => {
    // vertices: 3 x 3 x 4 = 36 bytes, segments: 2 x 2 x 4 = 16 bytes
    let mesh: LineMesh;

    beforeEach(() => {
      mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
    });

    it('passes when every array fits', () => {
      expect(() => mesh.validate({ limits: { fileSizeLimit: 36 } })).not.toThrow();
    });

    it('names the array that exceeds the limit', () => {
      const err = catchError(() => mesh.validate({ limits: { fileSizeLimit: 35 } }));
      expect(err).toBeInstanceOf(PayloadTooLargeError);
      expect(err).toMatchObject({ arrayName: 'vertices', byteSize: 36, limit: 35 });
    });

    it('checks segments before vertices', () => {
      const err = catchError(() => mesh.validate({ limits: { fileSizeLimit: 15 } }));
      expect(err).toMatchObject({ arrayName: 'segments', byteSize: 16 });
    });

    it('computes nbytes from both arrays', () => {
      expect(mesh.nbytes()).toBe(52);
    });
  });

  describe('dirtyFileSet', () => {
    it('returns every array after construction', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      expect([...mesh.dirtyFileSet().keys()]).toEqual(['segments', 'vertices']);
    });

    it('returns nothing after markSynced', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      mesh.markSynced();
      expect(mesh.dirtyFileSet().size).toBe(0);
    });

    it('returns exactly the mutated array', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      mesh.markSynced();
      mesh.vertices.set([
        [0, 0, 0],
        [1, 1, 0],
        [2, 0, 0],
      ]);
      expect([...mesh.dirtyFileSet().keys()]).toEqual(['vertices']);
    });

    it('returns every array when forced', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      mesh.markSynced();
      expect([...mesh.dirtyFileSet(true).keys()]).toEqual(['segments', 'vertices']);
    });

    it('produces byte-identical output when forced twice', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      const first = mesh.dirtyFileSet(true);
      const second = mesh.dirtyFileSet(true);
      expect(second.get('vertices')?.bytes).toEqual(first.get('vertices')?.bytes);
      expect(second.get('segments')?.bytes).toEqual(first.get('segments')?.bytes);
    });

    it('tags each file with its dtype and shape', () => {
      const files = new LineMesh({ vertices: VERTICES, segments: SEGMENTS }).dirtyFileSet();
      expect(files.get('vertices')).toMatchObject({ dtype: 'Float32Array', shape: [3, 3] });
      expect(files.get('segments')).toMatchObject({ dtype: 'Int32Array', shape: [2, 2] });
    });

    it('encodes arrays that decode back to the original values', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      const files = mesh.dirtyFileSet();
      const vertices = files.get('vertices');
      const segments = files.get('segments');
      expect(vertices).toBeDefined();
      expect(segments).toBeDefined();
      if (!vertices || !segments) return;

      expect(arraysEqual(FLOAT32_CODEC.decode(vertices.bytes, ['*', 3]), mesh.vertices.require('test'))).toBe(true);
      expect(arraysEqual(INT32_CODEC.decode(segments.bytes, ['*', 2]), mesh.segments.require('test'))).toBe(true);
    });

    it('leaves dirty state untouched when validation fails', () => {
      const mesh = new LineMesh({ vertices: VERTICES, segments: SEGMENTS });
      mesh.markSynced();
      mesh.segments.set([[0, 5]]);
      expect(() => mesh.dirtyFileSet()).toThrow(InvalidConnectivityError);
      expect(mesh.dirtyFieldNames()).toEqual(['segments']);

      mesh.segments.set([[0, 2]]);
      expect([...mesh.dirtyFileSet().keys()]).toEqual(['segments']);
    });
  });

  it('serializes options as meta', () => {
    const mesh = new LineMesh({ title: 'Holes', vertices: VERTICES, segments: SEGMENTS, opts: { viewType: 'tubes' } });
    expect(mesh.toJson()).toEqual({ title: 'Holes', meta: { opacity: 1, viewType: 'tube' } });
  });
});

describe('Line', () => {
  it('validates a per-cell binding matching the segment count', () => {
    const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
    expect(() => line.validate()).not.toThrow();
  });

  it('validates a per-node binding matching the vertex count', () => {
    const line = createLine([{ location: 'N', array: [1, 2, 3] }]);
    expect(() => line.validate()).not.toThrow();
  });

  it('reports a per-cell length mismatch', () => {
    const line = createLine([{ location: 'CC', array: [1, 2, 3] }]);
    const err = catchError(() => line.validate());
    expect(err).toBeInstanceOf(DataLengthMismatchError);
    expect(err).toMatchObject({ index: 0, actual: 3, expected: 2, location: 'CC' });
    expect(err).toHaveProperty('message', 'data[0] length 3 does not match CC length 2');
  });

  it('reports a per-node length mismatch', () => {
    const line = createLine([{ location: 'vertex', array: [1, 2] }]);
    const err = catchError(() => line.validate());
    expect(err).toMatchObject({ index: 0, actual: 2, expected: 3, location: 'N' });
  });

  it('checks every binding before failing', () => {
    const line = createLine([
      { location: 'N', array: [1, 2] },
      { location: 'CC', array: [1, 2] },
      { location: 'CC', array: [1, 2, 3] },
    ]);
    const err = catchError(() => line.validate());
    expect(err).toBeInstanceOf(DataLengthMismatchError);
    expect(err).toHaveProperty('failures', [
      { index: 0, actual: 2, expected: 3, location: 'N' },
      { index: 2, actual: 3, expected: 2, location: 'CC' },
    ]);
  });

  it('resolves location aliases', () => {
    const line = createLine([{ location: 'segment', array: [1, 2] }]);
    expect(line.bindings[0].location.value).toBe('CC');
  });

  it('sums mesh and data sizes', () => {
    const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
    expect(line.nbytes()).toBe(36 + 16 + 8);
  });

  describe('dirtyFileSet', () => {
    it('keys arrays by their position in the resource', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      expect([...line.dirtyFileSet().keys()]).toEqual(['mesh.segments', 'mesh.vertices', 'data.0.array']);
    });

    it('is empty after markSynced and tracks later edits', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      line.markSynced();
      expect(line.isDirty).toBe(false);
      expect(line.dirtyFileSet().size).toBe(0);

      line.bindings[0].dataArray.array.set([0.5, 0.7]);
      expect([...line.dirtyFileSet().keys()]).toEqual(['data.0.array']);
    });

    it('picks up newly bound data', () => {
      const line = createLine();
      line.markSynced();
      line.data.set([...line.bindings, new DataBinder({ location: 'N', data: new DataArray({ array: [1, 2, 3] }) })]);
      expect(line.isDirty).toBe(true);
      expect([...line.dirtyFileSet().keys()]).toEqual(['data.0.array']);
    });

    it('keeps edits made after a capture dirty once it is committed', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      const commit = line.captureSync();
      line.geometry.vertices.set([
        [0, 0, 0],
        [1, 1, 0],
        [2, 0, 0],
      ]);
      commit();

      expect(line.isDirty).toBe(true);
      expect(line.geometry.dirtyFieldNames()).toEqual(['vertices']);
      expect([...line.dirtyFileSet().keys()]).toEqual(['mesh.vertices']);
    });

    it('sends only the appended binding', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      line.markSynced();
      line.data.set([...line.bindings, new DataBinder({ location: 'N', data: new DataArray({ array: [1, 2, 3] }) })]);
      expect([...line.dirtyFileSet().keys()]).toEqual(['data.1.array']);
    });

    it('re-sends a clean binding that moved after a removal', () => {
      const line = createLine([
        { location: 'CC', array: [0.4, 0.7] },
        { location: 'CC', array: [0.1, 0.2] },
      ]);
      line.markSynced();
      line.data.set([line.bindings[1]]);

      expect(line.isDirty).toBe(true);
      const files = line.dirtyFileSet();
      expect([...files.keys()]).toEqual(['data.0.array']);
      expect(Array.from(FLOAT32_CODEC.decode(files.get('data.0.array')?.bytes ?? new Uint8Array(), ['*']).data)).toEqual([
        Math.fround(0.1),
        Math.fround(0.2),
      ]);
    });

    it('re-sends every binding after a reorder', () => {
      const line = createLine([
        { location: 'CC', array: [0.4, 0.7] },
        { location: 'N', array: [1, 2, 3] },
      ]);
      line.markSynced();
      line.data.set([line.bindings[1], line.bindings[0]]);
      expect([...line.dirtyFileSet().keys()]).toEqual(['data.0.array', 'data.1.array']);
    });

    it('keeps bindings in place when only a location changes', () => {
      const line = createLine([{ location: 'N', array: [1, 2, 3] }]);
      line.markSynced();
      line.geometry.segments.set([
        [0, 1],
        [1, 2],
        [2, 0],
      ]);
      line.bindings[0].location.set('CC');
      expect(line.isDirty).toBe(true);
      expect([...line.dirtyFileSet().keys()]).toEqual(['mesh.segments']);
    });

    it('sends every mesh array when the mesh is replaced by a synced one', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      line.markSynced();
      const other = new LineMesh({
        vertices: VERTICES,
        segments: [
          [0, 2],
          [2, 1],
        ],
      });
      other.markSynced();
      line.mesh.set(other);

      expect(line.isDirty).toBe(true);
      expect([...line.dirtyFileSet().keys()]).toEqual(['mesh.segments', 'mesh.vertices']);
    });

    it('sends a synced data array once it is bound in place of another', () => {
      const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
      line.markSynced();
      const replacement = new DataArray({ array: [9, 8] });
      replacement.markSynced();
      line.bindings[0].data.set(replacement);

      expect(line.isDirty).toBe(true);
      expect([...line.dirtyFileSet().keys()]).toEqual(['data.0.array']);
    });

    it('does not encode anything when data lengths disagree', () => {
      const line = createLine([{ location: 'CC', array: [1, 2] }]);
      line.markSynced();
      line.geometry.segments.set([[0, 1]]);
      expect(() => line.dirtyFileSet()).toThrow(DataLengthMismatchError);
      expect(line.geometry.dirtyFieldNames()).toEqual(['segments']);
    });
  });

  it('serializes metadata without arrays', () => {
    const line = createLine([{ location: 'CC', array: [0.4, 0.7] }]);
    line.opts.require('Line').color.set('#00ff00');
    expect(line.toJson()).toEqual({
      title: 'Survey',
      mesh: { meta: { opacity: 1, viewType: 'line' } },
      data: [{ location: 'CC', data: { title: 'Grade', order: 'c' } }],
      meta: { opacity: 1, color: '#00ff00' },
    });
  });

  it('exposes mesh geometry as nested arrays', () => {
    const line = createLine();
    expect(toNested(line.geometry.vertices.require('test'))).toEqual(VERTICES);
  });
});

describe('Line.fromJson', () => {
  const refs = new Map<string, Uint8Array>();
  const fetcher = {
    async fetchArray(ref: string): Promise<Uint8Array> {
      const bytes = refs.get(ref);
      if (!bytes) throw new Error(`No array at ${ref}`);
      return bytes;
    },
  };

  beforeEach(() => {
    const source = createLine([{ location: 'CC', array: [0.5, 0.25] }]);
    const files = source.dirtyFileSet(true);
    refs.clear();
    for (const [key, file] of files) {
      refs.set(`mem://${key}`, file.bytes);
    }
  });

  function remoteJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      title: 'Survey',
      mesh: {
        vertices: 'mem://mesh.vertices',
        segments: 'mem://mesh.segments',
        meta: { viewType: 'tubes', unknownKey: true },
      },
      data: [{ location: 'segment', data: { title: 'Grade', array: 'mem://data.0.array', order: 'c' } }],
      meta: { color: '#00ff00', opacity: 0.5 },
      ...overrides,
    };
  }

  it('rebuilds a clean resource from JSON and array refs', async () => {
    const line = await Line.fromJson(remoteJson(), fetcher);

    expect(line.title.value).toBe('Survey');
    expect(toNested(line.geometry.vertices.require('test'))).toEqual(VERTICES);
    expect(toNested(line.geometry.segments.require('test'))).toEqual(SEGMENTS);
    expect(Array.from(line.bindings[0].dataArray.array.require('test').data)).toEqual([0.5, 0.25]);
    expect(line.isDirty).toBe(false);
    expect(line.dirtyFileSet().size).toBe(0);
  });

  it('resolves aliases and ignores unknown meta keys', async () => {
    const line = await Line.fromJson(remoteJson(), fetcher);

    expect(line.bindings[0].location.value).toBe('CC');
    expect(line.geometry.opts.require('test').viewType.value).toBe('tube');
    expect(line.opts.require('test').color.value).toEqual([0, 255, 0]);
    expect(line.opts.require('test').opacity.value).toBe(0.5);
  });

  it('rejects corrupt array bytes', async () => {
    refs.set('mem://mesh.vertices', new Uint8Array(10));
    await expect(Line.fromJson(remoteJson(), fetcher)).rejects.toBeInstanceOf(DecodeError);
  });

  it('rejects remote connectivity that is out of range', async () => {
    refs.set('mem://mesh.segments', INT32_CODEC.encode(ndarray('int', [1, 2], [0, 5])));
    await expect(Line.fromJson(remoteJson(), fetcher)).rejects.toBeInstanceOf(InvalidConnectivityError);
  });

  it('names the path of a missing reference', async () => {
    const json = remoteJson({ mesh: { vertices: 'mem://mesh.vertices' } });
    await expect(Line.fromJson(json, fetcher)).rejects.toMatchObject({
      name: 'InvalidWireFormatError',
      path: 'resource.mesh.segments',
    });
  });
});
