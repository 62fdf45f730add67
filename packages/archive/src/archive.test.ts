/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { DecodeError, InvalidConnectivityError, InvalidWireFormatError, toNested } from '@meshsync/data';
import { Line, Point } from '@meshsync/model';
import { readArchive } from './reader.js';
import { writeArchive } from './writer.js';

function createLine(): Line {
  return new Line({
    title: 'Survey',
    mesh: {
      vertices: [
        [0, 0, 0],
        [1, 0, 0],
        [2, 0, 0],
      ],
      segments: [
        [0, 1],
        [1, 2],
      ],
      opts: { viewType: 'tube' },
    },
    data: [{ location: 'CC', data: { title: 'Grade', array: [0.5, 0.75] } }],
    opts: { color: '#336699', opacity: 0.5 },
  });
}

async function readManifest(bytes: Uint8Array): Promise<unknown> {
  const zip = await JSZip.loadAsync(bytes);
  const content = await zip.file('resource.json')?.async('string');
  return content === undefined ? undefined : JSON.parse(content);
}

async function rewrite(bytes: Uint8Array, edit: (zip: JSZip) => void): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(bytes);
  edit(zip);
  return zip.generateAsync({ type: 'uint8array' });
}

/** Rewrite the manifest through a JSON.parse reviver */
async function reviseManifest(
  bytes: Uint8Array,
  reviver: (key: string, value: unknown) => unknown
): Promise<Uint8Array> {
  const zip = await JSZip.loadAsync(bytes);
  const content = (await zip.file('resource.json')?.async('string')) ?? '';
  zip.file('resource.json', JSON.stringify(JSON.parse(content, reviver)));
  return zip.generateAsync({ type: 'uint8array' });
}

function patchIndexEntry(key: string, patch: Record<string, unknown>) {
  return (name: string, value: unknown): unknown =>
    name === key && typeof value === 'object' && value !== null ? { ...value, ...patch } : value;
}

describe('writeArchive', () => {
  it('stores every array under arrays/', async () => {
    const zip = await JSZip.loadAsync(await writeArchive(createLine()));
    const names = Object.values(zip.files)
      .filter(entry => !entry.dir)
      .map(entry => entry.name)
      .sort();
    expect(names).toEqual([
      'arrays/data.0.array.bin',
      'arrays/mesh.segments.bin',
      'arrays/mesh.vertices.bin',
      'resource.json',
    ]);
  });

  it('writes the wire JSON with archive paths in place of arrays', async () => {
    const manifest = await readManifest(await writeArchive(createLine()));
    expect(manifest).toEqual({
      format: 'meshsync-archive',
      version: 1,
      kind: 'line',
      resource: {
        title: 'Survey',
        mesh: {
          vertices: 'arrays/mesh.vertices.bin',
          segments: 'arrays/mesh.segments.bin',
          meta: { opacity: 1, viewType: 'tube' },
        },
        data: [
          {
            location: 'CC',
            data: { title: 'Grade', order: 'c', array: 'arrays/data.0.array.bin' },
          },
        ],
        meta: { opacity: 0.5, color: '#336699' },
      },
      arrays: {
        'mesh.segments': { path: 'arrays/mesh.segments.bin', dtype: 'Int32Array', shape: [2, 2] },
        'mesh.vertices': { path: 'arrays/mesh.vertices.bin', dtype: 'Float32Array', shape: [3, 3] },
        'data.0.array': { path: 'arrays/data.0.array.bin', dtype: 'Float32Array', shape: [2] },
      },
    });
  });

  it('includes arrays that are already synced', async () => {
    const line = createLine();
    line.markSynced();
    const zip = await JSZip.loadAsync(await writeArchive(line));
    expect(zip.file('arrays/mesh.vertices.bin')).not.toBeNull();
  });

  it('leaves dirty state untouched', async () => {
    const line = createLine();
    await writeArchive(line);
    expect(line.isDirty).toBe(true);
  });

  it('refuses to write an invalid resource', async () => {
    const line = createLine();
    line.geometry.segments.set([[0, 3]]);
    await expect(writeArchive(line)).rejects.toBeInstanceOf(InvalidConnectivityError);
  });
});

describe('readArchive', () => {
  it('rebuilds a line with its data and options', async () => {
    const resource = await readArchive(await writeArchive(createLine()));

    expect(resource).toBeInstanceOf(Line);
    if (!(resource instanceof Line)) return;
    expect(resource.title.value).toBe('Survey');
    expect(toNested(resource.geometry.vertices.require('test'))).toEqual([
      [0, 0, 0],
      [1, 0, 0],
      [2, 0, 0],
    ]);
    expect(toNested(resource.geometry.segments.require('test'))).toEqual([
      [0, 1],
      [1, 2],
    ]);
    expect(resource.geometry.opts.require('test').viewType.value).toBe('tube');
    expect(resource.bindings[0].location.value).toBe('CC');
    expect(Array.from(resource.bindings[0].dataArray.array.require('test').data)).toEqual([0.5, 0.75]);
    expect(resource.opts.require('test').color.value).toEqual([0x33, 0x66, 0x99]);
    expect(resource.opts.require('test').opacity.value).toBe(0.5);
  });

  it('returns a clean resource', async () => {
    const resource = await readArchive(await writeArchive(createLine()));
    expect(resource.isDirty).toBe(false);
    expect(resource.dirtyFileSet().size).toBe(0);
  });

  it('rebuilds points', async () => {
    const point = new Point({
      mesh: { vertices: [[1, 2, 3]] },
      data: [{ location: 'N', data: { array: [9] } }],
    });
    const resource = await readArchive(await writeArchive(point));
    expect(resource).toBeInstanceOf(Point);
    expect(resource.resourceKind).toBe('point');
    expect(toNested(resource.geometry.vertices.require('test'))).toEqual([[1, 2, 3]]);
  });

  it('reads from an ArrayBuffer', async () => {
    const bytes = await writeArchive(createLine());
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    await expect(readArchive(buffer)).resolves.toBeInstanceOf(Line);
  });

  it('rejects an archive without a manifest', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip => zip.remove('resource.json'));
    const err = await readArchive(bytes).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidWireFormatError);
    expect(err).toMatchObject({ path: 'resource.json' });
  });

  it('rejects a manifest of another format', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip =>
      zip.file('resource.json', JSON.stringify({ format: 'other', version: 1, kind: 'line' }))
    );
    await expect(readArchive(bytes)).rejects.toMatchObject({ path: 'manifest.format' });
  });

  it('rejects an unknown resource kind', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip =>
      zip.file('resource.json', JSON.stringify({ format: 'meshsync-archive', version: 1, kind: 'surface' }))
    );
    await expect(readArchive(bytes)).rejects.toMatchObject({ path: 'manifest.kind' });
  });

  it('rejects a manifest that is not JSON', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip => zip.file('resource.json', '{'));
    await expect(readArchive(bytes)).rejects.toBeInstanceOf(InvalidWireFormatError);
  });

  it('names a missing array entry', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip => zip.remove('arrays/mesh.segments.bin'));
    await expect(readArchive(bytes)).rejects.toMatchObject({
      name: 'InvalidWireFormatError',
      path: 'arrays/mesh.segments.bin',
    });
  });

  it('rejects a decoded shape that disagrees with the index', async () => {
    const bytes = await reviseManifest(await writeArchive(createLine()), patchIndexEntry('mesh.vertices', { shape: [4, 3] }));
    const err = await readArchive(bytes).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidWireFormatError);
    expect(err).toMatchObject({
      path: 'manifest.arrays.mesh.vertices.shape',
      reason: 'decoded [3, 3], index records [4, 3]',
    });
  });

  it('rejects an index dtype that disagrees with the field', async () => {
    const bytes = await reviseManifest(await writeArchive(createLine()), patchIndexEntry('data.0.array', { dtype: 'Int32Array' }));
    await expect(readArchive(bytes)).rejects.toMatchObject({
      path: 'manifest.arrays.data.0.array.dtype',
      reason: 'expected Float32Array, got Int32Array',
    });
  });

  it('requires the array index', async () => {
    const bytes = await reviseManifest(await writeArchive(createLine()), (name, value) =>
      name === 'arrays' ? undefined : value
    );
    await expect(readArchive(bytes)).rejects.toMatchObject({ name: 'InvalidWireFormatError', path: 'manifest.arrays' });
  });

  it('rejects a truncated array entry', async () => {
    const bytes = await rewrite(await writeArchive(createLine()), zip =>
      zip.file('arrays/mesh.vertices.bin', new Uint8Array(10))
    );
    await expect(readArchive(bytes)).rejects.toBeInstanceOf(DecodeError);
  });
});
