import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigError, InvalidInputError, TransientFailureError } from '../control-plane/errors.js';
import {
  classifyTransformError,
  passthroughTransform,
  replaceExtension,
  resolveOutputName,
  type TransformAdapter,
} from '../transform/adapter.js';
import { loadTransform } from '../transform/loader.js';
import { errnoError } from './helpers.js';

describe('classifyTransformError', () => {
  it('keeps errors that already carry a classification', () => {
    const invalid = new InvalidInputError('bad header');
    const transient = new TransientFailureError('gpu busy');
    expect(classifyTransformError(invalid, '/in/a.raw')).toBe(invalid);
    expect(classifyTransformError(transient, '/in/a.raw')).toBe(transient);
  });

  it('treats missing inputs as permanent', () => {
    const err = classifyTransformError(errnoError('ENOENT'), '/in/a.raw');
    expect(err).toBeInstanceOf(InvalidInputError);
    expect(err.permanent).toBe(true);
    expect(err.message).toBe('/in/a.raw: ENOENT: simulated');
  });

  it('treats locks and unknown failures as transient', () => {
    expect(classifyTransformError(errnoError('EBUSY'), '/in/a.raw')).toBeInstanceOf(TransientFailureError);
    expect(classifyTransformError(new Error('model crashed'), '/in/a.raw')).toBeInstanceOf(TransientFailureError);
    expect(classifyTransformError('plain string', '/in/a.raw').permanent).toBe(false);
  });
});

describe('passthroughTransform', () => {
  it('returns the input bytes', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hires-relay-transform-'));
    const path = join(dir, 'a.raw');
    await writeFile(path, 'frame data');
    expect(Buffer.from(await passthroughTransform.transform(path)).toString('utf-8')).toBe('frame data');
  });

  it('rejects an empty file as invalid input', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'hires-relay-transform-'));
    const path = join(dir, 'empty.raw');
    await writeFile(path, '');
    await expect(passthroughTransform.transform(path)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('rejects a missing file as invalid input', async () => {
    await expect(passthroughTransform.transform('/nonexistent/a.raw')).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('output naming', () => {
  const upscale: TransformAdapter = {
    name: 'upscale',
    transform: async () => new Uint8Array([1]),
    outputName: (rel) => rel.replace('_12', '_70'),
  };

  it('replaces the extension', () => {
    expect(replaceExtension('shoot/photo_12.raw', '.tif')).toBe('shoot/photo_12.tif');
    expect(replaceExtension('README', '.txt')).toBe('README.txt');
  });

  it('applies the adapter mapping, then the configured extension', () => {
    expect(resolveOutputName(upscale, 'shoot/photo_12.raw')).toBe('shoot/photo_70.raw');
    expect(resolveOutputName(upscale, 'shoot/photo_12.raw', '.tif')).toBe('shoot/photo_70.tif');
    expect(resolveOutputName(passthroughTransform, 'a.raw')).toBe('a.raw');
  });
});

describe('loadTransform', () => {
  it('resolves the built-in passthrough adapter', async () => {
    expect(await loadTransform('passthrough')).toBe(passthroughTransform);
  });

  it('reports a module that cannot be loaded', async () => {
    await expect(loadTransform('./no-such-adapter.js', '/nonexistent')).rejects.toBeInstanceOf(ConfigError);
  });
});
