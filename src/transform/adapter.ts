import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import {
  InvalidInputError,
  PipelineError,
  TransientFailureError,
  errnoCode,
  errorMessage,
} from '../control-plane/errors.js';

/**
 * Boundary around the resolution-upgrade step. Implementations must return
 * the same bytes for the same input bytes and must not modify the input.
 * Failures are thrown as InvalidInputError (permanent) or
 * TransientFailureError (retried); anything else counts as transient.
 */
export interface TransformAdapter {
  readonly name: string;
  transform(inputPath: string): Promise<Uint8Array>;
  /** Maps a source-relative path to the destination-relative path. */
  outputName?(relativePath: string): string;
}

const PERMANENT_CODES = new Set(['ENOENT', 'EISDIR', 'ENOTDIR']);

export function classifyTransformError(err: unknown, inputPath: string): PipelineError {
  if (err instanceof InvalidInputError || err instanceof TransientFailureError) {
    return err;
  }
  const code = errnoCode(err);
  // Locks, descriptor exhaustion and unknown failures are worth another attempt.
  const message = `${inputPath}: ${errorMessage(err)}`;
  if (code && PERMANENT_CODES.has(code)) {
    return new InvalidInputError(message, { cause: err });
  }
  return new TransientFailureError(message, { cause: err });
}

export const passthroughTransform: TransformAdapter = {
  name: 'passthrough',
  async transform(inputPath) {
    let data: Buffer;
    try {
      data = await readFile(inputPath);
    } catch (err) {
      throw classifyTransformError(err, inputPath);
    }
    if (data.length === 0) {
      throw new InvalidInputError(`${inputPath}: source file is empty`);
    }
    return data;
  },
};

export function replaceExtension(relativePath: string, extension: string): string {
  const current = extname(relativePath);
  return `${relativePath.slice(0, relativePath.length - current.length)}${extension}`;
}

/** Applies the adapter's own mapping, then the configured extension override. */
export function resolveOutputName(
  adapter: TransformAdapter,
  relativePath: string,
  outputExtension?: string
): string {
  const mapped = adapter.outputName ? adapter.outputName(relativePath) : relativePath;
  return outputExtension ? replaceExtension(mapped, outputExtension) : mapped;
}
