import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError, errorMessage } from '../control-plane/errors.js';
import { passthroughTransform, type TransformAdapter } from './adapter.js';

const BUILT_IN: Record<string, TransformAdapter> = {
  passthrough: passthroughTransform,
};

function isAdapter(value: unknown): value is TransformAdapter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'transform' in value &&
    typeof value.transform === 'function' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/**
 * Resolves a built-in adapter name, or imports a module whose default export
 * is an adapter or a (possibly async) factory returning one.
 */
export async function loadTransform(specifier: string, cwd: string = process.cwd()): Promise<TransformAdapter> {
  const builtIn = BUILT_IN[specifier];
  if (builtIn) return builtIn;

  let mod: unknown;
  try {
    mod = await import(pathToFileURL(resolve(cwd, specifier)).href);
  } catch (err) {
    throw new ConfigError(`Cannot load transform module "${specifier}": ${errorMessage(err)}`, { cause: err });
  }

  const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const candidate: unknown = typeof exported === 'function' ? await exported() : exported;

  if (!isAdapter(candidate)) {
    throw new ConfigError(
      `Transform module "${specifier}" must export a { name, transform } adapter or a factory returning one`
    );
  }
  return candidate;
}
