import { readFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../control-plane/errors.js';

export const ENV_PREFIX = 'RELAY_';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be greater than 0`);

const nonNegativeInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .nonnegative(`${name} must not be negative`);

const extensionList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .transform((list) =>
    list
      .map((ext) => ext.trim().toLowerCase())
      .filter(Boolean)
      .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
  );

const baseSchema = z.object({
  sourceDir: z.string({ required_error: 'sourceDir is required' }).min(1, 'sourceDir is required'),
  destDir: z.string({ required_error: 'destDir is required' }).min(1, 'destDir is required'),
  stabilityPollIntervalMs: positiveInt('stabilityPollIntervalMs').default(500),
  stabilityRequiredSamples: positiveInt('stabilityRequiredSamples')
    .min(2, 'stabilityRequiredSamples must be at least 2')
    .default(2),
  stabilityTimeoutMs: positiveInt('stabilityTimeoutMs').default(60_000),
  workerCount: positiveInt('workerCount').default(2),
  maxRetries: positiveInt('maxRetries').default(5),
  retryBaseDelayMs: positiveInt('retryBaseDelayMs').default(1000),
  retryMaxDelayMs: positiveInt('retryMaxDelayMs').default(30_000),
  overwriteExisting: booleanish.default(false),
  queueCapacity: positiveInt('queueCapacity').default(64),
  recursive: booleanish.default(true),
  extensions: extensionList.default([]),
  outputExtension: z
    .string()
    .min(1)
    .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
    .optional(),
  stateDir: z.string().min(1).default('.hires-relay'),
  ledgerPath: z.string().min(1).optional(),
  historyPath: z.string().min(1).optional(),
  deleteSourceOnSuccess: booleanish.default(false),
  usePolling: booleanish.default(false),
  pollingIntervalMs: positiveInt('pollingIntervalMs').default(1000),
  sourceRetryIntervalMs: positiveInt('sourceRetryIntervalMs').default(5000),
  sourceWaitTimeoutMs: nonNegativeInt('sourceWaitTimeoutMs').default(0),
  transform: z.string().min(1).default('passthrough'),
  logLevel: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `logLevel must be one of ${LOG_LEVELS.join(', ')}` }),
  }).default('info'),
});

export type SettingsInput = z.input<typeof baseSchema>;
export type SettingKey = keyof typeof baseSchema.shape;

function contains(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

function buildSchema(cwd: string) {
  return baseSchema
    .superRefine((data, ctx) => {
      const source = resolve(cwd, data.sourceDir);
      const dest = resolve(cwd, data.destDir);
      if (contains(source, dest) || contains(dest, source)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'sourceDir and destDir must be separate directories, neither inside the other',
          path: ['destDir'],
        });
      }

      if (data.retryMaxDelayMs < data.retryBaseDelayMs) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'retryMaxDelayMs cannot be lower than retryBaseDelayMs',
          path: ['retryMaxDelayMs'],
        });
      }

      if (data.stabilityTimeoutMs <= data.stabilityPollIntervalMs) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'stabilityTimeoutMs must exceed stabilityPollIntervalMs',
          path: ['stabilityTimeoutMs'],
        });
      }
    })
    .transform((data) => {
      const stateDir = resolve(cwd, data.stateDir);
      return {
        ...data,
        sourceDir: resolve(cwd, data.sourceDir),
        destDir: resolve(cwd, data.destDir),
        stateDir,
        ledgerPath: resolve(cwd, data.ledgerPath ?? join(stateDir, 'ledger.jsonl')),
        historyPath: resolve(cwd, data.historyPath ?? join(stateDir, 'history.jsonl')),
      };
    });
}

export type Settings = z.output<ReturnType<typeof buildSchema>>;

export const SETTING_KEYS: readonly SettingKey[] = baseSchema.keyof().options;

export function envName(key: SettingKey): string {
  return ENV_PREFIX + key.replace(/[A-Z]/g, (m) => `_${m}`).toUpperCase();
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<Record<SettingKey, string>> {
  const picked: Partial<Record<SettingKey, string>> = {};
  for (const key of SETTING_KEYS) {
    const value = env[envName(key)];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}

const configFileSchema = z.record(z.unknown());

export async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return result.data;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function toConfigError(error: z.ZodError): ConfigError {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
  return new ConfigError(`Invalid configuration. Fix the following: ${issues.join('; ')}`);
}

export function parseSettings(input: Record<string, unknown>, cwd: string = process.cwd()): Settings {
  try {
    return buildSchema(cwd).parse(input);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw toConfigError(error);
    }
    throw error;
  }
}

export interface LoadSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Record<SettingKey, unknown>>;
  cwd?: string;
}

async function gatherLayers(options: LoadSettingsOptions, cwd: string): Promise<Record<string, unknown>> {
  const fromFile = options.configPath ? await readConfigFile(resolve(cwd, options.configPath)) : {};
  const fromEnv = settingsFromEnv(options.env ?? process.env);
  return {
    ...fromFile,
    ...fromEnv,
    ...withoutUndefined(options.overrides ?? {}),
  };
}

/** Defaults < config file < RELAY_* environment < explicit overrides (CLI flags). */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const cwd = options.cwd ?? process.cwd();
  return parseSettings(await gatherLayers(options, cwd), cwd);
}

export interface StatePaths {
  stateDir: string;
  ledgerPath: string;
  historyPath: string;
}

const statePathsSchema = baseSchema.pick({ stateDir: true, ledgerPath: true, historyPath: true });

/** Resolves only the state file locations, for commands that never touch the watched directories. */
export async function loadStatePaths(options: LoadSettingsOptions = {}): Promise<StatePaths> {
  const cwd = options.cwd ?? process.cwd();
  const result = statePathsSchema.safeParse(await gatherLayers(options, cwd));
  if (!result.success) throw toConfigError(result.error);
  const stateDir = resolve(cwd, result.data.stateDir);
  return {
    stateDir,
    ledgerPath: resolve(cwd, result.data.ledgerPath ?? join(stateDir, 'ledger.jsonl')),
    historyPath: resolve(cwd, result.data.historyPath ?? join(stateDir, 'history.jsonl')),
  };
}
