export const ERROR_KINDS = [
  'StabilityTimeout',
  'SourceVanished',
  'InvalidInput',
  'TransientFailure',
  'DeliveryFailure',
  'LedgerWriteFailure',
  'SourceUnavailable',
  'DestinationUnavailable',
  'ConfigError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  /** Permanent errors end the job (or the process) without another attempt. */
  abstract readonly permanent: boolean;
  /** Fatal errors stop the whole pipeline, not just one job. */
  readonly fatal: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StabilityTimeoutError extends PipelineError {
  readonly kind = 'StabilityTimeout';
  readonly permanent = true;

  constructor(readonly path: string, readonly waitedMs: number) {
    super(`stability timeout: ${path} still changing after ${waitedMs}ms`);
  }
}

export class SourceVanishedError extends PipelineError {
  readonly kind = 'SourceVanished';
  readonly permanent = true;

  constructor(readonly path: string) {
    super(`source file disappeared: ${path}`);
  }
}

export class InvalidInputError extends PipelineError {
  readonly kind = 'InvalidInput';
  readonly permanent = true;
}

export class TransientFailureError extends PipelineError {
  readonly kind = 'TransientFailure';
  readonly permanent = false;
}

export class DeliveryError extends PipelineError {
  readonly kind = 'DeliveryFailure';
  readonly permanent = true;
}

export class LedgerWriteError extends PipelineError {
  readonly kind = 'LedgerWriteFailure';
  readonly permanent = true;
  override readonly fatal = true;
}

export class SourceUnavailableError extends PipelineError {
  readonly kind = 'SourceUnavailable';
  readonly permanent = true;
  override readonly fatal = true;
}

export class DestinationUnavailableError extends PipelineError {
  readonly kind = 'DestinationUnavailable';
  readonly permanent = true;
  override readonly fatal = true;
}

export class ConfigError extends PipelineError {
  readonly kind = 'ConfigError';
  readonly permanent = true;
  override readonly fatal = true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
