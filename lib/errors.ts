import type { TargetFormat } from './nbconvert';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Non-zero exit (or missing artifact) from one nbconvert invocation. */
export class ConversionError extends Error {
  readonly document: string;
  readonly format: TargetFormat;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(document: string, format: TargetFormat, exitCode: number | null, stderr: string, message?: string) {
    super(message ?? `nbconvert --to=${format} failed for ${document} (exit ${exitCode ?? 'none'})`);
    this.name = 'ConversionError';
    this.document = document;
    this.format = format;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class PublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
