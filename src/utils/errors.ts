import type { SourceId } from '../adapters/types.js';

export class ScoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScoutError';
  }
}

export class ConfigError extends ScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class AdapterError extends ScoutError {
  public readonly source: SourceId;
  public readonly statusCode?: number;

  constructor(
    source: SourceId,
    message: string,
    statusCode?: number,
    options?: ErrorOptions
  ) {
    super(`[${source}] ${message}`, options);
    this.name = 'AdapterError';
    this.source = source;
    this.statusCode = statusCode;
  }
}

export class ExportError extends ScoutError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExportError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
