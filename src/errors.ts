/**
 * Error types raised by the catalog generator.
 */

export type CatalogErrorCode = 'NOT_FOUND' | 'CONFIG';

/**
 * Base class for errors the CLI reports to the user without a stack trace.
 */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(message: string, code: CatalogErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogError';
    this.code = code;
  }
}

/**
 * A file the operation depends on does not exist.
 */
export class NotFoundError extends CatalogError {
  readonly path: string;

  constructor(path: string, message = `${path} does not exist.`) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export class ConfigError extends CatalogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', options);
    this.name = 'ConfigError';
  }
}

export function isNotFoundCode(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
