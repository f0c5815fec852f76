export type MockupErrorCode =
  | 'INVALID_IMAGE'
  | 'NO_TEMPLATES_AVAILABLE'
  | 'RESOURCE_NOT_FOUND'
  | 'COMPOSITING_FAILURE';

/**
 * Base class for every failure the mockup pipeline raises on purpose.
 * Anything else reaching a catch site is unexpected and gets wrapped.
 */
export class MockupError extends Error {
  readonly code: MockupErrorCode;

  constructor(code: MockupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MockupError';
    this.code = code;
  }
}

export class InvalidImageError extends MockupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_IMAGE', message, options);
    this.name = 'InvalidImageError';
  }
}

export class NoTemplatesAvailableError extends MockupError {
  constructor() {
    super('NO_TEMPLATES_AVAILABLE', 'No book templates are available to match against');
    this.name = 'NoTemplatesAvailableError';
  }
}

export class ResourceNotFoundError extends MockupError {
  readonly path: string;

  constructor(path: string, what = 'File') {
    super('RESOURCE_NOT_FOUND', `${what} not found: ${path}`);
    this.name = 'ResourceNotFoundError';
    this.path = path;
  }
}

export class CompositingFailureError extends MockupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPOSITING_FAILURE', message, options);
    this.name = 'CompositingFailureError';
  }
}

export function isMockupError(error: unknown): error is MockupError {
  return error instanceof MockupError;
}

// Node's fs errors carry a string `code`; ENOENT means the path is missing.
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
