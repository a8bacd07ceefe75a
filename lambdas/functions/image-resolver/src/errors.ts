import type { ImageQuery } from './query';

/**
 * Base class for every failure `ImageResolver.resolve` can reject with.
 */
export class ImageResolutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImageResolutionError';
  }
}

export class InvalidQueryError extends ImageResolutionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidQueryError';
  }
}

/**
 * No image in the catalog matches the owner scope and name pattern. An expected
 * outcome the caller has to handle.
 */
export class NotFoundError extends ImageResolutionError {
  constructor(public readonly query: ImageQuery) {
    super(`No image owned by ${query.ownerScope} matches name pattern ${query.namePattern}`);
    this.name = 'NotFoundError';
  }
}

/**
 * The catalog query itself failed. The provider error is kept as `cause`.
 */
export class ProviderError extends ImageResolutionError {
  public readonly code?: string;
  public readonly statusCode?: number;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'ProviderError';
    this.code = cause instanceof Error ? cause.name : undefined;
    this.statusCode = httpStatusCodeOf(cause);
  }

  static from(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ProviderError(`Image catalog query failed: ${detail}`, error);
  }
}

export class CancelledError extends ImageResolutionError {
  constructor(reason?: unknown) {
    super('Image resolution was cancelled', { cause: reason });
    this.name = 'CancelledError';
  }
}

export class TimedOutError extends ImageResolutionError {
  constructor(public readonly timeoutMs: number) {
    super(`Image resolution timed out after ${timeoutMs} ms`);
    this.name = 'TimedOutError';
  }
}

function httpStatusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}
