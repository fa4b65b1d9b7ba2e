import {
  BadGatewayException,
  ServiceUnavailableException,
} from '@nestjs/common';

/**
 * A domain data source failed and no cached copy could stand in for it.
 */
export class FetchError extends BadGatewayException {
  constructor(
    readonly key: string,
    cause?: unknown,
  ) {
    super(`Fetching "${key}" failed: ${describeError(cause)}`, { cause });
    this.name = 'FetchError';
  }
}

/** The durable store could not be read or written. Fatal for the request. */
export class StoreError extends ServiceUnavailableException {
  constructor(operation: string, cause?: unknown) {
    super(`Store ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'StoreError';
  }
}

/** The completion provider was unreachable, timed out or replied garbage. */
export class CompletionProviderError extends ServiceUnavailableException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CompletionProviderError';
  }
}

/**
 * Model-based intent classification failed. Never leaves the resolver:
 * it is logged and the rule-based result is used instead.
 */
export class ClassificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
}
