/**
 * Base error class for podsed
 */
export class PodsedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PodsedError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends PodsedError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Substitution rule that breaks the delimiter, escaping or group-reference contract
 */
export class MalformedRuleError extends PodsedError {
  constructor(
    message: string,
    public readonly rule: string,
    public readonly fragment?: string,
  ) {
    super(message);
    this.name = 'MalformedRuleError';
  }
}

/**
 * Feed could not be fetched or parsed
 */
export class FeedFetchError extends PodsedError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'FeedFetchError';
  }
}

export type TransferErrorKind = 'network' | 'http' | 'timeout' | 'disk' | 'aborted';

/**
 * Episode transfer error
 */
export class TransferError extends PodsedError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly kind: TransferErrorKind,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'TransferError';
  }
}

/**
 * State file error
 */
export class StateError extends PodsedError {
  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

/**
 * Completion mark could not be persisted
 */
export class StateWriteError extends PodsedError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'StateWriteError';
  }
}

/**
 * Format an unknown thrown value for a log line
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
