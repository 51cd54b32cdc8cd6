/**
 * @fileoverview Triage error hierarchy
 *
 * The classification core never throws. These types describe failures at its
 * boundary: the finding source (provider, ingestion) and input validation.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class TriageError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  /** Text shown to the agent or operator. */
  toUserMessage(): string {
    return this.message;
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderErrorReason =
  | 'invalid_url'
  | 'auth_failed'
  | 'build_not_found'
  | 'rate_limit'
  | 'network_timeout';

const PROVIDER_ERROR_TITLES: Record<ProviderErrorReason, string> = {
  invalid_url: 'Invalid build URL',
  auth_failed: 'Authentication failed',
  build_not_found: 'Build not found',
  rate_limit: 'Rate limited by CI provider',
  network_timeout: 'Network timeout',
};

const PROVIDER_ERROR_HINTS: Record<ProviderErrorReason, string> = {
  invalid_url: [
    'Supported formats:',
    '  - https://buildkite.com/org/pipeline/builds/123',
    '  - https://github.com/owner/repo/actions/runs/456',
  ].join('\n'),
  auth_failed: [
    'Check that your API token is valid and has the correct permissions.',
    '  - Buildkite: Set BUILDKITE_API_TOKEN',
    '  - GitHub: Set GITHUB_TOKEN',
  ].join('\n'),
  build_not_found: 'Check that the build URL is correct and you have access to the repository.',
  rate_limit: 'Wait a few minutes before retrying, or use a token with a higher rate limit.',
  network_timeout: 'Check network connectivity to the CI provider and retry.',
};

export function remediationHint(reason: ProviderErrorReason): string {
  return PROVIDER_ERROR_HINTS[reason];
}

export class ProviderError extends TriageError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`${PROVIDER_ERROR_TITLES[reason]}: ${message}`);
    this.name = 'ProviderError';
  }

  static invalidUrl(url: string): ProviderError {
    return new ProviderError('invalid_url', false, url);
  }

  static buildNotFound(url: string): ProviderError {
    return new ProviderError('build_not_found', false, url);
  }

  toUserMessage(): string {
    let text = PROVIDER_ERROR_TITLES[this.reason];
    text += `\n\nHint: ${remediationHint(this.reason)}`;
    text += `\n\nDetails: ${this.cause?.message ?? this.message}`;
    return text;
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        hint: remediationHint(this.reason),
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends TriageError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isTriageError(error: unknown): error is TriageError {
  return error instanceof TriageError;
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
