/**
 * @fileoverview Ranker error hierarchy
 *
 * Every failure a caller can observe is one of these types, so "no results",
 * "ranking degraded" and "hard failure" stay distinguishable without parsing
 * message strings.
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

export abstract class RankerError extends Error {
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
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends RankerError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
    readonly issues: string[] = [],
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// PROFILE ERRORS
// ============================================================================

export class UnknownProfileError extends RankerError {
  readonly code = 'UNKNOWN_PROFILE';
  readonly retryable = false;

  constructor(
    readonly profileId: string,
    readonly knownProfiles: string[],
  ) {
    super(`Unknown profile "${profileId}" (known: ${knownProfiles.join(', ')})`);
    this.name = 'UnknownProfileError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        profileId: this.profileId,
        knownProfiles: this.knownProfiles,
      },
    };
  }
}

// ============================================================================
// COLLABORATOR ERRORS
// ============================================================================

export class CandidateFetchError extends RankerError {
  readonly code = 'CANDIDATE_FETCH_ERROR';

  constructor(
    readonly stage: 'embed' | 'fetch',
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Candidate ${stage} failed: ${message}`);
    this.name = 'CandidateFetchError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        stage: this.stage,
        cause: this.cause?.message,
      },
    };
  }
}

export class ScoringError extends RankerError {
  readonly code = 'SCORING_ERROR';

  constructor(
    readonly chunkId: string,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Scoring chunk ${chunkId} failed: ${message}`);
    this.name = 'ScoringError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        chunkId: this.chunkId,
        cause: this.cause?.message,
      },
    };
  }
}

export type CacheName = 'alignment' | 'query_embedding';

export class CacheUnavailableError extends RankerError {
  readonly code = 'CACHE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly cache: CacheName,
    readonly operation: 'get' | 'set' | 'clear',
    message: string,
    readonly cause?: Error,
  ) {
    super(`Cache ${cache} ${operation} failed: ${message}`);
    this.name = 'CacheUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        cache: this.cache,
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// REQUEST ERRORS
// ============================================================================

export class InvalidRequestError extends RankerError {
  readonly code = 'INVALID_REQUEST';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Invalid ${field}: expected ${expected}, got ${received}`);
    this.name = 'InvalidRequestError';
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
// ERROR TYPE GUARDS
// ============================================================================

export function isRankerError(error: unknown): error is RankerError {
  return error instanceof RankerError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isCacheUnavailableError(error: unknown): error is CacheUnavailableError {
  return error instanceof CacheUnavailableError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof RankerError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('timeout') ||
      message.includes('socket hang up')
    );
  }

  return false;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  config: (key: string, message: string, issues: string[] = []) =>
    new ConfigurationError(key, message, issues),

  unknownProfile: (profileId: string, knownProfiles: string[]) =>
    new UnknownProfileError(profileId, knownProfiles),

  candidateFetch: (stage: 'embed' | 'fetch', message: string, retryable = true, cause?: Error) =>
    new CandidateFetchError(stage, retryable, message, cause),

  scoring: (chunkId: string, message: string, retryable = true, cause?: Error) =>
    new ScoringError(chunkId, retryable, message, cause),

  cacheUnavailable: (cache: CacheName, operation: 'get' | 'set' | 'clear', message: string, cause?: Error) =>
    new CacheUnavailableError(cache, operation, message, cause),

  invalidRequest: (field: string, expected: string, received: string) =>
    new InvalidRequestError(field, expected, received),
};
