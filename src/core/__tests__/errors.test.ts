/**
 * @fileoverview Tests for the ranker error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  CandidateFetchError,
  ConfigurationError,
  Errors,
  RankerError,
  isCacheUnavailableError,
  isConfigurationError,
  isRankerError,
  isRetryableError,
} from '../errors.js';

describe('Errors factory', () => {
  it('builds a configuration error carrying every issue', () => {
    const error = Errors.config('profiles', 'rejected 2 problem(s)', ['a: bad', 'b: bad']);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toBeInstanceOf(RankerError);
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe('Configuration error for profiles: rejected 2 problem(s)');
    expect(error.toJSON().details).toEqual({ configKey: 'profiles', issues: ['a: bad', 'b: bad'] });
  });

  it('names the known profiles in an unknown-profile error', () => {
    const error = Errors.unknownProfile('astronaut', ['general', 'legal']);

    expect(error.message).toBe('Unknown profile "astronaut" (known: general, legal)');
    expect(error.retryable).toBe(false);
  });

  it('keeps the cause of a candidate fetch failure', () => {
    const cause = new Error('socket closed');
    const error = Errors.candidateFetch('fetch', cause.message, true, cause);

    expect(error).toBeInstanceOf(CandidateFetchError);
    expect(error.toString()).toBe('[CANDIDATE_FETCH_ERROR] Candidate fetch failed: socket closed');
    expect(error.toJSON().details).toEqual({ stage: 'fetch', cause: 'socket closed' });
  });

  it('describes an invalid request', () => {
    const error = Errors.invalidRequest('resultCount', 'a positive integer', '0');

    expect(error.message).toBe('Invalid resultCount: expected a positive integer, got 0');
    expect(error.code).toBe('INVALID_REQUEST');
  });
});

describe('error guards', () => {
  it('recognizes ranker errors by type', () => {
    const cacheError = Errors.cacheUnavailable('alignment', 'get', 'down');

    expect(isRankerError(cacheError)).toBe(true);
    expect(isCacheUnavailableError(cacheError)).toBe(true);
    expect(isConfigurationError(cacheError)).toBe(false);
    expect(isRankerError(new Error('plain'))).toBe(false);
  });

  it('classifies retryable failures', () => {
    expect(isRetryableError(Errors.scoring('c1', 'store timeout'))).toBe(true);
    expect(isRetryableError(Errors.config('ranking', 'bad'))).toBe(false);
    expect(isRetryableError(new Error('read ECONNRESET'))).toBe(true);
    expect(isRetryableError(new Error('no such chunk'))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });
});
