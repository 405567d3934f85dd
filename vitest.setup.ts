/**
 * Centralized Vitest Setup for dimension-ranker
 *
 * The ranker logs degradations and timings to stderr. Tests keep the logger
 * at ERROR unless RANKER_TEST_LOG_LEVEL asks for more, and restore it after
 * every test so a test that changes the level cannot leak it.
 */

import { afterEach, beforeAll } from 'vitest';
import { parseLogLevel, setLogLevel } from './src/telemetry/logger.js';

const TEST_LOG_LEVEL = parseLogLevel(process.env.RANKER_TEST_LOG_LEVEL ?? 'ERROR');

beforeAll(() => {
  setLogLevel(TEST_LOG_LEVEL);
});

afterEach(() => {
  setLogLevel(TEST_LOG_LEVEL);
});
