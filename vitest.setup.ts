/**
 * Centralized Vitest setup for ci-triage
 *
 * Info and debug lines from the pipeline are muted so test output stays
 * readable. Warnings and errors still reach the console, where tests that
 * assert on them install spies. Set CI_TRIAGE_TEST_VERBOSE=true to see all.
 */

import { setLogLevel } from './src/telemetry/logger.js';

setLogLevel(process.env.CI_TRIAGE_TEST_VERBOSE === 'true' ? 'debug' : 'warn');
