/**
 * @fileoverview Runtime configuration from environment variables
 *
 * - `CI_TRIAGE_FINDINGS_DIR`: directory of finding bundles written by ingestion
 * - `CI_TRIAGE_DEFAULT_LIMIT`: tier-1 capacity when a caller passes no limit
 * - `CI_TRIAGE_LOG_LEVEL`: debug | info | warn | error
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { LogLevel } from '../telemetry/logger.js';
import { DEFAULT_FINDINGS_LIMIT } from '../triage/tiering.js';

export interface TriageConfig {
  findingsDir: string;
  defaultLimit: number;
  logLevel: LogLevel;
}

export const DEFAULT_FINDINGS_DIR = '.ci-triage/findings';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const EnvSchema = z.object({
  CI_TRIAGE_FINDINGS_DIR: z.string().trim().min(1).default(DEFAULT_FINDINGS_DIR),
  CI_TRIAGE_DEFAULT_LIMIT: z.coerce.number().int().positive().default(DEFAULT_FINDINGS_LIMIT),
  CI_TRIAGE_LOG_LEVEL: LogLevelSchema.default('info'),
});

type Env = Record<string, string | undefined>;

const EXPECTED: Record<keyof z.infer<typeof EnvSchema>, string> = {
  CI_TRIAGE_FINDINGS_DIR: 'a directory path',
  CI_TRIAGE_DEFAULT_LIMIT: 'a positive integer',
  CI_TRIAGE_LOG_LEVEL: 'one of debug, info, warn, error',
};

function isEnvKey(key: string): key is keyof typeof EXPECTED {
  return key in EXPECTED;
}

/**
 * Parse configuration. Empty variables count as unset.
 * @throws ValidationError naming the first offending variable
 */
export function loadTriageConfig(env: Env = process.env): TriageConfig {
  const relevant: Env = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      relevant[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(relevant);
  if (!parsed.success) {
    const field = String(parsed.error.errors[0]?.path[0] ?? '');
    if (isEnvKey(field)) {
      throw new ValidationError(field, EXPECTED[field], relevant[field] ?? 'undefined');
    }
    throw new ValidationError('environment', 'valid configuration', parsed.error.message);
  }

  return {
    findingsDir: parsed.data.CI_TRIAGE_FINDINGS_DIR,
    defaultLimit: parsed.data.CI_TRIAGE_DEFAULT_LIMIT,
    logLevel: parsed.data.CI_TRIAGE_LOG_LEVEL,
  };
}
