import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';
import { z } from 'zod';
import type { RetryPolicy } from '../retry/retry-policy.js';
import type { WaitOptions } from '../waiting/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find package root by looking for package.json
let currentDir = __dirname;
let packageRoot = currentDir;
while (currentDir !== path.dirname(currentDir)) {
  if (fs.existsSync(path.join(currentDir, 'package.json'))) {
    packageRoot = currentDir;
    break;
  }
  currentDir = path.dirname(currentDir);
}

const envPath = path.join(packageRoot, '.env');
if (fs.existsSync(envPath)) {
  const result = config({ path: envPath });
  if (result.error) {
    console.error('Dotenv error:', result.error);
  }
}

export interface IConfig {
  get(key: string): string | undefined;
}

export class EnvConfig implements IConfig {
  get(key: string): string | undefined {
    return process.env[key];
  }
}

/**
 * In-memory config, used by tests and by callers that assemble settings themselves.
 */
export class ConfigStub implements IConfig {
  constructor(private values: Record<string, string> = {}) {}

  get(key: string): string | undefined {
    return this.values[key];
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const settingsSchema = z.object({
  WAIT_TIMEOUT_MS: intFromEnv(30000, 1),
  WAIT_POLL_INTERVAL_MS: intFromEnv(500, 1),
  RETRY_MAX_ATTEMPTS: intFromEnv(3, 1),
  RETRY_DELAY_MS: intFromEnv(1000, 0),
  HTTP_BASE_URL: z.string().url().default('http://localhost:8080'),
});

export const SETTING_KEYS = [
  'WAIT_TIMEOUT_MS',
  'WAIT_POLL_INTERVAL_MS',
  'RETRY_MAX_ATTEMPTS',
  'RETRY_DELAY_MS',
  'HTTP_BASE_URL',
] as const satisfies ReadonlyArray<keyof typeof settingsSchema.shape>;

export interface HarnessSettings {
  /** Defaults for ConditionWaiter calls */
  waitOptions: WaitOptions;
  /** Defaults for RetryExecutor calls; add retryable kinds per call site */
  retryPolicy: RetryPolicy;
  httpBaseUrl: string;
}

/**
 * Reads and validates the harness defaults. The returned values are meant to be
 * passed explicitly into each wait/retry call.
 */
export function loadHarnessSettings(source: IConfig = new EnvConfig()): HarnessSettings {
  const raw: Record<string, string> = {};
  for (const key of SETTING_KEYS) {
    const value = source.get(key);
    // Blank values fall back to defaults
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid harness settings: ${issues.join('; ')}`, issues);
  }

  const settings = parsed.data;
  return {
    waitOptions: {
      timeout: settings.WAIT_TIMEOUT_MS,
      pollInterval: settings.WAIT_POLL_INTERVAL_MS,
    },
    retryPolicy: {
      maxAttempts: settings.RETRY_MAX_ATTEMPTS,
      delayBetweenAttempts: settings.RETRY_DELAY_MS,
      retryableErrorKinds: [],
    },
    httpBaseUrl: settings.HTTP_BASE_URL,
  };
}
