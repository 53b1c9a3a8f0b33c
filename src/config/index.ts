import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';

const configSchema = z.object({
  // Storage
  journalHome: z.string().min(1).default(join(homedir(), '.journal')).transform(expandPath),
  tmpDir: z.string().min(1).default(tmpdir()).transform(expandPath),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
});

export type Config = z.infer<typeof configSchema>;

export const MANIFEST_FILE = 'config.json';
export const DEFAULT_DB_FILE = 'journal.db';

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    journalHome: env('JOURNAL_HOME'),
    tmpDir: env('JOURNAL_TMP_DIR'),
    logLevel: env('LOG_LEVEL'),
    nodeEnv: env('NODE_ENV'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export function manifestPath(cfg: Config): string {
  return join(cfg.journalHome, MANIFEST_FILE);
}

export function defaultDatabasePath(cfg: Config): string {
  return join(cfg.journalHome, DEFAULT_DB_FILE);
}

export const config = loadConfig();
