import { z } from 'zod';
import type { LogLevel } from './logger.js';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  DSS_URL: z.string({ required_error: 'is required' }).url('must be a URL'),
  DSS_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  MCP_TRANSPORT: z.preprocess(emptyAsUndefined, z.enum(['stdio', 'http']).default('stdio')),
  HOST: z.preprocess(emptyAsUndefined, z.string().default('127.0.0.1')),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(8000)),
  DSS_JOB_POLL_INTERVAL_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).default(2000)),
  LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  ),
  NODE_ENV: z.preprocess(emptyAsUndefined, z.string().default('development')),
});

export interface Config {
  dssUrl: string;
  /** Identity used by the stdio transport; HTTP callers bring their own. */
  dssApiKey: string | undefined;
  transport: 'stdio' | 'http';
  host: string;
  port: number;
  jobPollIntervalMs: number;
  logLevel: LogLevel;
  production: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  const production = e.NODE_ENV === 'production';
  return {
    dssUrl: e.DSS_URL,
    dssApiKey: e.DSS_API_KEY,
    transport: e.MCP_TRANSPORT,
    host: e.HOST,
    port: e.PORT,
    jobPollIntervalMs: e.DSS_JOB_POLL_INTERVAL_MS,
    logLevel: e.LOG_LEVEL ?? (production ? 'info' : 'debug'),
    production,
  };
}
