// Runtime configuration. Credentials are read once at process start into an
// explicit ReporterConfig that is handed to the client and the orchestrator.
import fs from 'fs';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { MissingCredentialsError } from './errors';
import { err, ok, Result } from './result';

export type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  CONNECT_TIMEOUT_MS: 10_000,
  READ_TIMEOUT_MS: 60_000,
  USER_AGENT: 'cdn-usage-reporter/1.0',
  DEFAULT_OUT_DIR: './out',
};

export const REQUIRED_ENV = [
  'AKAMAI_HOST',
  'AKAMAI_CLIENT_TOKEN',
  'AKAMAI_CLIENT_SECRET',
  'AKAMAI_ACCESS_TOKEN',
] as const;

const required = z.string().trim().min(1);

const credentialsSchema = z.object({
  AKAMAI_HOST: required.transform((host) => host.replace(/^https?:\/\//, '').replace(/\/+$/, '')),
  AKAMAI_CLIENT_TOKEN: required,
  AKAMAI_CLIENT_SECRET: required,
  AKAMAI_ACCESS_TOKEN: required,
  AKAMAI_ACCOUNT_SWITCH_KEY: z.string().trim().optional(),
});

export interface Timeouts {
  connectMs: number;
  readMs: number;
}

export interface ReporterConfig {
  readonly host: string;
  readonly clientToken: string;
  readonly clientSecret: string;
  readonly accessToken: string;
  readonly accountSwitchKey?: string;
  readonly timeouts: Readonly<Timeouts>;
}

export interface ConfigOverrides {
  accountSwitchKey?: string;
}

/**
 * Build the run configuration from an environment map.
 * Empty values count as missing; the CLI exits with status 2 on failure.
 */
export function loadConfig(env: Env, overrides: ConfigOverrides = {}): Result<ReporterConfig, MissingCredentialsError> {
  const parsed = credentialsSchema.safeParse(env);
  if (!parsed.success) {
    const failed = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    const missing = REQUIRED_ENV.filter((name) => failed.has(name));
    return err(new MissingCredentialsError(missing.length ? missing : Array.from(failed)));
  }

  const data = parsed.data;
  const accountSwitchKey = overrides.accountSwitchKey || data.AKAMAI_ACCOUNT_SWITCH_KEY || undefined;

  return ok(
    Object.freeze({
      host: data.AKAMAI_HOST,
      clientToken: data.AKAMAI_CLIENT_TOKEN,
      clientSecret: data.AKAMAI_CLIENT_SECRET,
      accessToken: data.AKAMAI_ACCESS_TOKEN,
      accountSwitchKey,
      timeouts: Object.freeze({
        connectMs: envInt(env, 'AKAMAI_CONNECT_TIMEOUT_MS', CONFIG.CONNECT_TIMEOUT_MS),
        readMs: envInt(env, 'AKAMAI_READ_TIMEOUT_MS', CONFIG.READ_TIMEOUT_MS),
      }),
    }),
  );
}

/** Parse a dotenv file without touching process.env. */
export function readEnvFile(path: string): Env {
  return parseDotenv(fs.readFileSync(path));
}

/** Hosts issued by the provider look like `akab-xxxx.luna.akamaiapis.net`. */
export function looksLikeApiHost(host: string): boolean {
  return host.startsWith('akab-') || host.startsWith('akamai');
}

export function redactKey(key: string): string {
  return `${key.slice(0, 8)}...`;
}

export default CONFIG;
