/**
 * Environment configuration
 * Loads .env.local / .env and validates everything into one AppConfig object
 */

import dotenv from 'dotenv';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  DATABASE_PATH: z.string().default('data/disclosures.db'),
  TURSO_DATABASE_URL: optionalString,
  TURSO_AUTH_TOKEN: optionalString,
  DISCLOSURES_BASE_URL: z.string().url().default('https://disclosures.utah.gov'),
  LOBBYIST_BASE_URL: z.string().url().default('https://lobbyist.utah.gov'),
  USER_AGENT: z.string().default('UtahDisclosureTracker/1.0 (public finance data aggregator)'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  PORT: z.coerce.number().int().positive().default(3001),
});

export interface SourceConfig {
  disclosuresBaseUrl: string;
  lobbyistBaseUrl: string;
}

export interface FetchConfig {
  userAgent: string;
  timeoutMs: number;
  retries: number;
}

export interface AppConfig {
  databasePath: string;
  turso: { url: string; authToken?: string } | null;
  sources: SourceConfig;
  fetch: FetchConfig;
  port: number;
}

let envFilesLoaded = false;

export function loadEnvFiles(): void {
  if (envFilesLoaded) return;
  // .env.local wins: dotenv never overwrites a variable that is already set
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  envFilesLoaded = true;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    databasePath: parsed.DATABASE_PATH,
    turso: parsed.TURSO_DATABASE_URL
      ? { url: parsed.TURSO_DATABASE_URL, authToken: parsed.TURSO_AUTH_TOKEN }
      : null,
    sources: {
      disclosuresBaseUrl: parsed.DISCLOSURES_BASE_URL.replace(/\/+$/, ''),
      lobbyistBaseUrl: parsed.LOBBYIST_BASE_URL.replace(/\/+$/, ''),
    },
    fetch: {
      userAgent: parsed.USER_AGENT,
      timeoutMs: parsed.FETCH_TIMEOUT_MS,
      retries: parsed.FETCH_RETRIES,
    },
    port: parsed.PORT,
  };
}
