import 'dotenv/config';

export type AppEnv = 'development' | 'production';

export interface CrmConfig {
  appEnv: AppEnv;
  isDev: boolean;
  /** Org base URL, e.g. https://example.my.salesforce.com (no trailing slash) */
  instanceUrl: string;
  accessToken: string;
  /** REST API version segment, e.g. "v59.0" */
  apiVersion: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_API_VERSION = 'v59.0';

function requiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(env: Env, key: string, fallback = ''): string {
  return env[key] ?? fallback;
}

function parseAppEnv(value: string): AppEnv {
  return value === 'production' ? 'production' : 'development';
}

/**
 * Reads the Salesforce connection settings from the environment.
 *
 * Nothing is read at import time, so modules that never talk to a live org
 * (the in-memory store, the matcher, dry runs) work without a .env file.
 */
export function loadCrmConfig(env: Env = process.env): CrmConfig {
  const appEnv = parseAppEnv(optionalEnv(env, 'APP_ENV', 'development'));
  const apiVersion = optionalEnv(env, 'SF_API_VERSION', DEFAULT_API_VERSION);

  if (!/^v\d+\.\d+$/.test(apiVersion)) {
    throw new Error(`SF_API_VERSION must look like "v59.0", got "${apiVersion}"`);
  }

  return {
    appEnv,
    isDev: appEnv === 'development',
    instanceUrl: requiredEnv(env, 'SF_INSTANCE_URL').replace(/\/+$/, ''),
    accessToken: requiredEnv(env, 'SF_ACCESS_TOKEN'),
    apiVersion,
  };
}
