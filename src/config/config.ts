/* eslint-disable prefer-destructuring */
import { NotFoundError } from 'App/errors/CustomError';
import * as dotenv from 'dotenv';
import fs from 'fs-extra';
import crypto from 'node:crypto';
import os from 'node:os';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

/** Per-user state directory: settings, credential store and generated password. */
export const DEFAULT_STATE_DIR = path.join(os.homedir(), '.hostwatch');

export const DEFAULT_SETTINGS_FILE = path.join(
  DEFAULT_STATE_DIR,
  'settings.json',
);

/** Keys are snake_case, e.g. `{ "port": 4600, "max_ws_connections": 5 }`. */
export type SettingsFile = Record<string, unknown>;

export interface AppConfig {
  port: number;
  host: string;
  mode: string;

  jwtSecret: string;
  /** Access token lifetime in seconds. */
  accessTokenTtlSec: number;

  /** How long an unclaimed worker survives before the sweeper drops it. */
  workerGraceMs: number;
  workerSweepMs: number;
  publishIntervalMs: number;
  /** Consecutive unwritable ticks tolerated before a stream is dropped. */
  maxStalledTicks: number;

  poolSize: number;
  poolMaxQueue: number;
  maxWsConnections: number;
  /** Allowed browser origins; empty allows any. */
  corsOrigins: string[];
  /** Requests per IP per 15 minutes (production only). */
  authRateLimit: number;
  rateLimit: number;

  /** JSON file holding the account; empty keeps it in memory only. */
  accountFile: string;
  credentialsFile: string;
  username: string;
  /** Fixed password for the provisioned account; generated on first run when unset. */
  password?: string;
  bcryptRounds: number;
}

export const getEnvVariable = (
  key: string,
  defaultValue?: string,
  env: NodeJS.ProcessEnv = process.env,
): string => {
  const value = env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new NotFoundError(`Missing environment variable: ${key}`);
  }
  return value;
};

/**
 * Reads the optional JSON settings file. A missing file yields `{}`;
 * an unreadable or malformed one is logged and ignored.
 */
export const readSettingsFile = (
  file: string = DEFAULT_SETTINGS_FILE,
): SettingsFile => {
  try {
    if (!fs.pathExistsSync(file)) return {};
    const data: unknown = fs.readJsonSync(file);
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      console.warn(`[Config] Ignoring ${file}: expected a JSON object`);
      return {};
    }
    return { ...data };
  } catch (e) {
    console.error(
      '[Config] Failed to load settings from file:',
      e instanceof Error ? e.message : e,
    );
    return {};
  }
};

/** Two slots per CPU, between 1 and 16; some containers report no CPUs at all. */
export const defaultPoolSize = (cpuCount: number): number =>
  Math.max(1, Math.min(cpuCount * 2, 16));

export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  settings: SettingsFile = readSettingsFile(
    env.HOSTWATCH_SETTINGS_FILE || DEFAULT_SETTINGS_FILE,
  ),
): AppConfig => {
  // env wins over the settings file, which wins over the default
  const pick = (envKey: string, settingsKey?: string): string | undefined => {
    const fromEnv = env[envKey];
    if (fromEnv) return fromEnv;
    if (!settingsKey) return undefined;
    const fromFile = settings[settingsKey];
    if (typeof fromFile === 'string' || typeof fromFile === 'number') {
      return String(fromFile);
    }
    return undefined;
  };

  const num = (
    envKey: string,
    settingsKey: string | undefined,
    fallback: number,
    min = 1,
  ): number => {
    const raw = pick(envKey, settingsKey);
    if (raw === undefined) return fallback;
    const v = Number(raw);
    if (!Number.isFinite(v) || v < min) {
      console.warn(
        `[Config] Invalid value for ${envKey}: "${raw}", using ${fallback}`,
      );
      return fallback;
    }
    return v;
  };

  const stateDir = env.HOSTWATCH_STATE_DIR || DEFAULT_STATE_DIR;

  return {
    port: num('PORT', 'port', 4500, 0),
    host: pick('HOST', 'address') ?? 'localhost',
    mode: getEnvVariable('NODE_ENV', 'development', env),

    jwtSecret:
      pick('JWT_SECRET') ?? crypto.randomBytes(32).toString('base64url'),
    accessTokenTtlSec: Math.round(
      num('ACCESS_TOKEN_EXPIRE_MINUTES', undefined, 1) * 60,
    ),

    workerGraceMs: num('WORKER_GRACE_MS', 'worker_grace_ms', 5000),
    workerSweepMs: num('WORKER_SWEEP_MS', 'worker_sweep_ms', 1000),
    publishIntervalMs: num('PUBLISH_INTERVAL_MS', 'publish_interval_ms', 1000),
    maxStalledTicks: Math.floor(num('MAX_STALLED_TICKS', undefined, 10)),

    poolSize: Math.floor(
      num('OFFLOAD_POOL_SIZE', 'pool_size', defaultPoolSize(os.cpus().length)),
    ),
    poolMaxQueue: Math.floor(
      num('OFFLOAD_POOL_MAX_QUEUE', 'pool_max_queue', 64, 0),
    ),
    maxWsConnections: Math.floor(
      num('MAX_WS_CONNECTIONS', 'max_ws_connections', 20),
    ),
    authRateLimit: Math.floor(num('AUTH_RATE_LIMIT', undefined, 10)),
    rateLimit: Math.floor(num('RATE_LIMIT', undefined, 3000)),
    corsOrigins: (pick('CORS_ORIGINS') ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),

    accountFile: pick('ACCOUNT_FILE') ?? path.join(stateDir, 'account.json'),
    credentialsFile:
      pick('CREDENTIALS_FILE') ?? path.join(stateDir, 'credentials.json'),
    username: pick('MONITOR_USERNAME') ?? 'hostwatch',
    password: pick('MONITOR_PASSWORD'),
    bcryptRounds: Math.floor(num('BCRYPT_ROUNDS', undefined, 12, 4)),
  };
};

export const config: AppConfig = loadConfig();

export const PORT = config.port;

export const HOST = config.host;
