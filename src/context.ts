// src/context.ts
import { AppConfig } from 'App/config/config';
import { AuthService } from 'App/services/AuthService';
import {
  CredentialStore,
  FileCredentialStore,
} from 'App/services/CredentialStore';
import { OffloadPool } from 'App/services/OffloadPool';
import { networkProviders } from 'App/services/providers/networkProviders';
import { systemProviders } from 'App/services/providers/systemProviders';
import { SessionRegistry } from 'App/services/SessionRegistry';
import { SnapshotService } from 'App/services/SnapshotService';
import { NetworkProviders, SystemProviders } from 'App/types/metrics';
import { MonitorSocket } from 'App/types/socket';

/**
 * Long-lived components of one server instance. Created at start-up,
 * handed to buildServer() and torn down by its close().
 */
export interface AppContext {
  config: AppConfig;
  registry: SessionRegistry<MonitorSocket>;
  pool: OffloadPool;
  snapshots: SnapshotService;
  credentials: CredentialStore;
  auth: AuthService;
}

export interface AppContextOverrides {
  systemProviders?: SystemProviders;
  networkProviders?: NetworkProviders;
  credentials?: CredentialStore;
  now?: () => number;
}

/** Opens the account file and provisions the account on first run. */
export const openCredentialStore = (config: AppConfig): CredentialStore => {
  const store = new FileCredentialStore(config.accountFile || undefined);
  store.ensureAccount({
    username: config.username,
    password: config.password,
    bcryptRounds: config.bcryptRounds,
    credentialsFile: config.credentialsFile,
  });
  return store;
};

export const createAppContext = (
  config: AppConfig,
  overrides: AppContextOverrides = {},
): AppContext => {
  const now = overrides.now ?? Date.now;
  const registry = new SessionRegistry<MonitorSocket>({
    graceMs: config.workerGraceMs,
    now,
  });
  const pool = new OffloadPool({
    size: config.poolSize,
    maxQueue: config.poolMaxQueue,
    name: 'snapshots',
  });
  const snapshots = new SnapshotService(
    pool,
    overrides.systemProviders ?? systemProviders,
    overrides.networkProviders ?? networkProviders,
  );
  const credentials = overrides.credentials ?? openCredentialStore(config);
  const auth = new AuthService(credentials, {
    secret: config.jwtSecret,
    ttlSec: config.accessTokenTtlSec,
    bcryptRounds: config.bcryptRounds,
    now,
  });

  return { config, registry, pool, snapshots, credentials, auth };
};
