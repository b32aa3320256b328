/**
 * Gateway runtime bootstrap
 *
 * Wires database, vault, backend registry, audit pipeline, permission
 * evaluator, connection service and per-user gateway pool from one
 * validated configuration.
 */

import {
  AuditPipeline,
  AuditSpillFile,
  DatabaseAuditSink,
  closeDatabase,
  initializeDatabase,
  logger,
  runMigrations,
  type BackendClientFactory,
  type BackendSettings,
  type DatabaseClient,
  type ToolgateConfig,
} from '@toolgate/core';
import { ToolPermissionEvaluator, ToolPermissionService } from '@toolgate/authz-local';
import { SQL_BACKEND_KIND, createSqlBackendClient } from '@toolgate/backend-sql';
import { CredentialVault } from './vault/credential-vault.js';
import { MasterKeyManager } from './vault/master-key-manager.js';
import { BackendRegistry } from './backends/registry.js';
import { ConnectionService } from './services/connection-service.js';
import { ToolGateway } from './gateway/tool-gateway.js';
import { UserGatewayPool } from './gateway/user-gateway-pool.js';

export interface GatewayRuntimeOptions {
  /** Extra backend kinds, registered after the built-in "sql" */
  backends?: Record<string, BackendClientFactory>;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface GatewayRuntime {
  config: ToolgateConfig;
  db: DatabaseClient;
  vault: CredentialVault;
  registry: BackendRegistry;
  audit: AuditPipeline;
  evaluator: ToolPermissionEvaluator;
  permissions: ToolPermissionService;
  connections: ConnectionService;
  pool: UserGatewayPool;
  close(): Promise<void>;
}

export function createGatewayRuntime(config: ToolgateConfig, options: GatewayRuntimeOptions = {}): GatewayRuntime {
  const db = initializeDatabase({
    sqliteFilePath: config.database.url,
    enableWAL: config.database.enable_wal,
  });

  try {
    runMigrations(db);

    const masterKey = new MasterKeyManager({
      dataDir: config.vault.data_dir,
      configuredKey: config.vault.master_key,
      env: options.env,
    }).loadMasterKey();
    const vault = new CredentialVault(masterKey);

    const registry = new BackendRegistry();
    registry.register(SQL_BACKEND_KIND, createSqlBackendClient);
    for (const [kind, factory] of Object.entries(options.backends ?? {})) {
      registry.register(kind, factory);
    }

    const settings: BackendSettings = { sql: config.backends.sql };

    const spill = new AuditSpillFile({ spill_path: config.audit.spill_path });
    const audit = new AuditPipeline({ sink: new DatabaseAuditSink(db), spill });
    const evaluator = new ToolPermissionEvaluator(db);
    const permissions = new ToolPermissionService(db);
    const connections = new ConnectionService(db, vault, registry, settings);

    const pool = new UserGatewayPool({
      connections,
      registry,
      settings,
      createGateway: () =>
        new ToolGateway({ evaluator, audit, callTimeoutMs: config.gateway.call_timeout_ms }),
    });
    connections.onConnectionsChanged(ownerId => pool.invalidate(ownerId));

    logger.info(`[gateway] Runtime ready (backends: ${registry.kinds().join(', ')})`);

    return {
      config,
      db,
      vault,
      registry,
      audit,
      evaluator,
      permissions,
      connections,
      pool,
      async close() {
        await pool.shutdown();
        await spill.close();
        closeDatabase(db);
        logger.info('[gateway] Runtime closed');
      },
    };
  } catch (error) {
    closeDatabase(db);
    throw error;
  }
}
