/**
 * Database Access Layer - Barrel Export
 *
 * Usage:
 * ```typescript
 * import { initializeDatabase, runMigrations, createConnection } from './db';
 *
 * const db = initializeDatabase({ sqliteFilePath: './data/toolgate.db' });
 * runMigrations(db);
 * const connection = await createConnection(db, { owner_id, kind: 'sql', name: 'Sales DB' });
 * ```
 */

// Database client setup
export {
  initializeDatabase,
  runMigrations,
  closeDatabase,
  checkDatabaseHealth,
  type DatabaseClient,
  type DatabaseConfig,
} from './client.js';

// Connection repository
export {
  createConnection,
  getConnectionById,
  findConnection,
  getConnectionByName,
  listConnectionsForOwner,
  updateConnection,
  deleteConnection,
  recordHealthCheck,
  toConnection,
  type Connection,
  type NewConnection,
  type ConnectionUpdate,
} from './repositories/connections.js';

// Tool permission repository
export {
  getToolPermission,
  upsertToolPermission,
  bulkUpsertToolPermissions,
  deleteToolPermission,
  listToolPermissionsForUser,
  toToolPermission,
  type ToolPermission,
  type ToolPermissionInput,
} from './repositories/tool-permissions.js';

// Audit log repository
export {
  insertAuditLog,
  queryAuditLogs,
  getAuditLogById,
  type AuditLogInput,
  type AuditLogFilters,
  type AuditLogPage,
} from './repositories/audit-logs.js';
