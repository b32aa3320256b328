/**
 * Toolgate - Database Schema
 *
 * Drizzle ORM schema definitions (SQLite dialect).
 *
 * Design constraints:
 * - JSON columns stored as TEXT with JSON serialization
 * - UUIDs stored as TEXT (36 chars with hyphens)
 * - Timestamps as ISO 8601 strings
 * - Enum types as constrained TEXT columns
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { relations } from 'drizzle-orm';

/**
 * connections table
 *
 * One backend endpoint owned by exactly one user. Credentials are stored
 * only as the credential vault's opaque ciphertext.
 */
export const connections = sqliteTable(
  'connections',
  {
    // Primary key
    connection_id: text('connection_id').primaryKey().notNull(), // UUIDv4

    // Ownership
    owner_id: text('owner_id').notNull(),

    // Identity
    kind: text('kind').notNull(), // "sql", "docs", "calendar", ...
    name: text('name').notNull(), // Display name, unique per owner
    description: text('description'),

    // Non-secret settings (host, port, read_only, ...)
    config: text('config').notNull().default('{}'), // JSON object serialized to TEXT

    // Vault ciphertext, nullable for backends without credentials
    encrypted_credentials: text('encrypted_credentials'),

    // Lifecycle
    enabled: integer('enabled', { mode: 'boolean' }).notNull().default(true),

    // Health check
    last_health_check_at: text('last_health_check_at'), // ISO 8601
    last_health_status: text('last_health_status', { enum: ['success', 'failed'] }),
    last_health_error: text('last_health_error'),

    // Timestamps
    created_at: text('created_at').notNull(), // ISO 8601
    updated_at: text('updated_at').notNull(), // ISO 8601
  },
  table => ({
    ownerIdx: index('idx_connections_owner_id').on(table.owner_id),
    ownerNameIdx: uniqueIndex('unique_connections_owner_name').on(table.owner_id, table.name),
  })
);

/**
 * tool_permissions table
 *
 * One policy row per (user, connection, tool). Absence of a row means allow.
 * Expired rows stay in place; expiry is evaluated at check time.
 */
export const tool_permissions = sqliteTable(
  'tool_permissions',
  {
    // Primary key
    permission_id: text('permission_id').primaryKey().notNull(), // UUIDv4

    // Scope
    user_id: text('user_id').notNull(),
    connection_id: text('connection_id')
      .notNull()
      .references(() => connections.connection_id, { onDelete: 'cascade' }),
    tool_name: text('tool_name').notNull(), // Local tool name, e.g. "write_query"

    // Decision
    permission_kind: text('permission_kind', {
      enum: ['allowed', 'blocked', 'approval_required'],
    })
      .notNull()
      .default('allowed'),

    // Conditions (JSON objects serialized to TEXT, nullable)
    param_constraints: text('param_constraints'), // Reserved, not enforced
    expires_at: text('expires_at'), // ISO 8601
    time_restrictions: text('time_restrictions'), // { allowed_hours?, allowed_days? }
    rate_limit: text('rate_limit'), // Reserved, not enforced

    // Audit trail
    created_by: text('created_by'), // Authorizing party
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  table => ({
    scopeIdx: uniqueIndex('unique_tool_permissions_scope').on(
      table.user_id,
      table.connection_id,
      table.tool_name
    ),
    userIdx: index('idx_tool_permissions_user_id').on(table.user_id),
    connectionIdx: index('idx_tool_permissions_connection_id').on(table.connection_id),
  })
);

/**
 * audit_logs table
 *
 * Append-only, one row per tool-call attempt. Parameters and responses are
 * stored masked.
 */
export const audit_logs = sqliteTable(
  'audit_logs',
  {
    // Primary key
    id: text('id').primaryKey().notNull(), // UUIDv4

    // Temporal
    timestamp: text('timestamp').notNull(), // ISO 8601

    // Caller context
    user_id: text('user_id').notNull(),
    session_id: text('session_id'),
    user_query: text('user_query'), // Original natural-language request

    // Request/response (masked JSON)
    tool_name: text('tool_name').notNull(), // Fully qualified, e.g. "sql.list_tables"
    tool_params: text('tool_params'),
    response: text('response'),

    // Outcome
    status: text('status', { enum: ['success', 'fail', 'denied'] }).notNull(),
    error_message: text('error_message'),
    execution_time_ms: integer('execution_time_ms').notNull().default(0),

    // Set when masking failed and params/response were replaced by a marker
    masking_failed: integer('masking_failed', { mode: 'boolean' }).notNull().default(false),
  },
  table => ({
    timestampIdx: index('idx_audit_logs_timestamp').on(table.timestamp),
    userIdx: index('idx_audit_logs_user_id').on(table.user_id),
    toolIdx: index('idx_audit_logs_tool_name').on(table.tool_name),
    sessionIdx: index('idx_audit_logs_session_id').on(table.session_id),
  })
);

// ===== Relations =====

export const connectionsRelations = relations(connections, ({ many }) => ({
  permissions: many(tool_permissions),
}));

export const toolPermissionsRelations = relations(tool_permissions, ({ one }) => ({
  connection: one(connections, {
    fields: [tool_permissions.connection_id],
    references: [connections.connection_id],
  }),
}));

// ===== Row types =====

export type ConnectionRow = typeof connections.$inferSelect;
export type NewConnectionRow = typeof connections.$inferInsert;
export type ToolPermissionRow = typeof tool_permissions.$inferSelect;
export type NewToolPermissionRow = typeof tool_permissions.$inferInsert;
export type AuditLogRow = typeof audit_logs.$inferSelect;
export type NewAuditLogRow = typeof audit_logs.$inferInsert;
