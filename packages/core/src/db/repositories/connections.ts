/**
 * Connection Repository
 *
 * Data access layer for backend connection records. Credentials are only
 * ever handled here as vault ciphertext.
 *
 * @see schema/index.ts connections table
 */

import { and, desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import { connections, type ConnectionRow, type NewConnectionRow } from '../../schema/index.js';
import type { HealthStatus } from '@toolgate/protocol';
import { parseJsonObject } from '../../utils/json.js';
import { logger } from '../../utils/logger.js';

/**
 * Connection record with its config column parsed
 */
export interface Connection extends Omit<ConnectionRow, 'config'> {
  config: Record<string, unknown>;
}

export interface NewConnection {
  owner_id: string;
  kind: string;
  name: string;
  description?: string | null;
  config?: Record<string, unknown>;
  encrypted_credentials?: string | null;
  enabled?: boolean;
}

export interface ConnectionUpdate {
  name?: string;
  description?: string | null;
  config?: Record<string, unknown>;
  encrypted_credentials?: string | null;
  enabled?: boolean;
}

export function toConnection(row: ConnectionRow): Connection {
  return { ...row, config: parseJsonObject(row.config) };
}

/**
 * Insert a connection record
 */
export async function createConnection(db: DatabaseClient, data: NewConnection): Promise<Connection> {
  const now = new Date().toISOString();

  const row: NewConnectionRow = {
    connection_id: uuidv4(),
    owner_id: data.owner_id,
    kind: data.kind,
    name: data.name,
    description: data.description ?? null,
    config: JSON.stringify(data.config ?? {}),
    encrypted_credentials: data.encrypted_credentials ?? null,
    enabled: data.enabled ?? true,
    created_at: now,
    updated_at: now,
  };

  const [created] = await db.insert(connections).values(row).returning();
  if (!created) {
    throw new Error('[db:connections] Insert returned no row');
  }

  logger.info(`[db:connections] Created connection ${created.connection_id} (${data.kind}) for owner ${data.owner_id}`);
  return toConnection(created);
}

/**
 * Get a connection scoped to its owner
 */
export async function getConnectionById(
  db: DatabaseClient,
  connection_id: string,
  owner_id: string
): Promise<Connection | null> {
  const [row] = await db
    .select()
    .from(connections)
    .where(and(eq(connections.connection_id, connection_id), eq(connections.owner_id, owner_id)))
    .limit(1);

  return row ? toConnection(row) : null;
}

/**
 * Get a connection by id regardless of owner (administrative reads)
 */
export async function findConnection(db: DatabaseClient, connection_id: string): Promise<Connection | null> {
  const [row] = await db.select().from(connections).where(eq(connections.connection_id, connection_id)).limit(1);
  return row ? toConnection(row) : null;
}

/**
 * Get a connection by owner and display name
 */
export async function getConnectionByName(
  db: DatabaseClient,
  owner_id: string,
  name: string
): Promise<Connection | null> {
  const [row] = await db
    .select()
    .from(connections)
    .where(and(eq(connections.owner_id, owner_id), eq(connections.name, name)))
    .limit(1);

  return row ? toConnection(row) : null;
}

/**
 * List an owner's connections, newest first
 */
export async function listConnectionsForOwner(
  db: DatabaseClient,
  owner_id: string,
  options: { activeOnly?: boolean } = {}
): Promise<Connection[]> {
  const condition = options.activeOnly
    ? and(eq(connections.owner_id, owner_id), eq(connections.enabled, true))
    : eq(connections.owner_id, owner_id);

  const rows = await db
    .select()
    .from(connections)
    .where(condition)
    .orderBy(desc(connections.created_at), connections.connection_id);

  return rows.map(toConnection);
}

/**
 * Update mutable connection fields
 *
 * @returns Updated record, or null if the owner has no such connection
 */
export async function updateConnection(
  db: DatabaseClient,
  connection_id: string,
  owner_id: string,
  updates: ConnectionUpdate
): Promise<Connection | null> {
  const set: Partial<NewConnectionRow> = { updated_at: new Date().toISOString() };
  if (updates.name !== undefined) set.name = updates.name;
  if (updates.description !== undefined) set.description = updates.description;
  if (updates.config !== undefined) set.config = JSON.stringify(updates.config);
  if (updates.encrypted_credentials !== undefined) set.encrypted_credentials = updates.encrypted_credentials;
  if (updates.enabled !== undefined) set.enabled = updates.enabled;

  const [row] = await db
    .update(connections)
    .set(set)
    .where(and(eq(connections.connection_id, connection_id), eq(connections.owner_id, owner_id)))
    .returning();

  if (!row) {
    return null;
  }

  logger.info(`[db:connections] Updated connection ${connection_id}`);
  return toConnection(row);
}

/**
 * Delete a connection (cascades to its tool permissions)
 *
 * @returns true if a row was deleted
 */
export async function deleteConnection(
  db: DatabaseClient,
  connection_id: string,
  owner_id: string
): Promise<boolean> {
  const result = await db
    .delete(connections)
    .where(and(eq(connections.connection_id, connection_id), eq(connections.owner_id, owner_id)));

  const deleted = result.changes > 0;
  if (deleted) {
    logger.info(`[db:connections] Deleted connection ${connection_id}`);
  }
  return deleted;
}

/**
 * Store the result of a connection health check
 */
export async function recordHealthCheck(
  db: DatabaseClient,
  connection_id: string,
  owner_id: string,
  status: HealthStatus,
  error: string | null
): Promise<Connection | null> {
  const now = new Date().toISOString();
  const [row] = await db
    .update(connections)
    .set({
      last_health_check_at: now,
      last_health_status: status,
      last_health_error: error,
      updated_at: now,
    })
    .where(and(eq(connections.connection_id, connection_id), eq(connections.owner_id, owner_id)))
    .returning();

  return row ? toConnection(row) : null;
}
