/**
 * Tool Permission Repository
 *
 * Data access layer for per-(user, connection, tool) policy rows.
 *
 * @see schema/index.ts tool_permissions table
 */

import { and, asc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import {
  tool_permissions,
  type NewToolPermissionRow,
  type ToolPermissionRow,
} from '../../schema/index.js';
import {
  isWeekday,
  type PermissionKind,
  type RateLimitDescriptor,
  type TimeRestrictions,
} from '@toolgate/protocol';
import { isPlainObject, parseJsonNullable, toJsonColumn } from '../../utils/json.js';
import { logger } from '../../utils/logger.js';

/**
 * Policy row with its JSON columns parsed
 */
export interface ToolPermission {
  permission_id: string;
  user_id: string;
  connection_id: string;
  tool_name: string;
  permission_kind: PermissionKind;
  param_constraints: Record<string, unknown> | null;
  expires_at: string | null;
  time_restrictions: TimeRestrictions | null;
  rate_limit: RateLimitDescriptor | null;
  created_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface ToolPermissionInput {
  user_id: string;
  connection_id: string;
  tool_name: string;
  permission_kind: PermissionKind;
  param_constraints?: Record<string, unknown> | null;
  expires_at?: string | null;
  time_restrictions?: TimeRestrictions | null;
  rate_limit?: RateLimitDescriptor | null;
  created_by?: string | null;
}

function objectOrNull(text: string | null): Record<string, unknown> | null {
  const parsed = parseJsonNullable(text);
  return isPlainObject(parsed) ? parsed : null;
}

function parseTimeRestrictions(text: string | null): TimeRestrictions | null {
  const parsed = objectOrNull(text);
  if (!parsed) {
    return null;
  }
  const restrictions: TimeRestrictions = {};
  const hours = parsed['allowed_hours'];
  if (Array.isArray(hours)) {
    restrictions.allowed_hours = hours.filter((h): h is number => typeof h === 'number');
  }
  const days = parsed['allowed_days'];
  if (Array.isArray(days)) {
    restrictions.allowed_days = days.filter(isWeekday);
  }
  return restrictions;
}

function parseRateLimit(text: string | null): RateLimitDescriptor | null {
  const parsed = objectOrNull(text);
  if (!parsed) {
    return null;
  }
  const limit: RateLimitDescriptor = {};
  const perHour = parsed['max_calls_per_hour'];
  const perDay = parsed['max_calls_per_day'];
  if (typeof perHour === 'number') limit.max_calls_per_hour = perHour;
  if (typeof perDay === 'number') limit.max_calls_per_day = perDay;
  return limit;
}

export function toToolPermission(row: ToolPermissionRow): ToolPermission {
  return {
    permission_id: row.permission_id,
    user_id: row.user_id,
    connection_id: row.connection_id,
    tool_name: row.tool_name,
    permission_kind: row.permission_kind,
    param_constraints: objectOrNull(row.param_constraints),
    expires_at: row.expires_at,
    time_restrictions: parseTimeRestrictions(row.time_restrictions),
    rate_limit: parseRateLimit(row.rate_limit),
    created_by: row.created_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Get the policy row for one (user, connection, tool)
 */
export async function getToolPermission(
  db: DatabaseClient,
  user_id: string,
  connection_id: string,
  tool_name: string
): Promise<ToolPermission | null> {
  const [row] = await db
    .select()
    .from(tool_permissions)
    .where(
      and(
        eq(tool_permissions.user_id, user_id),
        eq(tool_permissions.connection_id, connection_id),
        eq(tool_permissions.tool_name, tool_name)
      )
    )
    .limit(1);

  return row ? toToolPermission(row) : null;
}

/**
 * Insert or replace the policy row for (user, connection, tool)
 *
 * Conditions not supplied are cleared; the original permission_id,
 * created_by and created_at are kept on update.
 */
export async function upsertToolPermission(
  db: DatabaseClient,
  input: ToolPermissionInput
): Promise<ToolPermission> {
  const now = new Date().toISOString();

  const values: NewToolPermissionRow = {
    permission_id: uuidv4(),
    user_id: input.user_id,
    connection_id: input.connection_id,
    tool_name: input.tool_name,
    permission_kind: input.permission_kind,
    param_constraints: toJsonColumn(input.param_constraints),
    expires_at: input.expires_at ?? null,
    time_restrictions: toJsonColumn(input.time_restrictions),
    rate_limit: toJsonColumn(input.rate_limit),
    created_by: input.created_by ?? null,
    created_at: now,
    updated_at: now,
  };

  const [row] = await db
    .insert(tool_permissions)
    .values(values)
    .onConflictDoUpdate({
      target: [tool_permissions.user_id, tool_permissions.connection_id, tool_permissions.tool_name],
      set: {
        permission_kind: values.permission_kind,
        param_constraints: values.param_constraints,
        expires_at: values.expires_at,
        time_restrictions: values.time_restrictions,
        rate_limit: values.rate_limit,
        updated_at: now,
      },
    })
    .returning();

  if (!row) {
    throw new Error('[db:tool-permissions] Upsert returned no row');
  }

  logger.info(
    `[db:tool-permissions] Set ${input.permission_kind} for user ${input.user_id} on ${input.connection_id}/${input.tool_name}`
  );
  return toToolPermission(row);
}

/**
 * Upsert several policy rows in one transaction
 */
export function bulkUpsertToolPermissions(
  db: DatabaseClient,
  inputs: ToolPermissionInput[]
): ToolPermission[] {
  const now = new Date().toISOString();

  return db.transaction(tx =>
    inputs.map(input => {
      const row = tx
        .insert(tool_permissions)
        .values({
          permission_id: uuidv4(),
          user_id: input.user_id,
          connection_id: input.connection_id,
          tool_name: input.tool_name,
          permission_kind: input.permission_kind,
          param_constraints: toJsonColumn(input.param_constraints),
          expires_at: input.expires_at ?? null,
          time_restrictions: toJsonColumn(input.time_restrictions),
          rate_limit: toJsonColumn(input.rate_limit),
          created_by: input.created_by ?? null,
          created_at: now,
          updated_at: now,
        })
        .onConflictDoUpdate({
          target: [tool_permissions.user_id, tool_permissions.connection_id, tool_permissions.tool_name],
          set: {
            permission_kind: input.permission_kind,
            param_constraints: toJsonColumn(input.param_constraints),
            expires_at: input.expires_at ?? null,
            time_restrictions: toJsonColumn(input.time_restrictions),
            rate_limit: toJsonColumn(input.rate_limit),
            updated_at: now,
          },
        })
        .returning()
        .get();
      if (!row) {
        throw new Error('[db:tool-permissions] Upsert returned no row');
      }
      return toToolPermission(row);
    })
  );
}

/**
 * Delete a policy row by id
 *
 * @returns true if a row was deleted
 */
export async function deleteToolPermission(db: DatabaseClient, permission_id: string): Promise<boolean> {
  const result = await db.delete(tool_permissions).where(eq(tool_permissions.permission_id, permission_id));
  return result.changes > 0;
}

/**
 * List a user's policy rows, optionally for one connection
 */
export async function listToolPermissionsForUser(
  db: DatabaseClient,
  user_id: string,
  connection_id?: string
): Promise<ToolPermission[]> {
  const condition =
    connection_id === undefined
      ? eq(tool_permissions.user_id, user_id)
      : and(eq(tool_permissions.user_id, user_id), eq(tool_permissions.connection_id, connection_id));

  const rows = await db
    .select()
    .from(tool_permissions)
    .where(condition)
    .orderBy(asc(tool_permissions.connection_id), asc(tool_permissions.tool_name));

  return rows.map(toToolPermission);
}
