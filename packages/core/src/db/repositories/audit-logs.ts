/**
 * Audit Log Repository
 *
 * Append-only store of tool-call attempts. Rows are written once and never
 * updated.
 *
 * @see schema/index.ts audit_logs table
 */

import { and, desc, eq, gte, lt, lte, or, sql, type SQL } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import { audit_logs, type AuditLogRow, type NewAuditLogRow } from '../../schema/index.js';
import type { AuditStatus } from '@toolgate/protocol';

export type AuditLogInput = Omit<NewAuditLogRow, 'id' | 'timestamp'> & { timestamp?: string };

export interface AuditLogFilters {
  user_id?: string;
  tool_name?: string;
  status?: AuditStatus;
  start_time?: string; // ISO 8601, inclusive
  end_time?: string; // ISO 8601, inclusive
  /** Substring matched against user_query, tool_name and error_message */
  keyword?: string;
}

export interface AuditLogPage {
  logs: AuditLogRow[];
  has_more: boolean;
  next_cursor?: string;
}

const CURSOR_SEPARATOR = '|';

function encodeCursor(row: AuditLogRow): string {
  return `${row.timestamp}${CURSOR_SEPARATOR}${row.id}`;
}

function decodeCursor(cursor: string): { timestamp: string; id: string } | null {
  const index = cursor.lastIndexOf(CURSOR_SEPARATOR);
  if (index <= 0) {
    return null;
  }
  return { timestamp: cursor.slice(0, index), id: cursor.slice(index + 1) };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

/**
 * Insert one audit record
 *
 * @returns Generated record id
 */
export async function insertAuditLog(db: DatabaseClient, input: AuditLogInput): Promise<string> {
  const id = uuidv4();

  const row: NewAuditLogRow = {
    ...input,
    id,
    timestamp: input.timestamp ?? new Date().toISOString(),
  };

  await db.insert(audit_logs).values(row);
  return id;
}

/**
 * Query audit records, newest first, with cursor pagination
 *
 * The cursor is opaque to callers; pass back `next_cursor` to get the next page.
 */
export async function queryAuditLogs(
  db: DatabaseClient,
  filters: AuditLogFilters = {},
  pagination: { limit?: number; cursor?: string } = {}
): Promise<AuditLogPage> {
  const limit = Math.min(Math.max(pagination.limit ?? 100, 1), 1000);
  const conditions: SQL[] = [];

  if (filters.user_id) {
    conditions.push(eq(audit_logs.user_id, filters.user_id));
  }
  if (filters.tool_name) {
    conditions.push(eq(audit_logs.tool_name, filters.tool_name));
  }
  if (filters.status) {
    conditions.push(eq(audit_logs.status, filters.status));
  }
  if (filters.start_time) {
    conditions.push(gte(audit_logs.timestamp, filters.start_time));
  }
  if (filters.end_time) {
    conditions.push(lte(audit_logs.timestamp, filters.end_time));
  }
  if (filters.keyword) {
    const pattern = `%${escapeLike(filters.keyword)}%`;
    const keywordMatch = or(
      sql`${audit_logs.user_query} LIKE ${pattern} ESCAPE '\\'`,
      sql`${audit_logs.tool_name} LIKE ${pattern} ESCAPE '\\'`,
      sql`${audit_logs.error_message} LIKE ${pattern} ESCAPE '\\'`
    );
    if (keywordMatch) {
      conditions.push(keywordMatch);
    }
  }

  const cursor = pagination.cursor ? decodeCursor(pagination.cursor) : null;
  if (cursor) {
    const before = or(
      lt(audit_logs.timestamp, cursor.timestamp),
      and(eq(audit_logs.timestamp, cursor.timestamp), lt(audit_logs.id, cursor.id))
    );
    if (before) {
      conditions.push(before);
    }
  }

  // limit + 1 to detect has_more
  const rows = await db
    .select()
    .from(audit_logs)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(desc(audit_logs.timestamp), desc(audit_logs.id))
    .limit(limit + 1);

  const has_more = rows.length > limit;
  const logs = has_more ? rows.slice(0, limit) : rows;
  const last = logs[logs.length - 1];

  return {
    logs,
    has_more,
    next_cursor: has_more && last ? encodeCursor(last) : undefined,
  };
}

/**
 * Get one audit record by id
 */
export async function getAuditLogById(db: DatabaseClient, id: string): Promise<AuditLogRow | null> {
  const [row] = await db.select().from(audit_logs).where(eq(audit_logs.id, id)).limit(1);
  return row ?? null;
}
