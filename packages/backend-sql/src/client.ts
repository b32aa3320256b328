/**
 * SQL Backend Client
 *
 * MySQL backend over a bounded mysql2 pool. Serves read_query, write_query,
 * list_tables and describe_table. Backend failures come back as failed
 * results; only cancellation rejects.
 */

import mysql, { type FieldPacket, type Pool, type PoolConnection } from 'mysql2/promise';
import { z } from 'zod';
import type { BackendCallResult, ToolDefinition } from '@toolgate/protocol';
import {
  CancelledError,
  ServiceUnavailableError,
  errorMessage,
  isPlainObject,
  logger,
  withAbort,
  withTimeout,
  type BackendCallOptions,
  type BackendClient,
  type SqlBackendSettings,
} from '@toolgate/core';
import { SQL_TOOLS } from './tools.js';
import { isSelectStatement, isValidIdentifier } from './statements.js';

export const READ_ONLY_ERROR = 'Read-only mode: only SELECT statements are allowed';

/**
 * Non-secret connection settings stored in connections.config
 */
export const SqlConnectionConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(3306),
  database: z.string().optional(),
  read_only: z.boolean().default(true),
});

export type SqlConnectionConfig = z.infer<typeof SqlConnectionConfigSchema>;

export interface SqlCredentials {
  username?: string;
  password?: string;
}

export interface SqlBackendClientOptions {
  /** Display name used in log lines */
  name: string;
  config: SqlConnectionConfig;
  credentials: SqlCredentials;
  settings: SqlBackendSettings;
}

const QueryParamsSchema = z.object({
  sql: z.string().min(1),
  params: z.array(z.unknown()).optional(),
});

const DescribeParamsSchema = z.object({
  table: z.string().min(1),
});

function ok(data: unknown): BackendCallResult {
  return { success: true, data, error: null };
}

function fail(error: string): BackendCallResult {
  return { success: false, data: null, error };
}

export class SqlBackendClient implements BackendClient {
  readonly kind = 'sql';
  private pool: Pool | null = null;

  constructor(private readonly options: SqlBackendClientOptions) {}

  get readOnly(): boolean {
    return this.options.config.read_only;
  }

  async connect(): Promise<boolean> {
    if (this.pool) {
      return true;
    }

    const { config, credentials, settings } = this.options;
    const pool = mysql.createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: credentials.username,
      password: credentials.password,
      connectionLimit: settings.pool_size,
      waitForConnections: true,
      queueLimit: 0,
      connectTimeout: settings.connect_timeout_ms,
    });

    try {
      const connection = await this.acquire(pool);
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      logger.warn(`[backend:sql] Connection to ${this.options.name} failed: ${errorMessage(error)}`);
      await pool.end().catch((err: unknown) => {
        logger.debug(`[backend:sql] Pool end after failed connect: ${errorMessage(err)}`);
      });
      return false;
    }

    this.pool = pool;
    logger.info(`[backend:sql] Connected to ${this.options.name} (${config.host}:${config.port})`);
    return true;
  }

  async disconnect(): Promise<void> {
    const pool = this.pool;
    if (!pool) {
      return;
    }
    this.pool = null;
    await pool.end();
    logger.info(`[backend:sql] Disconnected from ${this.options.name}`);
  }

  async listTools(): Promise<ToolDefinition[]> {
    return SQL_TOOLS.map(tool => ({ ...tool }));
  }

  async callTool(
    toolName: string,
    params: Record<string, unknown>,
    options: BackendCallOptions = {}
  ): Promise<BackendCallResult> {
    const pool = this.pool;
    if (!pool) {
      return fail('Not connected: call connect() first');
    }

    try {
      switch (toolName) {
        case 'read_query':
          return await this.runQuery(pool, params, true, options.signal);
        case 'write_query':
          return await this.runQuery(pool, params, this.readOnly, options.signal);
        case 'list_tables':
          return await this.listTables(pool, options.signal);
        case 'describe_table':
          return await this.describeTable(pool, params, options.signal);
        default:
          return fail(`Unknown tool: ${toolName}`);
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      return fail(errorMessage(error));
    }
  }

  private async runQuery(
    pool: Pool,
    params: Record<string, unknown>,
    selectOnly: boolean,
    signal?: AbortSignal
  ): Promise<BackendCallResult> {
    const parsed = QueryParamsSchema.safeParse(params);
    if (!parsed.success) {
      return fail('Parameter "sql" is required');
    }
    const { sql, params: values } = parsed.data;

    if (selectOnly && !isSelectStatement(sql)) {
      return fail(READ_ONLY_ERROR);
    }

    const [result, fields] = await this.withConnection(pool, signal, connection =>
      connection.query(sql, values ?? [])
    );

    if (Array.isArray(result)) {
      const rows = toRows(result);
      return ok({
        columns: columnNames(fields, rows),
        rows,
        row_count: rows.length,
      });
    }

    return ok({
      affected_rows: numberField(result, 'affectedRows'),
      insert_id: numberField(result, 'insertId'),
    });
  }

  private async listTables(pool: Pool, signal?: AbortSignal): Promise<BackendCallResult> {
    const [result] = await this.withConnection(pool, signal, connection => connection.query('SHOW TABLES'));
    const tables = toRows(result).map(firstValue).filter((name): name is string => typeof name === 'string');
    return ok({ tables, count: tables.length });
  }

  private async describeTable(
    pool: Pool,
    params: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<BackendCallResult> {
    const parsed = DescribeParamsSchema.safeParse(params);
    if (!parsed.success) {
      return fail('Parameter "table" is required');
    }
    const { table } = parsed.data;
    if (!isValidIdentifier(table)) {
      return fail(`Invalid table name: ${table}`);
    }

    return this.withConnection(pool, signal, async connection => {
      const [matches] = await connection.query('SHOW TABLES LIKE ?', [table]);
      if (!toRows(matches).some(row => firstValue(row) === table)) {
        return fail(`Table not found: ${table}`);
      }

      const [described] = await connection.query(`DESCRIBE \`${table}\``);
      const columns = toRows(described).map(row => ({
        name: row['Field'] ?? null,
        type: row['Type'] ?? null,
        null: row['Null'] ?? null,
        key: row['Key'] ?? null,
        default: row['Default'] ?? null,
        extra: row['Extra'] ?? null,
      }));
      return ok({ table, columns });
    });
  }

  /**
   * Borrow a pooled connection for one operation
   *
   * On abort the connection is destroyed rather than returned, so the
   * in-flight query is dropped with it.
   */
  private async withConnection<T>(
    pool: Pool,
    signal: AbortSignal | undefined,
    operation: (connection: PoolConnection) => Promise<T>
  ): Promise<T> {
    const connection = await this.acquire(pool, signal);
    let destroyed = false;

    try {
      return await withAbort(operation(connection), signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        connection.destroy();
        destroyed = true;
        logger.info(`[backend:sql] Query on ${this.options.name} cancelled, connection destroyed`);
      }
      throw error;
    } finally {
      if (!destroyed) {
        connection.release();
      }
    }
  }

  /**
   * Get a pooled connection, failing after acquire_timeout_ms
   */
  private async acquire(pool: Pool, signal?: AbortSignal): Promise<PoolConnection> {
    const timeoutMs = this.options.settings.acquire_timeout_ms;
    const pending = pool.getConnection();

    try {
      return await withAbort(
        withTimeout(
          pending,
          timeoutMs,
          () =>
            new ServiceUnavailableError(`No database connection available within ${timeoutMs}ms`, {
              connection: this.options.name,
            })
        ),
        signal
      );
    } catch (error) {
      // A connection granted after we gave up goes straight back to the pool
      void pending.then(
        connection => connection.release(),
        () => undefined
      );
      throw error;
    }
  }
}

function toRows(result: unknown): Record<string, unknown>[] {
  return Array.isArray(result) ? result.filter(isPlainObject) : [];
}

function firstValue(row: Record<string, unknown>): unknown {
  return Object.values(row)[0];
}

function columnNames(fields: FieldPacket[] | undefined, rows: Record<string, unknown>[]): string[] {
  if (fields && fields.length > 0) {
    return fields.map(field => field.name);
  }
  const first = rows[0];
  return first ? Object.keys(first) : [];
}

function numberField(result: unknown, key: string): number {
  if (!isPlainObject(result)) {
    return 0;
  }
  const value = result[key];
  return typeof value === 'number' ? value : 0;
}
