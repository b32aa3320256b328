/**
 * Tool Gateway Tests
 *
 * Name parsing, connection resolution, policy outcomes, backend outcomes,
 * cancellation and the one-audit-record-per-call rule.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AuditPipeline,
  DatabaseAuditSink,
  NameFormatError,
  closeDatabase,
  createConnection,
  initializeDatabase,
  logger,
  queryAuditLogs,
  runMigrations,
  upsertToolPermission,
  type DatabaseClient,
  type PermissionEvaluator,
} from '@toolgate/core';
import { ToolPermissionEvaluator } from '@toolgate/authz-local';
import { ToolGateway } from '../../src/gateway/tool-gateway.js';
import { FakeBackendClient, MemoryAuditSink, StaticEvaluator, makeConnection, makeTool } from '../helpers.js';

describe('ToolGateway', () => {
  let sink: MemoryAuditSink;
  let audit: AuditPipeline;

  beforeEach(() => {
    sink = new MemoryAuditSink();
    audit = new AuditPipeline({ sink });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function gatewayWith(evaluator: PermissionEvaluator = new StaticEvaluator(), callTimeoutMs = 0): ToolGateway {
    return new ToolGateway({ evaluator, audit, callTimeoutMs });
  }

  describe('name parsing', () => {
    it.each(['sql', 'sql.', '.read_query', 'sql.a.b', ''])(
      'should reject "%s" without auditing or calling the backend',
      async name => {
        const evaluator = new StaticEvaluator();
        const gateway = gatewayWith(evaluator);
        const client = new FakeBackendClient('sql');
        gateway.registerConnection(makeConnection(), client, [makeTool('read_query')]);

        const result = await gateway.callTool(name, {}, 'user-1');

        expect(result).toEqual({
          success: false,
          data: null,
          error: new NameFormatError(name).message,
          execution_time_ms: 0,
        });
        expect(sink.records).toHaveLength(0);
        expect(evaluator.checks).toHaveLength(0);
        expect(client.calls).toHaveLength(0);
      }
    );
  });

  describe('connection resolution', () => {
    it('should fail and audit when no connection of the kind is registered', async () => {
      const gateway = gatewayWith();

      const result = await gateway.callTool('docs.search', { q: 'x' }, 'user-1');

      expect(result.success).toBe(false);
      expect(result.error).toBe('No connection for kind: docs');
      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]).toMatchObject({
        tool_name: 'docs.search',
        status: 'fail',
        error_message: 'No connection for kind: docs',
        execution_time_ms: 0,
      });
    });

    it('should skip disabled connections', async () => {
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection({ enabled: false }), client, [makeTool('list_tables')]);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1');

      expect(result.error).toBe('No connection for kind: sql');
      expect(client.calls).toHaveLength(0);
    });

    it('should route to the first enabled connection in registration order', async () => {
      const evaluator = new StaticEvaluator();
      const gateway = gatewayWith(evaluator);
      const first = new FakeBackendClient('sql');
      const second = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection({ connection_id: 'conn-a', name: 'A' }), first, []);
      gateway.registerConnection(makeConnection({ connection_id: 'conn-b', name: 'B' }), second, []);

      await gateway.callTool('sql.list_tables', {}, 'user-1');

      expect(first.calls).toEqual([{ toolName: 'list_tables', params: {} }]);
      expect(second.calls).toHaveLength(0);
      expect(evaluator.checks).toEqual([{ userId: 'user-1', connectionId: 'conn-a', toolName: 'list_tables' }]);
    });
  });

  describe('policy', () => {
    it('should deny without touching the backend', async () => {
      const reason = "Tool 'write_query' is blocked";
      const gateway = gatewayWith(new StaticEvaluator({ write_query: { allowed: false, reason } }));
      const client = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.write_query', { sql: 'DELETE FROM t' }, 'user-1');

      expect(result).toEqual({ success: false, data: null, error: reason, execution_time_ms: 0 });
      expect(client.calls).toHaveLength(0);
      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]).toMatchObject({ status: 'denied', error_message: reason, response: null });
    });

    it('should fail open with a warning when the evaluator throws', async () => {
      const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const evaluator: PermissionEvaluator = {
        check: async () => {
          throw new Error('database is locked');
        },
      };
      const gateway = gatewayWith(evaluator);
      const client = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1');

      expect(result.success).toBe(true);
      expect(client.calls).toHaveLength(1);
      expect(sink.records[0]?.status).toBe('success');
      expect(warnSpy).toHaveBeenCalledWith(
        '[gateway] Permission check failed for sql.list_tables, allowing: database is locked'
      );
    });
  });

  describe('backend outcomes', () => {
    it('should return data and audit success with masked params', async () => {
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql', {
        handler: async () => ({ success: true, data: { rows: [{ id: 1 }] }, error: null }),
      });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.read_query', { email: 'kim@company.com' }, 'user-1', {
        query: 'find kim',
        sessionId: 'sess-9',
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ rows: [{ id: 1 }] });
      expect(result.error).toBeNull();
      expect(result.execution_time_ms).toBeGreaterThanOrEqual(0);

      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]).toMatchObject({
        user_id: 'user-1',
        session_id: 'sess-9',
        user_query: 'find kim',
        tool_name: 'sql.read_query',
        tool_params: '{"email":"k**@company.com"}',
        response: '{"rows":[{"id":1}]}',
        status: 'success',
        error_message: null,
        masking_failed: false,
      });
    });

    it('should audit fail when the backend reports a failure', async () => {
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql', {
        handler: async () => ({ success: false, data: null, error: 'Table not found: ghosts' }),
      });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.describe_table', { table: 'ghosts' }, 'user-1');

      expect(result.success).toBe(false);
      expect(result.error).toBe('Table not found: ghosts');
      expect(sink.records[0]).toMatchObject({ status: 'fail', error_message: 'Table not found: ghosts' });
    });

    it('should convert a thrown error into a failed result and audit fail', async () => {
      vi.spyOn(logger, 'error').mockImplementation(() => undefined);
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql', {
        handler: async () => {
          throw new Error('connection reset');
        },
      });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1');

      expect(result.success).toBe(false);
      expect(result.data).toBeNull();
      expect(result.error).toBe('connection reset');
      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]).toMatchObject({ status: 'fail', error_message: 'connection reset' });
    });
  });

  describe('cancellation', () => {
    it('should abort the backend call on timeout and audit a distinguishing failure', async () => {
      let backendSignal: AbortSignal | undefined;
      const gateway = gatewayWith(new StaticEvaluator(), 20);
      const client = new FakeBackendClient('sql', {
        handler: (_tool, _params, options) => {
          backendSignal = options.signal;
          return new Promise<never>(() => undefined);
        },
      });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.read_query', { sql: 'SELECT SLEEP(60)' }, 'user-1');

      expect(result.success).toBe(false);
      expect(result.error).toBe('Tool call cancelled: timed out after 20ms');
      expect(backendSignal?.aborted).toBe(true);
      expect(sink.records).toHaveLength(1);
      expect(sink.records[0]).toMatchObject({
        status: 'fail',
        error_message: 'Tool call cancelled: timed out after 20ms',
      });
    });

    it('should let a per-call timeout override the gateway default', async () => {
      const gateway = gatewayWith(new StaticEvaluator(), 60_000);
      const client = new FakeBackendClient('sql', { handler: () => new Promise<never>(() => undefined) });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1', { timeoutMs: 10 });

      expect(result.error).toBe('Tool call cancelled: timed out after 10ms');
    });

    it('should cancel when the caller aborts mid-call', async () => {
      const controller = new AbortController();
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql', {
        handler: () => {
          controller.abort('user cancelled');
          return new Promise<never>(() => undefined);
        },
      });
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1', { signal: controller.signal });

      expect(result.error).toBe('Tool call cancelled: user cancelled');
      expect(sink.records[0]).toMatchObject({ status: 'fail', error_message: 'Tool call cancelled: user cancelled' });
    });

    it('should not call the backend when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort('stopped');
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection(), client, []);

      const result = await gateway.callTool('sql.list_tables', {}, 'user-1', { signal: controller.signal });

      expect(result.error).toBe('Tool call cancelled: stopped');
      expect(client.calls).toHaveLength(0);
      expect(sink.records).toHaveLength(1);
    });
  });

  it('should write exactly one audit record per parsed call across all branches', async () => {
    vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const gateway = gatewayWith(
      new StaticEvaluator({ write_query: { allowed: false, reason: "Tool 'write_query' is blocked" } })
    );
    const client = new FakeBackendClient('sql', {
      handler: async tool => {
        if (tool === 'describe_table') return { success: false, data: null, error: 'Table not found: x' };
        if (tool === 'read_query') throw new Error('boom');
        return { success: true, data: [], error: null };
      },
    });
    gateway.registerConnection(makeConnection(), client, []);

    await gateway.callTool('docs.search', {}, 'user-1');
    await gateway.callTool('sql.write_query', {}, 'user-1');
    await gateway.callTool('sql.list_tables', {}, 'user-1');
    await gateway.callTool('sql.describe_table', {}, 'user-1');
    await gateway.callTool('sql.read_query', {}, 'user-1');
    await gateway.callTool('not-qualified', {}, 'user-1');

    expect(sink.records.map(record => record.status)).toEqual(['fail', 'denied', 'success', 'fail', 'fail']);
    expect(client.calls.map(call => call.toolName)).toEqual(['list_tables', 'describe_table', 'read_query']);
  });

  describe('connection management', () => {
    it('should list qualified tools with the connection name in the description', () => {
      const gateway = gatewayWith();
      gateway.registerConnection(makeConnection({ connection_id: 'conn-1' }), new FakeBackendClient('sql'), [
        makeTool('list_tables', 'List tables'),
      ]);
      gateway.registerConnection(
        makeConnection({ connection_id: 'conn-2', name: 'Off', enabled: false }),
        new FakeBackendClient('sql'),
        [makeTool('read_query')]
      );

      expect(gateway.listTools()).toEqual([
        {
          name: 'sql.list_tables',
          description: '[Sales DB] List tables',
          parameters: { type: 'object', properties: {} },
          connection_id: 'conn-1',
        },
      ]);
    });

    it('should disconnect a client when its connection is unregistered', async () => {
      const gateway = gatewayWith();
      const client = new FakeBackendClient('sql');
      gateway.registerConnection(makeConnection(), client, []);

      expect(await gateway.unregisterConnection('conn-1')).toBe(true);
      expect(await gateway.unregisterConnection('conn-1')).toBe(false);
      expect(client.disconnectCalls).toBe(1);
      expect(gateway.getConnections()).toEqual([]);
    });

    it('should disconnect every client on close', async () => {
      const gateway = gatewayWith();
      const a = new FakeBackendClient('sql');
      const b = new FakeBackendClient('docs');
      gateway.registerConnection(makeConnection({ connection_id: 'a' }), a, []);
      gateway.registerConnection(makeConnection({ connection_id: 'b', kind: 'docs' }), b, []);

      await gateway.close();

      expect(a.disconnectCalls).toBe(1);
      expect(b.disconnectCalls).toBe(1);
      expect(gateway.getConnections()).toHaveLength(0);
    });
  });
});

describe('ToolGateway with stored policy', () => {
  let db: DatabaseClient;

  beforeEach(() => {
    db = initializeDatabase({ sqliteFilePath: ':memory:' });
    runMigrations(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  async function setup() {
    const connection = await createConnection(db, { owner_id: 'user-1', kind: 'sql', name: 'Sales DB' });
    const client = new FakeBackendClient('sql', {
      handler: async () => ({ success: true, data: { tables: ['users', 'orders'], count: 2 }, error: null }),
    });
    const gateway = new ToolGateway({
      evaluator: new ToolPermissionEvaluator(db),
      audit: new AuditPipeline({ sink: new DatabaseAuditSink(db) }),
    });
    gateway.registerConnection(connection, client, []);
    return { connection, client, gateway };
  }

  it('should deny a blocked tool and store a denied audit record', async () => {
    const { connection, client, gateway } = await setup();
    await upsertToolPermission(db, {
      user_id: 'user-1',
      connection_id: connection.connection_id,
      tool_name: 'write_query',
      permission_kind: 'blocked',
    });

    const result = await gateway.callTool('sql.write_query', { sql: 'DROP TABLE users' }, 'user-1');

    expect(result.success).toBe(false);
    expect(result.error).toBe("Tool 'write_query' is blocked");
    expect(client.calls).toHaveLength(0);

    const page = await queryAuditLogs(db);
    expect(page.logs).toHaveLength(1);
    expect(page.logs[0]).toMatchObject({ status: 'denied', error_message: "Tool 'write_query' is blocked" });
  });

  it('should allow a tool with no policy row and store the response unchanged', async () => {
    const { gateway } = await setup();

    const result = await gateway.callTool('sql.list_tables', {}, 'user-1');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ tables: ['users', 'orders'], count: 2 });

    const page = await queryAuditLogs(db);
    expect(page.logs).toHaveLength(1);
    expect(page.logs[0]).toMatchObject({
      status: 'success',
      tool_name: 'sql.list_tables',
      response: '{"tables":["users","orders"],"count":2}',
    });
  });

  it('should deny an expired permission', async () => {
    const { connection, client, gateway } = await setup();
    await upsertToolPermission(db, {
      user_id: 'user-1',
      connection_id: connection.connection_id,
      tool_name: 'list_tables',
      permission_kind: 'allowed',
      expires_at: '2020-01-01T00:00:00.000Z',
    });

    const result = await gateway.callTool('sql.list_tables', {}, 'user-1');

    expect(result.error).toBe("Permission for tool 'list_tables' has expired");
    expect(client.calls).toHaveLength(0);
  });
});
