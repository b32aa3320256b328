/**
 * ToolPermissionEvaluator Tests
 *
 * Tests rule order: missing row, blocked, approval required, expiry,
 * time restrictions, reserved fields.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ToolPermissionEvaluator, evaluatePermission } from '../src/index.js';
import {
  initializeDatabase,
  runMigrations,
  closeDatabase,
  createConnection,
  logger,
  upsertToolPermission,
  type DatabaseClient,
  type ToolPermission,
  type ToolPermissionInput,
} from '@toolgate/core';

// Monday 2026-03-02 10:30 UTC
const MONDAY_MORNING = new Date('2026-03-02T10:30:00.000Z');

function row(overrides: Partial<ToolPermission>): ToolPermission {
  return {
    permission_id: 'perm-1',
    user_id: 'user-1',
    connection_id: 'conn-1',
    tool_name: 'write_query',
    permission_kind: 'allowed',
    param_constraints: null,
    expires_at: null,
    time_restrictions: null,
    rate_limit: null,
    created_by: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('evaluatePermission()', () => {
  it('should allow when no row exists', () => {
    expect(evaluatePermission(null, 'write_query', MONDAY_MORNING)).toEqual({ allowed: true, reason: null });
  });

  it('should deny blocked tools', () => {
    expect(evaluatePermission(row({ permission_kind: 'blocked' }), 'write_query', MONDAY_MORNING)).toEqual({
      allowed: false,
      reason: "Tool 'write_query' is blocked",
    });
  });

  it('should deny tools requiring approval', () => {
    const decision = evaluatePermission(row({ permission_kind: 'approval_required' }), 'write_query', MONDAY_MORNING);
    expect(decision.reason).toBe("Tool 'write_query' requires administrator approval");
  });

  it('should check blocked before expiry', () => {
    const decision = evaluatePermission(
      row({ permission_kind: 'blocked', expires_at: '2020-01-01T00:00:00.000Z' }),
      'write_query',
      MONDAY_MORNING
    );
    expect(decision.reason).toBe("Tool 'write_query' is blocked");
  });

  it('should deny expired allowed rows', () => {
    const decision = evaluatePermission(
      row({ expires_at: '2026-03-02T10:29:59.000Z' }),
      'write_query',
      MONDAY_MORNING
    );
    expect(decision).toEqual({ allowed: false, reason: "Permission for tool 'write_query' has expired" });
  });

  it('should allow rows expiring in the future', () => {
    const decision = evaluatePermission(row({ expires_at: '2026-03-03T00:00:00+09:00' }), 'write_query', MONDAY_MORNING);
    expect(decision.allowed).toBe(true);
  });

  it('should deny outside allowed UTC hours', () => {
    const restricted = row({ time_restrictions: { allowed_hours: [9, 10, 11] } });

    expect(evaluatePermission(restricted, 'write_query', MONDAY_MORNING).allowed).toBe(true);
    expect(evaluatePermission(restricted, 'write_query', new Date('2026-03-02T12:00:00.000Z'))).toEqual({
      allowed: false,
      reason: "Tool 'write_query' is not available at this time",
    });
  });

  it('should deny outside allowed UTC days', () => {
    const weekdays = row({
      time_restrictions: { allowed_days: ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'] },
    });

    expect(evaluatePermission(weekdays, 'write_query', MONDAY_MORNING).allowed).toBe(true);
    expect(evaluatePermission(weekdays, 'write_query', new Date('2026-03-07T10:00:00.000Z')).allowed).toBe(false);
  });

  it('should treat an empty hour list as never available', () => {
    const decision = evaluatePermission(row({ time_restrictions: { allowed_hours: [] } }), 'write_query', MONDAY_MORNING);
    expect(decision.allowed).toBe(false);
  });

  it('should not enforce param constraints or rate limits', () => {
    const decision = evaluatePermission(
      row({ param_constraints: { table: 'orders' }, rate_limit: { max_calls_per_hour: 1 } }),
      'write_query',
      MONDAY_MORNING,
      { table: 'users' }
    );
    expect(decision).toEqual({ allowed: true, reason: null });
  });
});

describe('ToolPermissionEvaluator', () => {
  let db: DatabaseClient;
  let connectionId: string;
  let now: Date;
  let evaluator: ToolPermissionEvaluator;

  async function setRow(input: Omit<ToolPermissionInput, 'user_id' | 'connection_id'>): Promise<void> {
    await upsertToolPermission(db, { user_id: 'user-1', connection_id: connectionId, ...input });
  }

  beforeEach(async () => {
    db = initializeDatabase({ sqliteFilePath: ':memory:' });
    runMigrations(db);
    const connection = await createConnection(db, { owner_id: 'user-1', kind: 'sql', name: 'Main' });
    connectionId = connection.connection_id;
    now = MONDAY_MORNING;
    evaluator = new ToolPermissionEvaluator(db, { clock: () => now });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDatabase(db);
  });

  it('should leave logging a denial to the caller', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    await setRow({ tool_name: 'write_query', permission_kind: 'blocked' });

    expect((await evaluator.check('user-1', connectionId, 'write_query')).allowed).toBe(false);
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('should allow tools without a row', async () => {
    expect(await evaluator.check('user-1', connectionId, 'list_tables')).toEqual({ allowed: true, reason: null });
  });

  it('should deny a blocked tool from the database', async () => {
    await setRow({ tool_name: 'write_query', permission_kind: 'blocked' });

    const decision = await evaluator.check('user-1', connectionId, 'write_query', { sql: 'DELETE FROM t' });

    expect(decision).toEqual({ allowed: false, reason: "Tool 'write_query' is blocked" });
  });

  it('should scope rows to the user', async () => {
    await setRow({ tool_name: 'write_query', permission_kind: 'blocked' });

    expect((await evaluator.check('user-2', connectionId, 'write_query')).allowed).toBe(true);
  });

  it('should use the injected clock for expiry', async () => {
    await setRow({ tool_name: 'read_query', permission_kind: 'allowed', expires_at: '2026-03-02T11:00:00.000Z' });

    expect((await evaluator.check('user-1', connectionId, 'read_query')).allowed).toBe(true);

    now = new Date('2026-03-02T11:00:00.001Z');
    expect(await evaluator.check('user-1', connectionId, 'read_query')).toEqual({
      allowed: false,
      reason: "Permission for tool 'read_query' has expired",
    });
  });

  it('should read time restrictions back from the database', async () => {
    await setRow({
      tool_name: 'read_query',
      permission_kind: 'allowed',
      time_restrictions: { allowed_hours: [9, 10], allowed_days: ['monday'] },
    });

    expect((await evaluator.check('user-1', connectionId, 'read_query')).allowed).toBe(true);

    now = new Date('2026-03-03T10:00:00.000Z');
    expect((await evaluator.check('user-1', connectionId, 'read_query')).allowed).toBe(false);
  });
});
