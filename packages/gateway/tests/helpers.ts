/**
 * Shared fakes for gateway tests
 */

import type { BackendCallResult, PolicyDecision, ToolDefinition } from '@toolgate/protocol';
import type {
  AuditRecord,
  AuditSink,
  BackendCallOptions,
  BackendClient,
  Connection,
  PermissionEvaluator,
} from '@toolgate/core';

export function makeTool(name: string, description = `${name} tool`): ToolDefinition {
  return { name, description, parameters: { type: 'object', properties: {} } };
}

export function makeConnection(overrides: Partial<Connection> = {}): Connection {
  return {
    connection_id: 'conn-1',
    owner_id: 'user-1',
    kind: 'sql',
    name: 'Sales DB',
    description: null,
    config: {},
    encrypted_credentials: null,
    enabled: true,
    last_health_check_at: null,
    last_health_status: null,
    last_health_error: null,
    created_at: '2026-03-01T00:00:00.000Z',
    updated_at: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export type CallHandler = (
  toolName: string,
  params: Record<string, unknown>,
  options: BackendCallOptions
) => Promise<BackendCallResult>;

export interface FakeBackendOptions {
  tools?: ToolDefinition[];
  connectResult?: boolean;
  handler?: CallHandler;
}

/**
 * In-process backend client that records every call
 */
export class FakeBackendClient implements BackendClient {
  connectCalls = 0;
  disconnectCalls = 0;
  readonly calls: Array<{ toolName: string; params: Record<string, unknown> }> = [];
  private readonly tools: ToolDefinition[];
  private readonly connectResult: boolean;
  private readonly handler: CallHandler;

  constructor(
    readonly kind: string,
    options: FakeBackendOptions = {}
  ) {
    this.tools = options.tools ?? [makeTool('list_tables', 'List tables')];
    this.connectResult = options.connectResult ?? true;
    this.handler = options.handler ?? (async () => ({ success: true, data: { ok: true }, error: null }));
  }

  async connect(): Promise<boolean> {
    this.connectCalls++;
    return this.connectResult;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  async listTools(): Promise<ToolDefinition[]> {
    return this.tools;
  }

  async callTool(
    toolName: string,
    params: Record<string, unknown>,
    options: BackendCallOptions = {}
  ): Promise<BackendCallResult> {
    this.calls.push({ toolName, params });
    return this.handler(toolName, params, options);
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async write(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}

/**
 * Evaluator returning a fixed decision per tool name (allow by default)
 */
export class StaticEvaluator implements PermissionEvaluator {
  readonly checks: Array<{ userId: string; connectionId: string; toolName: string }> = [];

  constructor(private readonly decisions: Record<string, PolicyDecision> = {}) {}

  async check(userId: string, connectionId: string, toolName: string): Promise<PolicyDecision> {
    this.checks.push({ userId, connectionId, toolName });
    return this.decisions[toolName] ?? { allowed: true, reason: null };
  }
}
