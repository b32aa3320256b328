/**
 * Service Provider Interface (SPI) definitions
 *
 * Interfaces the gateway depends on and that backend clients, policy
 * evaluators and audit sinks implement.
 */

import type {
  AuditStatus,
  BackendCallResult,
  PolicyDecision,
  ToolDefinition,
} from '@toolgate/protocol';
import type { Connection } from '../db/repositories/connections.js';
import type { SqlBackendSettings } from '../config/schema.js';

// ===== Backend SPI =====

/**
 * Per-call options passed to a backend client
 */
export interface BackendCallOptions {
  /** Aborted when the caller cancels or the call times out */
  signal?: AbortSignal;
}

/**
 * Backend Client Interface
 *
 * One live client per connection. `callTool` reports backend failures
 * through the result; it only rejects on cancellation.
 */
export interface BackendClient {
  /** Backend kind this client serves (e.g. "sql") */
  readonly kind: string;

  /** Open the underlying connection or pool; false when unreachable */
  connect(): Promise<boolean>;

  /** Release all backend resources */
  disconnect(): Promise<void>;

  /** Tools this backend offers, with local (unqualified) names */
  listTools(): Promise<ToolDefinition[]>;

  /** Execute one tool by its local name */
  callTool(
    toolName: string,
    params: Record<string, unknown>,
    options?: BackendCallOptions
  ): Promise<BackendCallResult>;
}

/**
 * Settings handed to backend factories, keyed by backend kind
 */
export interface BackendSettings {
  sql: SqlBackendSettings;
  [kind: string]: Record<string, unknown>;
}

/**
 * Everything a factory needs to build a client for one connection
 */
export interface BackendFactoryContext {
  connection: Connection;
  /** Decrypted credentials; empty when the connection stores none */
  credentials: Record<string, string>;
  settings: BackendSettings;
}

export type BackendClientFactory = (context: BackendFactoryContext) => BackendClient;

// ===== Authorization SPI =====

/**
 * Permission Evaluator Interface
 *
 * Implementations: ToolPermissionEvaluator (@toolgate/authz-local)
 */
export interface PermissionEvaluator {
  check(
    userId: string,
    connectionId: string,
    toolName: string,
    params?: Record<string, unknown>
  ): Promise<PolicyDecision>;
}

// ===== Audit SPI =====

/**
 * One tool-call attempt as handed to the audit pipeline (unmasked)
 */
export interface AuditEntry {
  userId: string;
  /** Qualified tool name as the caller supplied it */
  toolName: string;
  params: unknown;
  response: unknown;
  status: AuditStatus;
  query?: string | null;
  sessionId?: string | null;
  error?: string | null;
  durationMs?: number;
}

/**
 * Audit record after masking, ready for storage
 */
export interface AuditRecord {
  timestamp: string;
  user_id: string;
  session_id: string | null;
  user_query: string | null;
  tool_name: string;
  /** Masked params as JSON text */
  tool_params: string | null;
  /** Masked response as JSON text */
  response: string | null;
  status: AuditStatus;
  error_message: string | null;
  execution_time_ms: number;
  masking_failed: boolean;
}

/**
 * Audit Sink Interface
 *
 * Implementations: DatabaseAuditSink
 */
export interface AuditSink {
  write(record: AuditRecord): Promise<void>;
}
