/**
 * Tool Gateway
 *
 * Per-user dispatcher: routes "<kind>.<tool>" calls to the first enabled
 * connection of that kind, checks policy, times the backend call and writes
 * exactly one audit record for every call whose name parses.
 */

import {
  formatQualifiedName,
  splitQualifiedName,
  type AuditStatus,
  type PolicyDecision,
  type QualifiedToolDefinition,
  type ToolCallResult,
  type ToolDefinition,
} from '@toolgate/protocol';
import {
  CancelledError,
  NameFormatError,
  NoConnectionError,
  cancelledBy,
  errorMessage,
  logger,
  withAbort,
  type AuditPipeline,
  type BackendClient,
  type Connection,
  type PermissionEvaluator,
} from '@toolgate/core';

export interface ToolGatewayOptions {
  evaluator: PermissionEvaluator;
  audit: AuditPipeline;
  /** Default timeout per backend call; 0 or absent disables */
  callTimeoutMs?: number;
}

export interface CallToolOptions {
  /** Natural-language request that led to the call, stored with the audit record */
  query?: string | null;
  sessionId?: string | null;
  signal?: AbortSignal;
  /** Overrides the gateway default for this call */
  timeoutMs?: number;
}

interface RegisteredConnection {
  connection: Connection;
  client: BackendClient;
  tools: ToolDefinition[];
}

function failure(error: string, executionTimeMs = 0): ToolCallResult {
  return { success: false, data: null, error, execution_time_ms: executionTimeMs };
}

export class ToolGateway {
  // Insertion order is registration order
  private readonly registered = new Map<string, RegisteredConnection>();
  private readonly evaluator: PermissionEvaluator;
  private readonly audit: AuditPipeline;
  private readonly callTimeoutMs: number;

  constructor(options: ToolGatewayOptions) {
    this.evaluator = options.evaluator;
    this.audit = options.audit;
    this.callTimeoutMs = options.callTimeoutMs ?? 0;
  }

  registerConnection(connection: Connection, client: BackendClient, tools: ToolDefinition[]): void {
    if (this.registered.has(connection.connection_id)) {
      logger.warn(`[gateway] Connection ${connection.connection_id} already registered, replacing`);
    }
    this.registered.set(connection.connection_id, { connection, client, tools });
    logger.debug(`[gateway] Registered ${connection.kind} connection "${connection.name}" (${tools.length} tools)`);
  }

  /**
   * Remove a connection and disconnect its client
   *
   * @returns false if the connection was not registered
   */
  async unregisterConnection(connectionId: string): Promise<boolean> {
    const entry = this.registered.get(connectionId);
    if (!entry) {
      return false;
    }
    this.registered.delete(connectionId);
    await this.disconnect(entry);
    return true;
  }

  getConnections(): Connection[] {
    return [...this.registered.values()].map(entry => entry.connection);
  }

  listTools(): QualifiedToolDefinition[] {
    const tools: QualifiedToolDefinition[] = [];
    for (const { connection, tools: backendTools } of this.registered.values()) {
      if (!connection.enabled) continue;
      for (const tool of backendTools) {
        tools.push({
          name: formatQualifiedName(connection.kind, tool.name),
          description: `[${connection.name}] ${tool.description}`,
          parameters: tool.parameters,
          connection_id: connection.connection_id,
        });
      }
    }
    return tools;
  }

  async callTool(
    qualifiedName: string,
    params: Record<string, unknown>,
    userId: string,
    options: CallToolOptions = {}
  ): Promise<ToolCallResult> {
    const parsed = splitQualifiedName(qualifiedName);
    if (!parsed) {
      const error = new NameFormatError(qualifiedName);
      logger.debug(`[gateway] ${error.message}`);
      return failure(error.message);
    }

    const audit = (status: AuditStatus, response: unknown, error: string | null, durationMs = 0) =>
      this.audit.record({
        userId,
        toolName: qualifiedName,
        params,
        response,
        status,
        query: options.query,
        sessionId: options.sessionId,
        error,
        durationMs,
      });

    const target = this.resolve(parsed.kind);
    if (!target) {
      const error = new NoConnectionError(parsed.kind).message;
      await audit('fail', null, error);
      return failure(error);
    }

    const decision = await this.checkPolicy(userId, target.connection, parsed.tool, params);
    if (!decision.allowed) {
      const reason = decision.reason ?? `Tool '${parsed.tool}' is not permitted`;
      logger.info(`[gateway] Denied ${qualifiedName} for user ${userId}: ${reason}`);
      await audit('denied', null, reason);
      return failure(reason);
    }

    const timeoutMs = options.timeoutMs ?? this.callTimeoutMs;
    const { signal, dispose } = linkSignal(options.signal, timeoutMs);
    const started = performance.now();

    try {
      if (signal.aborted) {
        throw cancelledBy(signal);
      }
      const result = await withAbort(target.client.callTool(parsed.tool, params, { signal }), signal);
      const elapsed = performance.now() - started;

      await audit(result.success ? 'success' : 'fail', result.data, result.error, elapsed);
      return { ...result, execution_time_ms: Math.round(elapsed) };
    } catch (error) {
      const elapsed = performance.now() - started;
      const message = errorMessage(error);

      if (error instanceof CancelledError) {
        logger.warn(`[gateway] ${qualifiedName} cancelled after ${Math.round(elapsed)}ms`);
      } else {
        logger.error({ err: error }, `[gateway] ${qualifiedName} raised`);
      }

      await audit('fail', null, message, elapsed);
      return failure(message, Math.round(elapsed));
    } finally {
      dispose();
    }
  }

  /**
   * Disconnect every client and forget all connections
   */
  async close(): Promise<void> {
    const entries = [...this.registered.values()];
    this.registered.clear();
    await Promise.all(entries.map(entry => this.disconnect(entry)));
  }

  private resolve(kind: string): RegisteredConnection | undefined {
    for (const entry of this.registered.values()) {
      if (entry.connection.kind === kind && entry.connection.enabled) {
        return entry;
      }
    }
    return undefined;
  }

  private async checkPolicy(
    userId: string,
    connection: Connection,
    tool: string,
    params: Record<string, unknown>
  ): Promise<PolicyDecision> {
    try {
      return await this.evaluator.check(userId, connection.connection_id, tool, params);
    } catch (error) {
      // Fail open
      logger.warn(
        `[gateway] Permission check failed for ${connection.kind}.${tool}, allowing: ${errorMessage(error)}`
      );
      return { allowed: true, reason: null };
    }
  }

  private async disconnect(entry: RegisteredConnection): Promise<void> {
    try {
      await entry.client.disconnect();
    } catch (error) {
      logger.warn(`[gateway] Disconnect failed for "${entry.connection.name}": ${errorMessage(error)}`);
    }
  }
}

/**
 * Combine the caller's signal with a timeout into one signal for the backend
 */
function linkSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onCallerAbort = () => {
    const reason: unknown = callerSignal?.reason;
    controller.abort(reason instanceof Error || typeof reason === 'string' ? reason : 'aborted by caller');
  };

  if (callerSignal?.aborted) {
    onCallerAbort();
  } else {
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  const timer =
    timeoutMs > 0 && Number.isFinite(timeoutMs)
      ? setTimeout(() => controller.abort(`timed out after ${timeoutMs}ms`), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    },
  };
}
