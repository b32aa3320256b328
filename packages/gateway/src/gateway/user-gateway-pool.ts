/**
 * User Gateway Pool
 *
 * One ToolGateway per user, built on first use from the user's enabled
 * connections. Concurrent first calls for a user share one in-flight build.
 */

import type { QualifiedToolDefinition, ToolCallResult, ToolDefinition } from '@toolgate/protocol';
import {
  BackendError,
  ServiceUnavailableError,
  errorMessage,
  logger,
  type BackendClient,
  type BackendSettings,
  type Connection,
} from '@toolgate/core';
import type { BackendRegistry } from '../backends/registry.js';
import type { ConnectionSource } from '../services/connection-service.js';
import type { CallToolOptions, ToolGateway } from './tool-gateway.js';

export interface UserGatewayPoolOptions {
  connections: ConnectionSource;
  registry: BackendRegistry;
  settings: BackendSettings;
  /** Builds an empty gateway for one user */
  createGateway: () => ToolGateway;
}

interface PreparedConnection {
  connection: Connection;
  client: BackendClient;
  tools: ToolDefinition[];
}

export class UserGatewayPool {
  private readonly gateways = new Map<string, Promise<ToolGateway>>();
  private readonly connections: ConnectionSource;
  private readonly registry: BackendRegistry;
  private readonly settings: BackendSettings;
  private readonly createGateway: () => ToolGateway;
  private closed = false;

  constructor(options: UserGatewayPoolOptions) {
    this.connections = options.connections;
    this.registry = options.registry;
    this.settings = options.settings;
    this.createGateway = options.createGateway;
  }

  /**
   * Get the user's gateway, building it on first use
   */
  getOrBuild(userId: string): Promise<ToolGateway> {
    const existing = this.gateways.get(userId);
    if (existing) {
      return existing;
    }
    if (this.closed) {
      return Promise.reject(new ServiceUnavailableError('Gateway pool is shut down'));
    }

    const build = this.build(userId);
    this.gateways.set(userId, build);

    // A failed build is evicted so the next call retries
    void build.catch((error: unknown) => {
      if (this.gateways.get(userId) === build) {
        this.gateways.delete(userId);
      }
      logger.error(`[pool] Gateway build failed for user ${userId}: ${errorMessage(error)}`);
    });

    return build;
  }

  has(userId: string): boolean {
    return this.gateways.has(userId);
  }

  get size(): number {
    return this.gateways.size;
  }

  /**
   * Drop the user's gateway and disconnect its clients once any in-flight build settles
   */
  async invalidate(userId: string): Promise<void> {
    const entry = this.gateways.get(userId);
    if (!entry) {
      return;
    }
    this.gateways.delete(userId);

    let gateway: ToolGateway;
    try {
      gateway = await entry;
    } catch (error) {
      logger.debug(`[pool] Invalidated build for user ${userId} had failed: ${errorMessage(error)}`);
      return;
    }

    await gateway.close();
    logger.info(`[pool] Invalidated gateway for user ${userId}`);
  }

  async reload(userId: string): Promise<ToolGateway> {
    await this.invalidate(userId);
    return this.getOrBuild(userId);
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    const userIds = [...this.gateways.keys()];
    await Promise.allSettled(userIds.map(userId => this.invalidate(userId)));
    logger.info(`[pool] Shut down (${userIds.length} gateways closed)`);
  }

  async listTools(userId: string): Promise<QualifiedToolDefinition[]> {
    const gateway = await this.getOrBuild(userId);
    return gateway.listTools();
  }

  async callTool(
    userId: string,
    qualifiedName: string,
    params: Record<string, unknown>,
    options?: CallToolOptions
  ): Promise<ToolCallResult> {
    const gateway = await this.getOrBuild(userId);
    return gateway.callTool(qualifiedName, params, userId, options);
  }

  private async build(userId: string): Promise<ToolGateway> {
    const connections = await this.connections.getUserConnections(userId, true);
    const gateway = this.createGateway();

    // Connect in parallel, register in listing order
    const results = await Promise.allSettled(connections.map(connection => this.prepare(connection)));

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        gateway.registerConnection(result.value.connection, result.value.client, result.value.tools);
      } else {
        const connection = connections[index];
        logger.warn(
          `[pool] Skipping connection "${connection?.name ?? index}" for user ${userId}: ${errorMessage(result.reason)}`
        );
      }
    });

    logger.info(
      `[pool] Built gateway for user ${userId}: ${gateway.getConnections().length}/${connections.length} connections`
    );
    return gateway;
  }

  private async prepare(connection: Connection): Promise<PreparedConnection> {
    const client = this.registry.create({
      connection,
      credentials: this.connections.getDecryptedCredentials(connection),
      settings: this.settings,
    });

    try {
      if (!(await client.connect())) {
        throw new BackendError(`Could not connect to "${connection.name}"`);
      }
      const tools = await client.listTools();
      return { connection, client, tools };
    } catch (error) {
      await client.disconnect().catch((disconnectError: unknown) => {
        logger.debug(`[pool] Disconnect after failed connect: ${errorMessage(disconnectError)}`);
      });
      throw error;
    }
  }
}
