/**
 * Connection Service
 *
 * Owner-scoped CRUD for backend connections. Credentials are encrypted by
 * the vault before they reach the database and only decrypted when a
 * client is built. Every mutation notifies the change listeners so cached
 * gateways are rebuilt.
 */

import { z } from 'zod';
import type { ToolDefinition } from '@toolgate/protocol';
import {
  BackendKindSchema,
  ConflictError,
  ConnectionNameSchema,
  CredentialMapSchema,
  NotFoundError,
  ValidationError,
  createConnection,
  deleteConnection,
  errorMessage,
  getConnectionById,
  getConnectionByName,
  listConnectionsForOwner,
  logger,
  recordHealthCheck,
  updateConnection,
  validateInput,
  type BackendSettings,
  type Connection,
  type ConnectionUpdate,
  type DatabaseClient,
} from '@toolgate/core';
import type { CredentialVault } from '../vault/credential-vault.js';
import type { BackendRegistry } from '../backends/registry.js';

const ConnectionConfigSchema = z.record(z.unknown());

const CreateConnectionSchema = z.object({
  ownerId: z.string().min(1),
  kind: BackendKindSchema,
  name: ConnectionNameSchema,
  description: z.string().max(1000).nullable().optional(),
  config: ConnectionConfigSchema.optional(),
  credentials: CredentialMapSchema.optional(),
  enabled: z.boolean().optional(),
});

const UpdateConnectionSchema = z.object({
  name: ConnectionNameSchema.optional(),
  description: z.string().max(1000).nullable().optional(),
  config: ConnectionConfigSchema.optional(),
  /** null or an empty map removes stored credentials */
  credentials: CredentialMapSchema.nullable().optional(),
  enabled: z.boolean().optional(),
});

export type CreateConnectionInput = z.input<typeof CreateConnectionSchema>;
export type UpdateConnectionInput = z.input<typeof UpdateConnectionSchema>;

export interface ConnectionTestResult {
  success: boolean;
  message: string;
  tools: string[];
}

export type ConnectionsChangedListener = (ownerId: string) => Promise<void> | void;

/**
 * What the gateway pool needs to build a user's gateway
 */
export interface ConnectionSource {
  getUserConnections(ownerId: string, activeOnly?: boolean): Promise<Connection[]>;
  getDecryptedCredentials(connection: Connection): Record<string, string>;
}

export class ConnectionService implements ConnectionSource {
  private readonly listeners: ConnectionsChangedListener[] = [];

  constructor(
    private readonly db: DatabaseClient,
    private readonly vault: CredentialVault,
    private readonly registry: BackendRegistry,
    private readonly settings: BackendSettings
  ) {}

  onConnectionsChanged(listener: ConnectionsChangedListener): void {
    this.listeners.push(listener);
  }

  /**
   * @throws ValidationError for malformed input or an unregistered kind
   * @throws ConflictError if the owner already has a connection with this name
   */
  async createConnection(input: CreateConnectionInput): Promise<Connection> {
    const data = validateInput(CreateConnectionSchema, input, 'connection');

    if (!this.registry.has(data.kind)) {
      throw new ValidationError(`Unsupported backend kind: ${data.kind}`, { kind: data.kind });
    }

    if (await getConnectionByName(this.db, data.ownerId, data.name)) {
      throw new ConflictError(`Connection name already exists: ${data.name}`, { name: data.name });
    }

    const connection = await createConnection(this.db, {
      owner_id: data.ownerId,
      kind: data.kind,
      name: data.name,
      description: data.description ?? null,
      config: data.config ?? {},
      encrypted_credentials: this.encrypt(data.credentials),
      enabled: data.enabled ?? true,
    });

    await this.notify(data.ownerId);
    return connection;
  }

  async getUserConnections(ownerId: string, activeOnly = true): Promise<Connection[]> {
    return listConnectionsForOwner(this.db, ownerId, { activeOnly });
  }

  async getConnection(ownerId: string, connectionId: string): Promise<Connection | null> {
    return getConnectionById(this.db, connectionId, ownerId);
  }

  /**
   * @throws NotFoundError if the owner has no such connection
   * @throws ConflictError if renaming onto another connection's name
   */
  async updateConnection(ownerId: string, connectionId: string, input: UpdateConnectionInput): Promise<Connection> {
    const data = validateInput(UpdateConnectionSchema, input, 'connection update');
    const existing = await this.requireConnection(ownerId, connectionId);

    if (data.name !== undefined && data.name !== existing.name) {
      if (await getConnectionByName(this.db, ownerId, data.name)) {
        throw new ConflictError(`Connection name already exists: ${data.name}`, { name: data.name });
      }
    }

    const updates: ConnectionUpdate = {
      name: data.name,
      description: data.description,
      config: data.config,
      enabled: data.enabled,
    };
    if (data.credentials !== undefined) {
      updates.encrypted_credentials = this.encrypt(data.credentials ?? undefined);
    }

    const updated = await updateConnection(this.db, connectionId, ownerId, updates);
    if (!updated) {
      throw new NotFoundError(`Connection not found: ${connectionId}`, { connection_id: connectionId });
    }

    await this.notify(ownerId);
    return updated;
  }

  /**
   * @returns false if the owner has no such connection
   */
  async deleteConnection(ownerId: string, connectionId: string): Promise<boolean> {
    const deleted = await deleteConnection(this.db, connectionId, ownerId);
    if (deleted) {
      await this.notify(ownerId);
    }
    return deleted;
  }

  /**
   * @throws DecryptionError if the stored ciphertext does not decrypt under the current key
   */
  getDecryptedCredentials(connection: Connection): Record<string, string> {
    if (!connection.encrypted_credentials) {
      return {};
    }
    return this.vault.decrypt(connection.encrypted_credentials);
  }

  /**
   * Connect with a throwaway client, list its tools and store the outcome
   */
  async testConnection(ownerId: string, connectionId: string): Promise<ConnectionTestResult> {
    const connection = await this.requireConnection(ownerId, connectionId);

    let result: ConnectionTestResult;
    try {
      const client = this.registry.create({
        connection,
        credentials: this.getDecryptedCredentials(connection),
        settings: this.settings,
      });

      let tools: ToolDefinition[] = [];
      let connected = false;
      try {
        connected = await client.connect();
        if (connected) {
          tools = await client.listTools();
        }
      } finally {
        await client.disconnect();
      }

      result = connected
        ? { success: true, message: 'Connection succeeded', tools: tools.map(tool => tool.name) }
        : { success: false, message: `Could not connect to "${connection.name}"`, tools: [] };
    } catch (error) {
      result = { success: false, message: errorMessage(error), tools: [] };
    }

    await recordHealthCheck(
      this.db,
      connectionId,
      ownerId,
      result.success ? 'success' : 'failed',
      result.success ? null : result.message
    );
    logger.info(`[connections] Tested "${connection.name}": ${result.success ? 'success' : result.message}`);
    return result;
  }

  private async requireConnection(ownerId: string, connectionId: string): Promise<Connection> {
    const connection = await getConnectionById(this.db, connectionId, ownerId);
    if (!connection) {
      throw new NotFoundError(`Connection not found: ${connectionId}`, { connection_id: connectionId });
    }
    return connection;
  }

  private encrypt(credentials: Record<string, string> | undefined): string | null {
    if (!credentials || Object.keys(credentials).length === 0) {
      return null;
    }
    return this.vault.encrypt(credentials);
  }

  private async notify(ownerId: string): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(ownerId);
      } catch (error) {
        logger.warn(`[connections] Change listener failed for owner ${ownerId}: ${errorMessage(error)}`);
      }
    }
  }
}
