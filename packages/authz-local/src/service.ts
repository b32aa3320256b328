/**
 * Tool permission administration
 *
 * Create, replace, list and delete per-user tool policy rows. Inputs are
 * validated before they reach the database.
 */

import { z } from 'zod';
import type { PermissionKind } from '@toolgate/protocol';
import {
  bulkUpsertToolPermissions,
  deleteToolPermission,
  findConnection,
  getConnectionById,
  listToolPermissionsForUser,
  logger,
  upsertToolPermission,
  validateInput,
  NotFoundError,
  ParamConstraintsSchema,
  PermissionKindSchema,
  RateLimitSchema,
  TimeRestrictionsSchema,
  type DatabaseClient,
  type ToolPermission,
  type ToolPermissionInput,
} from '@toolgate/core';
import { DEFAULT_TOOL_CATALOG, type ToolCatalog } from './catalog.js';

const ToolNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{1,100}$/, 'tool name must be a local (unqualified) name');

const SetPermissionSchema = z.object({
  user_id: z.string().min(1),
  connection_id: z.string().min(1),
  tool_name: ToolNameSchema,
  permission_kind: PermissionKindSchema,
  created_by: z.string().min(1).nullable().optional(),
  param_constraints: ParamConstraintsSchema.nullable().optional(),
  expires_at: z.string().datetime({ offset: true }).nullable().optional(),
  time_restrictions: TimeRestrictionsSchema.nullable().optional(),
  rate_limit: RateLimitSchema.nullable().optional(),
});

const BulkPermissionsSchema = z.record(ToolNameSchema, PermissionKindSchema);

export type SetPermissionInput = ToolPermissionInput;

export class ToolPermissionService {
  constructor(
    private readonly db: DatabaseClient,
    private readonly catalog: ToolCatalog = DEFAULT_TOOL_CATALOG
  ) {}

  /**
   * Create or replace the policy row for (user, connection, tool)
   *
   * @throws ValidationError on malformed input
   * @throws NotFoundError if the user owns no such connection
   */
  async setPermission(input: SetPermissionInput): Promise<ToolPermission> {
    const data = validateInput(SetPermissionSchema, input, 'permission');
    await this.requireConnection(data.user_id, data.connection_id);

    return upsertToolPermission(this.db, data);
  }

  /**
   * Set the kind of several tools on one connection at once
   */
  async bulkSetPermissions(
    userId: string,
    connectionId: string,
    permissions: Record<string, PermissionKind>,
    createdBy?: string
  ): Promise<ToolPermission[]> {
    const kinds = validateInput(BulkPermissionsSchema, permissions, 'permissions');
    await this.requireConnection(userId, connectionId);

    const rows = bulkUpsertToolPermissions(
      this.db,
      Object.entries(kinds).map(([tool_name, permission_kind]) => ({
        user_id: userId,
        connection_id: connectionId,
        tool_name,
        permission_kind,
        created_by: createdBy ?? null,
      }))
    );

    logger.info(`[authz:local] Bulk set ${rows.length} permissions for user ${userId} on ${connectionId}`);
    return rows;
  }

  /**
   * @returns true if the row existed
   */
  async deletePermission(permissionId: string): Promise<boolean> {
    const deleted = await deleteToolPermission(this.db, permissionId);
    if (deleted) {
      logger.info(`[authz:local] Deleted permission ${permissionId}`);
    }
    return deleted;
  }

  async getUserPermissions(userId: string, connectionId?: string): Promise<ToolPermission[]> {
    return listToolPermissionsForUser(this.db, userId, connectionId);
  }

  /**
   * Default tool names for a connection's kind; empty for unknown connections
   */
  async getConnectionTools(connectionId: string): Promise<string[]> {
    const connection = await findConnection(this.db, connectionId);
    if (!connection) {
      return [];
    }
    return [...(this.catalog[connection.kind] ?? [])];
  }

  private async requireConnection(userId: string, connectionId: string): Promise<void> {
    const connection = await getConnectionById(this.db, connectionId, userId);
    if (!connection) {
      throw new NotFoundError(`Connection not found: ${connectionId}`, { connection_id: connectionId });
    }
  }
}
