/**
 * Tool permission evaluator
 *
 * Decides whether a user may call one tool on one connection from the
 * tool_permissions row for that triple. First matching rule wins:
 * 1. No row: allow
 * 2. blocked: deny
 * 3. approval_required: deny
 * 4. Expired: deny
 * 5. Outside allowed_hours / allowed_days (UTC): deny
 * 6. Param constraints and rate limits: stored, not yet enforced
 * 7. Allow
 */

import type { PolicyDecision, Weekday } from '@toolgate/protocol';
import {
  getToolPermission,
  logger,
  type DatabaseClient,
  type PermissionEvaluator,
  type ToolPermission,
} from '@toolgate/core';

// Indexed by Date#getUTCDay()
const UTC_DAY_NAMES: readonly Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
];

const ALLOW: PolicyDecision = { allowed: true, reason: null };

function deny(reason: string): PolicyDecision {
  return { allowed: false, reason };
}

export interface ToolPermissionEvaluatorOptions {
  /** Current time source (default: system clock) */
  clock?: () => Date;
}

export class ToolPermissionEvaluator implements PermissionEvaluator {
  private readonly clock: () => Date;

  constructor(
    private readonly db: DatabaseClient,
    options: ToolPermissionEvaluatorOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async check(
    userId: string,
    connectionId: string,
    toolName: string,
    params?: Record<string, unknown>
  ): Promise<PolicyDecision> {
    const permission = await getToolPermission(this.db, userId, connectionId, toolName);
    return evaluatePermission(permission, toolName, this.clock(), params);
  }
}

/**
 * Apply the policy rules to one (possibly absent) permission row
 */
export function evaluatePermission(
  permission: ToolPermission | null,
  toolName: string,
  now: Date,
  params?: Record<string, unknown>
): PolicyDecision {
  if (!permission) {
    return ALLOW;
  }

  if (permission.permission_kind === 'blocked') {
    return deny(`Tool '${toolName}' is blocked`);
  }

  if (permission.permission_kind === 'approval_required') {
    return deny(`Tool '${toolName}' requires administrator approval`);
  }

  if (isExpired(permission.expires_at, now)) {
    return deny(`Permission for tool '${toolName}' has expired`);
  }

  if (!isWithinTimeRestrictions(permission, now)) {
    return deny(`Tool '${toolName}' is not available at this time`);
  }

  if (permission.param_constraints && params && Object.keys(params).length > 0) {
    logger.debug(`[authz:local] Param constraints on ${toolName} are not yet enforced`);
  }

  if (permission.rate_limit) {
    logger.debug(`[authz:local] Rate limit on ${toolName} is not yet enforced`);
  }

  return ALLOW;
}

function isExpired(expiresAt: string | null, now: Date): boolean {
  if (!expiresAt) {
    return false;
  }
  const expiry = Date.parse(expiresAt);
  // An unreadable expiry never grants access
  return Number.isNaN(expiry) || expiry < now.getTime();
}

function isWithinTimeRestrictions(permission: ToolPermission, now: Date): boolean {
  const restrictions = permission.time_restrictions;
  if (!restrictions) {
    return true;
  }

  if (restrictions.allowed_hours && !restrictions.allowed_hours.includes(now.getUTCHours())) {
    return false;
  }

  const today = UTC_DAY_NAMES[now.getUTCDay()];
  if (restrictions.allowed_days && (!today || !restrictions.allowed_days.includes(today))) {
    return false;
  }

  return true;
}
