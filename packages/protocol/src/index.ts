/**
 * @toolgate/protocol
 *
 * Contract shared by the gateway, its backend clients and the
 * layers that call it. Runtime code is limited to qualified-name parsing
 * and weekday checks.
 */

/**
 * Separator between backend kind and tool name in a qualified tool name
 */
export const TOOL_NAME_SEPARATOR = '.';

/**
 * Backend kind enum-like string (e.g. "sql", "docs", "calendar")
 */
export type BackendKind = string;

/**
 * JSON Schema describing a tool's parameters
 */
export type ParameterSchema = Record<string, unknown>;

/**
 * Tool definition as advertised by a backend client
 */
export interface ToolDefinition {
  /** Tool name local to its backend (e.g. "list_tables") */
  name: string;
  description: string;
  parameters: ParameterSchema;
}

/**
 * Tool definition exposed to callers of the gateway
 *
 * `name` is fully qualified ("sql.list_tables"), `description` is prefixed
 * with the owning connection's display name.
 */
export interface QualifiedToolDefinition extends ToolDefinition {
  connection_id: string;
}

/**
 * Parsed form of a "<kind>.<tool>" string
 */
export interface QualifiedToolName {
  kind: BackendKind;
  tool: string;
}

/**
 * Result returned by a backend client for one tool call
 */
export interface BackendCallResult {
  success: boolean;
  data: unknown;
  error: string | null;
}

/**
 * Result returned by the gateway for one tool call
 */
export interface ToolCallResult extends BackendCallResult {
  /** Wall-clock time of the backend call only (0 when no backend was called) */
  execution_time_ms: number;
}

/**
 * Audit outcome for one tool-call attempt
 */
export type AuditStatus = 'success' | 'fail' | 'denied';

/**
 * Policy row kind
 */
export type PermissionKind = 'allowed' | 'blocked' | 'approval_required';

/**
 * Weekday names accepted in time restrictions (UTC)
 */
export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export function isWeekday(value: unknown): value is Weekday {
  return WEEKDAYS.some(day => day === value);
}

/**
 * Time-of-day / day-of-week restriction attached to a policy row
 */
export interface TimeRestrictions {
  /** Allowed UTC hours, 0-23 */
  allowed_hours?: number[];
  /** Allowed UTC weekdays */
  allowed_days?: Weekday[];
}

/**
 * Rate limit descriptor (stored, not enforced)
 */
export interface RateLimitDescriptor {
  max_calls_per_hour?: number;
  max_calls_per_day?: number;
}

/**
 * Outcome of a permission check
 */
export interface PolicyDecision {
  allowed: boolean;
  reason: string | null;
}

/**
 * Connection health-check status
 */
export type HealthStatus = 'success' | 'failed';

/**
 * Split a qualified tool name into kind and tool
 *
 * Returns null unless the name contains exactly one separator with a
 * non-empty kind and tool on either side.
 */
export function splitQualifiedName(qualifiedName: string): QualifiedToolName | null {
  const parts = qualifiedName.split(TOOL_NAME_SEPARATOR);
  if (parts.length !== 2) {
    return null;
  }
  const [kind, tool] = parts;
  if (!kind || !tool) {
    return null;
  }
  return { kind, tool };
}

/**
 * Build "<kind>.<tool>"
 */
export function formatQualifiedName(kind: BackendKind, tool: string): string {
  return `${kind}${TOOL_NAME_SEPARATOR}${tool}`;
}
