/**
 * Configuration schema (Zod)
 *
 * Validates toolgate.yaml structure with type-safe config object.
 */

import { z } from 'zod';

// ===== Database =====

const DatabaseConfigSchema = z.object({
  /** SQLite file path, or ':memory:' */
  url: z.string().min(1),
  enable_wal: z.boolean().default(true),
});

// ===== Credential vault =====

const VaultConfigSchema = z
  .object({
    /** 64 hex chars; falls back to TOOLGATE_MASTER_KEY, then the key file */
    master_key: z.string().optional(),
    /** Directory holding credential_master_key when no key is configured */
    data_dir: z.string().default('./data'),
  })
  .default({});

// ===== Gateway dispatcher =====

const GatewayConfigSchema = z
  .object({
    /** Timeout applied to each backend call, 0 disables */
    call_timeout_ms: z.number().int().min(0).default(30000),
  })
  .default({});

// ===== Audit pipeline =====

const AuditConfigSchema = z
  .object({
    /** JSONL file receiving records the database could not store */
    spill_path: z.string().default('./data/audit-spill.jsonl'),
  })
  .default({});

// ===== Backend clients =====

const SqlBackendConfigSchema = z
  .object({
    pool_size: z.number().int().min(1).max(100).default(5),
    acquire_timeout_ms: z.number().int().min(100).default(10000),
    connect_timeout_ms: z.number().int().min(100).default(10000),
  })
  .default({});

const BackendsConfigSchema = z
  .object({
    sql: SqlBackendConfigSchema,
  })
  .default({});

// ===== Root Configuration Schema =====

export const ToolgateConfigSchema = z.object({
  database: DatabaseConfigSchema,
  vault: VaultConfigSchema,
  gateway: GatewayConfigSchema,
  audit: AuditConfigSchema,
  backends: BackendsConfigSchema,
});

export type ToolgateConfig = z.infer<typeof ToolgateConfigSchema>;
export type SqlBackendSettings = z.infer<typeof SqlBackendConfigSchema>;

// ===== Credential field patterns =====

export const CREDENTIAL_FIELD_PATTERNS = [
  'password',
  'secret',
  'token',
  'key',
  'credential',
  'passphrase',
] as const;

/**
 * Check if a config key is likely a credential field
 */
export function isCredentialField(key: string, patterns: readonly string[] = CREDENTIAL_FIELD_PATTERNS): boolean {
  const lowerKey = key.toLowerCase();
  return patterns.some(pattern => lowerKey.includes(pattern));
}
