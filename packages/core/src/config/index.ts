/**
 * Configuration loader with secrets resolution
 *
 * Implements ${ENV:VAR} and ${file:path} resolution with startup validation.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import {
  ToolgateConfigSchema,
  CREDENTIAL_FIELD_PATTERNS,
  isCredentialField,
  type ToolgateConfig,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, ToolgateError } from '../utils/errors.js';

export * from './schema.js';

/**
 * Configuration loading options
 */
export interface ConfigLoadOptions {
  /** Additional credential field patterns (beyond defaults) */
  additional_credential_patterns?: string[];
  /** Enforcement mode: warn or block on literal secrets */
  enforcement?: 'warn' | 'block';
  /** Base directory for ${file:} resolution (default: config file directory) */
  secrets_base_dir?: string;
}

const MAX_CONFIG_BYTES = 1024 * 1024;
const ENV_REFERENCE = /^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/;
const FILE_REFERENCE = /^\$\{file:(.+)\}$/;

/**
 * Load configuration from YAML file with secrets resolution
 *
 * @throws ConfigurationError if the file is unreadable, invalid, or holds literal secrets (block mode)
 */
export async function loadConfig(
  configPath: string,
  options: ConfigLoadOptions = {}
): Promise<ToolgateConfig> {
  const { additional_credential_patterns = [], enforcement = 'block', secrets_base_dir } = options;

  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(`Config file ${configPath} exceeds 1MB size limit`, 'config_too_large');
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const rawConfig: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const patterns = [...CREDENTIAL_FIELD_PATTERNS, ...additional_credential_patterns];
    const baseDir = secrets_base_dir || path.dirname(path.resolve(configPath));
    const resolved = await resolveSecrets(rawConfig, patterns, enforcement, baseDir);

    const config = parseConfig(resolved);
    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof ToolgateError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Validate an already-resolved config object and apply defaults
 */
export function parseConfig(raw: unknown): ToolgateConfig {
  try {
    return ToolgateConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, 'config_invalid');
    }
    throw error;
  }
}

/**
 * Resolve ${ENV:VAR} and ${file:path} references in config
 */
async function resolveSecrets(
  value: unknown,
  patterns: string[],
  enforcement: 'warn' | 'block',
  baseDir: string
): Promise<unknown> {
  if (typeof value === 'string') {
    const envMatch = ENV_REFERENCE.exec(value);
    if (envMatch?.[1]) {
      const resolved = process.env[envMatch[1]];
      if (resolved === undefined) {
        throw new ConfigurationError(
          `Environment variable ${envMatch[1]} not found`,
          'config_resolution_error'
        );
      }
      return resolved;
    }

    const fileMatch = FILE_REFERENCE.exec(value);
    if (fileMatch?.[1]) {
      return resolveFileReference(fileMatch[1], baseDir);
    }

    return value;
  }

  if (Array.isArray(value)) {
    return Promise.all(value.map(item => resolveSecrets(item, patterns, enforcement, baseDir)));
  }

  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (typeof child === 'string' && isCredentialField(key, patterns)) {
        checkCredentialLiteral(key, child, enforcement);
      }
      resolved[key] = await resolveSecrets(child, patterns, enforcement, baseDir);
    }
    return resolved;
  }

  return value;
}

function checkCredentialLiteral(key: string, value: string, enforcement: 'warn' | 'block'): void {
  if (ENV_REFERENCE.test(value) || FILE_REFERENCE.test(value)) {
    return;
  }

  const message = value.startsWith('${')
    ? `Credential field '${key}' has unresolved reference: ${value}`
    : `Credential field '${key}' contains literal value - use \${ENV:VAR} or \${file:path}`;

  if (enforcement === 'block') {
    throw new ConfigurationError(message, 'literal_secret_detected');
  }
  logger.warn(`[config] ${message}`);
}

/**
 * Resolve ${file:path} reference, contained in the secrets base directory
 */
async function resolveFileReference(filePath: string, baseDir: string): Promise<string> {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(baseDir, filePath);

  let realPath: string;
  let realBase: string;
  try {
    realPath = await fs.realpath(absolutePath);
    realBase = await fs.realpath(baseDir);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read secret file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'file_resolution_error'
    );
  }

  if (!realPath.startsWith(realBase + path.sep) && realPath !== realBase) {
    throw new ConfigurationError(
      `Secret file path escapes allowed directory: ${filePath}`,
      'path_traversal_blocked'
    );
  }

  const stats = await fs.stat(realPath);
  if (stats.size > MAX_CONFIG_BYTES) {
    throw new ConfigurationError(`Secret file ${realPath} exceeds 1MB`, 'file_too_large');
  }

  const mode = stats.mode & 0o777;
  if (mode > 0o600) {
    logger.warn(
      `[config] Secret file ${realPath} has permissive permissions (${mode.toString(8)}) - should be 0600 or 0400`
    );
  }

  const content = await fs.readFile(realPath, 'utf-8');
  return content.trim();
}
