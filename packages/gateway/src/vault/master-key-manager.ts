/**
 * Master Key Manager
 *
 * Priority order for master key loading:
 * 1. Configured key (vault.master_key), then TOOLGATE_MASTER_KEY (64 hex chars)
 * 2. File: {dataDir}/credential_master_key
 * 3. Auto-generate: create a new key and save it to the file (mode 0600)
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { VaultError, logger } from '@toolgate/core';
import { MASTER_KEY_LENGTH } from './credential-vault.js';

export const MASTER_KEY_ENV = 'TOOLGATE_MASTER_KEY';
export const MASTER_KEY_FILE = 'credential_master_key';

const HEX_KEY = /^[0-9a-f]{64}$/i;

export interface MasterKeyManagerOptions {
  dataDir: string;
  /** Explicit key from configuration; takes precedence over the environment */
  configuredKey?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export class MasterKeyManager {
  private readonly dataDir: string;
  private readonly configuredKey?: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: MasterKeyManagerOptions) {
    this.dataDir = options.dataDir;
    this.configuredKey = options.configuredKey;
    this.env = options.env ?? process.env;
  }

  get keyPath(): string {
    return path.join(this.dataDir, MASTER_KEY_FILE);
  }

  /**
   * Load or generate the master key
   *
   * @throws VaultError if a supplied key is not 64 hex characters
   */
  loadMasterKey(): Buffer {
    const explicit = this.configuredKey || this.env[MASTER_KEY_ENV];
    if (explicit) {
      logger.info(this.configuredKey ? '[vault] Master key loaded from configuration' : '[vault] Master key loaded from environment');
      return parseHexKey(explicit, this.configuredKey ? 'vault.master_key' : MASTER_KEY_ENV);
    }

    if (fs.existsSync(this.keyPath)) {
      const keyHex = fs.readFileSync(this.keyPath, 'utf8').trim();
      logger.info('[vault] Master key loaded from file');
      return parseHexKey(keyHex, this.keyPath);
    }

    const newKey = crypto.randomBytes(MASTER_KEY_LENGTH);
    this.saveMasterKey(newKey);
    logger.info('[vault] Generated new master key and saved to file');
    return newKey;
  }

  /**
   * Write a master key to the key file atomically (temp + rename)
   */
  saveMasterKey(key: Buffer): void {
    if (key.length !== MASTER_KEY_LENGTH) {
      throw new VaultError(`Master key must be ${MASTER_KEY_LENGTH} bytes`);
    }

    fs.mkdirSync(this.dataDir, { recursive: true, mode: 0o700 });
    const tmpPath = `${this.keyPath}.tmp`;
    fs.writeFileSync(tmpPath, key.toString('hex'), { mode: 0o600 });
    fs.renameSync(tmpPath, this.keyPath);
  }
}

function parseHexKey(value: string, source: string): Buffer {
  if (!HEX_KEY.test(value)) {
    throw new VaultError(`${source} must be 64 hex characters (32 bytes)`, 'invalid_master_key');
  }
  return Buffer.from(value, 'hex');
}
