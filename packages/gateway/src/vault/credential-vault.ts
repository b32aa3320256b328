/**
 * Credential Vault
 *
 * Encrypts connection credentials with AES-256-GCM under a key derived
 * from the process-wide master key.
 *
 * Ciphertext format: "v1:" + base64(iv[12] || ciphertext || tag[16])
 */

import crypto from 'crypto';
import { CredentialMapSchema, DecryptionError, VaultError, logger } from '@toolgate/core';

const HKDF_INFO = 'toolgate-credential-vault-v1';
const VERSION_PREFIX = 'v1:';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const MASTER_KEY_LENGTH = 32;

export class CredentialVault {
  private key: Buffer;

  constructor(masterKey: Buffer) {
    this.key = CredentialVault.deriveKey(masterKey);
  }

  /**
   * Derive the data key with HKDF-SHA256
   */
  private static deriveKey(masterKey: Buffer): Buffer {
    if (masterKey.length !== MASTER_KEY_LENGTH) {
      throw new VaultError(`Master key must be ${MASTER_KEY_LENGTH} bytes`);
    }
    return Buffer.from(crypto.hkdfSync('sha256', masterKey, Buffer.alloc(0), HKDF_INFO, 32));
  }

  /**
   * Encrypt a credential map into an opaque string
   */
  encrypt(credentials: Record<string, string>): string {
    const plaintext = JSON.stringify(credentials);
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return VERSION_PREFIX + Buffer.concat([iv, encrypted, tag]).toString('base64');
  }

  /**
   * Decrypt an opaque string produced by encrypt()
   *
   * @throws DecryptionError for anything this vault did not produce under
   *   its current key, and for payloads that are not a string map
   */
  decrypt(opaque: string): Record<string, string> {
    if (!opaque.startsWith(VERSION_PREFIX)) {
      throw new DecryptionError('Unsupported credential format');
    }

    const encoded = opaque.slice(VERSION_PREFIX.length);
    if (!BASE64.test(encoded)) {
      throw new DecryptionError('Malformed credential ciphertext');
    }

    const combined = Buffer.from(encoded, 'base64');
    if (combined.length <= IV_LENGTH + TAG_LENGTH) {
      throw new DecryptionError('Credential ciphertext is truncated');
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const ciphertext = combined.subarray(IV_LENGTH, combined.length - TAG_LENGTH);
    const tag = combined.subarray(combined.length - TAG_LENGTH);

    let plaintext: string;
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, iv);
      decipher.setAuthTag(tag);
      plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      throw new DecryptionError();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext);
    } catch {
      throw new DecryptionError('Decrypted credentials are not valid JSON');
    }

    const result = CredentialMapSchema.safeParse(parsed);
    if (!result.success) {
      throw new DecryptionError('Decrypted credentials are not a string map');
    }
    return result.data;
  }

  /**
   * Re-encrypt a value for a new master key
   */
  reEncrypt(opaque: string, newMasterKey: Buffer): string {
    return new CredentialVault(newMasterKey).encrypt(this.decrypt(opaque));
  }

  /**
   * Switch a live vault to a new master key after rotation
   */
  updateMasterKey(newMasterKey: Buffer): void {
    this.key = CredentialVault.deriveKey(newMasterKey);
    logger.info('[vault] Master key updated in live instance');
  }
}
