/**
 * Audit spill file
 *
 * Append-only JSONL file receiving audit records the sink could not store.
 * Opened lazily with mode 0600; symlinks are rejected.
 */

import fs from 'fs/promises';
import path from 'path';
import type { AuditRecord } from '../spi/index.js';
import { logger } from '../utils/logger.js';

export interface AuditSpillConfig {
  /** Spill file path (default: ./data/audit-spill.jsonl) */
  spill_path: string;
  /** Maximum spill file size in bytes (default: 100MB) */
  max_spill_size_bytes?: number;
}

export class AuditSpillFile {
  private fileHandle?: fs.FileHandle;
  private fileSize = 0;
  private readonly maxSize: number;
  // Serializes appends so concurrent records never interleave
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly config: AuditSpillConfig) {
    this.maxSize = config.max_spill_size_bytes ?? 100 * 1024 * 1024;
  }

  get path(): string {
    return this.config.spill_path;
  }

  /**
   * Append one record; rejects if the record could not be written
   */
  append(record: AuditRecord): Promise<void> {
    const next = this.queue.then(() => this.write(record));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(record: AuditRecord): Promise<void> {
    const handle = await this.open();

    const line = JSON.stringify(record) + '\n';
    const bytes = Buffer.byteLength(line, 'utf-8');
    if (this.fileSize + bytes > this.maxSize) {
      throw new Error(`Spill file size limit reached (${this.maxSize} bytes)`);
    }

    await handle.write(line);
    this.fileSize += bytes;
  }

  private async open(): Promise<fs.FileHandle> {
    if (this.fileHandle) {
      return this.fileHandle;
    }

    const spillPath = this.config.spill_path;
    await fs.mkdir(path.dirname(spillPath), { recursive: true });

    try {
      const stats = await fs.lstat(spillPath);
      if (stats.isSymbolicLink()) {
        throw new Error('Spill file is a symlink - rejecting');
      }
      this.fileSize = stats.size;
    } catch (error: unknown) {
      if (!(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
      this.fileSize = 0;
    }

    this.fileHandle = await fs.open(spillPath, 'a', 0o600);
    logger.info(`[audit] Opened spill file: ${spillPath} (mode 0600)`);
    return this.fileHandle;
  }

  async close(): Promise<void> {
    await this.queue;
    if (this.fileHandle) {
      await this.fileHandle.close();
      this.fileHandle = undefined;
    }
  }
}
