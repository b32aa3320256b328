/**
 * Audit sink writing to the audit_logs table
 */

import type { AuditRecord, AuditSink } from '../spi/index.js';
import type { DatabaseClient } from '../db/client.js';
import { insertAuditLog } from '../db/repositories/audit-logs.js';

export class DatabaseAuditSink implements AuditSink {
  constructor(private readonly db: DatabaseClient) {}

  async write(record: AuditRecord): Promise<void> {
    await insertAuditLog(this.db, record);
  }
}
