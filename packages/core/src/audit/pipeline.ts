/**
 * Audit Pipeline
 *
 * Masks and stores one record per tool-call attempt. `record` never rejects:
 * - masking failure: params/response replaced by a marker, masking_failed set
 * - sink failure: record appended to the spill file
 * - spill failure: minimal record written to the error log
 */

import type { AuditEntry, AuditRecord, AuditSink } from '../spi/index.js';
import type { AuditSpillFile } from './spill.js';
import { maskPayload } from './masking.js';
import { toJsonColumn } from '../utils/json.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const MASKING_FAILED_MARKER = JSON.stringify({ _masking_failed: true });

export interface AuditPipelineOptions {
  sink: AuditSink;
  spill?: AuditSpillFile;
  /** Replaceable for tests */
  mask?: (payload: unknown) => unknown;
  now?: () => Date;
}

export class AuditPipeline {
  private readonly sink: AuditSink;
  private readonly spill?: AuditSpillFile;
  private readonly mask: (payload: unknown) => unknown;
  private readonly now: () => Date;

  constructor(options: AuditPipelineOptions) {
    this.sink = options.sink;
    this.spill = options.spill;
    this.mask = options.mask ?? maskPayload;
    this.now = options.now ?? (() => new Date());
  }

  async record(entry: AuditEntry): Promise<void> {
    const record = this.buildRecord(entry);

    try {
      await this.sink.write(record);
      return;
    } catch (error) {
      logger.warn(`[audit] Sink write failed for ${record.tool_name}: ${errorMessage(error)}`);
    }

    if (this.spill) {
      try {
        await this.spill.append(record);
        logger.warn(`[audit] Record spilled to ${this.spill.path}`);
        return;
      } catch (error) {
        logger.error(`[audit] Spill write failed: ${errorMessage(error)}`);
      }
    }

    logger.error(
      {
        audit_record: {
          timestamp: record.timestamp,
          user_id: record.user_id,
          session_id: record.session_id,
          tool_name: record.tool_name,
          status: record.status,
          error_message: record.error_message,
          execution_time_ms: record.execution_time_ms,
        },
      },
      '[audit] Audit record could not be stored'
    );
  }

  private buildRecord(entry: AuditEntry): AuditRecord {
    let toolParams: string | null;
    let response: string | null;
    let maskingFailed = false;

    try {
      toolParams = toJsonColumn(this.mask(entry.params));
      response = toJsonColumn(this.mask(entry.response));
    } catch (error) {
      logger.error(`[audit] Masking failed for ${entry.toolName}: ${errorMessage(error)}`);
      toolParams = MASKING_FAILED_MARKER;
      response = MASKING_FAILED_MARKER;
      maskingFailed = true;
    }

    return {
      timestamp: this.now().toISOString(),
      user_id: entry.userId,
      session_id: entry.sessionId ?? null,
      user_query: entry.query ?? null,
      tool_name: entry.toolName,
      tool_params: toolParams,
      response,
      status: entry.status,
      error_message: entry.error ?? null,
      execution_time_ms: Math.max(0, Math.round(entry.durationMs ?? 0)),
      masking_failed: maskingFailed,
    };
  }
}
