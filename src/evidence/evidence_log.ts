import * as path from 'node:path';
import { appendJsonLine, readJsonLines } from '../core/jsonl_log.js';
import { EvidenceAuditEventSchema, EvidenceSchema, type Evidence, type EvidenceAuditEvent } from './types.js';

export const EVIDENCE_FILE = 'evidence.jsonl';
export const AUDIT_FILE = 'events.jsonl';

/**
 * Append-only evidence rows and their audit trail for one content folder.
 * Rows are never rewritten; validation outcomes go to the audit log.
 */
export class EvidenceStore {
  readonly evidencePath: string;
  readonly auditPath: string;

  constructor(readonly contentDir: string) {
    this.evidencePath = path.join(contentDir, EVIDENCE_FILE);
    this.auditPath = path.join(contentDir, AUDIT_FILE);
  }

  async readAll(): Promise<Evidence[]> {
    const result = await readJsonLines(this.evidencePath, EvidenceSchema);
    return result?.records ?? [];
  }

  async append(row: Evidence): Promise<void> {
    await appendJsonLine(this.evidencePath, row, EvidenceSchema);
  }

  async appendAudit(event: EvidenceAuditEvent): Promise<void> {
    await appendJsonLine(this.auditPath, event, EvidenceAuditEventSchema);
  }

  async readAudit(): Promise<EvidenceAuditEvent[]> {
    const result = await readJsonLines(this.auditPath, EvidenceAuditEventSchema);
    return result?.records ?? [];
  }
}
