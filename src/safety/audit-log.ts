import { z } from 'zod';
import { getDb, type Db } from '../db/database.js';

export type AuditLevel = 'INFO' | 'WARN' | 'CRITICAL';

const auditRowSchema = z.object({
  id: z.number(),
  timestamp: z.number(),
  level: z.string(),
  module: z.string(),
  action: z.string(),
  detail: z.string().nullable(),
  correlation_id: z.string().nullable(),
});
export type AuditRow = z.infer<typeof auditRowSchema>;

/**
 * SQLite audit log: 실행 요청/결과/대사 이벤트를 correlationId와 함께 기록
 */
export class AuditLog {
  private db: Db;

  constructor(db: Db = getDb()) {
    this.db = db;
  }

  log(level: AuditLevel, module: string, action: string, detail?: string, correlationId?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, correlation_id)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(Date.now(), level, module, action, detail ?? null, correlationId ?? null);
  }

  info(module: string, action: string, detail?: string, correlationId?: string): void {
    this.log('INFO', module, action, detail, correlationId);
  }

  warn(module: string, action: string, detail?: string, correlationId?: string): void {
    this.log('WARN', module, action, detail, correlationId);
  }

  critical(module: string, action: string, detail?: string, correlationId?: string): void {
    this.log('CRITICAL', module, action, detail, correlationId);
  }

  getRecent(limit: number = 50): AuditRow[] {
    const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(auditRowSchema).parse(rows);
  }

  /** 한 요청의 이벤트 (시간순) */
  forCorrelation(correlationId: string): AuditRow[] {
    const rows = this.db
      .prepare('SELECT * FROM audit_log WHERE correlation_id = ? ORDER BY id ASC')
      .all(correlationId);
    return z.array(auditRowSchema).parse(rows);
  }
}
