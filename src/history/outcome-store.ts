import { z } from 'zod';
import { getDb, type Db } from '../db/database.js';
import type { ExecutionOutcome } from '../types/index.js';

const legOrderSchema = z.object({
  instrumentId: z.string(),
  leg: z.enum(['CALL', 'PUT']),
  side: z.enum(['buy', 'sell']),
  quantity: z.number(),
  orderType: z.enum(['MARKET', 'LIMIT', 'STOP_MARKET']),
  price: z.number().nullable(),
  clientOrderId: z.string(),
  reduceOnly: z.boolean(),
  stopPrice: z.number().optional(),
});

const legErrorSchema = z.object({
  kind: z.enum(['TRANSIENT_SUBMISSION', 'EXCHANGE_REJECTION', 'TIMEOUT', 'UNWIND']),
  message: z.string(),
});

const unwindSchema = z.object({
  order: legOrderSchema,
  status: z.enum(['FILLED', 'FAILED']),
  exchangeOrderId: z.string().nullable(),
  filledQty: z.number(),
  avgPrice: z.number().nullable(),
  error: legErrorSchema.nullable(),
});

const protectiveOrderSchema = z.object({
  kind: z.enum(['STOP_LOSS', 'TAKE_PROFIT']),
  order: legOrderSchema,
  status: z.enum(['PLACED', 'FAILED']),
  exchangeOrderId: z.string().nullable(),
  error: z.string().nullable(),
});

const legResultSchema = z.object({
  order: legOrderSchema,
  status: z.enum(['PENDING', 'FILLED', 'PARTIALLY_FILLED', 'REJECTED', 'TIMEOUT']),
  exchangeOrderId: z.string().nullable(),
  filledQty: z.number(),
  avgPrice: z.number().nullable(),
  error: legErrorSchema.nullable(),
  attempts: z.number(),
  unwind: unwindSchema.nullable(),
});

/** /history 와이어 계약 */
export const executionOutcomeSchema = z.object({
  correlationId: z.string(),
  ownerId: z.string(),
  strategyId: z.string(),
  credentialId: z.string(),
  underlying: z.string(),
  expiry: z.string(),
  strike: z.number(),
  side: z.enum(['LONG', 'SHORT']),
  call: legResultSchema,
  put: legResultSchema,
  protectiveOrders: z.array(protectiveOrderSchema).default([]),
  status: z.enum(['BOTH_FILLED', 'ONE_LEG_FILLED', 'BOTH_REJECTED', 'UNWOUND']),
  reviewRequired: z.boolean(),
  reviewReason: z
    .enum([
      'UNWIND_FAILED',
      'UNWIND_UNSUPPORTED',
      'SIBLING_UNCONFIRMED',
      'LEG_UNCONFIRMED',
      'PARTIAL_FILL',
      'PROTECTION_FAILED',
    ])
    .nullable(),
  createdAt: z.number(),
  finalizedAt: z.number(),
});

const bodyRowSchema = z.object({ body: z.string() });

/** 실행 결과 이력. 한 번 저장된 결과는 바뀌지 않는다 */
export class SqliteOutcomeStore {
  constructor(private readonly db: Db = getDb()) {}

  save(outcome: ExecutionOutcome): void {
    this.db.prepare(`
      INSERT OR IGNORE INTO execution_outcomes
        (correlation_id, owner_id, strategy_id, status, review_required, body, finalized_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      outcome.correlationId,
      outcome.ownerId,
      outcome.strategyId,
      outcome.status,
      outcome.reviewRequired ? 1 : 0,
      JSON.stringify(outcome),
      outcome.finalizedAt,
    );
  }

  get(correlationId: string): ExecutionOutcome | null {
    const raw = this.db.prepare('SELECT body FROM execution_outcomes WHERE correlation_id = ?').get(correlationId);
    if (raw === undefined) return null;
    return executionOutcomeSchema.parse(JSON.parse(bodyRowSchema.parse(raw).body));
  }

  /** 최신순 */
  listByOwner(ownerId: string, limit: number = 20): ExecutionOutcome[] {
    const rows = this.db
      .prepare('SELECT body FROM execution_outcomes WHERE owner_id = ? ORDER BY finalized_at DESC LIMIT ?')
      .all(ownerId, limit);
    return z.array(bodyRowSchema).parse(rows).map((r) => executionOutcomeSchema.parse(JSON.parse(r.body)));
  }

  /** 수동 확인이 필요한 결과 */
  listPendingReview(ownerId: string): ExecutionOutcome[] {
    const rows = this.db
      .prepare('SELECT body FROM execution_outcomes WHERE owner_id = ? AND review_required = 1 ORDER BY finalized_at DESC')
      .all(ownerId);
    return z.array(bodyRowSchema).parse(rows).map((r) => executionOutcomeSchema.parse(JSON.parse(r.body)));
  }
}
