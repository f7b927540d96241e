import { z } from 'zod';
import { StrategyNotFoundError, ValidationError } from '../errors.js';
import { getDb, type Db } from '../db/database.js';
import type { StrategyPreset } from '../types/index.js';

export const strategyPresetSchema = z
  .object({
    id: z.string().min(1),
    ownerId: z.string().min(1),
    name: z.string().min(1),
    underlying: z.string().min(1),
    lotSize: z.number().positive(),
    side: z.enum(['LONG', 'SHORT']),
    orderType: z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('MARKET') }),
      z.object({ kind: z.literal('LIMIT'), offsetPct: z.number().min(0).max(100) }),
    ]),
    maxLotSize: z.number().positive(),
    expiryType: z.enum(['DAILY', 'WEEKLY', 'MONTHLY']).default('DAILY'),
    protection: z
      .object({
        stopLossPct: z.number().positive().nullable().default(null),
        takeProfitPct: z.number().positive().nullable().default(null),
      })
      .strict()
      .nullable()
      .default(null),
  })
  .strict();

/** 외부 입력(JSON 파일 등) → 검증된 프리셋 */
export function parsePreset(input: unknown): StrategyPreset {
  const result = strategyPresetSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('INVALID_PRESET', `Invalid strategy preset: ${result.error.message}`, {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/** 프리셋 조회. 코어에는 읽기 전용 */
export interface StrategyStore {
  get(strategyId: string): Promise<StrategyPreset>;
}

const presetRowSchema = z.object({ body: z.string() });

export class SqliteStrategyStore implements StrategyStore {
  constructor(private readonly db: Db = getDb()) {}

  async get(strategyId: string): Promise<StrategyPreset> {
    const raw = this.db.prepare('SELECT body FROM strategy_presets WHERE id = ?').get(strategyId);
    if (raw === undefined) throw new StrategyNotFoundError(strategyId);
    return parsePreset(JSON.parse(presetRowSchema.parse(raw).body));
  }

  save(preset: StrategyPreset): void {
    const valid = parsePreset(preset);
    this.db.prepare(`
      INSERT INTO strategy_presets (id, owner_id, name, body, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET owner_id = excluded.owner_id, name = excluded.name,
        body = excluded.body, updated_at = excluded.updated_at
    `).run(valid.id, valid.ownerId, valid.name, JSON.stringify(valid), Date.now());
  }

  listByOwner(ownerId: string): StrategyPreset[] {
    const rows = this.db.prepare('SELECT body FROM strategy_presets WHERE owner_id = ? ORDER BY name').all(ownerId);
    return z.array(presetRowSchema).parse(rows).map((r) => parsePreset(JSON.parse(r.body)));
  }
}
