import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type {
  ApiKeys,
  ExchangeOrderApi,
  ExecutionOutcome,
  LegResult,
  ReconciliationEntry,
  ReconciliationReport,
} from '../types/index.js';

const log = createChildLogger('reconciler');

const EPSILON = 1e-9;

/** 이 실행으로 생긴 순 포지션 (매수 +, 매도 -, 언와인드 체결분 차감) */
export function expectedQty(leg: LegResult): number {
  const sign = leg.order.side === 'buy' ? 1 : -1;
  const unwound = leg.unwind?.filledQty ?? 0;
  return sign * (leg.filledQty - unwound);
}

/**
 * 실행 후 포지션 대사
 * - 레그 상품별 기대 수량과 거래소 포지션 비교, drift = actual - expected
 * - drift가 있으면 DRIFT (경고만, 자동 보정하지 않음)
 * - 포지션 조회 실패는 UNAVAILABLE로 보고 (throw하지 않음)
 *
 * 같은 상품에 이전부터 보유한 포지션이 있으면 그만큼 drift로 잡힌다.
 */
export class PositionReconciler {
  constructor(private readonly api: ExchangeOrderApi) {}

  async reconcile(outcome: ExecutionOutcome, keys: ApiKeys): Promise<ReconciliationReport> {
    const rlog = log.child({ correlationId: outcome.correlationId });
    const checkedAt = Date.now();

    let sizes: Map<string, number>;
    try {
      const positions = await this.api.getPositions(keys);
      sizes = new Map(positions.map((p) => [p.instrumentId, p.size]));
    } catch (err) {
      const message = errorMessage(err);
      rlog.warn({ err: message }, 'Position fetch failed, reconciliation unavailable');
      return { correlationId: outcome.correlationId, checkedAt, status: 'UNAVAILABLE', entries: [], error: message };
    }

    const entries: ReconciliationEntry[] = [outcome.call, outcome.put].map((leg) => {
      const expected = expectedQty(leg);
      const actual = sizes.get(leg.order.instrumentId) ?? 0;
      return {
        instrumentId: leg.order.instrumentId,
        expectedQty: expected,
        actualQty: actual,
        drift: actual - expected,
      };
    });

    const drifted = entries.filter((e) => Math.abs(e.drift) > EPSILON);
    if (drifted.length > 0) {
      rlog.warn({ drift: drifted }, 'Position drift detected');
    } else {
      rlog.info('Positions reconciled');
    }

    return {
      correlationId: outcome.correlationId,
      checkedAt,
      status: drifted.length > 0 ? 'DRIFT' : 'MATCHED',
      entries,
      error: null,
    };
  }
}
