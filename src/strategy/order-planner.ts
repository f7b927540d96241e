import { ValidationError } from '../errors.js';
import type {
  LegOrder,
  LegTag,
  OrderSide,
  StraddlePlan,
  StrategyPreset,
  StrikePair,
} from '../types/index.js';

const EPSILON = 1e-9;

/** 레그별 clientOrderId: 같은 상관 ID로 재계획해도 동일해야 거래소 재제출이 멱등 */
export function legClientOrderId(correlationId: string, leg: LegTag): string {
  return `${correlationId}-${leg === 'CALL' ? 'C' : 'P'}`;
}

function tickDecimals(tick: number): number {
  const s = String(tick);
  const dot = s.indexOf('.');
  return dot === -1 ? 0 : s.length - dot - 1;
}

/** 호가 단위 맞춤. 매수는 올림, 매도는 내림 */
export function roundToTick(price: number, tick: number, mode: 'up' | 'down'): number {
  if (tick <= 0) return price;
  const steps = price / tick;
  const rounded = mode === 'up' ? Math.ceil(steps - EPSILON) : Math.floor(steps + EPSILON);
  return Number((rounded * tick).toFixed(tickDecimals(tick)));
}

function limitPrice(mark: number | null, side: OrderSide, offsetPct: number, tick: number, leg: LegTag): number {
  if (mark === null || !(mark > 0)) {
    throw new ValidationError('MISSING_REFERENCE_PRICE', `No mark price for ${leg} leg; cannot price limit order`, { leg });
  }
  const factor = side === 'buy' ? 1 + offsetPct / 100 : 1 - offsetPct / 100;
  const price = roundToTick(mark * factor, tick, side === 'buy' ? 'up' : 'down');
  return Math.max(price, tick);
}

function validateLotSize(pair: StrikePair, preset: StrategyPreset): void {
  const granularity = pair.underlying.lotSize;
  const qty = preset.lotSize;
  const steps = qty / granularity;
  if (!Number.isFinite(qty) || qty <= 0 || Math.abs(steps - Math.round(steps)) > EPSILON) {
    throw new ValidationError(
      'INVALID_LOT_SIZE',
      `Lot size ${qty} is not a positive multiple of ${granularity} for ${pair.underlying.symbol}`,
      { lotSize: qty, granularity },
    );
  }
  if (qty > preset.maxLotSize) {
    throw new ValidationError(
      'RISK_LIMIT_EXCEEDED',
      `Lot size ${qty} exceeds preset max lot size ${preset.maxLotSize}`,
      { lotSize: qty, maxLotSize: preset.maxLotSize },
    );
  }
}

/**
 * 스트래들 주문 계획
 * - SHORT: 콜 매도 + 풋 매도 / LONG: 콜 매수 + 풋 매수
 * - 검증 실패 시 LegOrder를 만들지 않고 throw (네트워크 호출 없음)
 */
export function planStraddle(pair: StrikePair, preset: StrategyPreset, correlationId: string): StraddlePlan {
  validateLotSize(pair, preset);

  const side: OrderSide = preset.side === 'SHORT' ? 'sell' : 'buy';
  const makeLeg = (leg: LegTag, instrumentId: string, mark: number | null): LegOrder => ({
    instrumentId,
    leg,
    side,
    quantity: preset.lotSize,
    orderType: preset.orderType.kind,
    price:
      preset.orderType.kind === 'LIMIT'
        ? limitPrice(mark, side, preset.orderType.offsetPct, pair.underlying.tickSize, leg)
        : null,
    clientOrderId: legClientOrderId(correlationId, leg),
    reduceOnly: false,
  });

  return {
    correlationId,
    call: makeLeg('CALL', pair.callInstrumentId, pair.callMarkPrice),
    put: makeLeg('PUT', pair.putInstrumentId, pair.putMarkPrice),
  };
}
