import { roundToTick } from '../strategy/order-planner.js';
import type { LegOrder, LegResult, ProtectionKind, ProtectionSettings } from '../types/index.js';

export interface ProtectiveOrderPlan {
  kind: ProtectionKind;
  order: LegOrder;
}

const SUFFIX: Record<ProtectionKind, string> = {
  STOP_LOSS: 'SL',
  TAKE_PROFIT: 'TP',
};

/**
 * 체결된 레그 → 보호 주문 (reduce-only, 체결 수량만큼)
 *
 * 매도 진입(SHORT): 손절 = 체결가 위 stop 매수, 익절 = 체결가 아래 지정가 매수
 * 매수 진입(LONG):  손절 = 체결가 아래 stop 매도, 익절 = 체결가 위 지정가 매도
 *
 * 가격은 호가 단위로 진입 방향에 불리하지 않게 맞추고 최소 1틱.
 * 체결가가 없거나 체결 수량이 0이면 빈 배열.
 */
export function planProtectiveOrders(
  leg: LegResult,
  protection: ProtectionSettings,
  tickSize: number,
): ProtectiveOrderPlan[] {
  const entry = leg.avgPrice;
  if (entry === null || !(entry > 0) || leg.filledQty <= 0) return [];

  const shortEntry = leg.order.side === 'sell';
  const exitSide = shortEntry ? 'buy' : 'sell';
  const base = {
    instrumentId: leg.order.instrumentId,
    leg: leg.order.leg,
    side: exitSide,
    quantity: leg.filledQty,
    reduceOnly: true,
  } as const;
  const cid = (kind: ProtectionKind): string => `${leg.order.clientOrderId}-${SUFFIX[kind]}`;
  const plans: ProtectiveOrderPlan[] = [];

  if (protection.stopLossPct !== null) {
    const pct = protection.stopLossPct / 100;
    const stopPrice = shortEntry
      ? roundToTick(entry * (1 + pct), tickSize, 'up')
      : Math.max(roundToTick(entry * (1 - pct), tickSize, 'down'), tickSize);
    plans.push({
      kind: 'STOP_LOSS',
      order: { ...base, orderType: 'STOP_MARKET', price: null, stopPrice, clientOrderId: cid('STOP_LOSS') },
    });
  }

  if (protection.takeProfitPct !== null) {
    const pct = protection.takeProfitPct / 100;
    const price = shortEntry
      ? Math.max(roundToTick(entry * (1 - pct), tickSize, 'down'), tickSize)
      : roundToTick(entry * (1 + pct), tickSize, 'up');
    plans.push({
      kind: 'TAKE_PROFIT',
      order: { ...base, orderType: 'LIMIT', price, clientOrderId: cid('TAKE_PROFIT') },
    });
  }

  return plans;
}
