import { ExchangeRejectionError, RequestCancelledError, errorMessage } from '../errors.js';
import { planProtectiveOrders, type ProtectiveOrderPlan } from './protective-orders.js';
import { LegStateMachine } from './leg-state-machine.js';
import { mapOutcome, reviewForBothFilled } from './outcome.js';
import { waitForTerminal } from './order-poller.js';
import { RetryExhaustedError, type RetryPolicy } from './retry-policy.js';
import type { RequestContext } from './request-context.js';
import type {
  CloseOutcome,
  CloseStatus,
  ExchangeOrderApi,
  ExchangeOrderState,
  ExecutionOutcome,
  LegError,
  LegOrder,
  LegResult,
  OrderAck,
  ProtectiveOrderResult,
  ReviewReason,
  StraddlePlan,
  StrategyPreset,
  StrikePair,
  TerminalLegStatus,
  UnwindAttempt,
} from '../types/index.js';

const EPSILON = 1e-9;

export interface CoordinatorOptions {
  retry: RetryPolicy;
  pollIntervalsMs: readonly number[];
  /** 언와인드 주문 자체의 대기 한도 (요청 마감과 별개) */
  unwindTimeoutMs: number;
}

/** 결과 기록에 필요한 요청 메타데이터 */
export interface ExecutionMeta {
  pair: StrikePair;
  preset: StrategyPreset;
  credentialId: string;
}

/**
 * 레그 실행 결과 + 종결 상태가 거래소에서 확인됐는지.
 * 확인되지 않은 레그(조회/취소 실패)는 반대편 언와인드의 근거가 될 수 없다.
 */
interface LegRun {
  result: LegResult;
  confirmed: boolean;
}

type Finish = (
  status: TerminalLegStatus,
  confirmed: boolean,
  fields: { ack?: OrderAck | null; error?: LegError | null },
) => LegRun;

function isFilled(result: LegResult): boolean {
  return result.status === 'FILLED' || result.status === 'PARTIALLY_FILLED';
}

function isLotMultiple(qty: number, lotSize: number): boolean {
  const steps = qty / lotSize;
  return qty > 0 && Math.abs(steps - Math.round(steps)) < EPSILON;
}

function legError(kind: LegError['kind'], message: string): LegError {
  return { kind, message };
}

/** 청산 시점에 남아 있는 레그 수량: 진입 체결 - 언와인드 체결 - 발동된 보호 주문 체결 */
function openQuantity(leg: LegResult, protectionFilled: number): number {
  const unwound = leg.unwind?.filledQty ?? 0;
  return Math.max(0, leg.filledQty - unwound - protectionFilled);
}

/**
 * 스트래들 실행 코디네이터
 *
 * 1. 두 레그를 모두 제출한 뒤에 대기 (한 레그가 다른 레그를 막지 않는다)
 * 2. 레그별: 제출(재시도) → 폴링 → 마감 시 마지막 조회 → 미체결이면 취소
 * 3. 한쪽만 체결되면 반대편 종결이 확인된 경우에 한해 언와인드 1회
 * 4. 양쪽 체결이고 프리셋에 보호 설정이 있으면 레그별 손절/익절 주문
 * 5. mapOutcome으로 전체 상태 결정
 *
 * close()는 저장된 결과의 남은 포지션을 보호 주문 취소 후 reduce-only 시장가로 청산한다.
 *
 * 코디네이터 자체는 상태를 갖지 않는다. 요청별 상태는 RequestContext와 지역 변수에만 있다.
 * 제출 이후의 실패는 throw하지 않고 LegResult.error에 담는다.
 */
export class ExecutionCoordinator {
  constructor(
    private readonly api: ExchangeOrderApi,
    private readonly options: CoordinatorOptions,
  ) {}

  async execute(plan: StraddlePlan, meta: ExecutionMeta, ctx: RequestContext): Promise<ExecutionOutcome> {
    if (ctx.signal?.aborted) {
      ctx.log.info('Request cancelled before submission');
      throw new RequestCancelledError(ctx.correlationId);
    }

    const createdAt = Date.now();
    ctx.log.info(
      { call: plan.call.instrumentId, put: plan.put.instrumentId, side: plan.call.side, qty: plan.call.quantity },
      'Submitting straddle legs',
    );

    // 양쪽 제출이 먼저 시작된 뒤에 대기한다
    const [call, put] = await Promise.all([this.runLeg(plan.call, ctx), this.runLeg(plan.put, ctx)]);

    let callResult = call.result;
    let putResult = put.result;
    let reviewReason: ReviewReason | null = null;

    const callFilled = isFilled(callResult);
    const putFilled = isFilled(putResult);

    if (callFilled && putFilled) {
      reviewReason = reviewForBothFilled(callResult, putResult);
    } else if (callFilled || putFilled) {
      const filled = callFilled ? call : put;
      const sibling = callFilled ? put : call;
      const lotSize = meta.pair.underlying.lotSize;

      if (!sibling.confirmed) {
        ctx.log.warn({ leg: sibling.result.order.leg }, 'Sibling leg status unconfirmed, skipping unwind');
        reviewReason = 'SIBLING_UNCONFIRMED';
      } else if (!isLotMultiple(filled.result.filledQty, lotSize)) {
        ctx.log.warn({ filledQty: filled.result.filledQty, lotSize }, 'Filled quantity cannot be unwound in whole lots');
        reviewReason = 'UNWIND_UNSUPPORTED';
      } else {
        const unwind = await this.unwind(filled.result, ctx);
        const updated: LegResult = { ...filled.result, unwind };
        if (callFilled) callResult = updated;
        else putResult = updated;
        if (unwind.status !== 'FILLED') reviewReason = 'UNWIND_FAILED';
      }
    } else if (!call.confirmed || !put.confirmed) {
      // 양쪽 실패지만 거래소에 주문이 남아 있을 수 있다
      reviewReason = 'LEG_UNCONFIRMED';
    }

    let protectiveOrders: ProtectiveOrderResult[] = [];
    const protection = meta.preset.protection;
    if (callFilled && putFilled && protection) {
      const tick = meta.pair.underlying.tickSize;
      const plans = [
        ...planProtectiveOrders(callResult, protection, tick),
        ...planProtectiveOrders(putResult, protection, tick),
      ];
      protectiveOrders = await Promise.all(plans.map((p) => this.placeProtective(p, ctx)));
      if (reviewReason === null && protectiveOrders.some((p) => p.status === 'FAILED')) {
        reviewReason = 'PROTECTION_FAILED';
      }
    }

    const status = mapOutcome(callResult, putResult);
    const outcome: ExecutionOutcome = {
      correlationId: ctx.correlationId,
      ownerId: meta.preset.ownerId,
      strategyId: meta.preset.id,
      credentialId: meta.credentialId,
      underlying: meta.pair.underlying.symbol,
      expiry: meta.pair.expiry,
      strike: meta.pair.strike,
      side: meta.preset.side,
      call: callResult,
      put: putResult,
      protectiveOrders,
      status,
      reviewRequired: reviewReason !== null,
      reviewReason,
      createdAt,
      finalizedAt: Date.now(),
    };

    const level = outcome.reviewRequired ? 'warn' : 'info';
    ctx.log[level](
      { status, reviewReason, call: callResult.status, put: putResult.status },
      'Straddle execution finalized',
    );
    return Object.freeze(outcome);
  }

  // ── 레그 ─────────────────────────────────────────────────

  private async runLeg(order: LegOrder, ctx: RequestContext): Promise<LegRun> {
    const sm = new LegStateMachine(order.clientOrderId);
    const log = ctx.log.child({ leg: order.leg, clientOrderId: order.clientOrderId });
    let attempts = 0;

    const finish: Finish = (status, confirmed, fields) => {
      sm.transition(status);
      const ack = fields.ack ?? null;
      const result: LegResult = {
        order,
        status,
        exchangeOrderId: ack?.exchangeOrderId ?? null,
        filledQty: ack?.filledQty ?? 0,
        avgPrice: ack?.avgPrice ?? null,
        error: fields.error ?? null,
        attempts,
        unwind: null,
      };
      log.info({ status, confirmed, filledQty: result.filledQty, attempts }, 'Leg resolved');
      return { result, confirmed };
    };

    sm.transition('SENT');

    let ack: OrderAck;
    try {
      ack = await this.options.retry.execute(
        (attempt) => {
          attempts = attempt;
          return this.api.submitOrder(order, ctx.keys);
        },
        {
          deadline: ctx.deadline,
          onRetry: (err, attempt, delayMs) =>
            log.warn({ attempt, delayMs, err: errorMessage(err) }, 'Transient submission error, retrying'),
        },
      );
    } catch (err) {
      if (err instanceof ExchangeRejectionError) {
        return finish('REJECTED', true, { error: legError('EXCHANGE_REJECTION', err.reason) });
      }
      // 재시도 예산 소진 또는 알 수 없는 실패: 접수 여부를 clientOrderId로 1회 확인
      const cause = err instanceof RetryExhaustedError ? err.cause : err;
      const message = errorMessage(cause);
      let found: OrderAck | null;
      try {
        found = await this.api.findOrderByClientId(order.clientOrderId, ctx.keys);
      } catch (lookupErr) {
        log.warn({ err: errorMessage(lookupErr) }, 'Order lookup after failed submission also failed');
        return finish('TIMEOUT', false, { error: legError('TRANSIENT_SUBMISSION', message) });
      }
      if (!found) {
        return finish('REJECTED', true, { error: legError('TRANSIENT_SUBMISSION', message) });
      }
      log.info({ exchangeOrderId: found.exchangeOrderId }, 'Order found by client id after failed submission');
      ack = found;
    }

    return this.track(order, ack, ctx, finish);
  }

  private async track(
    order: LegOrder,
    initial: OrderAck,
    ctx: RequestContext,
    finish: Finish,
  ): Promise<LegRun> {
    let latest = initial;
    if (latest.state === 'OPEN') {
      const polled = await waitForTerminal(this.api, initial.exchangeOrderId, ctx.keys, {
        deadline: ctx.deadline,
        intervalsMs: this.options.pollIntervalsMs,
      });
      if (polled) latest = polled;
    }

    if (latest.state !== 'OPEN') return this.resolveAck(latest.state, latest, finish);

    // 마감까지 미체결: 고아 주문을 남기지 않도록 취소
    let cancelled: OrderAck;
    try {
      cancelled = await this.api.cancelOrder(
        { exchangeOrderId: latest.exchangeOrderId, instrumentId: order.instrumentId },
        ctx.keys,
      );
    } catch (err) {
      // 마지막 조회와 취소 사이에 체결됐을 수 있다 (취소 거절): 한 번 더 조회
      ctx.log.warn({ leg: order.leg, err: errorMessage(err) }, 'Cancel after timeout failed, re-checking order');
      const rechecked = await this.recheck(latest.exchangeOrderId, ctx);
      if (rechecked && rechecked.state !== 'OPEN') return this.resolveAck(rechecked.state, rechecked, finish);
      return finish('TIMEOUT', false, {
        ack: latest,
        error: legError('TIMEOUT', `Not filled before deadline; cancel failed: ${errorMessage(err)}`),
      });
    }

    if (cancelled.state === 'OPEN') {
      return finish('TIMEOUT', false, {
        ack: cancelled,
        error: legError('TIMEOUT', 'Not filled before deadline; cancel not acknowledged'),
      });
    }
    if (cancelled.state === 'CANCELLED' && cancelled.filledQty === 0) {
      return finish('TIMEOUT', true, {
        ack: cancelled,
        error: legError('TIMEOUT', 'Not filled before deadline; order cancelled'),
      });
    }
    return this.resolveAck(cancelled.state, cancelled, finish);
  }

  private async recheck(exchangeOrderId: string, ctx: RequestContext): Promise<OrderAck | null> {
    try {
      return await this.api.getOrderStatus(exchangeOrderId, ctx.keys);
    } catch (err) {
      ctx.log.warn({ exchangeOrderId, err: errorMessage(err) }, 'Order re-check after failed cancel also failed');
      return null;
    }
  }

  /** 종결된 거래소 상태 → 레그 상태 */
  private resolveAck(state: Exclude<ExchangeOrderState, 'OPEN'>, ack: OrderAck, finish: Finish): LegRun {
    switch (state) {
      case 'FILLED':
        return finish('FILLED', true, { ack });
      case 'CANCELLED':
        return ack.filledQty > 0
          ? finish('PARTIALLY_FILLED', true, { ack })
          : finish('REJECTED', true, { ack, error: legError('EXCHANGE_REJECTION', 'Order cancelled without fill') });
      case 'REJECTED':
        return finish('REJECTED', true, { ack, error: legError('EXCHANGE_REJECTION', 'Order rejected') });
    }
  }

  // ── 언와인드 ─────────────────────────────────────────────

  /**
   * 체결된 레그의 반대 매매 1회 (reduce-only 시장가, 재시도 없음).
   * 자체 마감 시간 안에 전량 체결되어야 FILLED.
   */
  private async unwind(leg: LegResult, ctx: RequestContext): Promise<UnwindAttempt> {
    const order: LegOrder = {
      instrumentId: leg.order.instrumentId,
      leg: leg.order.leg,
      side: leg.order.side === 'buy' ? 'sell' : 'buy',
      quantity: leg.filledQty,
      orderType: 'MARKET',
      price: null,
      clientOrderId: `${leg.order.clientOrderId}-U`,
      reduceOnly: true,
    };
    const log = ctx.log.child({ leg: order.leg, clientOrderId: order.clientOrderId });
    const deadline = Date.now() + this.options.unwindTimeoutMs;
    log.warn({ side: order.side, qty: order.quantity }, 'Unwinding filled leg');

    const failed = (ack: OrderAck | null, message: string): UnwindAttempt => {
      log.error({ filledQty: ack?.filledQty ?? 0, err: message }, 'Unwind failed, manual review required');
      return {
        order,
        status: 'FAILED',
        exchangeOrderId: ack?.exchangeOrderId ?? null,
        filledQty: ack?.filledQty ?? 0,
        avgPrice: ack?.avgPrice ?? null,
        error: legError('UNWIND', message),
      };
    };

    let ack: OrderAck;
    try {
      ack = await this.api.submitOrder(order, ctx.keys);
    } catch (err) {
      return failed(null, errorMessage(err));
    }

    if (ack.state === 'OPEN') {
      const polled = await waitForTerminal(this.api, ack.exchangeOrderId, ctx.keys, {
        deadline,
        intervalsMs: this.options.pollIntervalsMs,
      });
      if (polled) ack = polled;
    }

    if (ack.state === 'FILLED' && ack.filledQty >= order.quantity) {
      log.info({ avgPrice: ack.avgPrice }, 'Unwind filled');
      return { order, status: 'FILLED', exchangeOrderId: ack.exchangeOrderId, filledQty: ack.filledQty, avgPrice: ack.avgPrice, error: null };
    }

    if (ack.state === 'OPEN') {
      try {
        ack = await this.api.cancelOrder({ exchangeOrderId: ack.exchangeOrderId, instrumentId: order.instrumentId }, ctx.keys);
      } catch (err) {
        log.warn({ err: errorMessage(err) }, 'Cancel of open unwind order failed');
      }
      return failed(ack, 'Unwind not filled before its deadline');
    }
    return failed(ack, `Unwind ended in state ${ack.state}`);
  }

  // ── 보호 주문 ───────────────────────────────────────────

  /** 제출 1회. 거래소가 접수(OPEN/FILLED)하면 PLACED */
  private async placeProtective(plan: ProtectiveOrderPlan, ctx: RequestContext): Promise<ProtectiveOrderResult> {
    const { kind, order } = plan;
    const log = ctx.log.child({ leg: order.leg, clientOrderId: order.clientOrderId });
    try {
      const ack = await this.api.submitOrder(order, ctx.keys);
      if (ack.state === 'OPEN' || ack.state === 'FILLED') {
        log.info({ kind, exchangeOrderId: ack.exchangeOrderId, price: order.price, stopPrice: order.stopPrice }, 'Protective order placed');
        return { kind, order, status: 'PLACED', exchangeOrderId: ack.exchangeOrderId, error: null };
      }
      log.error({ kind, state: ack.state }, 'Protective order not accepted');
      return { kind, order, status: 'FAILED', exchangeOrderId: ack.exchangeOrderId, error: `Order ${ack.state}` };
    } catch (err) {
      log.error({ kind, err: errorMessage(err) }, 'Protective order failed');
      return { kind, order, status: 'FAILED', exchangeOrderId: null, error: errorMessage(err) };
    }
  }

  // ── 청산 ─────────────────────────────────────────────────

  /**
   * 저장된 실행 결과의 남은 포지션 청산
   * 1. 접수된 보호 주문 취소 (이미 발동돼 체결된 수량은 청산 수량에서 뺀다)
   * 2. 레그별 남은 수량을 `<레그 clientOrderId>-X` reduce-only 시장가로 동시에 제출
   * 취소를 확인하지 못한 보호 주문이 있으면 청산 수량이 불확실하므로 수동 확인.
   */
  async close(outcome: ExecutionOutcome, ctx: RequestContext): Promise<CloseOutcome> {
    if (ctx.signal?.aborted) {
      ctx.log.info('Close cancelled before submission');
      throw new RequestCancelledError(ctx.correlationId);
    }

    const protectionFilled = new Map<string, number>();
    const cancelledProtection: string[] = [];
    const unconfirmed: string[] = [];

    await Promise.all(
      outcome.protectiveOrders.map(async (p) => {
        const id = p.exchangeOrderId;
        if (p.status !== 'PLACED' || id === null) return;
        try {
          const ack = await this.api.cancelOrder(
            { exchangeOrderId: id, instrumentId: p.order.instrumentId },
            ctx.keys,
          );
          if (ack.state === 'OPEN') {
            unconfirmed.push(id);
            return;
          }
          if (ack.state === 'CANCELLED') cancelledProtection.push(id);
          if (ack.filledQty > 0) {
            protectionFilled.set(p.order.leg, (protectionFilled.get(p.order.leg) ?? 0) + ack.filledQty);
          }
        } catch (err) {
          ctx.log.warn({ exchangeOrderId: id, err: errorMessage(err) }, 'Protective order cancel failed');
          unconfirmed.push(id);
        }
      }),
    );

    const orders: LegOrder[] = [];
    for (const leg of [outcome.call, outcome.put]) {
      const qty = openQuantity(leg, protectionFilled.get(leg.order.leg) ?? 0);
      if (qty <= 0) continue;
      orders.push({
        instrumentId: leg.order.instrumentId,
        leg: leg.order.leg,
        side: leg.order.side === 'buy' ? 'sell' : 'buy',
        quantity: qty,
        orderType: 'MARKET',
        price: null,
        clientOrderId: `${leg.order.clientOrderId}-X`,
        reduceOnly: true,
      });
    }

    ctx.log.info({ legs: orders.map((o) => `${o.leg}:${o.side}:${o.quantity}`) }, 'Closing straddle position');
    const runs = await Promise.all(orders.map((o) => this.runLeg(o, ctx)));
    const legs = runs.map((r) => r.result);

    const closed = legs.filter((l) => l.status === 'FILLED').length;
    let status: CloseStatus;
    if (closed === legs.length) status = 'CLOSED';
    else if (legs.some(isFilled)) status = 'PARTIALLY_CLOSED';
    else status = 'FAILED';

    const result: CloseOutcome = {
      correlationId: outcome.correlationId,
      legs,
      cancelledProtection,
      status,
      reviewRequired: status !== 'CLOSED' || unconfirmed.length > 0 || runs.some((r) => !r.confirmed),
      finalizedAt: Date.now(),
    };
    ctx.log[result.reviewRequired ? 'warn' : 'info']({ status, reviewRequired: result.reviewRequired }, 'Straddle close finalized');
    return Object.freeze(result);
  }
}
