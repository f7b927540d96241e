import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { sleep, type Sleep } from './retry-policy.js';
import type { ApiKeys, ExchangeOrderApi, OrderAck } from '../types/index.js';

const log = createChildLogger('order-poller');

export interface PollOptions {
  /** 절대 시각 (Unix ms). 이 시각 이후에는 마지막 1회만 조회 */
  deadline: number;
  /** 폴링 간격 백오프 단계 (ms). 마지막 값이 계속 반복된다 */
  intervalsMs: readonly number[];
  wait?: Sleep;
}

/**
 * 주문 체결 확인 폴링
 * - getOrderStatus 반복 호출, OPEN이 아니면 즉시 반환
 * - 간격: intervalsMs 순서대로 백오프, deadline을 넘겨 자지 않는다
 * - deadline 도달 시 마지막으로 한 번 더 조회
 * 조회가 전부 실패하면 null. 취소 여부는 호출자가 정한다.
 */
export async function waitForTerminal(
  api: ExchangeOrderApi,
  exchangeOrderId: string,
  keys: ApiKeys,
  options: PollOptions,
): Promise<OrderAck | null> {
  const wait = options.wait ?? sleep;
  const intervals = options.intervalsMs.length > 0 ? options.intervalsMs : [500];
  let latest: OrderAck | null = null;
  let attempt = 0;

  const query = async (): Promise<OrderAck | null> => {
    try {
      return await api.getOrderStatus(exchangeOrderId, keys);
    } catch (err) {
      log.warn({ exchangeOrderId, attempt, err: errorMessage(err) }, 'Poll getOrderStatus failed');
      return null;
    }
  };

  while (Date.now() < options.deadline) {
    const interval = intervals[Math.min(attempt, intervals.length - 1)]!;
    await wait(Math.max(0, Math.min(interval, options.deadline - Date.now())));
    attempt++;
    if (Date.now() >= options.deadline) break;

    const order = await query();
    if (!order) continue;
    latest = order;
    log.debug({ exchangeOrderId, state: order.state, filledQty: order.filledQty, attempt }, 'Poll result');
    if (order.state !== 'OPEN') return order;
  }

  // 타임아웃 시 마지막 상태 한번 더 확인
  log.warn({ exchangeOrderId, attempts: attempt }, 'Order fill polling reached deadline');
  const last = await query();
  return last ?? latest;
}
