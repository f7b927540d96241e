import { KeyedRateLimiter } from './rate-limiter.js';
import { createChildLogger } from '../logger.js';
import { config } from '../config.js';
import { ExchangeRejectionError } from '../errors.js';
import * as delta from '../exchange/delta/rest.js';
import type { DeltaOrder } from '../exchange/delta/schemas.js';
import type {
  ApiKeys,
  ExchangeOrderApi,
  ExchangeOrderState,
  ExchangePosition,
  LegOrder,
  OrderAck,
} from '../types/index.js';

const log = createChildLogger('delta-api');

/** Delta 주문 상태: open | pending | closed | cancelled */
export function mapOrderState(order: Pick<DeltaOrder, 'state' | 'unfilled_size'>): ExchangeOrderState {
  switch (order.state) {
    case 'closed':
      // closed인데 잔량이 있으면 IOC 잔량 소멸 → 취소와 동일하게 취급
      return order.unfilled_size === 0 ? 'FILLED' : 'CANCELLED';
    case 'cancelled':
      return 'CANCELLED';
    case 'rejected':
      return 'REJECTED';
    default:
      return 'OPEN';
  }
}

export function toOrderAck(order: DeltaOrder): OrderAck {
  const filledQty = Math.max(0, order.size - order.unfilled_size);
  return {
    exchangeOrderId: order.id,
    clientOrderId: order.client_order_id ?? null,
    state: mapOrderState(order),
    quantity: order.size,
    filledQty,
    avgPrice: filledQty > 0 ? order.average_fill_price : null,
  };
}

const ORDER_TYPE: Record<LegOrder['orderType'], 'market_order' | 'limit_order' | 'stop_market_order'> = {
  MARKET: 'market_order',
  LIMIT: 'limit_order',
  STOP_MARKET: 'stop_market_order',
};

function isDuplicateClientId(err: unknown): boolean {
  return err instanceof ExchangeRejectionError && err.reason.toLowerCase().includes('duplicate');
}

/**
 * Delta Exchange Private REST API 클라이언트 (ExchangeOrderApi 구현)
 *
 * 엔드포인트:
 *   POST /v2/orders                           주문 생성
 *   DELETE /v2/orders                         주문 취소
 *   GET /v2/orders/{id}                       개별 주문 조회
 *   GET /v2/orders/client_order_id/{cid}      clientOrderId로 조회
 *   GET /v2/positions/margined                포지션 조회
 *
 * 인증: HMAC-SHA256 (exchange/delta/auth.ts)
 * 재시도는 하지 않는다. 제출 재시도는 ExecutionCoordinator의 RetryPolicy가 담당.
 * 레이트 리밋은 API 키 단위.
 */
export class DeltaPrivateApi implements ExchangeOrderApi {
  private readonly limiter: KeyedRateLimiter;

  constructor(maxPerSec: number = config.exchange.rateLimitPerSec) {
    this.limiter = new KeyedRateLimiter(maxPerSec);
  }

  async submitOrder(order: LegOrder, keys: ApiKeys): Promise<OrderAck> {
    await this.limiter.acquire(keys.apiKey);
    try {
      const res = await delta.placeOrder(keys, {
        product_symbol: order.instrumentId,
        size: order.quantity,
        side: order.side,
        order_type: ORDER_TYPE[order.orderType],
        ...(order.price !== null ? { limit_price: String(order.price) } : {}),
        ...(order.stopPrice !== undefined ? { stop_price: String(order.stopPrice) } : {}),
        client_order_id: order.clientOrderId,
        reduce_only: order.reduceOnly,
        ...(order.orderType === 'LIMIT' ? { time_in_force: 'gtc' as const } : {}),
      });
      const ack = toOrderAck(res);
      log.info(
        { clientOrderId: order.clientOrderId, exchangeOrderId: ack.exchangeOrderId, state: ack.state },
        'Order placed',
      );
      return ack;
    } catch (err) {
      if (isDuplicateClientId(err)) {
        // 이전 시도가 실제로는 접수됨 → 기존 주문을 그대로 돌려준다
        log.warn({ clientOrderId: order.clientOrderId }, 'Duplicate client order id, fetching existing order');
        const existing = await this.findOrderByClientId(order.clientOrderId, keys);
        if (existing) return existing;
      }
      throw err;
    }
  }

  async getOrderStatus(exchangeOrderId: string, keys: ApiKeys): Promise<OrderAck> {
    await this.limiter.acquire(keys.apiKey);
    return toOrderAck(await delta.getOrder(keys, exchangeOrderId));
  }

  /** 없으면 null (404). 그 외 실패는 전파 */
  async findOrderByClientId(clientOrderId: string, keys: ApiKeys): Promise<OrderAck | null> {
    await this.limiter.acquire(keys.apiKey);
    try {
      return toOrderAck(await delta.getOrderByClientId(keys, clientOrderId));
    } catch (err) {
      if (err instanceof ExchangeRejectionError && err.statusCode === 404) return null;
      throw err;
    }
  }

  async cancelOrder(ref: { exchangeOrderId: string; instrumentId: string }, keys: ApiKeys): Promise<OrderAck> {
    await this.limiter.acquire(keys.apiKey);
    const ack = toOrderAck(await delta.cancelOrder(keys, ref.exchangeOrderId, ref.instrumentId));
    log.info({ exchangeOrderId: ref.exchangeOrderId, state: ack.state, filledQty: ack.filledQty }, 'Order cancelled');
    return ack;
  }

  async getPositions(keys: ApiKeys): Promise<ExchangePosition[]> {
    await this.limiter.acquire(keys.apiKey);
    const rows = await delta.getPositions(keys);
    return rows.map((p) => ({ instrumentId: p.product_symbol, size: p.size, entryPrice: p.entry_price }));
  }
}
