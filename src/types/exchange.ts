import type { LegOrder } from './order.js';
import type { ExchangePosition } from './position.js';

/** 요청 동안만 메모리에 존재하는 API 키 */
export interface ApiKeys {
  readonly apiKey: string;
  readonly apiSecret: string;
}

export interface CredentialHandle {
  readonly id: string;
}

export type ExchangeOrderState = 'OPEN' | 'FILLED' | 'CANCELLED' | 'REJECTED';

export interface OrderAck {
  readonly exchangeOrderId: string;
  readonly clientOrderId: string | null;
  readonly state: ExchangeOrderState;
  readonly quantity: number;
  readonly filledQty: number;
  readonly avgPrice: number | null;
}

/**
 * 거래소 주문 API 계약
 * submitOrder는 TransientSubmissionError(재시도 대상) 또는 ExchangeRejectionError(종결)를 던진다.
 * 같은 clientOrderId 재제출은 기존 주문을 돌려준다 (멱등).
 */
export interface ExchangeOrderApi {
  submitOrder(order: LegOrder, keys: ApiKeys): Promise<OrderAck>;
  getOrderStatus(exchangeOrderId: string, keys: ApiKeys): Promise<OrderAck>;
  findOrderByClientId(clientOrderId: string, keys: ApiKeys): Promise<OrderAck | null>;
  cancelOrder(ref: { exchangeOrderId: string; instrumentId: string }, keys: ApiKeys): Promise<OrderAck>;
  getPositions(keys: ApiKeys): Promise<ExchangePosition[]>;
}
