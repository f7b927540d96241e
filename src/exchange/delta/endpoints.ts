/**
 * Delta Exchange REST 엔드포인트: 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 상품 목록 (옵션 체인 구성) */
export const PUBLIC_PRODUCTS = '/v2/products';

/** GET 티커 목록 (옵션 마크가격) */
export const PUBLIC_TICKERS = '/v2/tickers';

/** GET 단일 티커: 무기한 선물 마크가격을 현물 기준가로 사용 */
export function publicTicker(symbol: string): string {
  return `/v2/tickers/${encodeURIComponent(symbol)}`;
}

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** POST 주문 / DELETE 주문 취소 */
export const PRIVATE_ORDERS = '/v2/orders';

/** GET 개별 주문 조회 */
export function privateOrder(orderId: string): string {
  return `/v2/orders/${encodeURIComponent(orderId)}`;
}

/** GET client_order_id로 주문 조회 */
export function privateOrderByClientId(clientOrderId: string): string {
  return `/v2/orders/client_order_id/${encodeURIComponent(clientOrderId)}`;
}

/** GET 전체 포지션 (증거금 포지션) */
export const PRIVATE_POSITIONS_MARGINED = '/v2/positions/margined';

/** 기초자산 → 마크가격 조회용 무기한 선물 심볼 */
export const PERPETUAL_BY_UNDERLYING: Readonly<Record<string, string>> = {
  BTC: 'BTCUSD',
  ETH: 'ETHUSD',
};
