/**
 * Delta Exchange REST API: endpoints 상수 + undici + zod 전용.
 * 모든 URL은 endpoints.ts에서만 가져온다.
 */

import {
  PUBLIC_PRODUCTS,
  PUBLIC_TICKERS,
  publicTicker,
  PRIVATE_ORDERS,
  privateOrder,
  privateOrderByClientId,
  PRIVATE_POSITIONS_MARGINED,
} from './endpoints.js';
import { requestPublicValidated, requestPrivateValidated } from './client.js';
import {
  productsSchema,
  tickerResponseSchema,
  tickersResponseSchema,
  orderResponseSchema,
  positionsResponseSchema,
} from './schemas.js';
import type { ApiKeys } from '../../types/index.js';

const OPTION_CONTRACT_TYPES = 'call_options,put_options';

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export async function getTicker(symbol: string) {
  const res = await requestPublicValidated(publicTicker(symbol), {}, tickerResponseSchema);
  return res.result;
}

/** 기초자산의 상장 옵션 상품 전체 (모든 만기) */
export async function getOptionProducts(underlying: string) {
  const res = await requestPublicValidated(
    PUBLIC_PRODUCTS,
    { contract_types: OPTION_CONTRACT_TYPES, states: 'live' },
    productsSchema,
  );
  return res.result.filter((p) => p.underlying_asset.symbol === underlying);
}

/** 옵션 티커 (마크가격). expiryDate 형식: DD-MM-YYYY */
export async function getOptionTickers(underlying: string, expiryDate: string) {
  const res = await requestPublicValidated(
    PUBLIC_TICKERS,
    { contract_types: OPTION_CONTRACT_TYPES, underlying_asset_symbols: underlying, expiry_date: expiryDate },
    tickersResponseSchema,
  );
  return res.result;
}

// ─── PRIVATE ──────────────────────────────────────────────────────────────

export async function placeOrder(
  keys: ApiKeys,
  body: {
    product_symbol: string;
    size: number;
    side: 'buy' | 'sell';
    order_type: 'market_order' | 'limit_order' | 'stop_market_order';
    limit_price?: string;
    stop_price?: string;
    client_order_id: string;
    reduce_only: boolean;
    time_in_force?: 'gtc' | 'ioc';
  },
) {
  const res = await requestPrivateValidated(PRIVATE_ORDERS, { method: 'POST', keys, body }, orderResponseSchema);
  return res.result;
}

export async function getOrder(keys: ApiKeys, orderId: string) {
  const res = await requestPrivateValidated(privateOrder(orderId), { method: 'GET', keys }, orderResponseSchema);
  return res.result;
}

export async function getOrderByClientId(keys: ApiKeys, clientOrderId: string) {
  const res = await requestPrivateValidated(
    privateOrderByClientId(clientOrderId),
    { method: 'GET', keys },
    orderResponseSchema,
  );
  return res.result;
}

export async function cancelOrder(keys: ApiKeys, orderId: string, productSymbol: string) {
  const res = await requestPrivateValidated(
    PRIVATE_ORDERS,
    { method: 'DELETE', keys, body: { id: Number(orderId), product_symbol: productSymbol } },
    orderResponseSchema,
  );
  return res.result;
}

export async function getPositions(keys: ApiKeys) {
  const res = await requestPrivateValidated(PRIVATE_POSITIONS_MARGINED, { method: 'GET', keys }, positionsResponseSchema);
  return res.result;
}
