import { createChildLogger } from '../logger.js';
import { DataUnavailableError, errorMessage } from '../errors.js';
import * as delta from '../exchange/delta/rest.js';
import { PERPETUAL_BY_UNDERLYING } from '../exchange/delta/endpoints.js';
import type { DeltaProduct } from '../exchange/delta/schemas.js';
import type { OptionChainRow, OptionChainSnapshot, Underlying } from '../types/index.js';

const log = createChildLogger('market-data');

/** Delta 옵션은 1계약 단위 */
const DELTA_OPTION_LOT_SIZE = 1;

/**
 * 시세 게이트. 실패는 항상 DataUnavailableError로 바꿔서 던진다.
 */
export interface MarketDataGate {
  getSpotPrice(underlying: string): Promise<number>;
  /** 상장된 옵션 만기 (ISO 결제 시각) */
  getExpiries(underlying: string): Promise<string[]>;
  getOptionChain(underlying: string, expiry: string): Promise<OptionChainSnapshot>;
}

/** ISO 결제 시각 → Delta 티커 쿼리용 DD-MM-YYYY (UTC) */
export function toDeltaExpiryDate(expiry: string): string {
  const d = new Date(expiry);
  const dd = String(d.getUTCDate()).padStart(2, '0');
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  return `${dd}-${mm}-${d.getUTCFullYear()}`;
}

/**
 * 콜/풋 상품을 행사가별로 짝지어 체인 행 생성.
 * 한쪽만 상장된 행사가는 스트래들을 만들 수 없으므로 버린다. strike 오름차순.
 */
export function buildChainRows(
  products: readonly DeltaProduct[],
  markBySymbol: ReadonlyMap<string, number | null>,
): OptionChainRow[] {
  const byStrike = new Map<number, { call?: string; put?: string }>();
  for (const p of products) {
    if (p.strike_price === null) continue;
    const entry = byStrike.get(p.strike_price) ?? {};
    if (p.contract_type === 'call_options') entry.call = p.symbol;
    else if (p.contract_type === 'put_options') entry.put = p.symbol;
    byStrike.set(p.strike_price, entry);
  }

  const rows: OptionChainRow[] = [];
  for (const [strike, { call, put }] of byStrike) {
    if (!call || !put) continue;
    rows.push({
      strike,
      callInstrumentId: call,
      putInstrumentId: put,
      callMarkPrice: markBySymbol.get(call) ?? null,
      putMarkPrice: markBySymbol.get(put) ?? null,
    });
  }
  return rows.sort((a, b) => a.strike - b.strike);
}

export class DeltaMarketDataGate implements MarketDataGate {
  async getSpotPrice(underlying: string): Promise<number> {
    const symbol = PERPETUAL_BY_UNDERLYING[underlying];
    if (!symbol) {
      throw new DataUnavailableError(`No reference perpetual for ${underlying}`, { underlying });
    }
    let mark: number | null;
    try {
      mark = (await delta.getTicker(symbol)).mark_price;
    } catch (err) {
      log.warn({ underlying, err: errorMessage(err) }, 'Spot price fetch failed');
      throw new DataUnavailableError(`Spot price unavailable for ${underlying}`, { underlying }, { cause: err });
    }
    if (mark === null || !(mark > 0)) {
      throw new DataUnavailableError(`No mark price for ${symbol}`, { underlying, symbol });
    }
    return mark;
  }

  async getExpiries(underlying: string): Promise<string[]> {
    const products = await this.fetchProducts(underlying);
    const expiries = new Set<string>();
    for (const p of products) {
      if (p.settlement_time) expiries.add(p.settlement_time);
    }
    return [...expiries].sort((a, b) => Date.parse(a) - Date.parse(b));
  }

  async getOptionChain(underlying: string, expiry: string): Promise<OptionChainSnapshot> {
    const products = (await this.fetchProducts(underlying)).filter((p) => p.settlement_time === expiry);
    const first = products[0];
    if (!first) {
      throw new DataUnavailableError(`No listed options for ${underlying} at ${expiry}`, { underlying, expiry });
    }

    // 마크가격은 지정가 산정용. 티커가 실패해도 체인 자체는 유효 (시장가 프리셋은 진행 가능)
    const markBySymbol = new Map<string, number | null>();
    try {
      for (const t of await delta.getOptionTickers(underlying, toDeltaExpiryDate(expiry))) {
        markBySymbol.set(t.symbol, t.mark_price);
      }
    } catch (err) {
      log.warn({ underlying, expiry, err: errorMessage(err) }, 'Option tickers unavailable, marks left empty');
    }

    const ref: Underlying = {
      symbol: underlying,
      tickSize: first.tick_size,
      lotSize: DELTA_OPTION_LOT_SIZE,
      contractMultiplier: first.contract_value,
    };
    const rows = buildChainRows(products, markBySymbol).map((r) => Object.freeze(r));
    log.debug({ underlying, expiry, strikes: rows.length }, 'Option chain fetched');

    return Object.freeze({
      underlying: Object.freeze(ref),
      expiry,
      timestamp: Date.now(),
      rows: Object.freeze(rows),
    });
  }

  private async fetchProducts(underlying: string): Promise<DeltaProduct[]> {
    try {
      return await delta.getOptionProducts(underlying);
    } catch (err) {
      log.warn({ underlying, err: errorMessage(err) }, 'Option products fetch failed');
      throw new DataUnavailableError(`Option chain unavailable for ${underlying}`, { underlying }, { cause: err });
    }
  }
}
