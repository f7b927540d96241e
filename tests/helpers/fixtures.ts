import type {
  ApiKeys,
  ExecutionOutcome,
  LegResult,
  LegTag,
  OptionChainRow,
  OptionChainSnapshot,
  StrategyPreset,
  StrikePair,
  Underlying,
} from '../../src/types/index.js';

export const TEST_KEYS: ApiKeys = { apiKey: 'test-key', apiSecret: 'test-secret' };

export const BTC: Underlying = { symbol: 'BTC', tickSize: 0.5, lotSize: 1, contractMultiplier: 0.001 };

export const EXPIRY = '2030-03-29T12:00:00Z';

export function makePreset(overrides: Partial<StrategyPreset> = {}): StrategyPreset {
  return {
    id: 'preset-1',
    ownerId: 'owner-1',
    name: 'BTC short straddle',
    underlying: 'BTC',
    lotSize: 1,
    side: 'SHORT',
    orderType: { kind: 'MARKET' },
    maxLotSize: 10,
    expiryType: 'DAILY',
    protection: null,
    ...overrides,
  };
}

export function makeRow(strike: number, callMark: number | null = 500, putMark: number | null = 480): OptionChainRow {
  return {
    strike,
    callInstrumentId: `C-BTC-${strike}-290330`,
    putInstrumentId: `P-BTC-${strike}-290330`,
    callMarkPrice: callMark,
    putMarkPrice: putMark,
  };
}

export function makeSnapshot(strikes: number[], overrides: Partial<OptionChainSnapshot> = {}): OptionChainSnapshot {
  return {
    underlying: BTC,
    expiry: EXPIRY,
    timestamp: Date.now(),
    rows: strikes.map((s) => makeRow(s)),
    ...overrides,
  };
}

export function makePair(overrides: Partial<StrikePair> = {}): StrikePair {
  return {
    underlying: BTC,
    expiry: EXPIRY,
    strike: 50000,
    callInstrumentId: 'C-BTC-50000-290330',
    putInstrumentId: 'P-BTC-50000-290330',
    callMarkPrice: 500,
    putMarkPrice: 480,
    ...overrides,
  };
}

export function makeLeg(leg: LegTag, overrides: Partial<LegResult> = {}): LegResult {
  const tag = leg === 'CALL' ? 'C' : 'P';
  return {
    order: {
      instrumentId: `${tag}-BTC-50000-290330`,
      leg,
      side: 'sell',
      quantity: 1,
      orderType: 'MARKET',
      price: null,
      clientOrderId: `corr0001-${tag}`,
      reduceOnly: false,
    },
    status: 'FILLED',
    exchangeOrderId: leg === 'CALL' ? '1000' : '1001',
    filledQty: 1,
    avgPrice: leg === 'CALL' ? 505 : 475,
    error: null,
    attempts: 1,
    unwind: null,
    ...overrides,
  };
}

export function makeOutcome(overrides: Partial<ExecutionOutcome> = {}): ExecutionOutcome {
  return {
    correlationId: 'corr0001',
    ownerId: 'owner-1',
    strategyId: 'preset-1',
    credentialId: 'cred-1',
    underlying: 'BTC',
    expiry: EXPIRY,
    strike: 50000,
    side: 'SHORT',
    call: makeLeg('CALL'),
    put: makeLeg('PUT'),
    protectiveOrders: [],
    status: 'BOTH_FILLED',
    reviewRequired: false,
    reviewReason: null,
    createdAt: 1_900_000_000_000,
    finalizedAt: 1_900_000_001_000,
    ...overrides,
  };
}

/** 동기 함수가 던진 에러 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
