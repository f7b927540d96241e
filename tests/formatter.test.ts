import { describe, it, expect } from 'vitest';
import {
  formatAudit,
  formatClose,
  formatHistory,
  formatOutcome,
  formatPositions,
  formatReconciliation,
} from '../src/report/formatter.js';
import { makeLeg, makeOutcome } from './helpers/fixtures.js';

describe('formatOutcome', () => {
  it('lists request, result and both legs', () => {
    const text = formatOutcome(makeOutcome()).split('\n');
    expect(text).toContain('  Correlation ID         corr0001');
    expect(text).toContain('  Status                 BOTH_FILLED');
    expect(text).toContain('  Review Required        no');
    expect(text).toContain('  Duration               1000ms');
    expect(text).toContain('  Order                  sell 1 MARKET');
    expect(text).toContain('  Filled                 1 @ 505');
  });

  it('shows the review reason, leg error and unwind', () => {
    const call = makeLeg('CALL');
    const text = formatOutcome(
      makeOutcome({
        status: 'ONE_LEG_FILLED',
        reviewRequired: true,
        reviewReason: 'UNWIND_FAILED',
        call: {
          ...call,
          unwind: {
            order: { ...call.order, side: 'buy', clientOrderId: 'corr0001-C-U', reduceOnly: true },
            status: 'FAILED',
            exchangeOrderId: null,
            filledQty: 0,
            avgPrice: null,
            error: { kind: 'UNWIND', message: 'rejected' },
          },
        },
        put: makeLeg('PUT', { status: 'REJECTED', filledQty: 0, avgPrice: null, error: { kind: 'EXCHANGE_REJECTION', message: 'insufficient_margin' } }),
      }),
    ).split('\n');

    expect(text).toContain('  Review Required        YES (UNWIND_FAILED)');
    expect(text).toContain('  Unwind                 FAILED 0/1');
    expect(text).toContain('  Error                  EXCHANGE_REJECTION: insufficient_margin');
  });
});

describe('formatOutcome protection', () => {
  it('adds a protection section only when orders were placed', () => {
    expect(formatOutcome(makeOutcome())).not.toContain('── Protection');

    const call = makeLeg('CALL');
    const put = makeLeg('PUT');
    const text = formatOutcome(
      makeOutcome({
        protectiveOrders: [
          {
            kind: 'STOP_LOSS',
            order: { ...call.order, side: 'buy', orderType: 'STOP_MARKET', stopPrice: 758, clientOrderId: 'corr0001-C-SL', reduceOnly: true },
            status: 'PLACED',
            exchangeOrderId: '1002',
            error: null,
          },
          {
            kind: 'TAKE_PROFIT',
            order: { ...put.order, side: 'buy', orderType: 'LIMIT', price: 237.5, clientOrderId: 'corr0001-P-TP', reduceOnly: true },
            status: 'FAILED',
            exchangeOrderId: null,
            error: 'rejected',
          },
        ],
      }),
    ).split('\n');

    expect(text).toContain('  CALL STOP_LOSS         buy 1 @ 758 PLACED');
    expect(text).toContain('  PUT TAKE_PROFIT        buy 1 @ 237.5 FAILED (rejected)');
  });
});

describe('formatClose', () => {
  it('lists the close status, cancelled orders and each close leg', () => {
    const call = makeLeg('CALL');
    const text = formatClose({
      correlationId: 'corr0001',
      legs: [{ ...call, order: { ...call.order, side: 'buy', clientOrderId: 'corr0001-C-X', reduceOnly: true } }],
      cancelledProtection: ['1002', '1003'],
      status: 'CLOSED',
      reviewRequired: false,
      finalizedAt: 0,
    }).split('\n');

    expect(text).toContain('  Status                 CLOSED');
    expect(text).toContain('  Cancelled Orders       1002, 1003');
    expect(text).toContain('── Call Close ────────────────────────────');
    expect(text).toContain('  Order                  buy 1 MARKET');
  });
});

describe('formatReconciliation', () => {
  it('marks drifted instruments', () => {
    const text = formatReconciliation({
      correlationId: 'corr0001',
      checkedAt: 0,
      status: 'DRIFT',
      entries: [
        { instrumentId: 'C-BTC-50000-290330', expectedQty: -1, actualQty: -3, drift: -2 },
        { instrumentId: 'P-BTC-50000-290330', expectedQty: 1, actualQty: 1, drift: 0 },
      ],
      error: null,
    }).split('\n');

    expect(text[1]).toBe('! C-BTC-50000-290330         expected -1  actual -3');
    expect(text[2]).toBe('  P-BTC-50000-290330         expected +1  actual +1');
  });

  it('prints the error when unavailable', () => {
    const text = formatReconciliation({ correlationId: 'x', checkedAt: 0, status: 'UNAVAILABLE', entries: [], error: 'Positions unavailable' });
    expect(text.split('\n')[1]).toBe('  Positions unavailable');
  });
});

describe('formatHistory', () => {
  it('prints one row per outcome', () => {
    const text = formatHistory([
      makeOutcome({ status: 'UNWOUND' }),
      makeOutcome({ status: 'ONE_LEG_FILLED', reviewRequired: true, reviewReason: 'UNWIND_FAILED' }),
    ]).split('\n');

    expect(text).toHaveLength(3);
    expect(text[1]).toBe('2030-03-17 17:46:41  UNWOUND         BTC             50000  ');
    expect(text[2]).toBe('2030-03-17 17:46:41  ONE_LEG_FILLED  BTC             50000  UNWIND_FAILED');
  });

  it('says so when empty', () => {
    expect(formatHistory([])).toBe('No executions.');
  });
});

describe('formatPositions', () => {
  it('skips flat positions', () => {
    expect(
      formatPositions([
        { instrumentId: 'C-BTC-50000-290330', size: 0, entryPrice: null },
        { instrumentId: 'P-BTC-50000-290330', size: -1, entryPrice: 475 },
      ]),
    ).toBe('P-BTC-50000-290330               -1  @ 475');
    expect(formatPositions([])).toBe('No open positions.');
  });
});

describe('formatAudit', () => {
  it('prints one line per event with a dash for a missing correlation id', () => {
    const at = 1_900_000_000_000;
    const text = formatAudit([
      { id: 2, timestamp: at, level: 'INFO', module: 'service', action: 'STRADDLE_REQUESTED', detail: 'strategy=preset-1', correlation_id: 'corr0001' },
      { id: 1, timestamp: at, level: 'WARN', module: 'service', action: 'OTHER', detail: null, correlation_id: null },
    ]);
    expect(text.split('\n')).toEqual([
      '2030-03-17 17:46:40 INFO     STRADDLE_REQUESTED       corr0001 strategy=preset-1',
      '2030-03-17 17:46:40 WARN     OTHER                    -',
    ]);
  });

  it('reports an empty log', () => {
    expect(formatAudit([])).toBe('No audit events.');
  });
});
