import { describe, it, expect } from 'vitest';
import { planProtectiveOrders } from '../src/execution/protective-orders.js';
import { makeLeg } from './helpers/fixtures.js';

const BOTH = { stopLossPct: 50, takeProfitPct: 30 };

describe('planProtectiveOrders', () => {
  it('places a stop buy above and a limit buy below a short entry', () => {
    const plans = planProtectiveOrders(makeLeg('CALL'), BOTH, 0.5);
    expect(plans).toEqual([
      {
        kind: 'STOP_LOSS',
        order: {
          instrumentId: 'C-BTC-50000-290330',
          leg: 'CALL',
          side: 'buy',
          quantity: 1,
          reduceOnly: true,
          orderType: 'STOP_MARKET',
          price: null,
          stopPrice: 757.5,
          clientOrderId: 'corr0001-C-SL',
        },
      },
      {
        kind: 'TAKE_PROFIT',
        order: {
          instrumentId: 'C-BTC-50000-290330',
          leg: 'CALL',
          side: 'buy',
          quantity: 1,
          reduceOnly: true,
          orderType: 'LIMIT',
          price: 353.5,
          clientOrderId: 'corr0001-C-TP',
        },
      },
    ]);
  });

  it('uses the put entry price for the put leg', () => {
    const plans = planProtectiveOrders(makeLeg('PUT'), BOTH, 0.5);
    expect(plans.map((p) => [p.order.clientOrderId, p.order.stopPrice ?? p.order.price])).toEqual([
      ['corr0001-P-SL', 712.5],
      ['corr0001-P-TP', 332.5],
    ]);
  });

  it('mirrors the prices for a long entry', () => {
    const leg = makeLeg('CALL', { order: { ...makeLeg('CALL').order, side: 'buy' } });
    const plans = planProtectiveOrders(leg, BOTH, 0.5);
    expect(plans.map((p) => [p.kind, p.order.side, p.order.stopPrice ?? p.order.price])).toEqual([
      ['STOP_LOSS', 'sell', 252.5],
      ['TAKE_PROFIT', 'sell', 656.5],
    ]);
  });

  it('rounds against the position to the tick size', () => {
    const leg = makeLeg('CALL', { avgPrice: 100.3 });
    const plans = planProtectiveOrders(leg, { stopLossPct: 10, takeProfitPct: 10 }, 0.5);
    expect(plans[0]!.order.stopPrice).toBe(110.5);
    expect(plans[1]!.order.price).toBe(90);
  });

  it('never prices a take-profit below one tick', () => {
    const plans = planProtectiveOrders(makeLeg('CALL'), { stopLossPct: null, takeProfitPct: 100 }, 0.5);
    expect(plans).toHaveLength(1);
    expect(plans[0]).toMatchObject({ kind: 'TAKE_PROFIT', order: { price: 0.5 } });
  });

  it('covers only the filled quantity', () => {
    const plans = planProtectiveOrders(makeLeg('PUT', { status: 'PARTIALLY_FILLED', filledQty: 2 }), BOTH, 0.5);
    expect(plans.map((p) => p.order.quantity)).toEqual([2, 2]);
  });

  it('plans nothing without an entry price or a fill', () => {
    expect(planProtectiveOrders(makeLeg('CALL', { avgPrice: null }), BOTH, 0.5)).toEqual([]);
    expect(planProtectiveOrders(makeLeg('CALL', { filledQty: 0 }), BOTH, 0.5)).toEqual([]);
  });
});
