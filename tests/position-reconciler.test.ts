import { describe, it, expect } from 'vitest';
import { PositionReconciler, expectedQty } from '../src/reconcile/position-reconciler.js';
import { ExecutionCoordinator } from '../src/execution/coordinator.js';
import { RetryPolicy } from '../src/execution/retry-policy.js';
import { createRequestContext } from '../src/execution/request-context.js';
import { planStraddle } from '../src/strategy/order-planner.js';
import { FakeExchange } from './helpers/fake-exchange.js';
import { makePair, makePreset, TEST_KEYS } from './helpers/fixtures.js';
import type { StrategyPreset } from '../src/types/index.js';

const CALL = 'C-BTC-50000-290330';
const PUT = 'P-BTC-50000-290330';

async function execute(fake: FakeExchange, preset: StrategyPreset = makePreset()) {
  const pair = makePair();
  const coordinator = new ExecutionCoordinator(fake, {
    retry: new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 }),
    pollIntervalsMs: [5],
    unwindTimeoutMs: 100,
  });
  const ctx = createRequestContext({ correlationId: 'rec1', keys: TEST_KEYS, timeoutMs: 200 });
  return coordinator.execute(planStraddle(pair, preset, 'rec1'), { pair, preset, credentialId: 'cred-1' }, ctx);
}

describe('PositionReconciler', () => {
  it('reports MATCHED after a filled short straddle', async () => {
    const fake = new FakeExchange();
    const outcome = await execute(fake);
    const report = await new PositionReconciler(fake).reconcile(outcome, TEST_KEYS);

    expect(report.status).toBe('MATCHED');
    expect(report.error).toBeNull();
    expect(report.correlationId).toBe('rec1');
    expect(report.entries).toEqual([
      { instrumentId: CALL, expectedQty: -1, actualQty: -1, drift: 0 },
      { instrumentId: PUT, expectedQty: -1, actualQty: -1, drift: 0 },
    ]);
  });

  it('nets the unwind fill out of the expected position', async () => {
    const fake = new FakeExchange();
    fake.setBehavior('rec1-P', { reject: 'insufficient_margin' });
    const outcome = await execute(fake);
    const report = await new PositionReconciler(fake).reconcile(outcome, TEST_KEYS);

    expect(outcome.status).toBe('UNWOUND');
    expect(report.status).toBe('MATCHED');
    expect(report.entries.map((e) => e.expectedQty)).toEqual([0, 0]);
  });

  it('reports DRIFT when the exchange holds more than this execution opened', async () => {
    const fake = new FakeExchange();
    fake.extraPositions.push({ instrumentId: CALL, size: -2, entryPrice: 400 });
    const outcome = await execute(fake);
    const report = await new PositionReconciler(fake).reconcile(outcome, TEST_KEYS);

    expect(report.status).toBe('DRIFT');
    expect(report.entries[0]).toEqual({ instrumentId: CALL, expectedQty: -1, actualQty: -3, drift: -2 });
    expect(report.entries[1]?.drift).toBe(0);
  });

  it('flags DRIFT when the exchange shows less than was filled', async () => {
    const outcome = await execute(new FakeExchange(), makePreset({ side: 'LONG', lotSize: 2 }));
    const exchange = new FakeExchange();
    exchange.extraPositions.push(
      { instrumentId: CALL, size: 1, entryPrice: null },
      { instrumentId: PUT, size: 2, entryPrice: null },
    );
    const report = await new PositionReconciler(exchange).reconcile(outcome, TEST_KEYS);

    expect(outcome.status).toBe('BOTH_FILLED');
    expect(report.status).toBe('DRIFT');
    expect(report.entries).toEqual([
      { instrumentId: CALL, expectedQty: 2, actualQty: 1, drift: -1 },
      { instrumentId: PUT, expectedQty: 2, actualQty: 2, drift: 0 },
    ]);
  });

  it('treats a missing position as zero', async () => {
    const fake = new FakeExchange();
    const outcome = await execute(fake, makePreset({ side: 'LONG' }));
    const report = await new PositionReconciler(new FakeExchange()).reconcile(outcome, TEST_KEYS);

    expect(report.status).toBe('DRIFT');
    expect(report.entries[0]).toEqual({ instrumentId: CALL, expectedQty: 1, actualQty: 0, drift: -1 });
  });

  it('reports UNAVAILABLE without throwing when positions cannot be fetched', async () => {
    const fake = new FakeExchange();
    const outcome = await execute(fake);
    fake.positionsFail = true;
    const report = await new PositionReconciler(fake).reconcile(outcome, TEST_KEYS);

    expect(report).toMatchObject({ status: 'UNAVAILABLE', entries: [], error: 'Positions unavailable' });
  });
});

describe('expectedQty', () => {
  it('signs by side and subtracts the unwound quantity', async () => {
    const fake = new FakeExchange();
    fake.setBehavior('rec1-P', { reject: 'insufficient_margin' });
    const outcome = await execute(fake, makePreset({ side: 'LONG', lotSize: 2 }));

    expect(expectedQty(outcome.put)).toBe(0);
    expect(outcome.call.filledQty).toBe(2);
    expect(outcome.call.unwind?.filledQty).toBe(2);
    expect(expectedQty(outcome.call)).toBe(0);
  });
});
