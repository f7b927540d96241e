import { describe, it, expect, beforeEach, vi } from 'vitest';
import { openDb } from '../src/db/database.js';
import { StraddleService, type ExecutionSettings } from '../src/service/straddle-service.js';
import { SqliteOutcomeStore } from '../src/history/outcome-store.js';
import { AuditLog } from '../src/safety/audit-log.js';
import { CredentialError, DataUnavailableError, RequestCancelledError, ValidationError } from '../src/errors.js';
import { FakeExchange } from './helpers/fake-exchange.js';
import { stubTelegram } from './helpers/telegram-stub.js';
import { EXPIRY, TEST_KEYS, makePreset, makeSnapshot } from './helpers/fixtures.js';
import type { MarketDataGate } from '../src/market/market-data-gate.js';
import type { CredentialResolver } from '../src/credentials/credential-resolver.js';
import type {
  ApiKeys,
  CredentialHandle,
  OptionChainSnapshot,
  ReconciliationReport,
} from '../src/types/index.js';

const CORR = 'svc00001';

class FakeGate implements MarketDataGate {
  spot = 50_100;
  expiries: string[] = [EXPIRY];
  failSpot = false;
  chainRequests: string[] = [];

  async getSpotPrice(underlying: string): Promise<number> {
    if (this.failSpot) throw new DataUnavailableError(`Spot price unavailable for ${underlying}`, { underlying });
    return this.spot;
  }

  async getExpiries(): Promise<string[]> {
    return this.expiries;
  }

  async getOptionChain(_underlying: string, expiry: string): Promise<OptionChainSnapshot> {
    this.chainRequests.push(expiry);
    return makeSnapshot([49_000, 50_000, 51_000], { expiry });
  }
}

class StaticCredentials implements CredentialResolver {
  resolved: string[] = [];
  revoked = false;

  async resolve(handle: CredentialHandle): Promise<ApiKeys> {
    if (this.revoked) throw new CredentialError('CREDENTIAL_REVOKED', handle.id);
    this.resolved.push(handle.id);
    return TEST_KEYS;
  }
}

const SETTINGS: Partial<ExecutionSettings> = {
  requestTimeoutMs: 300,
  submitMaxAttempts: 3,
  submitBackoffBaseMs: 1,
  submitBackoffMaxMs: 5,
  pollIntervalsMs: [5, 10],
  unwindTimeoutMs: 100,
};

describe('StraddleService', () => {
  let gate: FakeGate;
  let credentials: StaticCredentials;
  let exchange: FakeExchange;
  let outcomes: SqliteOutcomeStore;
  let audit: AuditLog;
  let telegram: ReturnType<typeof stubTelegram>;
  let reports: ReconciliationReport[];
  let service: StraddleService;

  beforeEach(() => {
    const db = openDb(':memory:');
    gate = new FakeGate();
    credentials = new StaticCredentials();
    exchange = new FakeExchange();
    outcomes = new SqliteOutcomeStore(db);
    audit = new AuditLog(db);
    telegram = stubTelegram();
    reports = [];
    service = new StraddleService(
      { marketData: gate, credentials, exchange, outcomes, audit, notifier: telegram.notifier },
      { settings: SETTINGS, onReconciliation: (report) => reports.push(report) },
    );
  });

  const handle = { id: 'cred-1' };

  it('executes the ATM straddle, records it, and reconciles positions', async () => {
    const outcome = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });

    expect(outcome).toMatchObject({ status: 'BOTH_FILLED', strike: 50_000, expiry: EXPIRY, credentialId: 'cred-1' });
    expect(outcome.call.order.clientOrderId).toBe('svc00001-C');
    expect(outcome.put.order.clientOrderId).toBe('svc00001-P');
    expect(gate.chainRequests).toEqual([EXPIRY]);
    expect(credentials.resolved).toEqual(['cred-1']);

    expect(outcomes.get(CORR)).toEqual(outcome);
    expect(audit.forCorrelation(CORR).map((r) => r.action)).toEqual([
      'STRADDLE_REQUESTED',
      'STRADDLE_PLANNED',
      'STRADDLE_OUTCOME',
      'RECONCILIATION_MATCHED',
    ]);
    expect(reports).toHaveLength(1);
    expect(reports[0]?.status).toBe('MATCHED');

    await telegram.notifier.flush();
    expect(telegram.texts()).toHaveLength(1);
    expect(telegram.texts()[0]).toContain('<b>스트래들 BOTH_FILLED</b>');
  });

  it('generates a correlation id when none is given', async () => {
    const outcome = await service.executeStraddle(handle, makePreset(), 'BTC');
    expect(outcome.correlationId).toMatch(/^[0-9a-f]{16}$/);
    expect(outcome.call.order.clientOrderId).toBe(`${outcome.correlationId}-C`);
  });

  it('does not create new orders when retried with the same correlation id', async () => {
    await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
    const again = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });

    expect(again).toEqual(outcomes.get(CORR));
    expect(exchange.orderCount()).toBe(2);
    expect(exchange.orderCount('svc00001-C')).toBe(1);
    expect(exchange.callsFor('submit')).toHaveLength(2);
    expect(audit.forCorrelation(CORR).map((r) => r.action)).toContain('STRADDLE_REPLAYED');
  });

  it('rejects a correlation id reused for another preset', async () => {
    await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
    const submits = exchange.callsFor('submit').length;

    await expect(
      service.executeStraddle(handle, makePreset({ id: 'preset-2' }), 'BTC', { correlationId: CORR }),
    ).rejects.toMatchObject({ code: 'CORRELATION_ID_REUSED' });
    expect(exchange.callsFor('submit')).toHaveLength(submits);
  });

  it('refuses to re-plan other instruments under an unfinished correlation id', async () => {
    audit.info(
      'service',
      'STRADDLE_PLANNED',
      JSON.stringify({ call: 'C-BTC-49000-290330', put: 'P-BTC-49000-290330', quantity: 1 }),
      CORR,
    );

    const err = await service
      .executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: 'CORRELATION_ID_REUSED' });
    expect(exchange.calls).toHaveLength(0);
    expect(credentials.resolved).toEqual([]);
  });

  it('resumes an unfinished correlation id when the plan is unchanged', async () => {
    audit.info(
      'service',
      'STRADDLE_PLANNED',
      JSON.stringify({ call: 'C-BTC-50000-290330', put: 'P-BTC-50000-290330', quantity: 1 }),
      CORR,
    );
    const outcome = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
    expect(outcome.status).toBe('BOTH_FILLED');
  });

  describe('closeStraddle', () => {
    it('closes both legs of a stored straddle', async () => {
      await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
      const closed = await service.closeStraddle(handle, CORR);

      expect(closed.status).toBe('CLOSED');
      expect(closed.legs.map((l) => l.order.clientOrderId)).toEqual(['svc00001-C-X', 'svc00001-P-X']);
      const row = audit.forCorrelation(CORR).find((r) => r.action === 'STRADDLE_CLOSE');
      expect(row).toMatchObject({ level: 'INFO', detail: 'status=CLOSED legs=CALL:FILLED,PUT:FILLED' });

      await telegram.notifier.flush();
      expect(telegram.texts()[1]).toContain('<b>스트래들 청산</b> CLOSED');
    });

    it('fails OUTCOME_NOT_FOUND for an unknown correlation id', async () => {
      await expect(service.closeStraddle(handle, 'missing01')).rejects.toMatchObject({ code: 'OUTCOME_NOT_FOUND' });
      expect(exchange.calls).toHaveLength(0);
      expect(audit.forCorrelation('missing01').map((r) => r.action)).toEqual(['CLOSE_REQUESTED', 'CLOSE_ABORTED']);
    });

    it('fails NOTHING_TO_CLOSE for an unwound straddle', async () => {
      exchange.setBehavior('svc00001-P', { reject: 'insufficient_margin' });
      const outcome = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
      expect(outcome.status).toBe('UNWOUND');
      const before = exchange.calls.length;

      await expect(service.closeStraddle(handle, CORR)).rejects.toMatchObject({ code: 'NOTHING_TO_CLOSE' });
      expect(exchange.calls).toHaveLength(before);
    });

    it('refuses to close with another credential', async () => {
      await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });
      await expect(service.closeStraddle({ id: 'cred-2' }, CORR)).rejects.toMatchObject({
        code: 'CORRELATION_ID_REUSED',
      });
    });
  });

  it('records a review-required outcome as critical and alerts', async () => {
    exchange.setBehavior('svc00001-P', { reject: 'insufficient_margin' });
    exchange.setBehavior('svc00001-C-U', { reject: 'reduce_only_violation' });
    const outcome = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });

    expect(outcome).toMatchObject({ status: 'ONE_LEG_FILLED', reviewReason: 'UNWIND_FAILED' });
    const row = audit.forCorrelation(CORR).find((r) => r.action === 'STRADDLE_OUTCOME');
    expect(row?.level).toBe('CRITICAL');
    expect(outcomes.listPendingReview('owner-1').map((o) => o.correlationId)).toEqual([CORR]);

    await telegram.notifier.flush();
    expect(telegram.texts()[1]).toBe('🚨 <b>수동 확인 필요</b>\n사유: UNWIND_FAILED\nID: svc00001');
  });

  it('reports drift from pre-existing positions without changing the outcome', async () => {
    exchange.extraPositions.push({ instrumentId: 'C-BTC-50000-290330', size: 1, entryPrice: null });
    const outcome = await service.executeStraddle(handle, makePreset(), 'BTC', { correlationId: CORR });

    expect(outcome.status).toBe('BOTH_FILLED');
    expect(reports[0]).toMatchObject({ status: 'DRIFT' });
    expect(audit.forCorrelation(CORR).map((r) => r.action)).toContain('RECONCILIATION_DRIFT');
  });

  it('rejects a preset for another underlying before touching the exchange', async () => {
    const err = await service
      .executeStraddle(handle, makePreset({ underlying: 'ETH' }), 'BTC', { correlationId: CORR })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: 'UNDERLYING_MISMATCH' });
    expect(exchange.calls).toHaveLength(0);
    expect(audit.forCorrelation(CORR).map((r) => r.action)).toEqual(['STRADDLE_REQUESTED', 'STRADDLE_ABORTED']);
  });

  it('fails NO_CHAIN_AVAILABLE when no expiry matches the preset', async () => {
    gate.expiries = [];
    await expect(service.executeStraddle(handle, makePreset(), 'BTC')).rejects.toMatchObject({
      code: 'NO_CHAIN_AVAILABLE',
    });
    expect(exchange.calls).toHaveLength(0);
  });

  it('fails NO_STRIKE_NEAR_SPOT when the chain is far from spot', async () => {
    gate.spot = 60_000;
    await expect(service.executeStraddle(handle, makePreset(), 'BTC')).rejects.toMatchObject({
      code: 'NO_STRIKE_NEAR_SPOT',
    });
    expect(exchange.calls).toHaveLength(0);
  });

  it('propagates market data failures and sends nothing', async () => {
    gate.failSpot = true;
    await expect(service.executeStraddle(handle, makePreset(), 'BTC')).rejects.toBeInstanceOf(DataUnavailableError);
    expect(credentials.resolved).toEqual([]);
    expect(exchange.calls).toHaveLength(0);
  });

  it('propagates credential failures and sends nothing', async () => {
    credentials.revoked = true;
    await expect(service.executeStraddle(handle, makePreset(), 'BTC')).rejects.toMatchObject({
      code: 'CREDENTIAL_REVOKED',
    });
    expect(exchange.calls).toHaveLength(0);
  });

  it('fails RISK_LIMIT_EXCEEDED without resolving credentials', async () => {
    await expect(
      service.executeStraddle(handle, makePreset({ lotSize: 20, maxLotSize: 10 }), 'BTC'),
    ).rejects.toMatchObject({ code: 'RISK_LIMIT_EXCEEDED' });
    expect(credentials.resolved).toEqual([]);
  });

  it('throws RequestCancelledError for an already aborted request', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      service.executeStraddle(handle, makePreset(), 'BTC', { signal: controller.signal }),
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(exchange.calls).toHaveLength(0);
  });

  it('returns the outcome even when the reconciliation callback throws', async () => {
    const onReconciliation = vi.fn(() => {
      throw new Error('listener bug');
    });
    const svc = new StraddleService({ marketData: gate, credentials, exchange }, { settings: SETTINGS, onReconciliation });

    const outcome = await svc.executeStraddle(handle, makePreset(), 'BTC');
    expect(outcome.status).toBe('BOTH_FILLED');
    expect(onReconciliation).toHaveBeenCalledOnce();
  });
});
