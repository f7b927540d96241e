import { z } from 'zod';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { CoreError, RequestCancelledError, StrikeSelectionError, ValidationError, errorMessage } from '../errors.js';
import { selectExpiry } from '../strategy/expiry-selector.js';
import { selectAtmStrikes } from '../strategy/strike-selector.js';
import { planStraddle } from '../strategy/order-planner.js';
import { ExecutionCoordinator } from '../execution/coordinator.js';
import { RetryPolicy } from '../execution/retry-policy.js';
import { createRequestContext, newCorrelationId } from '../execution/request-context.js';
import { PositionReconciler } from '../reconcile/position-reconciler.js';
import type { MarketDataGate } from '../market/market-data-gate.js';
import type { CredentialResolver } from '../credentials/credential-resolver.js';
import type { SqliteOutcomeStore } from '../history/outcome-store.js';
import type { AuditLog } from '../safety/audit-log.js';
import type { Notifier } from '../notification/notifier.js';
import type {
  ApiKeys,
  CloseOutcome,
  CredentialHandle,
  ExchangeOrderApi,
  ExecutionOutcome,
  ReconciliationReport,
  StraddlePlan,
  StrategyPreset,
  StrikePair,
} from '../types/index.js';

const log = createChildLogger('straddle-service');

/** STRADDLE_PLANNED 감사 기록의 detail */
const plannedDetailSchema = z.object({
  call: z.string(),
  put: z.string(),
  quantity: z.number(),
});
type PlannedDetail = z.infer<typeof plannedDetailSchema>;

function plannedDetail(plan: StraddlePlan): PlannedDetail {
  return { call: plan.call.instrumentId, put: plan.put.instrumentId, quantity: plan.call.quantity };
}

export type ReconciliationCallback = (report: ReconciliationReport, outcome: ExecutionOutcome) => void;

export interface StraddleServiceDeps {
  marketData: MarketDataGate;
  credentials: CredentialResolver;
  exchange: ExchangeOrderApi;
  outcomes?: SqliteOutcomeStore | null;
  audit?: AuditLog | null;
  notifier?: Notifier | null;
}

export interface ExecutionSettings {
  requestTimeoutMs: number;
  submitMaxAttempts: number;
  submitBackoffBaseMs: number;
  submitBackoffMaxMs: number;
  pollIntervalsMs: readonly number[];
  unwindTimeoutMs: number;
  maxDeviationPct: number;
  maxSnapshotAgeMs: number;
}

export const DEFAULT_SETTINGS: ExecutionSettings = {
  requestTimeoutMs: config.execution.requestTimeoutMs,
  submitMaxAttempts: config.execution.submitMaxAttempts,
  submitBackoffBaseMs: config.execution.submitBackoffBaseMs,
  submitBackoffMaxMs: config.execution.submitBackoffMaxMs,
  pollIntervalsMs: config.execution.pollIntervalsMs,
  unwindTimeoutMs: config.execution.unwindTimeoutMs,
  maxDeviationPct: config.strikes.maxDeviationPct,
  maxSnapshotAgeMs: config.strikes.maxSnapshotAgeMs,
};

interface PreparedRequest {
  pair: StrikePair;
  plan: StraddlePlan;
  keys: ApiKeys;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /**
   * 재시도 시 같은 값을 넘기면 clientOrderId가 같아져 거래소 제출이 멱등.
   * 이미 확정된 결과가 있으면 그 결과를 그대로 돌려준다.
   */
  correlationId?: string;
}

/**
 * 스트래들 실행 진입점
 * 만기 선택 → 시세/체인 → ATM 행사가 → 주문 계획 → 자격증명 → 실행 → 기록/알림 → 포지션 대사
 * closeStraddle: 저장된 실행 결과의 남은 포지션 청산
 *
 * 주문 제출 전 실패는 throw, 제출 이후는 항상 ExecutionOutcome을 돌려준다.
 */
export class StraddleService {
  private readonly coordinator: ExecutionCoordinator;
  private readonly reconciler: PositionReconciler;
  private readonly settings: ExecutionSettings;
  private readonly onReconciliation: ReconciliationCallback | undefined;

  constructor(
    private readonly deps: StraddleServiceDeps,
    opts?: { settings?: Partial<ExecutionSettings>; onReconciliation?: ReconciliationCallback },
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...opts?.settings };
    this.onReconciliation = opts?.onReconciliation;
    this.coordinator = new ExecutionCoordinator(deps.exchange, {
      retry: new RetryPolicy({
        maxAttempts: this.settings.submitMaxAttempts,
        baseDelayMs: this.settings.submitBackoffBaseMs,
        maxDelayMs: this.settings.submitBackoffMaxMs,
      }),
      pollIntervalsMs: this.settings.pollIntervalsMs,
      unwindTimeoutMs: this.settings.unwindTimeoutMs,
    });
    this.reconciler = new PositionReconciler(deps.exchange);
  }

  async executeStraddle(
    handle: CredentialHandle,
    preset: StrategyPreset,
    underlying: string,
    options: ExecuteOptions = {},
  ): Promise<ExecutionOutcome> {
    const correlationId = options.correlationId ?? newCorrelationId();
    const rlog = log.child({ correlationId });
    const audit = this.deps.audit ?? null;
    audit?.info('service', 'STRADDLE_REQUESTED', `strategy=${preset.id} underlying=${underlying}`, correlationId);

    let prepared: PreparedRequest;
    try {
      const stored = this.storedOutcome(correlationId, handle, preset);
      if (stored) {
        rlog.info({ status: stored.status }, 'Correlation id already finalized, returning stored outcome');
        audit?.info('service', 'STRADDLE_REPLAYED', `status=${stored.status}`, correlationId);
        return stored;
      }
      prepared = await this.prepare(handle, preset, underlying, correlationId, options.signal);
    } catch (err) {
      const code = err instanceof CoreError ? err.code : 'UNEXPECTED';
      rlog.warn({ code, err: errorMessage(err) }, 'Straddle request failed before submission');
      audit?.warn('service', 'STRADDLE_ABORTED', `${code}: ${errorMessage(err)}`, correlationId);
      throw err;
    }

    const { pair, plan, keys } = prepared;
    audit?.info('service', 'STRADDLE_PLANNED', JSON.stringify(plannedDetail(plan)), correlationId);
    const ctx = createRequestContext({
      correlationId,
      keys,
      timeoutMs: this.settings.requestTimeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
    });

    let outcome: ExecutionOutcome;
    try {
      outcome = await this.coordinator.execute(plan, { pair, preset, credentialId: handle.id }, ctx);
    } catch (err) {
      audit?.warn('service', 'STRADDLE_ABORTED', errorMessage(err), correlationId);
      throw err;
    }

    this.record(outcome);
    const report = await this.reconciler.reconcile(outcome, keys);
    this.publishReconciliation(report, outcome);
    return outcome;
  }

  async closeStraddle(
    handle: CredentialHandle,
    correlationId: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<CloseOutcome> {
    const audit = this.deps.audit ?? null;
    audit?.info('service', 'CLOSE_REQUESTED', `credential=${handle.id}`, correlationId);

    let outcome: ExecutionOutcome;
    let keys: ApiKeys;
    try {
      outcome = this.closable(correlationId, handle);
      keys = await this.deps.credentials.resolve(handle);
    } catch (err) {
      const code = err instanceof CoreError ? err.code : 'UNEXPECTED';
      log.warn({ correlationId, code, err: errorMessage(err) }, 'Straddle close failed before submission');
      audit?.warn('service', 'CLOSE_ABORTED', `${code}: ${errorMessage(err)}`, correlationId);
      throw err;
    }

    const ctx = createRequestContext({
      correlationId,
      keys,
      timeoutMs: this.settings.requestTimeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
    });
    let result: CloseOutcome;
    try {
      result = await this.coordinator.close(outcome, ctx);
    } catch (err) {
      audit?.warn('service', 'CLOSE_ABORTED', errorMessage(err), correlationId);
      throw err;
    }

    try {
      audit?.[result.reviewRequired ? 'critical' : 'info'](
        'service',
        'STRADDLE_CLOSE',
        `status=${result.status} legs=${result.legs.map((l) => `${l.order.leg}:${l.status}`).join(',') || '-'}`,
        correlationId,
      );
    } catch (err) {
      log.error({ correlationId, err: errorMessage(err) }, 'Failed to audit close');
    }
    this.deps.notifier?.notifyClose(result);
    return result;
  }

  private closable(correlationId: string, handle: CredentialHandle): ExecutionOutcome {
    const outcome = this.deps.outcomes?.get(correlationId) ?? null;
    if (!outcome) {
      throw new ValidationError('OUTCOME_NOT_FOUND', `No finalized straddle ${correlationId}`, { correlationId });
    }
    if (outcome.credentialId !== handle.id) {
      throw new ValidationError(
        'CORRELATION_ID_REUSED',
        `Straddle ${correlationId} was executed with another credential`,
        { correlationId, credentialId: outcome.credentialId },
      );
    }
    if (outcome.status === 'BOTH_REJECTED' || outcome.status === 'UNWOUND') {
      throw new ValidationError('NOTHING_TO_CLOSE', `Straddle ${correlationId} has no open legs (${outcome.status})`, {
        correlationId,
        status: outcome.status,
      });
    }
    return outcome;
  }

  /** 제출 전 단계. 여기서 나는 에러는 모두 호출자에게 그대로 전달 */
  private async prepare(
    handle: CredentialHandle,
    preset: StrategyPreset,
    underlying: string,
    correlationId: string,
    signal: AbortSignal | undefined,
  ): Promise<PreparedRequest> {
    if (preset.underlying !== underlying) {
      throw new ValidationError(
        'UNDERLYING_MISMATCH',
        `Preset ${preset.id} is for ${preset.underlying}, not ${underlying}`,
        { presetUnderlying: preset.underlying, underlying },
      );
    }
    if (signal?.aborted) throw new RequestCancelledError(correlationId);

    const { marketData } = this.deps;
    const expiries = await marketData.getExpiries(underlying);
    const expiry = selectExpiry(expiries, preset.expiryType);
    if (expiry === null) {
      throw new StrikeSelectionError('NO_CHAIN_AVAILABLE', `No ${preset.expiryType} expiry listed for ${underlying}`, {
        underlying,
        expiryType: preset.expiryType,
      });
    }

    const [spot, chain] = await Promise.all([
      marketData.getSpotPrice(underlying),
      marketData.getOptionChain(underlying, expiry),
    ]);
    const pair = selectAtmStrikes(chain, spot, {
      maxDeviationPct: this.settings.maxDeviationPct,
      maxSnapshotAgeMs: this.settings.maxSnapshotAgeMs,
    });
    const plan = planStraddle(pair, preset, correlationId);
    this.assertSamePlan(correlationId, plan);
    log.info({ correlationId, underlying, expiry, spot, strike: pair.strike }, 'ATM straddle planned');

    const keys = await this.deps.credentials.resolve(handle);
    return { pair, plan, keys };
  }

  /** 같은 correlationId의 확정 결과. 다른 전략/자격증명의 것이면 재사용 거부 */
  private storedOutcome(
    correlationId: string,
    handle: CredentialHandle,
    preset: StrategyPreset,
  ): ExecutionOutcome | null {
    const stored = this.deps.outcomes?.get(correlationId) ?? null;
    if (!stored) return null;
    if (stored.strategyId !== preset.id || stored.credentialId !== handle.id) {
      throw new ValidationError(
        'CORRELATION_ID_REUSED',
        `Correlation id ${correlationId} belongs to another request`,
        { correlationId, strategyId: stored.strategyId, credentialId: stored.credentialId },
      );
    }
    return stored;
  }

  /**
   * 결과 확정 전에 중단된 요청의 재시도: 시세가 움직여 다른 종목이 잡히면
   * 같은 clientOrderId가 이전 종목의 주문을 가리키게 되므로 제출하지 않는다.
   */
  private assertSamePlan(correlationId: string, plan: StraddlePlan): void {
    const rows = this.deps.audit?.forCorrelation(correlationId) ?? [];
    const next = plannedDetail(plan);
    for (const row of rows) {
      if (row.action !== 'STRADDLE_PLANNED' || row.detail === null) continue;
      const prior = plannedDetailSchema.safeParse(JSON.parse(row.detail));
      if (!prior.success) continue;
      const p = prior.data;
      if (p.call !== next.call || p.put !== next.put || p.quantity !== next.quantity) {
        throw new ValidationError(
          'CORRELATION_ID_REUSED',
          `Correlation id ${correlationId} was planned for ${p.call} / ${p.put}`,
          { correlationId, planned: p, replanned: next },
        );
      }
    }
  }

  /** 저장/감사/알림 실패는 결과를 바꾸지 않는다 */
  private record(outcome: ExecutionOutcome): void {
    try {
      this.deps.outcomes?.save(outcome);
      const level = outcome.reviewRequired ? 'critical' : 'info';
      this.deps.audit?.[level](
        'service',
        'STRADDLE_OUTCOME',
        `status=${outcome.status} review=${outcome.reviewReason ?? '-'} call=${outcome.call.status} put=${outcome.put.status}`,
        outcome.correlationId,
      );
    } catch (err) {
      log.error({ correlationId: outcome.correlationId, err: errorMessage(err) }, 'Failed to record outcome');
    }
    this.deps.notifier?.notifyOutcome(outcome);
  }

  private publishReconciliation(report: ReconciliationReport, outcome: ExecutionOutcome): void {
    try {
      this.deps.audit?.[report.status === 'MATCHED' ? 'info' : 'warn'](
        'reconciler',
        `RECONCILIATION_${report.status}`,
        report.error ?? JSON.stringify(report.entries),
        report.correlationId,
      );
    } catch (err) {
      log.error({ correlationId: report.correlationId, err: errorMessage(err) }, 'Failed to audit reconciliation');
    }
    this.deps.notifier?.notifyDrift(report);
    try {
      this.onReconciliation?.(report, outcome);
    } catch (err) {
      log.warn({ correlationId: report.correlationId, err: errorMessage(err) }, 'onReconciliation callback threw');
    }
  }
}
