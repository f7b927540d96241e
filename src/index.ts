export * from './types/index.js';
export * from './errors.js';
export { config, type AppConfig } from './config.js';
export { logger, createChildLogger, type Logger } from './logger.js';

export { selectAtmStrikes, type StrikeSelectorOptions } from './strategy/strike-selector.js';
export { selectExpiry } from './strategy/expiry-selector.js';
export { planStraddle, legClientOrderId, roundToTick } from './strategy/order-planner.js';
export { SqliteStrategyStore, parsePreset, strategyPresetSchema, type StrategyStore } from './strategy/strategy-store.js';

export { ExecutionCoordinator, type CoordinatorOptions, type ExecutionMeta } from './execution/coordinator.js';
export { mapOutcome } from './execution/outcome.js';
export { planProtectiveOrders, type ProtectiveOrderPlan } from './execution/protective-orders.js';
export { RetryPolicy, RetryExhaustedError, type RetryPolicyOptions } from './execution/retry-policy.js';
export { LegStateMachine } from './execution/leg-state-machine.js';
export { createRequestContext, newCorrelationId, type RequestContext } from './execution/request-context.js';
export { DeltaPrivateApi } from './execution/delta-api.js';

export { DeltaMarketDataGate, type MarketDataGate } from './market/market-data-gate.js';
export { PositionReconciler } from './reconcile/position-reconciler.js';
export { SecretBox } from './credentials/secret-box.js';
export {
  SqliteCredentialResolver,
  SqliteCredentialStore,
  type CredentialResolver,
} from './credentials/credential-resolver.js';
export { SqliteOutcomeStore, executionOutcomeSchema } from './history/outcome-store.js';
export { AuditLog, type AuditLevel, type AuditRow } from './safety/audit-log.js';
export { Notifier } from './notification/notifier.js';
export { TelegramNotifier } from './notification/telegram.js';
export {
  StraddleService,
  DEFAULT_SETTINGS,
  type ExecutionSettings,
  type ExecuteOptions,
  type ReconciliationCallback,
  type StraddleServiceDeps,
} from './service/straddle-service.js';
