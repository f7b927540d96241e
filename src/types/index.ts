export type {
  Underlying,
  OptionChainRow,
  OptionChainSnapshot,
  StrikePair,
} from './market.js';
export type {
  StraddleSide,
  ExpiryType,
  PresetOrderType,
  ProtectionSettings,
  StrategyPreset,
} from './strategy.js';
export type {
  LegTag,
  OrderSide,
  LegOrderType,
  LegOrder,
  LegState,
  LegStatus,
  TerminalLegStatus,
  LegErrorKind,
  LegError,
  UnwindAttempt,
  ProtectionKind,
  ProtectiveOrderResult,
  LegResult,
  StraddlePlan,
} from './order.js';
export type { OutcomeStatus, ReviewReason, ExecutionOutcome, CloseStatus, CloseOutcome } from './outcome.js';
export type {
  ExchangePosition,
  ReconciliationStatus,
  ReconciliationEntry,
  ReconciliationReport,
} from './position.js';
export type {
  ApiKeys,
  CredentialHandle,
  ExchangeOrderState,
  OrderAck,
  ExchangeOrderApi,
} from './exchange.js';
