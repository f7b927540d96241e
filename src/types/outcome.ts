import type { LegResult, ProtectiveOrderResult } from './order.js';
import type { StraddleSide } from './strategy.js';

export type OutcomeStatus = 'BOTH_FILLED' | 'ONE_LEG_FILLED' | 'BOTH_REJECTED' | 'UNWOUND';

export type ReviewReason =
  | 'UNWIND_FAILED'
  | 'UNWIND_UNSUPPORTED'
  | 'SIBLING_UNCONFIRMED'
  | 'LEG_UNCONFIRMED'
  | 'PARTIAL_FILL'
  | 'PROTECTION_FAILED';

/** 요청당 1개. 확정 후 불변이며 /history 에 저장되는 유일한 산출물 */
export interface ExecutionOutcome {
  readonly correlationId: string;
  readonly ownerId: string;
  readonly strategyId: string;
  readonly credentialId: string;
  readonly underlying: string;
  readonly expiry: string;
  readonly strike: number;
  readonly side: StraddleSide;
  readonly call: LegResult;
  readonly put: LegResult;
  readonly protectiveOrders: readonly ProtectiveOrderResult[];
  readonly status: OutcomeStatus;
  readonly reviewRequired: boolean;
  readonly reviewReason: ReviewReason | null;
  readonly createdAt: number;
  readonly finalizedAt: number;
}

export type CloseStatus = 'CLOSED' | 'PARTIALLY_CLOSED' | 'FAILED';

/**
 * 스트래들 청산 결과. correlationId는 청산 대상 실행의 것.
 * 보호 주문 취소 → 남은 수량을 reduce-only 시장가로 청산
 */
export interface CloseOutcome {
  readonly correlationId: string;
  readonly legs: readonly LegResult[];
  readonly cancelledProtection: readonly string[];
  readonly status: CloseStatus;
  readonly reviewRequired: boolean;
  readonly finalizedAt: number;
}
