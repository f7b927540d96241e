/**
 * 실행 코어 에러 분류
 *
 * 주문 제출 이전 단계(시세/검증/자격증명)는 throw로 즉시 중단한다.
 * 제출 이후의 실패는 throw하지 않고 LegResult.error / ExecutionOutcome에 담긴다.
 */
export type CoreErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'NO_CHAIN_AVAILABLE'
  | 'NO_STRIKE_NEAR_SPOT'
  | 'INVALID_LOT_SIZE'
  | 'RISK_LIMIT_EXCEEDED'
  | 'MISSING_REFERENCE_PRICE'
  | 'UNDERLYING_MISMATCH'
  | 'INVALID_PRESET'
  | 'CORRELATION_ID_REUSED'
  | 'OUTCOME_NOT_FOUND'
  | 'NOTHING_TO_CLOSE'
  | 'CREDENTIAL_NOT_FOUND'
  | 'CREDENTIAL_REVOKED'
  | 'STRATEGY_NOT_FOUND'
  | 'TRANSIENT_SUBMISSION'
  | 'EXCHANGE_REJECTION'
  | 'REQUEST_CANCELLED';

export class CoreError extends Error {
  readonly code: CoreErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: CoreErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** 시세/옵션체인 조회 실패. 주문은 나가지 않는다 */
export class DataUnavailableError extends CoreError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super('DATA_UNAVAILABLE', message, details, options);
  }
}

export class StrikeSelectionError extends CoreError {
  constructor(code: 'NO_CHAIN_AVAILABLE' | 'NO_STRIKE_NEAR_SPOT', message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
  }
}

export type ValidationCode =
  | 'INVALID_LOT_SIZE'
  | 'RISK_LIMIT_EXCEEDED'
  | 'MISSING_REFERENCE_PRICE'
  | 'UNDERLYING_MISMATCH'
  | 'INVALID_PRESET'
  | 'CORRELATION_ID_REUSED'
  | 'OUTCOME_NOT_FOUND'
  | 'NOTHING_TO_CLOSE';

export class ValidationError extends CoreError {
  constructor(code: ValidationCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
  }
}

export class CredentialError extends CoreError {
  constructor(code: 'CREDENTIAL_NOT_FOUND' | 'CREDENTIAL_REVOKED', credentialId: string) {
    super(
      code,
      code === 'CREDENTIAL_NOT_FOUND' ? `Credential not found: ${credentialId}` : `Credential revoked: ${credentialId}`,
      { credentialId },
    );
  }
}

export class StrategyNotFoundError extends CoreError {
  constructor(strategyId: string) {
    super('STRATEGY_NOT_FOUND', `Strategy preset not found: ${strategyId}`, { strategyId });
  }
}

/** 네트워크 오류, 429, 5xx: 재시도 대상 */
export class TransientSubmissionError extends CoreError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super('TRANSIENT_SUBMISSION', message, { statusCode }, options);
    this.statusCode = statusCode;
  }
}

/** 거래소가 명시적으로 거절 (증거금 부족, 잘못된 상품 등): 재시도하지 않는다 */
export class ExchangeRejectionError extends CoreError {
  readonly reason: string;
  readonly statusCode: number;

  constructor(reason: string, statusCode: number, details: Record<string, unknown> = {}) {
    super('EXCHANGE_REJECTION', `Exchange rejected request: ${reason}`, { ...details, statusCode });
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

export class RequestCancelledError extends CoreError {
  constructor(correlationId: string) {
    super('REQUEST_CANCELLED', 'Request cancelled before any order was sent', { correlationId });
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientSubmissionError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
