export type LegTag = 'CALL' | 'PUT';
export type OrderSide = 'buy' | 'sell';
export type LegOrderType = 'MARKET' | 'LIMIT' | 'STOP_MARKET';

export interface LegOrder {
  readonly instrumentId: string;
  readonly leg: LegTag;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly orderType: LegOrderType;
  readonly price: number | null;   // 시장가는 null
  readonly clientOrderId: string;  // 멱등 키: <corrId>-C / <corrId>-P
  readonly reduceOnly: boolean;
  readonly stopPrice?: number;     // STOP_MARKET 트리거 가격
}

/** 레그 진행 상태 (상태 머신) */
export type LegState = 'NOT_SENT' | 'SENT' | 'FILLED' | 'PARTIALLY_FILLED' | 'REJECTED' | 'TIMEOUT';

/** 결과에 기록되는 상태 */
export type LegStatus = 'PENDING' | 'FILLED' | 'PARTIALLY_FILLED' | 'REJECTED' | 'TIMEOUT';
export type TerminalLegStatus = Exclude<LegStatus, 'PENDING'>;

export type LegErrorKind = 'TRANSIENT_SUBMISSION' | 'EXCHANGE_REJECTION' | 'TIMEOUT' | 'UNWIND';

export interface LegError {
  readonly kind: LegErrorKind;
  readonly message: string;
}

export interface UnwindAttempt {
  readonly order: LegOrder;
  readonly status: 'FILLED' | 'FAILED';
  readonly exchangeOrderId: string | null;
  readonly filledQty: number;
  readonly avgPrice: number | null;
  readonly error: LegError | null;
}

export type ProtectionKind = 'STOP_LOSS' | 'TAKE_PROFIT';

/** 체결된 레그에 걸어 둔 보호 주문. 거래소에 접수되면 PLACED */
export interface ProtectiveOrderResult {
  readonly kind: ProtectionKind;
  readonly order: LegOrder;
  readonly status: 'PLACED' | 'FAILED';
  readonly exchangeOrderId: string | null;
  readonly error: string | null;
}

export interface LegResult {
  readonly order: LegOrder;
  readonly status: LegStatus;
  readonly exchangeOrderId: string | null;
  readonly filledQty: number;
  readonly avgPrice: number | null;
  readonly error: LegError | null;
  readonly attempts: number;
  readonly unwind: UnwindAttempt | null;
}

export interface StraddlePlan {
  readonly correlationId: string;
  readonly call: LegOrder;
  readonly put: LegOrder;
}
