/** 거래소 포지션. size는 부호 포함 (+ 매수, - 매도) */
export interface ExchangePosition {
  readonly instrumentId: string;
  readonly size: number;
  readonly entryPrice: number | null;
}

export type ReconciliationStatus = 'MATCHED' | 'DRIFT' | 'UNAVAILABLE';

export interface ReconciliationEntry {
  readonly instrumentId: string;
  readonly expectedQty: number;
  readonly actualQty: number;
  readonly drift: number;   // actual - expected
}

export interface ReconciliationReport {
  readonly correlationId: string;
  readonly checkedAt: number;
  readonly status: ReconciliationStatus;
  readonly entries: readonly ReconciliationEntry[];
  readonly error: string | null;
}
