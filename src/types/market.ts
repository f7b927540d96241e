/** 기초자산 참조 데이터 (거래소에서 주기적으로 갱신) */
export interface Underlying {
  readonly symbol: string;              // BTC, ETH
  readonly tickSize: number;            // 옵션 프리미엄 호가 단위
  readonly lotSize: number;             // 최소 주문 단위 (계약)
  readonly contractMultiplier: number;  // 계약당 기초자산 수량
}

export interface OptionChainRow {
  readonly strike: number;
  readonly callInstrumentId: string;
  readonly putInstrumentId: string;
  readonly callMarkPrice: number | null;
  readonly putMarkPrice: number | null;
}

/** 단일 만기 옵션체인 스냅샷. 한 번 받으면 불변 */
export interface OptionChainSnapshot {
  readonly underlying: Underlying;
  readonly expiry: string;              // 결제 시각 (ISO)
  readonly timestamp: number;           // 조회 시각 Unix ms
  readonly rows: readonly OptionChainRow[];  // strike 오름차순
}

export interface StrikePair {
  readonly underlying: Underlying;
  readonly expiry: string;
  readonly strike: number;
  readonly callInstrumentId: string;
  readonly putInstrumentId: string;
  readonly callMarkPrice: number | null;
  readonly putMarkPrice: number | null;
}
