export type StraddleSide = 'LONG' | 'SHORT';
export type ExpiryType = 'DAILY' | 'WEEKLY' | 'MONTHLY';

export type PresetOrderType =
  | { readonly kind: 'MARKET' }
  | { readonly kind: 'LIMIT'; readonly offsetPct: number };  // 마크가격 대비 %

/** 진입 체결 후 레그별 보호 주문. 레그 평균 체결가 대비 % */
export interface ProtectionSettings {
  readonly stopLossPct: number | null;
  readonly takeProfitPct: number | null;
}

/** 사용자 전략 프리셋. 코어에서는 읽기 전용 */
export interface StrategyPreset {
  readonly id: string;
  readonly ownerId: string;
  readonly name: string;
  readonly underlying: string;
  readonly lotSize: number;        // 레그당 요청 계약 수
  readonly side: StraddleSide;
  readonly orderType: PresetOrderType;
  readonly maxLotSize: number;
  readonly expiryType: ExpiryType;
  readonly protection: ProtectionSettings | null;
}
