import type { LegResult, LegStatus, OutcomeStatus, ReviewReason } from '../types/index.js';

type MappedLeg = 'FILLED' | 'FAILED';

/** PARTIALLY_FILLED는 FILLED로, PENDING(미해결)은 TIMEOUT과 같이 실패로 본다 */
function classify(status: LegStatus): MappedLeg {
  return status === 'FILLED' || status === 'PARTIALLY_FILLED' ? 'FILLED' : 'FAILED';
}

function unwound(leg: Pick<LegResult, 'unwind'>): boolean {
  return leg.unwind?.status === 'FILLED';
}

/**
 * 두 레그 결과 → 전체 결과. 순수 함수이며 전체 상태는 이 함수로만 정해진다.
 *
 * | call   | put    | 결과                                  |
 * |--------|--------|---------------------------------------|
 * | FILLED | FILLED | BOTH_FILLED                           |
 * | FILLED | FAILED | ONE_LEG_FILLED (언와인드 체결 시 UNWOUND) |
 * | FAILED | FILLED | ONE_LEG_FILLED (언와인드 체결 시 UNWOUND) |
 * | FAILED | FAILED | BOTH_REJECTED                         |
 */
export function mapOutcome(
  call: Pick<LegResult, 'status' | 'unwind'>,
  put: Pick<LegResult, 'status' | 'unwind'>,
): OutcomeStatus {
  const c = classify(call.status);
  const p = classify(put.status);

  if (c === 'FILLED' && p === 'FILLED') return 'BOTH_FILLED';
  if (c === 'FAILED' && p === 'FAILED') return 'BOTH_REJECTED';

  const filled = c === 'FILLED' ? call : put;
  return unwound(filled) ? 'UNWOUND' : 'ONE_LEG_FILLED';
}

/** 양쪽 체결이지만 부분 체결이 섞이면 수동 확인 */
export function reviewForBothFilled(call: LegResult, put: LegResult): ReviewReason | null {
  if (call.status === 'PARTIALLY_FILLED' || put.status === 'PARTIALLY_FILLED') return 'PARTIAL_FILL';
  return null;
}
