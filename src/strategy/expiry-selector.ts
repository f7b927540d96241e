import type { ExpiryType } from '../types/index.js';

const FRIDAY = 5;
const DAY_MS = 86_400_000;

function isFriday(d: Date): boolean {
  return d.getUTCDay() === FRIDAY;
}

/** 해당 월의 마지막 금요일인지 (7일 뒤가 다음 달) */
function isLastFridayOfMonth(d: Date): boolean {
  if (!isFriday(d)) return false;
  const next = new Date(d.getTime() + 7 * DAY_MS);
  return next.getUTCMonth() !== d.getUTCMonth();
}

/**
 * 프리셋 만기 유형에 맞는 가장 가까운 미래 만기 선택
 * - DAILY: 가장 가까운 만기
 * - WEEKLY: 금요일 만기
 * - MONTHLY: 월말 마지막 금요일 만기
 * 후보가 없으면 null
 */
export function selectExpiry(expiries: readonly string[], expiryType: ExpiryType, now: number = Date.now()): string | null {
  const upcoming = expiries
    .map((e) => ({ id: e, at: Date.parse(e) }))
    .filter((e) => Number.isFinite(e.at) && e.at > now)
    .sort((a, b) => a.at - b.at);

  const match = upcoming.find((e) => {
    const d = new Date(e.at);
    switch (expiryType) {
      case 'DAILY':
        return true;
      case 'WEEKLY':
        return isFriday(d);
      case 'MONTHLY':
        return isLastFridayOfMonth(d);
    }
  });
  return match?.id ?? null;
}
