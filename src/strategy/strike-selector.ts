import { StrikeSelectionError } from '../errors.js';
import type { OptionChainSnapshot, StrikePair } from '../types/index.js';

export interface StrikeSelectorOptions {
  /** 현물 대비 허용 괴리 (%): 이보다 멀면 체인이 오래됐거나 듬성한 것으로 본다 */
  maxDeviationPct: number;
  /** 스냅샷 최대 허용 나이 (ms). 0 이하이면 검사 안 함 */
  maxSnapshotAgeMs?: number;
  now?: number;
}

/**
 * ATM 행사가 선택
 * - |strike - spot| 최소인 행사가
 * - 동률이면 낮은 행사가 (재현 가능)
 * - 부수효과 없음
 */
export function selectAtmStrikes(
  snapshot: OptionChainSnapshot,
  spot: number,
  options: StrikeSelectorOptions,
): StrikePair {
  if (snapshot.rows.length === 0) {
    throw new StrikeSelectionError('NO_CHAIN_AVAILABLE', `Empty option chain for ${snapshot.underlying.symbol}`, {
      underlying: snapshot.underlying.symbol,
      expiry: snapshot.expiry,
    });
  }

  const maxAge = options.maxSnapshotAgeMs ?? 0;
  if (maxAge > 0) {
    const age = (options.now ?? Date.now()) - snapshot.timestamp;
    if (age > maxAge) {
      throw new StrikeSelectionError('NO_CHAIN_AVAILABLE', `Option chain snapshot is stale (${age}ms old)`, {
        underlying: snapshot.underlying.symbol,
        ageMs: age,
        maxSnapshotAgeMs: maxAge,
      });
    }
  }

  if (!Number.isFinite(spot) || spot <= 0) {
    throw new StrikeSelectionError('NO_STRIKE_NEAR_SPOT', `Invalid spot price: ${spot}`, { spot });
  }

  let best = snapshot.rows[0]!;
  let bestDistance = Math.abs(best.strike - spot);
  for (const row of snapshot.rows) {
    const distance = Math.abs(row.strike - spot);
    if (distance < bestDistance || (distance === bestDistance && row.strike < best.strike)) {
      best = row;
      bestDistance = distance;
    }
  }

  const maxDistance = spot * (options.maxDeviationPct / 100);
  if (bestDistance > maxDistance) {
    throw new StrikeSelectionError(
      'NO_STRIKE_NEAR_SPOT',
      `Nearest strike ${best.strike} is ${bestDistance} away from spot ${spot} (max ${maxDistance})`,
      { spot, strike: best.strike, distance: bestDistance, maxDistance },
    );
  }

  return {
    underlying: snapshot.underlying,
    expiry: snapshot.expiry,
    strike: best.strike,
    callInstrumentId: best.callInstrumentId,
    putInstrumentId: best.putInstrumentId,
    callMarkPrice: best.callMarkPrice,
    putMarkPrice: best.putMarkPrice,
  };
}
