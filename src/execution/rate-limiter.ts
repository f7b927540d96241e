import { sleep, type Sleep } from './retry-policy.js';

interface Bucket {
  tokens: number;
  refilledAt: number;
}

/**
 * API 키 단위 토큰 버킷
 * Delta Exchange는 키마다 요청 한도를 따로 센다. 버킷은 첫 요청 때 가득 찬 상태로 생긴다.
 */
export class KeyedRateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly perMs: number;

  constructor(
    private readonly maxPerSec: number,
    private readonly wait: Sleep = sleep,
  ) {
    this.perMs = maxPerSec / 1000;
  }

  async acquire(key: string): Promise<void> {
    const bucket = this.refill(key);
    if (bucket.tokens >= 1) {
      bucket.tokens--;
      return;
    }

    const waitMs = Math.ceil((1 - bucket.tokens) / this.perMs);
    bucket.tokens--; // 대기 중 다른 호출이 같은 토큰을 잡지 않도록 선차감
    await this.wait(waitMs);
  }

  available(key: string): number {
    return Math.floor(this.refill(key).tokens);
  }

  get size(): number {
    return this.buckets.size;
  }

  private refill(key: string): Bucket {
    const now = Date.now();
    const bucket = this.buckets.get(key);
    if (!bucket) {
      const fresh = { tokens: this.maxPerSec, refilledAt: now };
      this.buckets.set(key, fresh);
      return fresh;
    }
    bucket.tokens = Math.min(this.maxPerSec, bucket.tokens + (now - bucket.refilledAt) * this.perMs);
    bucket.refilledAt = now;
    return bucket;
  }
}
