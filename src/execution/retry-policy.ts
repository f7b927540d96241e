import { isTransient } from '../errors.js';

export interface RetryPolicyOptions {
  /** 첫 시도 포함 최대 시도 횟수 */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
}

export interface RetryRunOptions {
  /** 재시도 대상 판정. 기본: TransientSubmissionError만 */
  isRetryable?: (err: unknown) => boolean;
  /** 이 시각(Unix ms)을 넘기는 대기는 하지 않는다 */
  deadline?: number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Retry budget exhausted after ${attempts} attempt(s)`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * 유한 재시도 정책: 지수 백오프 (base * factor^n, 상한 maxDelayMs)
 * 재시도 불가 에러는 그대로 전파, 예산 소진 시 RetryExhaustedError.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;
  private readonly wait: Sleep;

  constructor(options: RetryPolicyOptions, wait: Sleep = sleep) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.factor = options.factor ?? 2;
    this.wait = wait;
  }

  /** n번째 재시도 전 대기 (n = 0부터) */
  delayFor(retryIndex: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.factor, retryIndex));
  }

  /** 백오프 스케줄 전체 (테스트/로그용) */
  schedule(): number[] {
    return Array.from({ length: this.maxAttempts - 1 }, (_, i) => this.delayFor(i));
  }

  async execute<T>(op: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    const isRetryable = options.isRetryable ?? isTransient;
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      attempts = attempt;
      try {
        return await op(attempt);
      } catch (err) {
        if (!isRetryable(err)) throw err;
        lastError = err;
        if (attempt === this.maxAttempts) break;

        const delay = this.delayFor(attempt - 1);
        if (options.deadline !== undefined && Date.now() + delay >= options.deadline) break;
        options.onRetry?.(err, attempt, delay);
        await this.wait(delay);
      }
    }
    throw new RetryExhaustedError(attempts, lastError);
  }
}
