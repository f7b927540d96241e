import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 패키지 루트 .env 먼저, cwd의 .env가 있으면 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  return v !== undefined ? v === 'true' : fallback;
}

/** "500,1000,2000" → [500, 1000, 2000] */
function envList(key: string, fallback: readonly number[]): readonly number[] {
  const v = process.env[key];
  if (!v) return fallback;
  const list = v
    .split(',')
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isFinite(n) && n > 0);
  return list.length > 0 ? list : fallback;
}

export const config = {
  exchange: {
    /** Delta Exchange REST 베이스 */
    baseUrl: env('DELTA_BASE_URL', 'https://api.india.delta.exchange'),
    requestTimeoutMs: envNum('EXCHANGE_REQUEST_TIMEOUT_MS', 10_000),
    /** 공개 API(시세/상품) 재시도 횟수. 주문 제출은 execution.submit* 사용 */
    maxRetries: envNum('EXCHANGE_MAX_RETRIES', 3),
    retryBaseMs: envNum('EXCHANGE_RETRY_BASE_MS', 1000),
    rateLimitPerSec: envNum('EXCHANGE_RATE_LIMIT_PER_SEC', 10),
  },

  execution: {
    /** 요청 전체 타임아웃. 레그별이 아니라 요청 단위 */
    requestTimeoutMs: envNum('EXECUTION_REQUEST_TIMEOUT_MS', 30_000),
    submitMaxAttempts: envNum('SUBMIT_MAX_ATTEMPTS', 3),
    submitBackoffBaseMs: envNum('SUBMIT_BACKOFF_BASE_MS', 250),
    submitBackoffMaxMs: envNum('SUBMIT_BACKOFF_MAX_MS', 2000),
    /** 체결 폴링 간격 백오프 단계 (ms) */
    pollIntervalsMs: envList('POLL_INTERVALS_MS', [500, 1000, 2000]),
    /** 언와인드 주문 자체의 대기 한도 */
    unwindTimeoutMs: envNum('UNWIND_TIMEOUT_MS', 10_000),
  },

  strikes: {
    /** 현물 대비 최근접 행사가 허용 괴리 (%) */
    maxDeviationPct: envNum('MAX_STRIKE_DEVIATION_PCT', 2),
    maxSnapshotAgeMs: envNum('MAX_SNAPSHOT_AGE_MS', 30_000),
  },

  credentials: {
    /** 32바이트 키의 base64url 인코딩 */
    encryptionKey: env('CREDENTIAL_ENCRYPTION_KEY', ''),
    cacheTtlMs: envNum('CREDENTIAL_CACHE_TTL_MS', 60_000),
  },

  db: {
    path: env('DB_PATH', './data/straddle.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  telegram: {
    enabled: envBool('TELEGRAM_ENABLED', false),
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    chatId: env('TELEGRAM_CHAT_ID', ''),
  },
} as const;

export type AppConfig = typeof config;
