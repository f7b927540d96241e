import { request as undiciRequest } from 'undici';
import type { z } from 'zod';
import { createChildLogger } from '../../logger.js';
import { config } from '../../config.js';
import { ExchangeRejectionError, TransientSubmissionError } from '../../errors.js';
import type { ApiKeys } from '../../types/index.js';
import { buildAuthHeaders, toQueryString } from './auth.js';
import { errorEnvelopeSchema } from './schemas.js';

const log = createChildLogger('delta-client');

const TIMEOUT_CODES = new Set(['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'UND_ERR_CONNECT_TIMEOUT']);

type HttpMethod = 'GET' | 'POST' | 'DELETE';

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function isTimeout(err: unknown): boolean {
  const code = errorCode(err);
  return (err instanceof Error && err.name === 'TimeoutError') || (code !== undefined && TIMEOUT_CODES.has(code));
}

function parseBody(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return { _rawBody: text };
  }
}

/** 거래소 에러 코드 추출 ({ error: { code } }) */
export function rejectionReason(raw: unknown, statusCode: number): string {
  const parsed = errorEnvelopeSchema.safeParse(raw);
  return parsed.success ? parsed.data.error.code : `http_${statusCode}`;
}

/**
 * Public GET: 429/5xx/timeout/네트워크 오류는 지수 백오프로 재시도.
 */
export async function requestPublic(
  path: string,
  query: Record<string, string> = {},
  options: { timeoutMs?: number } = {},
): Promise<unknown> {
  const url = new URL(path + toQueryString(query), config.exchange.baseUrl);
  const timeout = options.timeoutMs ?? config.exchange.requestTimeoutMs;
  const maxRetries = config.exchange.maxRetries;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const delay = config.exchange.retryBaseMs * Math.pow(2, attempt);
    let statusCode: number;
    let raw: unknown;
    try {
      const res = await undiciRequest(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json', 'User-Agent': 'straddle-bot/0.1' },
        bodyTimeout: timeout,
        headersTimeout: timeout,
      });
      statusCode = res.statusCode;
      raw = parseBody(await res.body.text());
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt < maxRetries) {
        log.warn({ path, attempt, delay, timeout: isTimeout(err), err: lastError.message }, 'Request failed, retrying');
        await sleep(delay);
      }
      continue;
    }

    if (statusCode === 200) return raw;
    lastError = new Error(`Delta public request failed: ${statusCode} ${rejectionReason(raw, statusCode)}`);
    if (!isRetryableStatus(statusCode)) throw lastError;
    if (attempt < maxRetries) {
      log.warn({ statusCode, path, attempt, delay }, 'Retryable error, backing off');
      await sleep(delay);
    }
  }
  throw lastError ?? new Error('Public request failed after retries');
}

/**
 * Public GET + zod 검증
 */
export async function requestPublicValidated<T>(
  path: string,
  query: Record<string, string>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { timeoutMs?: number } = {},
): Promise<T> {
  const raw = await requestPublic(path, query, options);
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  log.warn({ path, issues: result.error.issues.length }, 'Response validation failed');
  throw new Error(`Delta response validation failed for ${path}: ${result.error.message}`);
}

export interface PrivateRequestOptions {
  method: HttpMethod;
  keys: ApiKeys;
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  timeoutMs?: number;
}

/**
 * Private 요청: 1회 시도. 재시도 여부는 호출자(RetryPolicy)가 정한다.
 * - 네트워크/timeout, 429, 5xx → TransientSubmissionError
 * - 그 외 2xx가 아닌 응답 → ExchangeRejectionError (거래소 error.code 포함)
 */
export async function requestPrivate(path: string, options: PrivateRequestOptions): Promise<unknown> {
  const queryString = toQueryString(options.query);
  const url = new URL(path + queryString, config.exchange.baseUrl);
  const timeout = options.timeoutMs ?? config.exchange.requestTimeoutMs;
  const body = options.body ? JSON.stringify(options.body) : '';
  const headers = buildAuthHeaders(options.keys, options.method, path, queryString, body);

  let statusCode: number;
  let raw: unknown;
  try {
    const res = await undiciRequest(url.toString(), {
      method: options.method,
      headers,
      body: body || undefined,
      bodyTimeout: timeout,
      headersTimeout: timeout,
    });
    statusCode = res.statusCode;
    raw = parseBody(await res.body.text());
  } catch (err) {
    log.warn({ path, method: options.method, timeout: isTimeout(err), err: err instanceof Error ? err.message : String(err) }, 'Private request failed');
    throw new TransientSubmissionError(`Network error on ${options.method} ${path}`, null, { cause: err });
  }

  if (statusCode >= 200 && statusCode < 300) return raw;

  const reason = rejectionReason(raw, statusCode);
  if (isRetryableStatus(statusCode)) {
    log.warn({ statusCode, path, reason }, 'Retryable private response');
    throw new TransientSubmissionError(`Delta ${statusCode} on ${options.method} ${path}: ${reason}`, statusCode);
  }
  if (statusCode === 401 || statusCode === 403) {
    log.error({ statusCode, path, reason }, 'Private API auth error, check API key, secret and IP whitelist');
  } else {
    log.warn({ statusCode, path, reason }, 'Private request rejected');
  }
  throw new ExchangeRejectionError(reason, statusCode, { path });
}

/**
 * Private + zod 검증. 2xx인데 형식이 다르면 일반 Error (결과 불명: 호출자가 조회로 확인)
 */
export async function requestPrivateValidated<T>(
  path: string,
  options: PrivateRequestOptions,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const raw = await requestPrivate(path, options);
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  log.warn({ path, issues: result.error.issues.length }, 'Private response validation failed');
  throw new Error(`Delta private response validation failed for ${path}: ${result.error.message}`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
