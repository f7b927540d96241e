import { createHmac } from 'node:crypto';
import type { ApiKeys } from '../../types/index.js';

export interface SignedHeaders {
  'api-key': string;
  signature: string;
  timestamp: string;
  'User-Agent': string;
  'Content-Type': string;
  [key: string]: string;
}

/**
 * Delta Exchange 서명
 * signature = HMAC-SHA256(secret, method + timestamp + path + queryString + body) hex
 * queryString은 '?a=1&b=2' 형태 (없으면 빈 문자열), timestamp는 초 단위
 */
export function signRequest(
  secret: string,
  method: string,
  timestamp: string,
  path: string,
  queryString: string = '',
  body: string = '',
): string {
  return createHmac('sha256', secret)
    .update(method.toUpperCase() + timestamp + path + queryString + body)
    .digest('hex');
}

/** 쿼리 객체 → '?k=v&…' (삽입 순서 유지: URL과 서명 문자열이 같아야 한다) */
export function toQueryString(query: Record<string, string> | undefined): string {
  if (!query) return '';
  const entries = Object.entries(query);
  if (entries.length === 0) return '';
  return '?' + new URLSearchParams(entries).toString();
}

export function buildAuthHeaders(
  keys: ApiKeys,
  method: string,
  path: string,
  queryString: string,
  body: string,
  now: number = Date.now(),
): SignedHeaders {
  if (!keys.apiKey || !keys.apiSecret) {
    throw new Error('Delta API keys not configured');
  }
  const timestamp = String(Math.floor(now / 1000));
  return {
    'api-key': keys.apiKey,
    signature: signRequest(keys.apiSecret, method, timestamp, path, queryString, body),
    timestamp,
    'User-Agent': 'straddle-bot/0.1',
    'Content-Type': 'application/json',
  };
}
