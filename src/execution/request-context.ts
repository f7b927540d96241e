import { randomBytes } from 'node:crypto';
import { createChildLogger, type Logger } from '../logger.js';
import type { ApiKeys } from '../types/index.js';

/**
 * 요청 1건의 실행 컨텍스트. 요청 사이에 공유되는 상태는 없다.
 * keys는 이 객체와 함께 버려진다.
 */
export interface RequestContext {
  readonly correlationId: string;
  /** 요청 전체 마감 시각 (Unix ms). 두 레그가 공유 */
  readonly deadline: number;
  readonly keys: ApiKeys;
  readonly signal?: AbortSignal;
  readonly log: Logger;
}

/** 16자리 hex. Delta client_order_id(최대 32자)에 접미사(-C, -C-U, -C-SL)를 붙여도 들어간다 */
export function newCorrelationId(): string {
  return randomBytes(8).toString('hex');
}

export function createRequestContext(params: {
  correlationId: string;
  keys: ApiKeys;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: number;
}): RequestContext {
  return {
    correlationId: params.correlationId,
    deadline: (params.now ?? Date.now()) + params.timeoutMs,
    keys: params.keys,
    ...(params.signal ? { signal: params.signal } : {}),
    log: createChildLogger('execution').child({ correlationId: params.correlationId }),
  };
}
