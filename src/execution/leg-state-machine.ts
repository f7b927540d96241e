import { createChildLogger } from '../logger.js';
import type { LegState } from '../types/index.js';

const log = createChildLogger('leg-state');

type StateTransition = [LegState, LegState];

/** 허용된 레그 상태 전이: NOT_SENT → SENT → 종결 상태 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['NOT_SENT', 'SENT'],
  ['SENT', 'FILLED'],
  ['SENT', 'PARTIALLY_FILLED'],
  ['SENT', 'REJECTED'],
  ['SENT', 'TIMEOUT'],
];

/**
 * 레그 단위 상태 머신
 * 종결 상태에서 다른 상태로 가는 시도는 에러 (한 레그 결과를 두 번 확정하지 않도록)
 */
export class LegStateMachine {
  private state: LegState = 'NOT_SENT';

  constructor(private readonly clientOrderId: string) {}

  get current(): LegState {
    return this.state;
  }

  transition(to: LegState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid leg transition: ${this.state} → ${to}`;
      log.error({ clientOrderId: this.clientOrderId, from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ clientOrderId: this.clientOrderId, from: this.state, to }, 'Leg transition');
    this.state = to;
  }

  canTransition(to: LegState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }
}
