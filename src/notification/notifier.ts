import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { TelegramNotifier } from './telegram.js';
import type {
  CloseOutcome,
  ExecutionOutcome,
  LegResult,
  ProtectiveOrderResult,
  ReconciliationReport,
} from '../types/index.js';

const log = createChildLogger('notifier');

const STATUS_EMOJI: Record<ExecutionOutcome['status'], string> = {
  BOTH_FILLED: '✅',
  UNWOUND: '↩️',
  ONE_LEG_FILLED: '⚠️',
  BOTH_REJECTED: '❌',
};

function legLine(leg: LegResult): string {
  const price = leg.avgPrice !== null ? ` @ ${leg.avgPrice}` : '';
  const err = leg.error ? ` (${leg.error.message})` : '';
  return `${leg.order.leg} ${leg.order.side} ${leg.order.instrumentId}: ${leg.status} ${leg.filledQty}/${leg.order.quantity}${price}${err}`;
}

function protectionLine(p: ProtectiveOrderResult): string {
  const price = p.order.stopPrice ?? p.order.price;
  const state = p.status === 'PLACED' ? 'PLACED' : `FAILED (${p.error ?? '-'})`;
  return `${p.kind} ${p.order.leg} ${p.order.side} ${p.order.quantity} @ ${price ?? '-'}: ${state}`;
}

function defaultTelegram(): TelegramNotifier | null {
  if (config.telegram.enabled && config.telegram.botToken && config.telegram.chatId) {
    log.info('Telegram notifier enabled');
    return new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
  }
  log.debug('Telegram notifier disabled');
  return null;
}

/**
 * 알림 허브: TelegramNotifier 래핑 + 이벤트별 메시지 포맷
 * 텔레그램이 꺼져 있으면 모든 호출 무시
 */
export class Notifier {
  private readonly tg: TelegramNotifier | null;

  constructor(tg: TelegramNotifier | null = defaultTelegram()) {
    this.tg = tg;
  }

  notifyOutcome(outcome: ExecutionOutcome): void {
    this.send(
      `${STATUS_EMOJI[outcome.status]} <b>스트래들 ${outcome.status}</b>\n` +
      `${outcome.underlying} ${outcome.side} ${outcome.strike} (${outcome.expiry})\n` +
      `${legLine(outcome.call)}\n` +
      `${legLine(outcome.put)}\n` +
      outcome.protectiveOrders.map((p) => `${protectionLine(p)}\n`).join('') +
      `ID: ${outcome.correlationId}`,
    );
    if (outcome.reviewRequired) this.notifyManualReview(outcome);
  }

  notifyManualReview(outcome: ExecutionOutcome): void {
    this.send(
      `🚨 <b>수동 확인 필요</b>\n` +
      `사유: ${outcome.reviewReason ?? 'UNKNOWN'}\n` +
      `ID: ${outcome.correlationId}`,
    );
  }

  notifyDrift(report: ReconciliationReport): void {
    if (report.status === 'MATCHED') return;
    if (report.status === 'UNAVAILABLE') {
      this.send(`⚠️ <b>포지션 대사 불가</b>\n${report.error ?? ''}\nID: ${report.correlationId}`);
      return;
    }
    const lines = report.entries
      .filter((e) => e.drift !== 0)
      .map((e) => `${e.instrumentId}: 기대 ${e.expectedQty}, 실제 ${e.actualQty}`);
    this.send(`📊 <b>포지션 불일치</b>\n${lines.join('\n')}\nID: ${report.correlationId}`);
  }

  notifyClose(result: CloseOutcome): void {
    const header = result.reviewRequired ? '🚨 <b>스트래들 청산 확인 필요</b>' : '🔒 <b>스트래들 청산</b>';
    this.send(
      `${header} ${result.status}\n` +
      result.legs.map((l) => `${legLine(l)}\n`).join('') +
      `ID: ${result.correlationId}`,
    );
  }

  async flush(): Promise<void> {
    await this.tg?.flush();
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'Notifier send error');
    }
  }
}
