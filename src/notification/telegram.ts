import { createChildLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

const log = createChildLogger('telegram');

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

/**
 * Telegram Bot API를 통한 메시지 전송
 * - 큐 + 초당 1건 제한 (rate limit 준수)
 * - 전송 실패 시 로그만 남김 (알림 실패가 실행 결과를 바꾸면 안 됨)
 */
export class TelegramNotifier {
  private readonly queue: string[] = [];
  private processing: Promise<void> | null = null;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly intervalMs: number = 1000,
  ) {}

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.processing = this.processQueue().finally(() => {
        this.processing = null;
      });
    }
  }

  /** 큐가 빌 때까지 대기 (종료 직전/테스트용) */
  async flush(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private async processQueue(): Promise<void> {
    while (this.queue.length > 0) {
      const msg = this.queue.shift()!;
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err: errorMessage(err) }, 'Telegram send failed');
      }
      // 초당 1건 제한
      if (this.queue.length > 0) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
