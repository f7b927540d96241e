import type {
  CloseOutcome,
  ExecutionOutcome,
  ExchangePosition,
  LegResult,
  ReconciliationReport,
} from '../types/index.js';
import type { AuditRow } from '../safety/audit-log.js';

/**
 * 콘솔 테이블 출력 (외부 의존성 없음)
 */
export function formatOutcome(outcome: ExecutionOutcome): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push('          STRADDLE EXECUTION');
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Request', [
    ['Correlation ID', outcome.correlationId],
    ['Strategy', outcome.strategyId],
    ['Underlying', outcome.underlying],
    ['Expiry', outcome.expiry],
    ['Strike', String(outcome.strike)],
    ['Side', outcome.side],
  ]));

  lines.push(formatSection('Result', [
    ['Status', outcome.status],
    ['Review Required', outcome.reviewRequired ? `YES (${outcome.reviewReason ?? '-'})` : 'no'],
    ['Duration', `${outcome.finalizedAt - outcome.createdAt}ms`],
  ]));

  lines.push(formatSection('Call Leg', legRows(outcome.call)));
  lines.push(formatSection('Put Leg', legRows(outcome.put)));

  if (outcome.protectiveOrders.length > 0) {
    lines.push(formatSection('Protection', outcome.protectiveOrders.map((p): [string, string] => [
      `${p.order.leg} ${p.kind}`,
      `${p.order.side} ${p.order.quantity} @ ${p.order.stopPrice ?? p.order.price ?? '-'} ${p.status}${p.error ? ` (${p.error})` : ''}`,
    ])));
  }

  return lines.join('\n');
}

export function formatClose(result: CloseOutcome): string {
  const lines: string[] = [];
  lines.push(formatSection('Close', [
    ['Correlation ID', result.correlationId],
    ['Status', result.status],
    ['Review Required', result.reviewRequired ? 'YES' : 'no'],
    ['Cancelled Orders', result.cancelledProtection.length > 0 ? result.cancelledProtection.join(', ') : '-'],
  ]));
  for (const leg of result.legs) {
    lines.push(formatSection(`${leg.order.leg === 'CALL' ? 'Call' : 'Put'} Close`, legRows(leg)));
  }
  return lines.join('\n');
}

export function formatReconciliation(report: ReconciliationReport): string {
  const lines: string[] = [];
  lines.push(`── Reconciliation: ${report.status} ${'─'.repeat(Math.max(0, 22 - report.status.length))}`);
  if (report.error) lines.push(`  ${report.error}`);
  for (const e of report.entries) {
    const mark = e.drift === 0 ? ' ' : '!';
    lines.push(`${mark} ${e.instrumentId.padEnd(26)} expected ${fmtQty(e.expectedQty)}  actual ${fmtQty(e.actualQty)}`);
  }
  lines.push('');
  return lines.join('\n');
}

/** /history 목록 */
export function formatHistory(outcomes: readonly ExecutionOutcome[]): string {
  if (outcomes.length === 0) return 'No executions.';
  const header = `${'Time'.padEnd(20)} ${'Status'.padEnd(15)} ${'Underlying'.padEnd(10)} ${'Strike'.padStart(10)}  Review`;
  const rows = outcomes.map((o) =>
    [
      new Date(o.finalizedAt).toISOString().slice(0, 19).replace('T', ' ').padEnd(20),
      o.status.padEnd(15),
      o.underlying.padEnd(10),
      String(o.strike).padStart(10),
      ` ${o.reviewRequired ? (o.reviewReason ?? 'YES') : ''}`,
    ].join(' '),
  );
  return [header, ...rows].join('\n');
}

/** /audit 목록 (최신순 또는 한 요청의 시간순, 호출자가 정한 순서 그대로) */
export function formatAudit(rows: readonly AuditRow[]): string {
  if (rows.length === 0) return 'No audit events.';
  return rows
    .map((r) =>
      [
        new Date(r.timestamp).toISOString().slice(0, 19).replace('T', ' '),
        r.level.padEnd(8),
        r.action.padEnd(24),
        r.correlation_id ?? '-',
        r.detail ?? '',
      ].join(' ').trimEnd(),
    )
    .join('\n');
}

/** /positions 목록 */
export function formatPositions(positions: readonly ExchangePosition[]): string {
  const open = positions.filter((p) => p.size !== 0);
  if (open.length === 0) return 'No open positions.';
  return open
    .map((p) => `${p.instrumentId.padEnd(26)} ${fmtQty(p.size).padStart(8)}  @ ${p.entryPrice ?? '-'}`)
    .join('\n');
}

function legRows(leg: LegResult): [string, string][] {
  const rows: [string, string][] = [
    ['Instrument', leg.order.instrumentId],
    ['Order', `${leg.order.side} ${leg.order.quantity} ${leg.order.orderType}${leg.order.price !== null ? ` @ ${leg.order.price}` : ''}`],
    ['Status', leg.status],
    ['Filled', `${leg.filledQty}${leg.avgPrice !== null ? ` @ ${leg.avgPrice}` : ''}`],
    ['Attempts', String(leg.attempts)],
  ];
  if (leg.error) rows.push(['Error', `${leg.error.kind}: ${leg.error.message}`]);
  if (leg.unwind) {
    rows.push(['Unwind', `${leg.unwind.status} ${leg.unwind.filledQty}/${leg.unwind.order.quantity}`]);
  }
  return rows;
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(Math.max(0, 38 - title.length))}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

function fmtQty(qty: number): string {
  return qty > 0 ? `+${qty}` : String(qty);
}
