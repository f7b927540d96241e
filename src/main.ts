#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { config } from './config.js';
import { createChildLogger } from './logger.js';
import { getDb, closeDb } from './db/database.js';
import { parseArgs, getNum, requireArg } from './cli/args.js';
import { SecretBox } from './credentials/secret-box.js';
import { SqliteCredentialResolver, SqliteCredentialStore } from './credentials/credential-resolver.js';
import { SqliteStrategyStore, parsePreset } from './strategy/strategy-store.js';
import { SqliteOutcomeStore } from './history/outcome-store.js';
import { DeltaMarketDataGate } from './market/market-data-gate.js';
import { DeltaPrivateApi } from './execution/delta-api.js';
import { StraddleService } from './service/straddle-service.js';
import { AuditLog } from './safety/audit-log.js';
import { Notifier } from './notification/notifier.js';
import {
  formatAudit,
  formatClose,
  formatHistory,
  formatOutcome,
  formatPositions,
  formatReconciliation,
} from './report/formatter.js';

const log = createChildLogger('main');

function printUsage(): void {
  console.log(`
Usage:
  straddle-bot straddle --credential <id> --strategy <id> [--underlying BTC]
  straddle-bot close --credential <id> --id <correlationId>
  straddle-bot history --owner <id> [--limit 20] [--review]
  straddle-bot audit [--id <correlationId>] [--limit 50]
  straddle-bot positions --credential <id>
  straddle-bot credential-add --owner <id> --nickname <name> --key <api-key> --secret <api-secret>
  straddle-bot credential-revoke --credential <id>
  straddle-bot strategy-add <preset.json>
  straddle-bot strategies --owner <id>
  straddle-bot keygen

Commands:
  straddle           ATM 스트래들 실행 (결과 + 포지션 대사 출력)
  close              실행된 스트래들 청산 (보호 주문 취소 후 시장가)
  history            실행 이력
  audit              감사 로그 (--id: 한 요청의 이벤트)
  positions          거래소 포지션 조회
  credential-add     API 키 등록 (CREDENTIAL_ENCRYPTION_KEY로 암호화 저장)
  credential-revoke  API 키 비활성화
  strategy-add       전략 프리셋 등록/수정 (JSON 파일)
  strategies         전략 프리셋 목록
  keygen             CREDENTIAL_ENCRYPTION_KEY용 새 키 출력
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');

  if (!command) {
    printUsage();
    process.exit(1);
  }

  if (command === 'keygen') {
    console.log(SecretBox.generateKey());
    return;
  }

  const db = getDb();

  switch (command) {
    case 'straddle': {
      const box = new SecretBox(config.credentials.encryptionKey);
      const preset = await new SqliteStrategyStore(db).get(requireArg(args, '--strategy'));
      const underlying = (args.get('--underlying') ?? preset.underlying).toUpperCase();
      const notifier = new Notifier();
      const service = new StraddleService(
        {
          marketData: new DeltaMarketDataGate(),
          credentials: new SqliteCredentialResolver(box, db),
          exchange: new DeltaPrivateApi(),
          outcomes: new SqliteOutcomeStore(db),
          audit: new AuditLog(db),
          notifier,
        },
        { onReconciliation: (report) => console.log(formatReconciliation(report)) },
      );

      // 제출 전 Ctrl+C는 요청 취소, 제출 후에는 결과 확정까지 진행
      const abort = new AbortController();
      const onSigint = (): void => {
        log.warn('SIGINT received, cancelling request if not yet submitted');
        abort.abort();
      };
      process.once('SIGINT', onSigint);
      try {
        const outcome = await service.executeStraddle(
          { id: requireArg(args, '--credential') },
          preset,
          underlying,
          { signal: abort.signal },
        );
        console.log(formatOutcome(outcome));
      } finally {
        process.off('SIGINT', onSigint);
        await notifier.flush();
      }
      break;
    }

    case 'close': {
      const box = new SecretBox(config.credentials.encryptionKey);
      const notifier = new Notifier();
      const service = new StraddleService({
        marketData: new DeltaMarketDataGate(),
        credentials: new SqliteCredentialResolver(box, db),
        exchange: new DeltaPrivateApi(),
        outcomes: new SqliteOutcomeStore(db),
        audit: new AuditLog(db),
        notifier,
      });
      try {
        const result = await service.closeStraddle({ id: requireArg(args, '--credential') }, requireArg(args, '--id'));
        console.log(formatClose(result));
      } finally {
        await notifier.flush();
      }
      break;
    }

    case 'audit': {
      const audit = new AuditLog(db);
      const id = args.get('--id');
      console.log(formatAudit(id ? audit.forCorrelation(id) : audit.getRecent(getNum(args, '--limit', 50))));
      break;
    }

    case 'history': {
      const store = new SqliteOutcomeStore(db);
      const owner = requireArg(args, '--owner');
      const outcomes = args.has('--review')
        ? store.listPendingReview(owner)
        : store.listByOwner(owner, getNum(args, '--limit', 20));
      console.log(formatHistory(outcomes));
      break;
    }

    case 'positions': {
      const box = new SecretBox(config.credentials.encryptionKey);
      const keys = await new SqliteCredentialResolver(box, db).resolve({ id: requireArg(args, '--credential') });
      const positions = await new DeltaPrivateApi().getPositions(keys);
      console.log(formatPositions(positions));
      break;
    }

    case 'credential-add': {
      const box = new SecretBox(config.credentials.encryptionKey);
      const handle = await new SqliteCredentialStore(box, db).add({
        ownerId: requireArg(args, '--owner'),
        nickname: requireArg(args, '--nickname'),
        apiKey: requireArg(args, '--key'),
        apiSecret: requireArg(args, '--secret'),
      });
      console.log(handle.id);
      break;
    }

    case 'credential-revoke': {
      const box = new SecretBox(config.credentials.encryptionKey);
      const id = requireArg(args, '--credential');
      const revoked = new SqliteCredentialStore(box, db).revoke(id);
      console.log(revoked ? `Revoked ${id}` : `Credential not found: ${id}`);
      break;
    }

    case 'strategy-add': {
      const file = args.get('_file');
      if (!file) {
        printUsage();
        process.exit(1);
      }
      const preset = parsePreset(JSON.parse(readFileSync(file, 'utf-8')));
      new SqliteStrategyStore(db).save(preset);
      console.log(`Saved strategy ${preset.id} (${preset.name})`);
      break;
    }

    case 'strategies': {
      const presets = new SqliteStrategyStore(db).listByOwner(requireArg(args, '--owner'));
      for (const p of presets) {
        const type = p.orderType.kind === 'LIMIT' ? `LIMIT ${p.orderType.offsetPct}%` : 'MARKET';
        console.log(`${p.id}  ${p.name}  ${p.underlying} ${p.side} x${p.lotSize} (max ${p.maxLotSize}) ${type} ${p.expiryType}`);
      }
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(1);
  }
}

main()
  .catch((err: unknown) => {
    log.error({ err }, 'Command failed');
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(() => closeDb());
