import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { CredentialError } from '../errors.js';
import { getDb, type Db } from '../db/database.js';
import type { SecretBox } from './secret-box.js';
import type { ApiKeys, CredentialHandle } from '../types/index.js';

const log = createChildLogger('credentials');

/** 자격증명 핸들 → API 키. 키는 로그에 남기지 않는다 */
export interface CredentialResolver {
  resolve(handle: CredentialHandle): Promise<ApiKeys>;
}

const credentialRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  nickname: z.string(),
  api_key: z.string(),
  api_secret: z.string(),
  active: z.number(),
  created_at: z.number(),
});

export interface CredentialSummary {
  id: string;
  ownerId: string;
  nickname: string;
  active: boolean;
  createdAt: number;
}

/**
 * SQLite + SecretBox 기반 resolver
 * 활성 여부는 매 요청 DB에서 확인하고, 복호화된 키만 TTL 동안 캐시 (요청 간 유일한 공유 상태)
 */
export class SqliteCredentialResolver implements CredentialResolver {
  private readonly cache = new Map<string, { keys: ApiKeys; expiresAt: number }>();

  constructor(
    private readonly box: SecretBox,
    private readonly db: Db = getDb(),
    private readonly ttlMs: number = config.credentials.cacheTtlMs,
  ) {}

  async resolve(handle: CredentialHandle): Promise<ApiKeys> {
    const raw = this.db.prepare('SELECT * FROM api_credentials WHERE id = ?').get(handle.id);
    if (raw === undefined) {
      this.cache.delete(handle.id);
      log.warn({ credentialId: handle.id }, 'Credential not found');
      throw new CredentialError('CREDENTIAL_NOT_FOUND', handle.id);
    }
    const row = credentialRowSchema.parse(raw);
    if (row.active !== 1) {
      this.cache.delete(handle.id);
      log.warn({ credentialId: handle.id }, 'Credential revoked');
      throw new CredentialError('CREDENTIAL_REVOKED', handle.id);
    }

    const cached = this.cache.get(handle.id);
    if (cached && cached.expiresAt > Date.now()) return cached.keys;
    this.cache.delete(handle.id);

    const keys: ApiKeys = Object.freeze({
      apiKey: await this.box.open(row.api_key),
      apiSecret: await this.box.open(row.api_secret),
    });
    if (this.ttlMs > 0) {
      this.cache.set(handle.id, { keys, expiresAt: Date.now() + this.ttlMs });
    }
    log.debug({ credentialId: handle.id }, 'Credential resolved');
    return keys;
  }

  invalidate(credentialId: string): void {
    this.cache.delete(credentialId);
  }
}

/** 자격증명 등록/해지 (CLI용). 평문 키는 저장 직전에 암호화 */
export class SqliteCredentialStore {
  constructor(
    private readonly box: SecretBox,
    private readonly db: Db = getDb(),
  ) {}

  async add(params: { ownerId: string; nickname: string; apiKey: string; apiSecret: string }): Promise<CredentialHandle> {
    const id = randomUUID();
    const apiKey = await this.box.seal(params.apiKey);
    const apiSecret = await this.box.seal(params.apiSecret);
    this.db.prepare(`
      INSERT INTO api_credentials (id, owner_id, nickname, api_key, api_secret, active, created_at)
      VALUES (?, ?, ?, ?, ?, 1, ?)
    `).run(id, params.ownerId, params.nickname, apiKey, apiSecret, Date.now());
    log.info({ credentialId: id, ownerId: params.ownerId }, 'Credential added');
    return { id };
  }

  revoke(credentialId: string): boolean {
    const res = this.db.prepare('UPDATE api_credentials SET active = 0 WHERE id = ?').run(credentialId);
    return res.changes > 0;
  }

  listByOwner(ownerId: string): CredentialSummary[] {
    const rows = this.db
      .prepare('SELECT * FROM api_credentials WHERE owner_id = ? ORDER BY created_at ASC')
      .all(ownerId);
    return z.array(credentialRowSchema).parse(rows).map((r) => ({
      id: r.id,
      ownerId: r.owner_id,
      nickname: r.nickname,
      active: r.active === 1,
      createdAt: r.created_at,
    }));
  }
}
