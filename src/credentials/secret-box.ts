import { randomBytes } from 'node:crypto';
import { CompactEncrypt, compactDecrypt, base64url } from 'jose';

const KEY_BYTES = 32;

/**
 * 저장용 API 시크릿 암호화: JWE compact (alg=dir, enc=A256GCM)
 * 키: 32바이트, base64url 문자열로 주입 (CREDENTIAL_ENCRYPTION_KEY)
 */
export class SecretBox {
  private readonly key: Uint8Array;
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder();

  constructor(encodedKey: string) {
    if (!encodedKey) {
      throw new Error('CREDENTIAL_ENCRYPTION_KEY not configured');
    }
    const key = base64url.decode(encodedKey);
    if (key.length !== KEY_BYTES) {
      throw new Error(`Encryption key must be ${KEY_BYTES} bytes (got ${key.length})`);
    }
    this.key = key;
  }

  /** 새 키 (base64url) */
  static generateKey(): string {
    return base64url.encode(randomBytes(KEY_BYTES));
  }

  async seal(plaintext: string): Promise<string> {
    return new CompactEncrypt(this.encoder.encode(plaintext))
      .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
      .encrypt(this.key);
  }

  async open(sealed: string): Promise<string> {
    const { plaintext } = await compactDecrypt(sealed, this.key);
    return this.decoder.decode(plaintext);
  }
}
