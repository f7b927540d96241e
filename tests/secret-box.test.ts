import { describe, it, expect } from 'vitest';
import { base64url } from 'jose';
import { SecretBox } from '../src/credentials/secret-box.js';
import { thrown } from './helpers/fixtures.js';

describe('SecretBox', () => {
  it('opens what it sealed', async () => {
    const box = new SecretBox(SecretBox.generateKey());
    const sealed = await box.seal('test-secret');
    expect(sealed).not.toContain('test-secret');
    expect(sealed.split('.')).toHaveLength(5);
    await expect(box.open(sealed)).resolves.toBe('test-secret');
  });

  it('uses a fresh IV for every seal', async () => {
    const box = new SecretBox(SecretBox.generateKey());
    expect(await box.seal('same')).not.toBe(await box.seal('same'));
  });

  it('refuses to open with a different key', async () => {
    const sealed = await new SecretBox(SecretBox.generateKey()).seal('test-secret');
    await expect(new SecretBox(SecretBox.generateKey()).open(sealed)).rejects.toThrow();
  });

  it('requires a configured 32-byte key', () => {
    expect(thrown(() => new SecretBox(''))).toMatchObject({ message: 'CREDENTIAL_ENCRYPTION_KEY not configured' });
    const short = base64url.encode(new Uint8Array(16));
    expect(thrown(() => new SecretBox(short))).toMatchObject({ message: 'Encryption key must be 32 bytes (got 16)' });
  });

  it('generates 32-byte keys', () => {
    expect(base64url.decode(SecretBox.generateKey())).toHaveLength(32);
  });
});
