import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../password.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher({ timeCost: 2, memoryCost: 4096 });

  it('should produce an argon2id digest carrying its own parameters', async () => {
    const digest = await hasher.hash('Secret123');

    expect(digest).toMatch(/^\$argon2id\$v=19\$m=4096,t=2,p=\d+\$/);
    expect(digest).not.toContain('Secret123');
  });

  it('should salt every hash', async () => {
    const first = await hasher.hash('Secret123');
    const second = await hasher.hash('Secret123');

    expect(first).not.toBe(second);
  });

  it('should verify the matching password', async () => {
    const digest = await hasher.hash('Secret123');

    expect(await hasher.verify('Secret123', digest)).toBe(true);
  });

  it('should reject a different password', async () => {
    const digest = await hasher.hash('Secret123');

    expect(await hasher.verify('Secret124', digest)).toBe(false);
  });

  it('should return false instead of throwing for a malformed hash', async () => {
    expect(await hasher.verify('Secret123', 'not-a-hash')).toBe(false);
  });

  it('should keep verifying hashes made under an older cost', async () => {
    const legacy = new PasswordHasher({ timeCost: 2, memoryCost: 2048 });
    const digest = await legacy.hash('Secret123');

    expect(await hasher.verify('Secret123', digest)).toBe(true);
    expect(hasher.needsRehash(digest)).toBe(true);
  });

  it('should not ask to rehash a digest made under the current cost', async () => {
    const digest = await hasher.hash('Secret123');

    expect(hasher.needsRehash(digest)).toBe(false);
  });
});
