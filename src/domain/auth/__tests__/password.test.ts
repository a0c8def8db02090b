import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../password.js';
import { VerificationFailure } from '../errors.js';
import { TEST_HASH_COST } from '../../../test-utils/fakes.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher(TEST_HASH_COST);

  it('should verify a password against its own hash', async () => {
    const hash = await hasher.hash('Secret123');

    await expect(hasher.verify('Secret123', hash)).resolves.toBe(true);
  });

  it('should reject a different password', async () => {
    const hash = await hasher.hash('Secret123');

    await expect(hasher.verify('Secret124', hash)).resolves.toBe(false);
    await expect(hasher.verify('', hash)).resolves.toBe(false);
  });

  it('should produce an argon2id hash that never contains the plaintext', async () => {
    const hash = await hasher.hash('Secret123');

    expect(hash.startsWith('$argon2id$')).toBe(true);
    expect(hash).not.toContain('Secret123');
  });

  it('should salt every hash', async () => {
    const first = await hasher.hash('Secret123');
    const second = await hasher.hash('Secret123');

    expect(first).not.toBe(second);
    await expect(hasher.verify('Secret123', second)).resolves.toBe(true);
  });

  it('should encode the configured cost in the hash', async () => {
    const hash = await hasher.hash('Secret123');

    expect(hash).toContain('m=4096,t=2,p=1');
  });

  it('should throw VerificationFailure for a malformed hash', async () => {
    await expect(hasher.verify('Secret123', 'not-a-hash')).rejects.toThrow(VerificationFailure);
    await expect(hasher.verify('Secret123', '')).rejects.toThrow(
      'Credential verification failed'
    );
  });

  it('should throw VerificationFailure for a truncated argon2 hash', async () => {
    await expect(hasher.verify('Secret123', '$argon2id$v=19$m=4096')).rejects.toThrow(
      VerificationFailure
    );
  });
});
