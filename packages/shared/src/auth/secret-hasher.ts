import { hash, verify } from '@node-rs/argon2';
import { type SecretHasher } from '@gatehouse/domain';

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

/** Argon2id hashing for pins and access codes. A malformed stored hash never verifies. */
export class Argon2SecretHasher implements SecretHasher {
  async hash(secret: string): Promise<string> {
    return hash(secret, ARGON2_OPTIONS);
  }

  async verify(secret: string, secretHash: string): Promise<boolean> {
    if (secretHash === '' || secretHash === '!') return false;
    try {
      return await verify(secretHash, secret, ARGON2_OPTIONS);
    } catch {
      return false;
    }
  }
}
