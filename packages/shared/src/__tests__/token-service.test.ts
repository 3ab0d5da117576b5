import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { JoseTokenService } from '../auth/token-service';

function createService(activeKid = 'key-1') {
  return new JoseTokenService({
    activeKid,
    keys: [
      { kid: 'key-1', secret: 'a'.repeat(32) },
      { kid: 'key-2', secret: 'b'.repeat(32) },
    ],
    accessTokenTtl: '900',
  });
}

describe('JoseTokenService', () => {
  it('round-trips the actor id and role', async () => {
    const service = createService();
    const token = await service.signAccessToken({ userId: 'user-123', role: 'FRONT_DESK' });

    expect(token.split('.')).toHaveLength(3);
    expect(await service.verifyAccessToken(token)).toEqual({ userId: 'user-123', role: 'FRONT_DESK' });
  });

  it('verifies a token signed with an older key after rotation', async () => {
    const token = await createService('key-1').signAccessToken({ userId: 'user-456', role: 'TENANT' });
    const result = await createService('key-2').verifyAccessToken(token);
    expect(result.userId).toBe('user-456');
  });

  it('rejects a token signed with an unknown key', async () => {
    const foreign = new JoseTokenService({
      activeKid: 'other',
      keys: [{ kid: 'other', secret: 'x'.repeat(32) }],
      accessTokenTtl: '900',
    });
    const token = await foreign.signAccessToken({ userId: 'user-789', role: 'TENANT' });

    await expect(createService().verifyAccessToken(token)).rejects.toThrow();
  });

  it('rejects a token without a known role', async () => {
    const token = await new SignJWT({ sub: 'user-1', role: 'JANITOR' })
      .setProtectedHeader({ alg: 'HS256', kid: 'key-1' })
      .setIssuer('gatehouse')
      .setExpirationTime('60s')
      .sign(new TextEncoder().encode('a'.repeat(32)));

    await expect(createService().verifyAccessToken(token)).rejects.toThrow('JWT missing or unknown role claim');
  });

  it('throws if active kid is not found in keys', () => {
    expect(
      () =>
        new JoseTokenService({
          activeKid: 'nonexistent',
          keys: [{ kid: 'key-1', secret: 'a'.repeat(32) }],
          accessTokenTtl: '900',
        }),
    ).toThrow("Active JWT key 'nonexistent' not found in keys");
  });
});
