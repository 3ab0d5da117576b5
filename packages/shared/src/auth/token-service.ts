import { SignJWT, jwtVerify } from 'jose';
import { type Actor, type UserRole } from '@gatehouse/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtl: string;
  issuer?: string;
}

const ROLES: readonly UserRole[] = ['SUPER_ADMIN', 'PROPERTY_MANAGER', 'FRONT_DESK', 'TENANT'];

export interface TokenService {
  signAccessToken(actor: Actor): Promise<string>;
  verifyAccessToken(token: string): Promise<Actor>;
}

/**
 * HS256 access tokens carrying the actor's id (`sub`) and role. Verification
 * accepts any configured key so rotated-out keys keep working until removed.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtl: string;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtl = config.accessTokenTtl;
    this.issuer = config.issuer ?? 'gatehouse';
  }

  async signAccessToken(actor: Actor): Promise<string> {
    return new SignJWT({ sub: actor.userId, role: actor.role })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(`${this.accessTokenTtl}s`)
      .sign(this.activeKey.secret);
  }

  async verifyAccessToken(token: string): Promise<Actor> {
    const { payload } = await jwtVerify(
      token,
      async (header) => {
        const key = header.kid ? this.keys.get(header.kid) : undefined;
        if (!key) throw new Error('Unknown JWT key');
        return key.secret;
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
      },
    );

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }
    const role = ROLES.find((r) => r === payload.role);
    if (!role) {
      throw new Error('JWT missing or unknown role claim');
    }

    return { userId: payload.sub, role };
  }
}
