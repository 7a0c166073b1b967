/**
 * Bearer token validation.
 *
 * Tokens are JWTs in compact serialisation, signed with RS256 by the
 * identity provider or, in development, with HS256 and a shared secret.
 * Validation is a pure function of the token, the clock and the current
 * signing keys; callers rotate keys with setKeys().
 */

import { KeyObject, createHmac, createPublicKey, timingSafeEqual, verify } from 'crypto';
import { z } from 'zod';
import { RpcError, statusError } from '../domain/errors';

export type SigningAlgorithm = 'RS256' | 'HS256';

export type SigningKey =
  | { alg: 'RS256'; kid?: string; publicKey: KeyObject | string }
  | { alg: 'HS256'; kid?: string; secret: string };

/** What the rest of the service knows about a caller. */
export interface Claims {
  subject: string;
  preferredUsername?: string;
  /** Forge-side numeric user id, as a string. */
  forgeId?: string;
  realmRoles: string[];
  email?: string;
  raw: Record<string, unknown>;
}

export interface TokenValidatorOptions {
  issuer?: string;
  audience?: string;
  leewaySeconds?: number;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

/** Anything that can turn a bearer string into claims. */
export interface ClaimsValidator {
  parseAndValidate(token: string): Claims;
}

const HeaderSchema = z.object({
  alg: z.string(),
  kid: z.string().optional(),
  typ: z.string().optional(),
});

const PayloadSchema = z
  .object({
    sub: z.string().min(1),
    exp: z.number(),
    nbf: z.number().optional(),
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    preferred_username: z.string().optional(),
    gh_id: z.union([z.string(), z.number()]).optional(),
    email: z.string().optional(),
    realm_access: z.object({ roles: z.array(z.string()).optional() }).optional(),
  })
  .passthrough();

const DEFAULT_LEEWAY_SECONDS = 30;

function invalidToken(reason: string): RpcError {
  return statusError('Unauthenticated', `invalid auth token: ${reason}`);
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}

function signatureMatches(key: SigningKey, signingInput: string, signature: Buffer): boolean {
  if (key.alg === 'HS256') {
    const expected = createHmac('sha256', key.secret).update(signingInput).digest();
    return expected.length === signature.length && timingSafeEqual(expected, signature);
  }
  const publicKey = typeof key.publicKey === 'string' ? createPublicKey(key.publicKey) : key.publicKey;
  return verify('RSA-SHA256', Buffer.from(signingInput), publicKey, signature);
}

export class TokenValidator implements ClaimsValidator {
  private keys: SigningKey[];
  private readonly issuer?: string;
  private readonly audience?: string;
  private readonly leewaySeconds: number;
  private readonly now: () => number;

  constructor(keys: SigningKey[], options: TokenValidatorOptions = {}) {
    this.keys = [...keys];
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.leewaySeconds = options.leewaySeconds ?? DEFAULT_LEEWAY_SECONDS;
    this.now = options.now ?? Date.now;
  }

  /** Replace the signing material. */
  setKeys(keys: SigningKey[]): void {
    this.keys = [...keys];
  }

  /** Verify the token and return its claims; throws Unauthenticated. */
  parseAndValidate(token: string): Claims {
    const parts = token.split('.');
    if (parts.length !== 3) throw invalidToken('malformed token');
    const [headerB64, payloadB64, signatureB64] = parts;

    const header = HeaderSchema.safeParse(decodeSegment(headerB64));
    if (!header.success) throw invalidToken('malformed header');
    const alg = header.data.alg;
    if (alg !== 'RS256' && alg !== 'HS256') throw invalidToken(`unsupported algorithm ${alg}`);

    const candidates = this.keys.filter(
      (key) => key.alg === alg && (header.data.kid === undefined || key.kid === header.data.kid),
    );
    if (candidates.length === 0) throw invalidToken('no signing key matches the token');

    const signingInput = `${headerB64}.${payloadB64}`;
    const signature = Buffer.from(signatureB64, 'base64url');
    if (!candidates.some((key) => signatureMatches(key, signingInput, signature))) {
      throw invalidToken('signature verification failed');
    }

    const payload = PayloadSchema.safeParse(decodeSegment(payloadB64));
    if (!payload.success) throw invalidToken('malformed claims');
    const claims = payload.data;

    const nowSeconds = Math.floor(this.now() / 1000);
    if (claims.exp + this.leewaySeconds < nowSeconds) throw invalidToken('token is expired');
    if (claims.nbf !== undefined && claims.nbf - this.leewaySeconds > nowSeconds) {
      throw invalidToken('token is not valid yet');
    }
    if (this.issuer !== undefined && claims.iss !== this.issuer) throw invalidToken('issuer mismatch');
    if (this.audience !== undefined) {
      const audiences = claims.aud === undefined ? [] : Array.isArray(claims.aud) ? claims.aud : [claims.aud];
      if (!audiences.includes(this.audience)) throw invalidToken('audience mismatch');
    }

    return {
      subject: claims.sub,
      preferredUsername: claims.preferred_username,
      forgeId: claims.gh_id === undefined ? undefined : String(claims.gh_id),
      realmRoles: claims.realm_access?.roles ?? [],
      email: claims.email,
      raw: claims,
    };
  }
}
