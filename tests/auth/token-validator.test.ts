import { generateKeyPairSync, sign } from 'crypto';
import { TokenValidator } from '../../src/auth/token-validator';
import { TEST_SECRET, signHs256, thrownBy } from '../helpers/fixtures';

const NOW_MS = 1_700_000_000_000;
const NOW_S = NOW_MS / 1000;

function hmacValidator(options: { issuer?: string; audience?: string } = {}): TokenValidator {
  return new TokenValidator([{ alg: 'HS256', secret: TEST_SECRET }], { ...options, now: () => NOW_MS });
}

describe('TokenValidator', () => {
  it('returns the claims of a valid HS256 token', () => {
    const token = signHs256({
      sub: 'subject-1',
      exp: NOW_S + 60,
      preferred_username: 'octo',
      gh_id: 4242,
      email: 'octo@example.com',
      realm_access: { roles: ['superadmin'] },
    });

    const claims = hmacValidator().parseAndValidate(token);
    expect(claims.subject).toBe('subject-1');
    expect(claims.preferredUsername).toBe('octo');
    expect(claims.forgeId).toBe('4242');
    expect(claims.email).toBe('octo@example.com');
    expect(claims.realmRoles).toEqual(['superadmin']);
  });

  it('defaults realm roles to empty', () => {
    const claims = hmacValidator().parseAndValidate(signHs256({ sub: 'subject-1', exp: NOW_S + 60 }));
    expect(claims.realmRoles).toEqual([]);
    expect(claims.forgeId).toBeUndefined();
  });

  it('allows 30 seconds of clock skew on expiry', () => {
    expect(hmacValidator().parseAndValidate(signHs256({ sub: 's', exp: NOW_S - 30 })).subject).toBe('s');

    const err = thrownBy(() => hmacValidator().parseAndValidate(signHs256({ sub: 's', exp: NOW_S - 31 })));
    expect(err.code).toBe('Unauthenticated');
    expect(err.message).toBe('invalid auth token: token is expired');
  });

  it('rejects tokens that are not valid yet', () => {
    const err = thrownBy(() =>
      hmacValidator().parseAndValidate(signHs256({ sub: 's', exp: NOW_S + 600, nbf: NOW_S + 120 })),
    );
    expect(err.message).toBe('invalid auth token: token is not valid yet');
  });

  it('rejects a token signed with another secret', () => {
    const token = signHs256({ sub: 's', exp: NOW_S + 60 }, 'other-secret');
    expect(thrownBy(() => hmacValidator().parseAndValidate(token)).message).toBe(
      'invalid auth token: signature verification failed',
    );
  });

  it('rejects unsupported algorithms', () => {
    const token = signHs256({ sub: 's', exp: NOW_S + 60 }, TEST_SECRET, { alg: 'none' });
    expect(thrownBy(() => hmacValidator().parseAndValidate(token)).message).toBe(
      'invalid auth token: unsupported algorithm none',
    );
  });

  it('rejects malformed tokens', () => {
    expect(thrownBy(() => hmacValidator().parseAndValidate('abc.def')).message).toBe(
      'invalid auth token: malformed token',
    );
    expect(thrownBy(() => hmacValidator().parseAndValidate('!!.e30.sig')).message).toBe(
      'invalid auth token: malformed header',
    );
  });

  it('requires a subject and an expiry', () => {
    expect(thrownBy(() => hmacValidator().parseAndValidate(signHs256({ sub: 's' }))).message).toBe(
      'invalid auth token: malformed claims',
    );
  });

  it('checks issuer and audience when configured', () => {
    const validator = hmacValidator({ issuer: 'https://id.example.com', audience: 'rampart' });
    const good = signHs256({ sub: 's', exp: NOW_S + 60, iss: 'https://id.example.com', aud: ['account', 'rampart'] });
    expect(validator.parseAndValidate(good).subject).toBe('s');

    const wrongIssuer = signHs256({ sub: 's', exp: NOW_S + 60, iss: 'https://other.example.com', aud: 'rampart' });
    expect(thrownBy(() => validator.parseAndValidate(wrongIssuer)).message).toBe('invalid auth token: issuer mismatch');

    const wrongAudience = signHs256({ sub: 's', exp: NOW_S + 60, iss: 'https://id.example.com', aud: 'account' });
    expect(thrownBy(() => validator.parseAndValidate(wrongAudience)).message).toBe(
      'invalid auth token: audience mismatch',
    );
  });

  describe('RS256', () => {
    const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });

    function signRs256(payload: Record<string, unknown>, kid?: string): string {
      const header = Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT', kid })).toString('base64url');
      const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
      const signature = sign('RSA-SHA256', Buffer.from(`${header}.${body}`), privateKey).toString('base64url');
      return `${header}.${body}.${signature}`;
    }

    it('verifies with the matching public key', () => {
      const validator = new TokenValidator([{ alg: 'RS256', kid: 'key-1', publicKey }], { now: () => NOW_MS });
      expect(validator.parseAndValidate(signRs256({ sub: 'rsa-user', exp: NOW_S + 60 }, 'key-1')).subject).toBe(
        'rsa-user',
      );
    });

    it('rejects a kid no key carries', () => {
      const validator = new TokenValidator([{ alg: 'RS256', kid: 'key-1', publicKey }], { now: () => NOW_MS });
      const err = thrownBy(() => validator.parseAndValidate(signRs256({ sub: 'rsa-user', exp: NOW_S + 60 }, 'key-2')));
      expect(err.message).toBe('invalid auth token: no signing key matches the token');
    });

    it('picks up rotated keys', () => {
      const validator = new TokenValidator([], { now: () => NOW_MS });
      const token = signRs256({ sub: 'rsa-user', exp: NOW_S + 60 });
      expect(thrownBy(() => validator.parseAndValidate(token)).code).toBe('Unauthenticated');

      validator.setKeys([{ alg: 'RS256', publicKey }]);
      expect(validator.parseAndValidate(token).subject).toBe('rsa-user');
    });
  });
});
