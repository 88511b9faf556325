import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TOKEN_SCOPE } from '../../src/constants/auth.constants';
import { TokenService } from '../../src/modules/auth/token.service';
import { InvalidTokenError } from '../../src/utils/errors';

const tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256' });

describe('TokenService', () => {
  it('round-trips the subject of an access token', () => {
    const token = tokens.createAccessToken({ sub: 'alice@example.com' });
    const decoded = tokens.decode(token, TOKEN_SCOPE.ACCESS);

    expect(decoded.subject).toBe('alice@example.com');
    expect(decoded.scope).toBe('access_token');
  });

  it('expires access tokens after 300 minutes by default', () => {
    const before = Date.now();
    const { expiresAt } = tokens.decode(tokens.createAccessToken({ sub: 'alice@example.com' }), TOKEN_SCOPE.ACCESS);

    const expected = before + 300 * 60 * 1000;
    expect(Math.abs(expiresAt.getTime() - expected)).toBeLessThan(5000);
  });

  it('refuses an access token where a refresh token is expected and vice versa', () => {
    const access = tokens.createAccessToken({ sub: 'alice@example.com' });
    const refresh = tokens.createRefreshToken({ sub: 'alice@example.com' });

    expect(() => tokens.decode(access, TOKEN_SCOPE.REFRESH)).toThrow(InvalidTokenError);
    expect(() => tokens.decode(refresh, TOKEN_SCOPE.ACCESS)).toThrow(InvalidTokenError);
    expect(tokens.decode(refresh, TOKEN_SCOPE.REFRESH).subject).toBe('alice@example.com');
  });

  it('rejects an expired token even with a valid signature', () => {
    const expired = jwt.sign(
      { sub: 'alice@example.com', scope: 'access_token', exp: Math.floor(Date.now() / 1000) - 10 },
      'test-secret'
    );

    expect(() => tokens.decode(expired, TOKEN_SCOPE.ACCESS)).toThrow('Token has expired');
  });

  it('rejects tokens signed with another secret or algorithm', () => {
    const foreign = new TokenService({ secret: 'other-secret', algorithm: 'HS256' });
    const strongerAlgorithm = new TokenService({ secret: 'test-secret', algorithm: 'HS512' });
    const token = tokens.createAccessToken({ sub: 'alice@example.com' });

    expect(() => foreign.decode(token, TOKEN_SCOPE.ACCESS)).toThrow(InvalidTokenError);
    expect(() => strongerAlgorithm.decode(token, TOKEN_SCOPE.ACCESS)).toThrow(InvalidTokenError);
  });

  it('rejects a token without a subject', () => {
    const anonymous = jwt.sign({ scope: 'access_token' }, 'test-secret', { expiresIn: 60 });
    expect(() => tokens.decode(anonymous, TOKEN_SCOPE.ACCESS)).toThrow(InvalidTokenError);
  });

  it('carries the address in email tokens and never accepts them as access tokens', () => {
    const emailToken = tokens.createEmailToken({ sub: 'alice@example.com' });

    expect(tokens.decodeEmailToken(emailToken)).toBe('alice@example.com');
    expect(() => tokens.decode(emailToken, TOKEN_SCOPE.ACCESS)).toThrow(InvalidTokenError);
    expect(() => tokens.decodeEmailToken('not-a-token')).toThrow(InvalidTokenError);
  });

  it('issues bearer token pairs', () => {
    const pair = tokens.createTokenPair('alice@example.com');

    expect(pair.token_type).toBe('bearer');
    expect(tokens.decode(pair.access_token, TOKEN_SCOPE.ACCESS).subject).toBe('alice@example.com');
    expect(tokens.decode(pair.refresh_token, TOKEN_SCOPE.REFRESH).subject).toBe('alice@example.com');
  });
});
