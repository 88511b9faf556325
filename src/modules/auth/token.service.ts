import jwt, { JwtPayload } from 'jsonwebtoken';
import { JwtAlgorithm } from '../../connections/config/app.config';
import {
  ACCESS_TOKEN_TTL_SECONDS,
  EMAIL_TOKEN_TTL_SECONDS,
  REFRESH_TOKEN_TTL_SECONDS,
  TOKEN_SCOPE,
  TokenScope,
} from '../../constants/auth.constants';
import { InvalidTokenError } from '../../utils/errors';

export interface TokenClaims {
  sub: string;
}

export interface DecodedToken {
  subject: string;
  scope: TokenScope;
  expiresAt: Date;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export interface TokenServiceOptions {
  secret: string;
  algorithm: JwtAlgorithm;
}

const isTokenScope = (value: unknown): value is TokenScope =>
  value === TOKEN_SCOPE.ACCESS || value === TOKEN_SCOPE.REFRESH;

/**
 * Signs and verifies the three token kinds. Access and refresh tokens carry a
 * `scope` claim so neither can stand in for the other; email tokens carry only
 * the address as `sub`.
 */
export class TokenService {
  constructor(private readonly options: TokenServiceOptions) {}

  createAccessToken(claims: TokenClaims, ttlSeconds: number = ACCESS_TOKEN_TTL_SECONDS): string {
    return this.sign({ ...claims, scope: TOKEN_SCOPE.ACCESS }, ttlSeconds);
  }

  createRefreshToken(claims: TokenClaims, ttlSeconds: number = REFRESH_TOKEN_TTL_SECONDS): string {
    return this.sign({ ...claims, scope: TOKEN_SCOPE.REFRESH }, ttlSeconds);
  }

  createEmailToken(claims: TokenClaims, ttlSeconds: number = EMAIL_TOKEN_TTL_SECONDS): string {
    return this.sign({ ...claims }, ttlSeconds);
  }

  createTokenPair(subject: string): TokenPair {
    return {
      access_token: this.createAccessToken({ sub: subject }),
      refresh_token: this.createRefreshToken({ sub: subject }),
      token_type: 'bearer',
    };
  }

  decode(token: string, expectedScope: TokenScope): DecodedToken {
    const payload = this.verify(token);

    if (!isTokenScope(payload.scope) || payload.scope !== expectedScope) {
      throw new InvalidTokenError('Invalid scope for token');
    }
    if (typeof payload.exp !== 'number') {
      throw new InvalidTokenError();
    }

    return {
      subject: this.subjectOf(payload),
      scope: payload.scope,
      expiresAt: new Date(payload.exp * 1000),
    };
  }

  decodeEmailToken(token: string): string {
    return this.subjectOf(this.verify(token));
  }

  private sign(payload: Record<string, unknown>, ttlSeconds: number): string {
    return jwt.sign(payload, this.options.secret, {
      algorithm: this.options.algorithm,
      expiresIn: ttlSeconds,
    });
  }

  private verify(token: string): JwtPayload {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
      });
    } catch (error) {
      throw new InvalidTokenError(
        error instanceof jwt.TokenExpiredError ? 'Token has expired' : 'Could not validate credentials'
      );
    }

    if (typeof decoded === 'string') {
      throw new InvalidTokenError();
    }
    return decoded;
  }

  private subjectOf(payload: JwtPayload): string {
    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw new InvalidTokenError();
    }
    return payload.sub;
  }
}
