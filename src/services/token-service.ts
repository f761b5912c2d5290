import jwt from 'jsonwebtoken';
import crypto from 'crypto';

export interface AccessTokenClaims {
  userId: string;
  email: string;
  name: string;
  deviceId: string;
}

export interface RefreshTokenClaims {
  userId: string;
  deviceId: string;
  tokenFamily: string;
}

export interface TokenServiceOptions {
  secret: string;
  expiresInSeconds: number;
  refreshExpiresInSeconds: number;
}

/** Issues and checks the tokens handed out by the on-device identity backend. */
export class TokenService {
  private usedRefreshTokens = new Set<string>();

  constructor(private readonly options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token secret is required');
    }
  }

  generateAccessToken(claims: AccessTokenClaims): string {
    return jwt.sign({ ...claims, type: 'access' }, this.options.secret, {
      expiresIn: this.options.expiresInSeconds,
      subject: claims.userId
    });
  }

  generateRefreshToken(userId: string, deviceId: string, tokenFamily?: string): string {
    const family = tokenFamily || crypto.randomBytes(16).toString('hex');
    return jwt.sign({ userId, deviceId, tokenFamily: family, type: 'refresh' }, this.options.secret, {
      expiresIn: this.options.refreshExpiresInSeconds,
      jwtid: crypto.randomBytes(8).toString('hex')
    });
  }

  verifyAccessToken(token: string): AccessTokenClaims {
    const decoded = jwt.verify(token, this.options.secret);
    if (typeof decoded === 'string' || decoded.type !== 'access') {
      throw new Error('Invalid access token');
    }
    const { userId, email, name, deviceId } = decoded;
    if (typeof userId !== 'string' || typeof email !== 'string' || typeof name !== 'string' || typeof deviceId !== 'string') {
      throw new Error('Invalid access token');
    }
    return { userId, email, name, deviceId };
  }

  /**
   * Verifies a refresh token and retires it. Presenting the same token twice
   * is treated as theft and rejected.
   */
  consumeRefreshToken(token: string): RefreshTokenClaims {
    if (this.usedRefreshTokens.has(token)) {
      throw new Error('Refresh token reuse detected');
    }

    const decoded = jwt.verify(token, this.options.secret);
    if (typeof decoded === 'string' || decoded.type !== 'refresh') {
      throw new Error('Invalid refresh token');
    }
    const { userId, deviceId, tokenFamily } = decoded;
    if (typeof userId !== 'string' || typeof deviceId !== 'string' || typeof tokenFamily !== 'string') {
      throw new Error('Invalid refresh token');
    }

    this.usedRefreshTokens.add(token);
    return { userId, deviceId, tokenFamily };
  }
}
