import { DeviceIdentityService } from './device-identity-service';
import { HashService } from './hash-service';
import { RefreshTokenClaims, TokenService } from './token-service';
import { LocalUser, UserRepository } from '../repositories/user-repository';
import { BackendResponse, IdentityBackend } from '../types';

function reply(statusCode: number, message: string, data: Record<string, unknown> | null = null): BackendResponse {
  return { success: statusCode >= 200 && statusCode < 300, statusCode, message, data };
}

/**
 * Identity backend that keeps accounts on the device. Speaks the same
 * response shape as the HTTP backend so the orchestrator cannot tell them
 * apart.
 */
export class LocalIdentityBackend implements IdentityBackend {
  readonly name = 'local';

  constructor(
    private readonly users: UserRepository,
    private readonly hasher: HashService,
    private readonly tokens: TokenService,
    private readonly deviceIdentity: DeviceIdentityService
  ) {}

  async isReachable(): Promise<boolean> {
    return true;
  }

  async login(email: string, password: string): Promise<BackendResponse> {
    const user = await this.users.findByEmail(email);
    if (!user || !(await this.hasher.verify(password, user.passwordHash))) {
      return reply(401, 'Invalid email or password');
    }

    await this.users.updateLastLogin(user.id);
    return reply(200, 'Login successful', await this.sessionPayload(user));
  }

  async register(name: string, email: string, password: string): Promise<BackendResponse> {
    if (await this.users.findByEmail(email)) {
      return reply(409, 'An account with this email already exists');
    }

    const passwordHash = await this.hasher.hash(password);
    const user = await this.users.create({ email, name, passwordHash });
    return reply(201, 'Account created successfully', await this.sessionPayload(user));
  }

  async getUser(userId: string): Promise<BackendResponse> {
    const user = await this.users.findById(userId);
    if (!user) {
      return reply(404, 'User not found');
    }
    return reply(200, 'User retrieved', { user_id: user.id, name: user.name, email: user.email });
  }

  async refresh(refreshToken: string): Promise<BackendResponse> {
    let claims: RefreshTokenClaims;
    try {
      claims = this.tokens.consumeRefreshToken(refreshToken);
    } catch (error) {
      return reply(401, error instanceof Error ? error.message : 'Invalid refresh token');
    }

    const deviceId = await this.deviceIdentity.getDeviceId();
    if (claims.deviceId !== deviceId) {
      return reply(401, 'Refresh token was issued to another device');
    }

    const user = await this.users.findById(claims.userId);
    if (!user) {
      return reply(404, 'User not found');
    }

    return reply(200, 'Token refreshed', {
      access_token: this.tokens.generateAccessToken({ userId: user.id, email: user.email, name: user.name, deviceId }),
      refresh_token: this.tokens.generateRefreshToken(user.id, deviceId, claims.tokenFamily)
    });
  }

  private async sessionPayload(user: LocalUser): Promise<Record<string, unknown>> {
    const deviceId = await this.deviceIdentity.getDeviceId();
    return {
      user_id: user.id,
      name: user.name,
      email: user.email,
      access_token: this.tokens.generateAccessToken({ userId: user.id, email: user.email, name: user.name, deviceId }),
      refresh_token: this.tokens.generateRefreshToken(user.id, deviceId)
    };
  }
}
