import { BackendResponse, TokenPair, UserProfile } from '../types';

function pickString(data: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }
  return null;
}

/** Backends spell the id `user_id`, `userId` or `id`; all are accepted. */
export function parseBackendUser(data: Record<string, unknown> | null): UserProfile | null {
  if (!data) return null;
  const userId = pickString(data, 'user_id', 'userId', 'id');
  const email = pickString(data, 'email');
  if (!userId || !email) return null;
  return { userId, email, name: pickString(data, 'name') ?? '' };
}

export function parseBackendTokens(data: Record<string, unknown> | null): TokenPair | null {
  if (!data) return null;
  const accessToken = pickString(data, 'access_token', 'accessToken', 'token');
  if (!accessToken) return null;
  return { accessToken, refreshToken: pickString(data, 'refresh_token', 'refreshToken') };
}

/** statusCode 0 means the request never got an HTTP answer. */
export function isTransportFailure(response: BackendResponse): boolean {
  return !response.success && response.statusCode === 0;
}

export function isDuplicateAccount(response: BackendResponse): boolean {
  return response.statusCode === 409 || /already (exists|registered|taken)/i.test(response.message);
}
