import crypto from 'crypto';
import { SecureStorageService, isRecord, stringOrNull } from '../services/secure-storage-service';

export const LOCAL_USERS_KEY = 'local_users';

export interface LocalUser {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  createdAt: string;
  lastLoginAt: string | null;
}

function parseUser(value: unknown): LocalUser | null {
  if (!isRecord(value)) return null;
  const { id, email, name, passwordHash, createdAt } = value;
  if (
    typeof id !== 'string' ||
    typeof email !== 'string' ||
    typeof name !== 'string' ||
    typeof passwordHash !== 'string' ||
    typeof createdAt !== 'string'
  ) {
    return null;
  }
  return { id, email, name, passwordHash, createdAt, lastLoginAt: stringOrNull(value.lastLoginAt) };
}

function parseUsers(value: unknown): LocalUser[] | null {
  if (!Array.isArray(value)) return null;
  const users: LocalUser[] = [];
  for (const entry of value) {
    const user = parseUser(entry);
    if (!user) return null;
    users.push(user);
  }
  return users;
}

/** Accounts known to the on-device backend, kept as one vault record. */
export class UserRepository {
  constructor(private readonly storage: SecureStorageService) {}

  async findByEmail(email: string): Promise<LocalUser | null> {
    const normalized = email.toLowerCase();
    const users = await this.readUsers();
    return users.find(user => user.email === normalized) ?? null;
  }

  async findById(id: string): Promise<LocalUser | null> {
    const users = await this.readUsers();
    return users.find(user => user.id === id) ?? null;
  }

  async create(userData: { email: string; name: string; passwordHash: string }): Promise<LocalUser> {
    const users = await this.readUsers();
    const normalized = userData.email.toLowerCase();
    if (users.some(user => user.email === normalized)) {
      throw new Error('Email already registered');
    }

    const user: LocalUser = {
      id: crypto.randomUUID(),
      email: normalized,
      name: userData.name,
      passwordHash: userData.passwordHash,
      createdAt: new Date().toISOString(),
      lastLoginAt: null
    };
    await this.storage.setJson(LOCAL_USERS_KEY, [...users, user]);
    return user;
  }

  async updateLastLogin(userId: string): Promise<void> {
    const users = await this.readUsers();
    const now = new Date().toISOString();
    await this.storage.setJson(
      LOCAL_USERS_KEY,
      users.map(user => (user.id === userId ? { ...user, lastLoginAt: now } : user))
    );
  }

  private async readUsers(): Promise<LocalUser[]> {
    return (await this.storage.getJson(LOCAL_USERS_KEY, parseUsers)) ?? [];
  }
}
