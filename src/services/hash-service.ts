import bcrypt from 'bcrypt';

/** Salted one-way hashing for PINs and locally held passwords. */
export class HashService {
  constructor(private readonly saltRounds = 12) {}

  async hash(secret: string): Promise<string> {
    if (!secret) {
      throw new Error('Secret cannot be empty');
    }

    try {
      return await bcrypt.hash(secret, this.saltRounds);
    } catch (error) {
      throw new Error('Hashing failed');
    }
  }

  async verify(secret: string, hashed: string): Promise<boolean> {
    if (!secret || !hashed) {
      return false;
    }

    try {
      return await bcrypt.compare(secret, hashed);
    } catch (error) {
      throw new Error('Hash verification failed');
    }
  }
}
