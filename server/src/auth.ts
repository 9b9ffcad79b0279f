/**
 * Registration, credential checks and session tokens.
 */
import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import type { Repository, User } from './repo.js';

const KEY_LENGTH = 64;
const SALT_BYTES = 16;

/** scrypt$<salt hex>$<key hex> */
export function hashPassword(password: string): string {
  const salt = randomBytes(SALT_BYTES);
  const key = scryptSync(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString('hex')}$${key.toString('hex')}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, saltHex, keyHex] = stored.split('$');
  if (scheme !== 'scrypt' || !saltHex || !keyHex) return false;
  const expected = Buffer.from(keyHex, 'hex');
  const actual = scryptSync(password, Buffer.from(saltHex, 'hex'), expected.length);
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export type RegisterResult =
  | { ok: true; user: User }
  | { ok: false; reason: 'invalid' | 'duplicate'; error: string };

export interface Session {
  token: string;
  expiresAt: Date;
}

export function createAuthService(repo: Repository, options: { sessionLifetimeSecs: number; now: () => Date }) {
  return {
    register(name: string, email: string, password: string): RegisterResult {
      const cleanName = name.trim();
      const cleanEmail = normalizeEmail(email);
      if (!cleanName || !cleanEmail || !password) {
        return { ok: false, reason: 'invalid', error: 'Name, email and password are required.' };
      }
      if (repo.findUserByEmail(cleanEmail)) {
        return { ok: false, reason: 'duplicate', error: 'A user with this email already exists.' };
      }
      const user = repo.createUser(cleanName, cleanEmail, hashPassword(password));
      return { ok: true, user };
    },

    /** The user for these credentials, or undefined */
    authenticate(email: string, password: string): User | undefined {
      if (!email || !password) return undefined;
      const found = repo.findUserByEmail(normalizeEmail(email));
      if (!found || !verifyPassword(password, found.passwordHash)) return undefined;
      return { id: found.id, name: found.name, email: found.email, createdAt: found.createdAt };
    },

    startSession(userId: number): Session {
      const now = options.now().getTime();
      repo.purgeExpiredSessions(now);
      const token = randomBytes(32).toString('hex');
      const expiresAt = now + options.sessionLifetimeSecs * 1000;
      repo.createSession(token, userId, expiresAt);
      return { token, expiresAt: new Date(expiresAt) };
    },

    endSession(token: string): void {
      repo.deleteSession(token);
    },
  };
}

export type AuthService = ReturnType<typeof createAuthService>;
