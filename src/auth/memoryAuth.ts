import { randomBytes, randomUUID, scryptSync, timingSafeEqual } from "crypto";
import { Unauthorized, ValidationError } from "../lib/errors.js";
import type { AuthSession, AuthUser, Authenticator } from "./authenticator.js";

interface Account {
  user: AuthUser;
  salt: Buffer;
  hash: Buffer;
}

const TOKEN_TTL_SECONDS = 3600;

function hashPassword(password: string, salt: Buffer): Buffer {
  return scryptSync(password, salt, 32);
}

/** Accounts and tokens kept in process; pairs with the memory store. */
export function createMemoryAuthenticator(): Authenticator {
  const accounts = new Map<string, Account>();
  const tokens = new Map<string, { userId: string; expiresAt: number }>();

  function issue(user: AuthUser): AuthSession {
    const accessToken = randomBytes(24).toString("hex");
    const expiresAt = Math.floor(Date.now() / 1000) + TOKEN_TTL_SECONDS;
    tokens.set(accessToken, { userId: user.id, expiresAt });
    return { user: { ...user }, session: { accessToken, expiresAt } };
  }

  function checkCredentials(email: string, password: string): string {
    const key = email.trim().toLowerCase();
    if (!key.includes("@")) throw new ValidationError("A valid email is required");
    if (password.length < 6) throw new ValidationError("Password must be at least 6 characters");
    return key;
  }

  return {
    async signUp(email, password) {
      const key = checkCredentials(email, password);
      if (accounts.has(key)) throw new ValidationError("User already registered");
      const salt = randomBytes(16);
      const user: AuthUser = { id: randomUUID(), email: key };
      accounts.set(key, { user, salt, hash: hashPassword(password, salt) });
      return issue(user);
    },

    async signIn(email, password) {
      const account = accounts.get(email.trim().toLowerCase());
      if (!account || !timingSafeEqual(account.hash, hashPassword(password, account.salt))) {
        throw new Unauthorized("Invalid login credentials");
      }
      return issue(account.user);
    },

    async verify(accessToken) {
      const entry = tokens.get(accessToken);
      if (!entry) throw new Unauthorized("Invalid or expired token");
      if (entry.expiresAt * 1000 < Date.now()) {
        tokens.delete(accessToken);
        throw new Unauthorized("Invalid or expired token");
      }
      for (const account of accounts.values()) {
        if (account.user.id === entry.userId) return { ...account.user };
      }
      throw new Unauthorized("Invalid or expired token");
    },
  };
}
