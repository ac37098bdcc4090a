import { z } from "zod";
import type { TokenAuthority } from "../auth.js";
import {
  alreadyExists,
  checkSignal,
  internal,
  invalidArgument,
  notFound,
  unauthenticated,
  wrapInternal,
} from "../errors.js";
import { hashPassword, verifyPassword } from "./password.js";
import { EmailTakenError, type UserStore } from "./store.js";

/** Public view of a user. Never includes the password hash. */
export interface User {
  id: string;
  email: string;
  created_at: string;
}

/**
 * Lets other services ask whether a user id is real without reading the users
 * database.
 */
export interface UserDirectory {
  exists(userId: string, signal?: AbortSignal): Promise<boolean>;
}

const INVALID_CREDENTIALS = "invalid email or password";

// Well-formed hash that matches no password. Unknown emails are checked
// against it so both login failures cost one key derivation.
const UNKNOWN_USER_HASH = `scrypt$${"00".repeat(16)}$${"00".repeat(64)}`;

const EmailSchema = z.string().email();

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class UserService implements UserDirectory {
  private readonly store: UserStore;
  private readonly tokens: TokenAuthority;

  constructor(store: UserStore, tokens: TokenAuthority) {
    this.store = store;
    this.tokens = tokens;
  }

  async signup(email: string, password: string, signal?: AbortSignal): Promise<User> {
    const normalized = normalizeEmail(email);
    if (!normalized || !password) {
      throw invalidArgument("email and password are required");
    }
    if (!EmailSchema.safeParse(normalized).success) {
      throw invalidArgument("email must be a valid email address");
    }

    const hash = await wrapInternal("failed to hash password", () => hashPassword(password));
    checkSignal(signal);

    try {
      const row = this.store.insert(normalized, hash);
      console.log(`[users] Registered ${row.id}`);
      return { id: row.id, email: row.email, created_at: row.created_at };
    } catch (err) {
      if (err instanceof EmailTakenError) throw alreadyExists("user already exists");
      throw internal("failed to create user", err);
    }
  }

  /**
   * Returns a signed token. Unknown email and wrong password produce the same
   * Unauthenticated error.
   */
  async login(email: string, password: string, signal?: AbortSignal): Promise<string> {
    const normalized = normalizeEmail(email);
    if (!normalized || !password) {
      throw invalidArgument("email and password are required");
    }
    checkSignal(signal);

    const row = await wrapInternal("failed to fetch user", () => this.store.findByEmail(normalized));

    const ok = await wrapInternal("failed to verify password", () =>
      verifyPassword(password, row?.password_hash ?? UNKNOWN_USER_HASH)
    );
    if (!row || !ok) throw unauthenticated(INVALID_CREDENTIALS);

    return wrapInternal("failed to generate token", () => this.tokens.issue(row.id, row.email));
  }

  async getUser(userId: string, signal?: AbortSignal): Promise<User> {
    checkSignal(signal);
    const row = await wrapInternal("failed to fetch user", () => this.store.findById(userId));
    if (!row) throw notFound("user not found");
    return { id: row.id, email: row.email, created_at: row.created_at };
  }

  async exists(userId: string, signal?: AbortSignal): Promise<boolean> {
    checkSignal(signal);
    const row = await wrapInternal("failed to fetch user", () => this.store.findById(userId));
    return row !== undefined;
  }
}
