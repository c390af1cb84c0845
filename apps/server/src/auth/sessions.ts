import { randomUUID } from 'node:crypto';

export interface SessionStoreOptions {
  /** Session lifetime; defaults to 12 hours */
  ttlMs?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 12 * 60 * 60 * 1000;

/**
 * Bearer tokens of signed-in browser sessions, held in memory.
 *
 * One store is created per server and handed to the routes that need it.
 */
export class SessionStore {
  private readonly expiries = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Opens a session and returns its token.
   */
  create(): string {
    this.purgeExpired();
    const token = randomUUID();
    this.expiries.set(token, this.now() + this.ttlMs);
    return token;
  }

  isValid(token: string): boolean {
    const expiresAt = this.expiries.get(token);
    if (expiresAt === undefined) {
      return false;
    }
    if (expiresAt <= this.now()) {
      this.expiries.delete(token);
      return false;
    }
    return true;
  }

  /**
   * @returns whether the token was open
   */
  revoke(token: string): boolean {
    return this.expiries.delete(token);
  }

  get size(): number {
    return this.expiries.size;
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [token, expiresAt] of this.expiries) {
      if (expiresAt <= now) {
        this.expiries.delete(token);
      }
    }
  }
}
