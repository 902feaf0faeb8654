import { randomBytes } from "node:crypto";

export interface SessionRecord {
  token: string;
  username: string;
  createdAt: number;
}

export interface SessionRegistryOptions {
  /** 0 keeps sessions for the process lifetime. */
  ttlMs?: number;
  /** Oldest sessions of a user are dropped once a new one would exceed this. */
  maxSessionsPerUser?: number;
  now?: () => number;
}

export const DEFAULT_MAX_SESSIONS_PER_USER = 16;

function generateSessionToken(): string {
  return randomBytes(32).toString("hex");
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly ttlMs: number;
  private readonly maxSessionsPerUser: number;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? 0);
    this.maxSessionsPerUser = Math.max(1, Math.trunc(options.maxSessionsPerUser ?? DEFAULT_MAX_SESSIONS_PER_USER));
    this.now = options.now ?? Date.now;
  }

  create(username: string): SessionRecord {
    this.pruneExpired();
    this.evictOldest(username);
    const record: SessionRecord = {
      token: generateSessionToken(),
      username,
      createdAt: this.now()
    };
    this.sessions.set(record.token, record);
    return record;
  }

  get(token: string | undefined): SessionRecord | null {
    if (!token) {
      return null;
    }

    const record = this.sessions.get(token);
    if (!record) {
      return null;
    }
    if (this.isExpired(record)) {
      this.sessions.delete(token);
      return null;
    }
    return record;
  }

  destroy(token: string | undefined): boolean {
    if (!token) {
      return false;
    }
    return this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(record: SessionRecord): boolean {
    return this.ttlMs > 0 && this.now() - record.createdAt >= this.ttlMs;
  }

  // Map iteration follows insertion order, so the first matches are the oldest.
  private evictOldest(username: string): void {
    const owned: string[] = [];
    for (const [token, record] of this.sessions) {
      if (record.username === username) {
        owned.push(token);
      }
    }

    const excess = owned.length - this.maxSessionsPerUser + 1;
    for (const token of owned.slice(0, Math.max(0, excess))) {
      this.sessions.delete(token);
    }
  }

  private pruneExpired(): void {
    if (this.ttlMs === 0) {
      return;
    }
    for (const [token, record] of this.sessions) {
      if (this.isExpired(record)) {
        this.sessions.delete(token);
      }
    }
  }
}
