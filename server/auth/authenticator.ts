import { accessDenied } from "../errors.js";
import { computeCredentialDigest, type CredentialStore } from "../credentials/store.js";
import type { SessionRegistry } from "./sessions.js";

export interface LoginResult {
  token: string;
  username: string;
}

/**
 * Couples credentials to tenant scope: a session may only touch paths whose
 * first segment is the username it was issued for. Every failure surfaces as
 * the same access-denied error.
 */
export class SessionAuthenticator {
  constructor(
    private readonly credentials: CredentialStore,
    private readonly sessions: SessionRegistry
  ) {}

  login(username: string, password: string): LoginResult {
    const matched = this.credentials.lookup(computeCredentialDigest(username, password));
    if (matched === null) {
      throw accessDenied();
    }

    const session = this.sessions.create(matched);
    return { token: session.token, username: session.username };
  }

  authorize(token: string | undefined, segments: readonly string[]): string {
    const session = this.sessions.get(token);
    const claimedTenant = segments[0];
    if (!session || claimedTenant === undefined || claimedTenant !== session.username) {
      throw accessDenied();
    }
    if (!this.credentials.has(session.username)) {
      throw accessDenied();
    }
    return session.username;
  }

  describe(token: string | undefined): string | null {
    return this.sessions.get(token)?.username ?? null;
  }

  logout(token: string | undefined): void {
    this.sessions.destroy(token);
  }
}
