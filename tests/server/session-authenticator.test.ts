import { describe, expect, it } from "vitest";

import { SessionAuthenticator } from "../../server/auth/authenticator.js";
import { DEFAULT_MAX_SESSIONS_PER_USER, SessionRegistry } from "../../server/auth/sessions.js";
import { ACCESS_DENIED_MESSAGE } from "../../server/errors.js";
import { createCredentialStore } from "../helpers/tempVault.js";

describe("session registry", () => {
  it("issues random tokens and forgets destroyed sessions", () => {
    const registry = new SessionRegistry();
    const first = registry.create("alice");
    const second = registry.create("alice");

    expect(first.token).toMatch(/^[0-9a-f]{64}$/);
    expect(second.token).not.toBe(first.token);
    expect(registry.get(first.token)?.username).toBe("alice");
    expect(registry.get(undefined)).toBeNull();
    expect(registry.get("unknown")).toBeNull();

    expect(registry.destroy(first.token)).toBe(true);
    expect(registry.destroy(first.token)).toBe(false);
    expect(registry.get(first.token)).toBeNull();
    expect(registry.size).toBe(1);
  });

  it("expires sessions after the configured lifetime", () => {
    let now = 0;
    const registry = new SessionRegistry({ ttlMs: 1_000, now: () => now });
    const session = registry.create("alice");

    now = 999;
    expect(registry.get(session.token)?.username).toBe("alice");

    now = 1_000;
    expect(registry.get(session.token)).toBeNull();
    expect(registry.size).toBe(0);
  });

  it("prunes expired sessions when a new one is created", () => {
    let now = 0;
    const registry = new SessionRegistry({ ttlMs: 500, now: () => now });
    registry.create("alice");
    registry.create("bob");

    now = 600;
    registry.create("alice");
    expect(registry.size).toBe(1);
  });

  it("drops the oldest sessions of a user beyond the per-user limit", () => {
    const registry = new SessionRegistry({ maxSessionsPerUser: 3 });
    const bobSession = registry.create("bob");
    const aliceTokens = Array.from({ length: 5 }, () => registry.create("alice").token);

    expect(registry.size).toBe(4);
    expect(registry.get(aliceTokens[0])).toBeNull();
    expect(registry.get(aliceTokens[1])).toBeNull();
    expect(aliceTokens.slice(2).map((token) => registry.get(token)?.username)).toEqual(["alice", "alice", "alice"]);
    expect(registry.get(bobSession.token)?.username).toBe("bob");
  });

  it("bounds repeated logins by default", () => {
    const registry = new SessionRegistry();
    for (let attempt = 0; attempt < 40; attempt += 1) {
      registry.create("alice");
    }

    expect(registry.size).toBe(DEFAULT_MAX_SESSIONS_PER_USER);
  });
});

describe("session authenticator", () => {
  function createAuthenticator(): { authenticator: SessionAuthenticator; sessions: SessionRegistry } {
    const sessions = new SessionRegistry();
    return { authenticator: new SessionAuthenticator(createCredentialStore(), sessions), sessions };
  }

  it("scopes a session to the tenant it was issued for", () => {
    const { authenticator } = createAuthenticator();
    const { token, username } = authenticator.login("alice", "alice-password");

    expect(username).toBe("alice");
    expect(authenticator.authorize(token, ["alice", "docs"])).toBe("alice");
    expect(authenticator.describe(token)).toBe("alice");
    expect(() => authenticator.authorize(token, ["bob"])).toThrow(ACCESS_DENIED_MESSAGE);
    expect(() => authenticator.authorize(token, [])).toThrow(ACCESS_DENIED_MESSAGE);
  });

  it("rejects wrong passwords and mismatched users alike", () => {
    const { authenticator } = createAuthenticator();

    expect(() => authenticator.login("alice", "wrong")).toThrow(ACCESS_DENIED_MESSAGE);
    expect(() => authenticator.login("alice", "bob-password")).toThrow(ACCESS_DENIED_MESSAGE);
    expect(() => authenticator.login("carol", "carol-password")).toThrow(ACCESS_DENIED_MESSAGE);
  });

  it("denies requests without a live session", () => {
    const { authenticator } = createAuthenticator();
    const { token } = authenticator.login("bob", "bob-password");

    expect(() => authenticator.authorize(undefined, ["bob"])).toThrow(ACCESS_DENIED_MESSAGE);
    authenticator.logout(token);
    expect(() => authenticator.authorize(token, ["bob"])).toThrow(ACCESS_DENIED_MESSAGE);
    expect(authenticator.describe(token)).toBeNull();
  });

  it("denies sessions whose user is no longer listed", () => {
    const { authenticator, sessions } = createAuthenticator();
    const orphan = sessions.create("carol");

    expect(() => authenticator.authorize(orphan.token, ["carol"])).toThrow(ACCESS_DENIED_MESSAGE);
  });
});
