import { describe, expect, it } from "vitest";

import { SessionAuthenticator } from "../../server/auth/authenticator.js";
import { SessionRegistry } from "../../server/auth/sessions.js";
import { SESSION_COOKIE_NAME } from "../../server/http/helpers.js";
import { registerAuthRoutes } from "../../server/http/routes/auth.js";
import { createRouteHarness, invokeRoute } from "../helpers/routeHarness.js";
import { createCredentialStore } from "../helpers/tempVault.js";

function setup(sessionTtlMs = 0) {
  const { app, route } = createRouteHarness();
  const authenticator = new SessionAuthenticator(createCredentialStore(), new SessionRegistry({ ttlMs: sessionTtlMs }));
  registerAuthRoutes(app as never, { authenticator, secureCookies: false, sessionTtlMs });
  return { route, authenticator };
}

describe("auth routes", () => {
  it("issues a signed session cookie on login", async () => {
    const { route, authenticator } = setup();

    const response = await invokeRoute(route("POST", "/api/auth/login"), {
      method: "POST",
      body: { username: "alice", password: "alice-password" }
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({ ok: true, username: "alice", home: "alice" });

    const cookie = response.cookies[SESSION_COOKIE_NAME];
    expect(cookie?.options).toEqual({ httpOnly: true, sameSite: "lax", secure: false, signed: true, path: "/" });
    expect(authenticator.describe(cookie?.value)).toBe("alice");
  });

  it("sets a cookie lifetime when sessions expire", async () => {
    const { route } = setup(60_000);

    const response = await invokeRoute(route("POST", "/api/auth/login"), {
      method: "POST",
      body: { username: "bob", password: "bob-password" }
    });

    expect(response.cookies[SESSION_COOKIE_NAME]?.options.maxAge).toBe(60_000);
  });

  it("answers every failed login with the same denial", async () => {
    const { route } = setup();

    for (const body of [
      { username: "alice", password: "wrong" },
      { username: "carol", password: "alice-password" }
    ]) {
      const response = await invokeRoute(route("POST", "/api/auth/login"), { method: "POST", body });
      expect(response.statusCode).toBe(403);
      expect(response.body).toEqual({ error: "Access denied.", code: "auth_failure" });
      expect(response.cookies).toEqual({});
    }
  });

  it("validates the login body", async () => {
    const { route } = setup();

    const response = await invokeRoute(route("POST", "/api/auth/login"), {
      method: "POST",
      body: { username: "alice" }
    });

    expect(response.statusCode).toBe(400);
    expect(response.body).toMatchObject({ error: "Validation failed" });
  });

  it("replaces the previous session on a new login", async () => {
    const { route, authenticator } = setup();
    const previous = authenticator.login("alice", "alice-password");

    await invokeRoute(route("POST", "/api/auth/login"), {
      method: "POST",
      body: { username: "alice", password: "alice-password" },
      signedCookies: { [SESSION_COOKIE_NAME]: previous.token }
    });

    expect(authenticator.describe(previous.token)).toBeNull();
  });

  it("logs out and reports session state", async () => {
    const { route, authenticator } = setup();
    const { token } = authenticator.login("alice", "alice-password");
    const signedCookies = { [SESSION_COOKIE_NAME]: token };

    const active = await invokeRoute(route("GET", "/api/auth/session"), { signedCookies });
    expect(active.body).toEqual({ authenticated: true, username: "alice" });

    const logout = await invokeRoute(route("POST", "/api/auth/logout"), { method: "POST", signedCookies });
    expect(logout.body).toEqual({ ok: true });
    expect(logout.clearedCookies).toEqual([SESSION_COOKIE_NAME]);

    const ended = await invokeRoute(route("GET", "/api/auth/session"), { signedCookies });
    expect(ended.body).toEqual({ authenticated: false });
  });
});
