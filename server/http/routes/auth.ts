import type { CookieOptions, Express, Request, Response } from "express";

import type { SessionAuthenticator } from "../../auth/authenticator.js";
import { readSessionToken, sendRouteError, SESSION_COOKIE_NAME } from "../helpers.js";
import { loginSchema } from "../schemas.js";

export interface AuthRouteDependencies {
  authenticator: SessionAuthenticator;
  secureCookies: boolean;
  /** 0 issues a browser-session cookie. */
  sessionTtlMs: number;
}

function sessionCookieOptions(deps: AuthRouteDependencies): CookieOptions {
  return {
    httpOnly: true,
    sameSite: "lax",
    secure: deps.secureCookies,
    signed: true,
    path: "/",
    ...(deps.sessionTtlMs > 0 ? { maxAge: deps.sessionTtlMs } : {})
  };
}

export function registerAuthRoutes(app: Express, deps: AuthRouteDependencies): void {
  app.post("/api/auth/login", (request: Request, response: Response) => {
    try {
      const input = loginSchema.parse(request.body ?? {});
      deps.authenticator.logout(readSessionToken(request));
      const session = deps.authenticator.login(input.username, input.password);

      response.cookie(SESSION_COOKIE_NAME, session.token, sessionCookieOptions(deps));
      response.json({ ok: true, username: session.username, home: session.username });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/auth/logout", (request: Request, response: Response) => {
    deps.authenticator.logout(readSessionToken(request));
    response.clearCookie(SESSION_COOKIE_NAME, { path: "/" });
    response.json({ ok: true });
  });

  app.get("/api/auth/session", (request: Request, response: Response) => {
    const username = deps.authenticator.describe(readSessionToken(request));
    response.json(username === null ? { authenticated: false } : { authenticated: true, username });
  });
}
