import cors from "cors";
import type { NextFunction, Request, Response } from "express";
import multer from "multer";

import { ACCESS_DENIED_MESSAGE } from "../errors.js";
import { readSessionToken } from "./helpers.js";

export function createSecurityHeadersMiddleware(): (request: Request, response: Response, next: NextFunction) => void {
  return (_request, response, next) => {
    response.setHeader("X-Content-Type-Options", "nosniff");
    response.setHeader("X-Frame-Options", "DENY");
    response.setHeader("Referrer-Policy", "no-referrer");
    next();
  };
}

export interface CorsConfig {
  allowedOrigins: string[];
  allowAnyOrigin: boolean;
}

export function createCorsMiddleware(config: CorsConfig) {
  return cors({
    origin: (origin, callback) => {
      if (!origin || config.allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      // Credentialed requests cannot use a wildcard, so "*" reflects the caller's origin.
      callback(null, config.allowAnyOrigin);
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    credentials: true,
    maxAge: 600
  });
}

export interface SessionGuardOptions {
  hasSession: (token: string | undefined) => boolean;
}

const publicPaths = new Set(["/api/health", "/api/auth/login", "/api/auth/logout", "/api/auth/session"]);

/**
 * Rejects API requests that carry no live session before any body parsing
 * happens. Tenant scoping is checked per route.
 */
export function createSessionGuardMiddleware(options: SessionGuardOptions) {
  return (request: Request, response: Response, next: NextFunction) => {
    if (!request.path.startsWith("/api/") || request.method === "OPTIONS" || publicPaths.has(request.path)) {
      next();
      return;
    }

    if (!options.hasSession(readSessionToken(request))) {
      response.status(403).json({ error: ACCESS_DENIED_MESSAGE, code: "auth_failure" });
      return;
    }

    next();
  };
}

export function createNotFoundMiddleware(): (request: Request, response: Response) => void {
  return (_request, response) => {
    response.status(404).json({ error: "Not found" });
  };
}

export function createErrorMiddleware(): (
  error: unknown,
  request: Request,
  response: Response,
  next: NextFunction
) => void {
  return (error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }

    if (error instanceof multer.MulterError) {
      const statusCode = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      response.status(statusCode).json({ error: error.message, code: "invalid_input" });
      return;
    }

    console.error("[unhandled-api-error]", error);
    response.status(500).json({ error: "Internal server error" });
  };
}
