import type { Request, Response } from "express";
import { ZodError } from "zod";

import { FileServiceError } from "../errors.js";

export const SESSION_COOKIE_NAME = "homevault_session";

export function sendZodError(error: unknown, response: Response): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  console.error("[api-error]", error);
  response.status(500).json({ error: "Internal server error" });
}

export function sendRouteError(error: unknown, response: Response): void {
  if (error instanceof FileServiceError) {
    response.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  sendZodError(error, response);
}

export function firstParam(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? "";
  }
  return value ?? "";
}

export function readSessionToken(request: Request): string | undefined {
  const signed: unknown = request.signedCookies?.[SESSION_COOKIE_NAME];
  return typeof signed === "string" && signed.length > 0 ? signed : undefined;
}
