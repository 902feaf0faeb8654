import type { Express } from "express";

export interface SystemRouteDependencies {
  getVersion?: () => string;
}

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/api/health", (_request, response) => {
    const version = deps.getVersion?.();
    response.json({
      ok: true,
      now: new Date().toISOString(),
      ...(typeof version === "string" && version.trim().length > 0
        ? {
            version: version.trim()
          }
        : {})
    });
  });
}
