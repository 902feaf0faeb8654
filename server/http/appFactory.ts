import cookieParser from "cookie-parser";
import express from "express";

import {
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware,
  createSessionGuardMiddleware
} from "./middleware.js";
import { registerAuthRoutes, type AuthRouteDependencies } from "./routes/auth.js";
import { registerFileRoutes, type FileRouteDependencies } from "./routes/files.js";
import { registerSystemRoutes, type SystemRouteDependencies } from "./routes/system.js";

export interface AppFactoryDependencies {
  sessionSecret: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  system: SystemRouteDependencies;
  auth: AuthRouteDependencies;
  files: FileRouteDependencies;
}

export function createApp(deps: AppFactoryDependencies): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.allowedCorsOrigins,
      allowAnyOrigin: deps.allowAnyCorsOrigin
    })
  );
  app.use(cookieParser(deps.sessionSecret));
  app.use(express.json({ limit: "64kb" }));
  app.use(
    createSessionGuardMiddleware({
      hasSession: (token) => deps.auth.authenticator.describe(token) !== null
    })
  );

  registerSystemRoutes(app, deps.system);
  registerAuthRoutes(app, deps.auth);
  registerFileRoutes(app, deps.files);

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
