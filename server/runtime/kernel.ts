import type { Server } from "node:http";

import { ArchiveService } from "../archive/archiveService.js";
import { runArchiveCommand, type ArchiveCommandRunner } from "../archive/commandRunner.js";
import { ArtifactLeases } from "../archive/leases.js";
import { createTempJanitor, type TempJanitor } from "../archive/tempJanitor.js";
import { SessionAuthenticator } from "../auth/authenticator.js";
import { SessionRegistry } from "../auth/sessions.js";
import { ensureHomeDirectories } from "../credentials/provisioning.js";
import { CredentialStore } from "../credentials/store.js";
import { createApp } from "../http/appFactory.js";
import { createUploadParser } from "../http/uploads.js";
import { FileOperations } from "../storage/fileOperations.js";
import { createKeyedLock } from "../storage/locks.js";
import { PathResolver } from "../storage/pathResolver.js";
import { createNameSanitizer } from "../storage/sanitizer.js";
import { initializeRuntimeBootstrap, type RuntimeBootstrapHandle } from "./bootstrap.js";
import { resolveRuntimeConfig, type RuntimeConfig } from "./config.js";

export interface ServerRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<RuntimeConfig>;
  credentials?: CredentialStore;
  runCommand?: ArchiveCommandRunner;
}

/** Everything a request needs, built once and handed to each component. */
export interface ApplicationContext {
  config: RuntimeConfig;
  credentials: CredentialStore;
  authenticator: SessionAuthenticator;
  resolver: PathResolver;
  fileOperations: FileOperations;
  archives: ArchiveService;
  leases: ArtifactLeases;
  janitor: TempJanitor;
}

export interface ServerRuntime {
  app: ReturnType<typeof createApp>;
  context: ApplicationContext;
  start: () => Promise<Server>;
  stop: () => void;
}

export function createApplicationContext(
  config: RuntimeConfig,
  credentials: CredentialStore,
  runCommand: ArchiveCommandRunner = runArchiveCommand
): ApplicationContext {
  const resolver = new PathResolver(config.storageRoot);
  const sanitizer = createNameSanitizer({
    whitelist: config.nameWhitelist,
    maxLength: config.nameMaxLength
  });
  const tenantLock = createKeyedLock();
  const leases = new ArtifactLeases();

  return {
    config,
    credentials,
    authenticator: new SessionAuthenticator(
      credentials,
      new SessionRegistry({ ttlMs: config.sessionTtlMs, maxSessionsPerUser: config.maxSessionsPerUser })
    ),
    resolver,
    fileOperations: new FileOperations({
      resolver,
      sanitizer,
      tenantLock,
      defaultDirectoryName: config.defaultDirectoryName
    }),
    archives: new ArchiveService({
      resolver,
      sanitizer,
      tenantLock,
      leases,
      runCommand,
      zipCommand: config.zipCommand,
      unzipCommand: config.unzipCommand,
      timeoutMs: config.archiveTimeoutMs
    }),
    leases,
    janitor: createTempJanitor({
      tmpDirectory: resolver.tmpDirectory,
      intervalMs: config.tmpSweepIntervalMs,
      minRetentionMs: config.tmpMinRetentionMs,
      leases
    })
  };
}

export async function createServerRuntime(options: ServerRuntimeOptions = {}): Promise<ServerRuntime> {
  const config: RuntimeConfig = {
    ...resolveRuntimeConfig(options.env),
    ...(options.config ?? {})
  };
  const appVersion = (options.env?.npm_package_version ?? process.env.npm_package_version ?? "dev").trim() || "dev";

  // A missing or malformed credential list stops startup here.
  const credentials = options.credentials ?? (await CredentialStore.load(config.usersFile));
  const context = createApplicationContext(config, credentials, options.runCommand);

  const app = createApp({
    sessionSecret: config.sessionSecret,
    allowedCorsOrigins: config.allowedCorsOrigins,
    allowAnyCorsOrigin: config.allowAnyCorsOrigin,
    system: {
      getVersion: () => appVersion
    },
    auth: {
      authenticator: context.authenticator,
      secureCookies: config.secureCookies,
      sessionTtlMs: config.sessionTtlMs
    },
    files: {
      authenticator: context.authenticator,
      resolver: context.resolver,
      fileOperations: context.fileOperations,
      archives: context.archives,
      uploadParser: createUploadParser({
        stagingDirectory: config.uploadStagingDirectory,
        maxUploadBytes: config.maxUploadBytes
      })
    }
  });

  let server: Server | null = null;
  let bootstrapHandle: RuntimeBootstrapHandle | null = null;

  function stop(): void {
    if (bootstrapHandle) {
      bootstrapHandle.dispose();
      bootstrapHandle = null;
    }

    if (server) {
      server.close();
      server = null;
    }
  }

  async function start(): Promise<Server> {
    if (server) {
      return server;
    }

    bootstrapHandle = await initializeRuntimeBootstrap({
      enableJanitor: config.enableJanitor,
      ensureStorageLayout: async () => {
        const created = await ensureHomeDirectories(config.storageRoot, credentials.usernames());
        if (created.length > 0) {
          console.log(`[storage] created home directories: ${created.join(", ")}`);
        }
      },
      janitor: context.janitor
    });

    const listening = app.listen(config.port, () => {
      console.log(
        `homevault listening on http://localhost:${config.port} (storage=${config.storageRoot}, users=${credentials.size})`
      );
    });
    server = listening;
    return listening;
  }

  return {
    app,
    context,
    start,
    stop
  };
}
