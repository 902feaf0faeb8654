import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import {
  defaultNameWhitelist,
  parseBooleanEnv,
  parseIntEnv,
  resolveCorsOrigins,
  resolvePort,
  resolveRuntimeConfig,
  resolveStorageRoot
} from "../../server/runtime/config.js";

describe("runtime config", () => {
  it("uses safe defaults when env is empty", () => {
    const cwd = path.resolve("/srv/vault");
    const config = resolveRuntimeConfig({}, cwd);

    expect(config.port).toBe(8000);
    expect(config.storageRoot).toBe(cwd);
    expect(config.usersFile).toBe(path.join(cwd, "users.csv"));
    expect(config.nameWhitelist).toBe(defaultNameWhitelist);
    expect(config.nameMaxLength).toBe(128);
    expect(config.defaultDirectoryName).toBe("new_directory");
    expect(config.enableJanitor).toBe(true);
    expect(config.tmpSweepIntervalMs).toBe(3_600_000);
    expect(config.tmpMinRetentionMs).toBe(0);
    expect(config.sessionTtlMs).toBe(0);
    expect(config.maxSessionsPerUser).toBe(16);
    expect(config.secureCookies).toBe(false);
    expect(config.zipCommand).toBe("zip");
    expect(config.unzipCommand).toBe("unzip");
    expect(config.archiveTimeoutMs).toBe(600_000);
    expect(config.maxUploadBytes).toBe(4 * 1024 * 1024 * 1024);
    expect(config.uploadStagingDirectory).toBe(path.join(os.tmpdir(), "homevault-uploads"));
    expect(config.sessionSecret).toMatch(/^[0-9a-f]{64}$/);
    expect(config.allowedCorsOrigins).toEqual(["http://localhost:8000", "http://127.0.0.1:8000"]);
    expect(config.allowAnyCorsOrigin).toBe(false);
  });

  it("parses runtime env overrides", () => {
    const cwd = path.resolve("/srv/vault");
    const config = resolveRuntimeConfig(
      {
        PORT: "9000",
        HOMEVAULT_STORAGE_PATH: "data",
        HOMEVAULT_USERS_FILE: "config/users.csv",
        HOMEVAULT_NAME_WHITELIST: "abc ",
        HOMEVAULT_NAME_MAX_LENGTH: "500",
        HOMEVAULT_DEFAULT_DIRECTORY_NAME: "folder",
        HOMEVAULT_TMP_SWEEP_INTERVAL_MS: "10",
        HOMEVAULT_TMP_MIN_RETENTION_MS: "60000",
        HOMEVAULT_ENABLE_JANITOR: "off",
        HOMEVAULT_SESSION_SECRET: " test-secret ",
        HOMEVAULT_SESSION_TTL_MS: "3600000",
        HOMEVAULT_MAX_SESSIONS_PER_USER: "4",
        HOMEVAULT_SECURE_COOKIES: "yes",
        HOMEVAULT_ZIP_COMMAND: "/usr/local/bin/zip",
        HOMEVAULT_MAX_UPLOAD_BYTES: "1024",
        HOMEVAULT_UPLOAD_STAGING_PATH: "staging",
        CORS_ORIGINS: "https://files.example.com,*"
      },
      cwd
    );

    expect(config.port).toBe(9000);
    expect(config.storageRoot).toBe(path.join(cwd, "data"));
    expect(config.usersFile).toBe(path.join(cwd, "config", "users.csv"));
    expect(config.nameWhitelist).toBe("abc ");
    expect(config.nameMaxLength).toBe(255);
    expect(config.defaultDirectoryName).toBe("folder");
    expect(config.tmpSweepIntervalMs).toBe(1_000);
    expect(config.tmpMinRetentionMs).toBe(60_000);
    expect(config.enableJanitor).toBe(false);
    expect(config.sessionSecret).toBe("test-secret");
    expect(config.sessionTtlMs).toBe(3_600_000);
    expect(config.maxSessionsPerUser).toBe(4);
    expect(config.secureCookies).toBe(true);
    expect(config.zipCommand).toBe("/usr/local/bin/zip");
    expect(config.maxUploadBytes).toBe(1024);
    expect(config.uploadStagingDirectory).toBe(path.join(cwd, "staging"));
    expect(config.allowedCorsOrigins).toEqual(["https://files.example.com", "*"]);
    expect(config.allowAnyCorsOrigin).toBe(true);
  });

  it("rejects a default directory name longer than the name limit", () => {
    expect(() =>
      resolveRuntimeConfig({ HOMEVAULT_NAME_MAX_LENGTH: "5", HOMEVAULT_DEFAULT_DIRECTORY_NAME: "new_directory" })
    ).toThrow("HOMEVAULT_DEFAULT_DIRECTORY_NAME must not exceed HOMEVAULT_NAME_MAX_LENGTH.");
  });

  it("normalizes helper parsers", () => {
    expect(resolvePort("70000")).toBe(8000);
    expect(resolvePort("8080")).toBe(8080);
    expect(parseBooleanEnv("maybe", true)).toBe(true);
    expect(parseBooleanEnv("0", true)).toBe(false);
    expect(parseIntEnv("abc", 5, 1, 10)).toBe(5);
    expect(parseIntEnv("-4", 5, 1, 10)).toBe(1);
    expect(resolveCorsOrigins(" , ").allowedCorsOrigins).toEqual([
      "http://localhost:8000",
      "http://127.0.0.1:8000"
    ]);
    expect(resolveStorageRoot("  ", path.resolve("/srv/vault"))).toBe(path.resolve("/srv/vault"));
    expect(resolveStorageRoot("/mnt/files", path.resolve("/srv/vault"))).toBe(path.resolve("/mnt/files"));
  });
});
