import { randomBytes } from "node:crypto";
import os from "node:os";
import path from "node:path";
import { DEFAULT_MAX_SESSIONS_PER_USER } from "../auth/sessions.js";

export interface RuntimeConfig {
  port: number;
  storageRoot: string;
  usersFile: string;
  nameWhitelist: string;
  nameMaxLength: number;
  defaultDirectoryName: string;
  enableJanitor: boolean;
  tmpSweepIntervalMs: number;
  tmpMinRetentionMs: number;
  sessionSecret: string;
  sessionTtlMs: number;
  maxSessionsPerUser: number;
  secureCookies: boolean;
  zipCommand: string;
  unzipCommand: string;
  archiveTimeoutMs: number;
  maxUploadBytes: number;
  uploadStagingDirectory: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
}

const defaultPort = 8000;
const defaultCorsOrigins = ["http://localhost:8000", "http://127.0.0.1:8000"];
export const defaultNameWhitelist =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZäöüÄÖÜß0123456789 ._-+()[]{}!&,'@#$%=~";
const defaultNameMaxLength = 128;
const defaultDirectoryName = "new_directory";
const defaultTmpSweepIntervalMs = 60 * 60 * 1000;
const defaultArchiveTimeoutMs = 10 * 60 * 1000;
const defaultMaxUploadBytes = 4 * 1024 * 1024 * 1024;

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export function resolvePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function resolveCorsOrigins(raw: string | undefined): {
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const allowedCorsOrigins = configured.length > 0 ? configured : defaultCorsOrigins;

  return {
    allowedCorsOrigins,
    allowAnyCorsOrigin: allowedCorsOrigins.includes("*")
  };
}

// Relative storage paths are anchored at the working directory, an empty one is the working directory itself.
export function resolveStorageRoot(raw: string | undefined, cwd: string = process.cwd()): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0) {
    return path.resolve(cwd);
  }
  return path.resolve(cwd, trimmed);
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const trimmed = (raw ?? "").trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): RuntimeConfig {
  const { allowedCorsOrigins, allowAnyCorsOrigin } = resolveCorsOrigins(env.CORS_ORIGINS);
  // Whitespace is meaningful in the whitelist, so it is taken verbatim.
  const nameWhitelist = env.HOMEVAULT_NAME_WHITELIST && env.HOMEVAULT_NAME_WHITELIST.length > 0
    ? env.HOMEVAULT_NAME_WHITELIST
    : defaultNameWhitelist;

  const config: RuntimeConfig = {
    port: resolvePort(env.PORT),
    storageRoot: resolveStorageRoot(env.HOMEVAULT_STORAGE_PATH, cwd),
    usersFile: path.resolve(cwd, nonEmpty(env.HOMEVAULT_USERS_FILE, "users.csv")),
    nameWhitelist,
    nameMaxLength: parseIntEnv(env.HOMEVAULT_NAME_MAX_LENGTH, defaultNameMaxLength, 1, 255),
    defaultDirectoryName: nonEmpty(env.HOMEVAULT_DEFAULT_DIRECTORY_NAME, defaultDirectoryName),
    enableJanitor: parseBooleanEnv(env.HOMEVAULT_ENABLE_JANITOR, true),
    tmpSweepIntervalMs: parseIntEnv(
      env.HOMEVAULT_TMP_SWEEP_INTERVAL_MS,
      defaultTmpSweepIntervalMs,
      1_000,
      7 * 24 * 60 * 60 * 1000
    ),
    tmpMinRetentionMs: parseIntEnv(env.HOMEVAULT_TMP_MIN_RETENTION_MS, 0, 0, 7 * 24 * 60 * 60 * 1000),
    sessionSecret: (env.HOMEVAULT_SESSION_SECRET ?? "").trim(),
    sessionTtlMs: parseIntEnv(env.HOMEVAULT_SESSION_TTL_MS, 0, 0, 365 * 24 * 60 * 60 * 1000),
    maxSessionsPerUser: parseIntEnv(env.HOMEVAULT_MAX_SESSIONS_PER_USER, DEFAULT_MAX_SESSIONS_PER_USER, 1, 1000),
    secureCookies: parseBooleanEnv(env.HOMEVAULT_SECURE_COOKIES, false),
    zipCommand: nonEmpty(env.HOMEVAULT_ZIP_COMMAND, "zip"),
    unzipCommand: nonEmpty(env.HOMEVAULT_UNZIP_COMMAND, "unzip"),
    archiveTimeoutMs: parseIntEnv(env.HOMEVAULT_ARCHIVE_TIMEOUT_MS, defaultArchiveTimeoutMs, 0, 24 * 60 * 60 * 1000),
    maxUploadBytes: parseIntEnv(env.HOMEVAULT_MAX_UPLOAD_BYTES, defaultMaxUploadBytes, 1, Number.MAX_SAFE_INTEGER),
    uploadStagingDirectory: path.resolve(
      cwd,
      nonEmpty(env.HOMEVAULT_UPLOAD_STAGING_PATH, path.join(os.tmpdir(), "homevault-uploads"))
    ),
    allowedCorsOrigins,
    allowAnyCorsOrigin
  };

  if (config.sessionSecret.length === 0) {
    config.sessionSecret = randomBytes(32).toString("hex");
  }

  if (config.nameMaxLength < config.defaultDirectoryName.length) {
    throw new Error("HOMEVAULT_DEFAULT_DIRECTORY_NAME must not exceed HOMEVAULT_NAME_MAX_LENGTH.");
  }

  return config;
}
