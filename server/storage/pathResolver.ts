import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode, FileServiceError, translateFsError } from "../errors.js";

export type PathKind = "file" | "directory" | "absent";

export interface ResolvedPath {
  /** Validated request segments; the first one is the tenant. */
  segments: string[];
  relativePath: string;
  absolutePath: string;
  tenant: string;
  kind: PathKind;
}

function invalidPath(message: string): FileServiceError {
  return new FileServiceError("invalid_path", message);
}

function assertSegment(segment: string): void {
  if (segment === "..") {
    throw invalidPath("Path escapes the storage root.");
  }
  if (segment.includes("\0")) {
    throw invalidPath("Path contains invalid characters.");
  }
  if (segment.includes("/") || segment.includes("\\")) {
    throw invalidPath("Path segments must not contain separators.");
  }
}

/**
 * Validates request segments. Empty and `.` segments are dropped, parent
 * references are rejected instead of being normalized away.
 */
export function normalizeSegments(segments: readonly string[]): string[] {
  const accepted: string[] = [];
  for (const segment of segments) {
    if (segment.length === 0 || segment === ".") {
      continue;
    }
    assertSegment(segment);
    accepted.push(segment);
  }

  if (accepted.length === 0) {
    throw invalidPath("Path must start with a home directory.");
  }
  return accepted;
}

export function parseRequestPath(raw: string): string[] {
  if (raw.includes("\\")) {
    throw invalidPath("Path segments must not contain separators.");
  }
  return normalizeSegments(raw.split("/"));
}

export function isPathWithinRoot(rootPath: string, candidatePath: string): boolean {
  const root = path.resolve(rootPath).replace(/[\\/]+$/, "");
  const candidate = path.resolve(candidatePath).replace(/[\\/]+$/, "");
  if (candidate === root) {
    return true;
  }
  return candidate.startsWith(`${root}${path.sep}`);
}

async function realpathOrNull(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    return translateFsError(error, target);
  }
}

/**
 * Canonical path of `target`, or of its closest existing ancestor with the
 * missing tail re-appended when `target` itself does not exist yet.
 */
async function canonicalize(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  while (true) {
    const real = await realpathOrNull(current);
    if (real !== null) {
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return target;
    }
    missing.push(path.basename(current));
    current = parent;
  }
}

async function classify(target: string): Promise<PathKind> {
  try {
    const stats = await fs.stat(target);
    if (stats.isDirectory()) {
      return "directory";
    }
    return stats.isFile() ? "file" : "absent";
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return "absent";
    }
    return translateFsError(error, target);
  }
}

async function isSymbolicLink(target: string): Promise<boolean> {
  try {
    return (await fs.lstat(target)).isSymbolicLink();
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return false;
    }
    return translateFsError(error, target);
  }
}

export class PathResolver {
  readonly storageRoot: string;

  constructor(storageRoot: string) {
    this.storageRoot = path.resolve(storageRoot);
  }

  get tmpDirectory(): string {
    return path.join(this.storageRoot, "tmp");
  }

  /**
   * Joins validated segments onto the storage root. Symlinks are followed, and
   * the canonical target must still sit inside the tenant's canonical home.
   */
  async resolve(segments: readonly string[]): Promise<ResolvedPath> {
    const accepted = normalizeSegments(segments);
    const tenant = accepted[0] ?? "";
    const absolutePath = path.join(this.storageRoot, ...accepted);
    const tenantRoot = path.join(this.storageRoot, tenant);

    if (!isPathWithinRoot(tenantRoot, absolutePath)) {
      throw invalidPath("Path escapes the storage root.");
    }

    const [canonicalTenantRoot, canonicalTarget] = await Promise.all([
      canonicalize(tenantRoot),
      canonicalize(absolutePath)
    ]);
    if (!isPathWithinRoot(canonicalTenantRoot, canonicalTarget)) {
      throw invalidPath("Path escapes the storage root.");
    }

    return {
      segments: accepted,
      relativePath: accepted.join("/"),
      absolutePath,
      tenant,
      kind: await classify(absolutePath)
    };
  }

  /**
   * Like `resolve`, but a symlink named by the last segment is reported as a
   * plain `file` entry without following it, so the link itself can be
   * removed wherever it points. The parent must still resolve inside the home.
   */
  async resolveEntry(segments: readonly string[]): Promise<ResolvedPath> {
    const accepted = normalizeSegments(segments);
    if (accepted.length < 2) {
      return this.resolve(accepted);
    }

    const parent = await this.resolve(accepted.slice(0, -1));
    const absolutePath = path.join(parent.absolutePath, accepted[accepted.length - 1] ?? "");
    const isLink = parent.kind === "directory" && (await isSymbolicLink(absolutePath));
    if (!isLink) {
      return this.resolve(accepted);
    }

    return {
      segments: accepted,
      relativePath: accepted.join("/"),
      absolutePath,
      tenant: parent.tenant,
      kind: "file"
    };
  }

  /** Canonical location of a tenant's home directory. */
  async tenantHome(tenant: string): Promise<string> {
    return canonicalize(path.join(this.storageRoot, tenant));
  }

  /** Canonical location of an already resolved path. */
  async canonicalPathOf(resolved: ResolvedPath): Promise<string> {
    return canonicalize(resolved.absolutePath);
  }

  /** Resolves a direct child of an already resolved directory. */
  async resolveChild(parent: ResolvedPath, name: string): Promise<ResolvedPath> {
    return this.resolve([...parent.segments, name]);
  }
}
