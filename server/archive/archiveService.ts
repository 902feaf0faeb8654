import { createHash, randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode, FileServiceError, translateFsError } from "../errors.js";
import type { KeyedLock } from "../storage/locks.js";
import { isPathWithinRoot, type PathResolver, type ResolvedPath } from "../storage/pathResolver.js";
import type { NameSanitizer } from "../storage/sanitizer.js";
import type { ArchiveCommandResult, ArchiveCommandRunner } from "./commandRunner.js";
import type { ArtifactLeases } from "./leases.js";

export interface ArchiveServiceOptions {
  resolver: PathResolver;
  sanitizer: NameSanitizer;
  tenantLock: KeyedLock;
  leases: ArtifactLeases;
  runCommand: ArchiveCommandRunner;
  zipCommand: string;
  unzipCommand: string;
  timeoutMs: number;
}

export interface ArchiveArtifact {
  artifactPath: string;
  artifactName: string;
  /** Name offered to the client, without the identifying hash. */
  downloadName: string;
  /** Drops the lease that keeps the janitor away while the artifact is streamed. */
  release: () => void;
}

// unzip reports recoverable warnings with exit code 1.
const UNZIP_WARNING_EXIT_CODE = 1;

/** `<dir name>-<md5 of the relative path>.zip`, stable for a given directory. */
export function artifactNameFor(dir: Pick<ResolvedPath, "relativePath" | "absolutePath">): string {
  const hash = createHash("md5").update(dir.relativePath, "utf8").digest("hex");
  return `${path.basename(dir.absolutePath)}-${hash}.zip`;
}

function summarizeOutput(result: ArchiveCommandResult): string {
  const output = `${result.stderr}\n${result.stdout}`.trim().replace(/\s+/g, " ");
  return output.length > 0 ? `: ${output.slice(0, 240)}` : "";
}

/** Unique name for a build in progress; keeps the .zip suffix so zip does not append one. */
function stagingNameFor(artifactName: string): string {
  return `${artifactName.slice(0, -".zip".length)}.build-${randomBytes(6).toString("hex")}.zip`;
}

async function realpathOrNull(target: string): Promise<string | null> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") {
      return null;
    }
    return translateFsError(error, path.basename(target));
  }
}

/**
 * Removes every symlink under `directory` that dangles or resolves outside
 * `home`. Links are never followed while walking.
 */
export async function pruneEscapingLinks(directory: string, home: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      return [];
    }
    return translateFsError(error, path.basename(directory));
  });

  const removed: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    if (entry.isSymbolicLink()) {
      const target = await realpathOrNull(entryPath);
      if (target === null || !isPathWithinRoot(home, target)) {
        await fs.unlink(entryPath);
        removed.push(entryPath);
      }
    } else if (entry.isDirectory()) {
      removed.push(...(await pruneEscapingLinks(entryPath, home)));
    }
  }
  return removed;
}

async function isRegularFile(target: string): Promise<boolean> {
  const stats = await fs.stat(target).catch((error: unknown) => {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      return null;
    }
    return translateFsError(error, path.basename(target));
  });
  return stats?.isFile() ?? false;
}

export class ArchiveService {
  constructor(private readonly options: ArchiveServiceOptions) {}

  /**
   * Rebuilds the directory's zip in the temp area from scratch. The archive is
   * written under a unique staging name and renamed over the artifact, so a
   * previous copy that is still being streamed is never truncated. Symlinks
   * are stored as links. The artifact stays after the caller releases it,
   * until the janitor reclaims it or the next request replaces it.
   */
  async downloadAsZip(dir: ResolvedPath): Promise<ArchiveArtifact> {
    if (dir.kind !== "directory") {
      throw new FileServiceError("not_found", `Directory not found: ${dir.relativePath}.`);
    }

    const { resolver, leases, tenantLock } = this.options;
    const artifactName = artifactNameFor(dir);
    const tmpDirectory = resolver.tmpDirectory;
    const artifactPath = path.join(tmpDirectory, artifactName);
    const stagingPath = path.join(tmpDirectory, stagingNameFor(artifactName));
    const baseName = path.basename(dir.absolutePath);

    // The tenant lock also serializes rebuilds of the same artifact, whose name embeds the tenant path.
    return tenantLock.runExclusive(dir.tenant, () =>
      leases.trackBuild(async () => {
        const release = leases.acquire(artifactPath);
        const releaseStaging = leases.acquire(stagingPath);
        try {
          await fs.mkdir(tmpDirectory, { recursive: true });
          // A linked directory is archived from its target, not as a bare link entry.
          const source = await resolver.canonicalPathOf(dir);

          const result = await this.run(
            this.options.zipCommand,
            ["-q", "-r", "-y", stagingPath, path.basename(source)],
            { cwd: path.dirname(source), failure: "zip_failed" }
          );
          if (result.exitCode !== 0) {
            throw new FileServiceError("zip_failed", `Archiving failed with exit code ${result.exitCode}${summarizeOutput(result)}`);
          }
          if (!(await isRegularFile(stagingPath))) {
            throw new FileServiceError("zip_failed", "Archiving finished without producing an archive.");
          }
          await fs.rename(stagingPath, artifactPath);

          return {
            artifactPath,
            artifactName,
            downloadName: `${baseName}.zip`,
            release
          };
        } catch (error) {
          release();
          await fs.rm(stagingPath, { force: true });
          throw error;
        } finally {
          releaseStaging();
        }
      })
    );
  }

  /**
   * Extracts `<name>.zip` inside `dir` into a new sibling directory `<name>`.
   * Extracted symlinks that dangle or lead out of the tenant's home are removed.
   */
  async unpackArchive(dir: ResolvedPath, rawArchiveName: string): Promise<string> {
    const archiveName = this.options.sanitizer.sanitizeName(rawArchiveName);
    if (!archiveName.toLowerCase().endsWith(".zip")) {
      throw new FileServiceError("invalid_input", "Only .zip archives can be unpacked.");
    }
    const targetName = archiveName.slice(0, -".zip".length);
    if (targetName.length === 0 || targetName === "." || targetName === "..") {
      throw new FileServiceError("invalid_input", "The archive name has no usable directory name.");
    }
    if (dir.kind !== "directory") {
      throw new FileServiceError("not_found", `Directory not found: ${dir.relativePath}.`);
    }

    const { resolver, tenantLock } = this.options;
    return tenantLock.runExclusive(dir.tenant, async () => {
      const source = await resolver.resolveChild(dir, archiveName);
      if (source.kind !== "file") {
        throw new FileServiceError("not_found", `Archive not found: ${archiveName}.`);
      }

      const target = await resolver.resolveChild(dir, targetName);
      const targetExists = await fs.lstat(target.absolutePath).then(
        () => true,
        (error: unknown) => (errnoCode(error) === "ENOENT" ? false : translateFsError(error, target.relativePath))
      );
      if (targetExists) {
        throw new FileServiceError("already_exists", `An entry named "${targetName}" already exists.`);
      }

      const result = await this.run(
        this.options.unzipCommand,
        ["-q", source.absolutePath, "-d", target.absolutePath],
        { failure: "unpack_failed" }
      );
      const removed = await pruneEscapingLinks(target.absolutePath, await resolver.tenantHome(dir.tenant));
      if (removed.length > 0) {
        console.warn(`[archive] removed ${removed.length} unsafe link(s) unpacked from ${source.relativePath}`);
      }
      if (result.exitCode !== 0 && result.exitCode !== UNZIP_WARNING_EXIT_CODE) {
        throw new FileServiceError(
          "unpack_failed",
          `Unpacking failed with exit code ${result.exitCode}${summarizeOutput(result)}`
        );
      }
      return targetName;
    });
  }

  private async run(
    command: string,
    args: string[],
    options: { cwd?: string; failure: "zip_failed" | "unpack_failed" }
  ): Promise<ArchiveCommandResult> {
    try {
      return await this.options.runCommand(command, args, {
        cwd: options.cwd,
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      console.error(`[archive] ${command} could not be run`, error);
      throw new FileServiceError(options.failure, `Could not run ${command}.`, { cause: error });
    }
  }
}
