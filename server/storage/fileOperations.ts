import { constants as fsConstants, type Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode, FileServiceError, translateFsError } from "../errors.js";
import type { KeyedLock } from "./locks.js";
import type { PathResolver, ResolvedPath } from "./pathResolver.js";
import type { NameSanitizer } from "./sanitizer.js";

export interface DirectoryListing {
  directories: string[];
  files: string[];
}

export interface UploadedFile {
  originalName: string;
  /** Staging location written by the multipart parser. */
  tempPath: string;
}

export interface FileDownload {
  absolutePath: string;
  fileName: string;
  sizeBytes: number;
}

export interface FileOperationsOptions {
  resolver: PathResolver;
  sanitizer: NameSanitizer;
  tenantLock: KeyedLock;
  defaultDirectoryName: string;
  renameFile?: (source: string, target: string) => Promise<void>;
  copyFile?: (source: string, target: string, mode: number) => Promise<void>;
}

function compareDisplayNames(left: string, right: string): number {
  const leftKey = left.toLowerCase();
  const rightKey = right.toLowerCase();
  if (leftKey !== rightKey) {
    return leftKey < rightKey ? -1 : 1;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function requireDirectory(target: ResolvedPath): void {
  if (target.kind !== "directory") {
    throw new FileServiceError("not_found", `Directory not found: ${target.relativePath}.`);
  }
}

async function entryExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return false;
    }
    return translateFsError(error, path.basename(target));
  }
}

async function removeQuietly(target: string): Promise<void> {
  await fs.rm(target, { force: true }).catch((error: unknown) => {
    console.warn(`[file-operations] could not remove ${target}`, error);
  });
}

/**
 * Multipart parsers hand over header file names as latin1. Re-decode as UTF-8
 * unless that produces replacement characters.
 */
export function decodeUploadFileName(raw: string): string {
  const decoded = Buffer.from(raw, "latin1").toString("utf8");
  return decoded.includes("\uFFFD") ? raw : decoded;
}

export class FileOperations {
  private readonly resolver: PathResolver;
  private readonly sanitizer: NameSanitizer;
  private readonly tenantLock: KeyedLock;
  private readonly defaultDirectoryName: string;
  private readonly renameFile: (source: string, target: string) => Promise<void>;
  private readonly copyFile: (source: string, target: string, mode: number) => Promise<void>;

  constructor(options: FileOperationsOptions) {
    this.resolver = options.resolver;
    this.sanitizer = options.sanitizer;
    this.tenantLock = options.tenantLock;
    this.defaultDirectoryName = options.defaultDirectoryName;
    this.renameFile = options.renameFile ?? ((source, target) => fs.rename(source, target));
    this.copyFile = options.copyFile ?? ((source, target, mode) => fs.copyFile(source, target, mode));
  }

  async list(dir: ResolvedPath): Promise<DirectoryListing> {
    requireDirectory(dir);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir.absolutePath, { withFileTypes: true });
    } catch (error) {
      return translateFsError(error, dir.relativePath);
    }

    const directories: string[] = [];
    const files: string[] = [];
    for (const entry of entries) {
      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        const stats = await fs.stat(path.join(dir.absolutePath, entry.name)).catch(() => null);
        isDirectory = stats?.isDirectory() ?? false;
        isFile = stats?.isFile() ?? false;
      }

      if (isDirectory) {
        directories.push(entry.name);
      } else if (isFile) {
        files.push(entry.name);
      }
    }

    return {
      directories: directories.sort(compareDisplayNames),
      files: files.sort(compareDisplayNames)
    };
  }

  async openDownload(file: ResolvedPath): Promise<FileDownload> {
    if (file.kind !== "file") {
      throw new FileServiceError("not_found", `File not found: ${file.relativePath}.`);
    }

    try {
      const stats = await fs.stat(file.absolutePath);
      return {
        absolutePath: file.absolutePath,
        fileName: path.basename(file.absolutePath),
        sizeBytes: stats.size
      };
    } catch (error) {
      return translateFsError(error, file.relativePath);
    }
  }

  async createDirectory(parent: ResolvedPath, rawName: string): Promise<string> {
    requireDirectory(parent);
    const sanitized = this.sanitizer.sanitizeName(rawName);
    const name = sanitized.length > 0 ? sanitized : this.defaultDirectoryName;

    return this.tenantLock.runExclusive(parent.tenant, async () => {
      const target = await this.resolver.resolveChild(parent, name);
      if (await entryExists(target.absolutePath)) {
        throw new FileServiceError("already_exists", `An entry named "${name}" already exists.`);
      }

      try {
        await fs.mkdir(target.absolutePath);
      } catch (error) {
        translateFsError(error, target.relativePath);
      }
      return name;
    });
  }

  /** Removes a file or a whole directory tree. Returns the parent's relative path. */
  async delete(target: ResolvedPath): Promise<string> {
    if (target.segments.length <= 1) {
      throw new FileServiceError("forbidden", "Home directories cannot be deleted.");
    }
    if (target.kind === "absent") {
      throw new FileServiceError("not_found", `Not found: ${target.relativePath}.`);
    }

    const parent = target.segments.slice(0, -1).join("/");
    await this.tenantLock.runExclusive(target.tenant, async () => {
      try {
        if (target.kind === "directory") {
          const stats = await fs.lstat(target.absolutePath);
          // A linked directory loses the link, never the linked contents.
          await fs.rm(target.absolutePath, { recursive: !stats.isSymbolicLink() });
        } else {
          await fs.unlink(target.absolutePath);
        }
      } catch (error) {
        translateFsError(error, target.relativePath);
      }
    });
    return parent;
  }

  async upload(dir: ResolvedPath, file: UploadedFile): Promise<string> {
    try {
      requireDirectory(dir);
      const name = this.sanitizer.sanitizeUploadName(decodeUploadFileName(file.originalName));
      if (name.length === 0 || name === "." || name === "..") {
        throw new FileServiceError("invalid_input", "The uploaded file name is empty after sanitizing.");
      }

      return await this.tenantLock.runExclusive(dir.tenant, async () => {
        const target = await this.resolver.resolveChild(dir, name);
        if (await entryExists(target.absolutePath)) {
          throw new FileServiceError("already_exists", `A file named "${name}" already exists.`);
        }

        await this.persistUpload(file.tempPath, target.absolutePath);
        return name;
      });
    } finally {
      await removeQuietly(file.tempPath);
    }
  }

  async diskUsagePercent(dir: ResolvedPath): Promise<number | null> {
    try {
      const stats = await fs.statfs(dir.absolutePath);
      if (stats.blocks <= 0) {
        return null;
      }
      const used = stats.blocks - stats.bfree;
      const available = used + stats.bavail;
      return available > 0 ? Math.ceil((used / available) * 100) : null;
    } catch (error) {
      console.warn("[file-operations] disk usage unavailable", error);
      return null;
    }
  }

  // Rename first; a failed rename (e.g. EXDEV across volumes) falls back to an exclusive copy.
  private async persistUpload(source: string, target: string): Promise<void> {
    try {
      await this.renameFile(source, target);
      return;
    } catch (renameError) {
      console.warn(`[file-operations] rename of upload failed (${errnoCode(renameError) ?? "unknown"}), copying`);
    }

    try {
      await this.copyFile(source, target, fsConstants.COPYFILE_EXCL);
    } catch (copyError) {
      if (errnoCode(copyError) === "EEXIST") {
        throw new FileServiceError("already_exists", `A file named "${path.basename(target)}" already exists.`);
      }
      await removeQuietly(target);
      throw new FileServiceError("upload_failed", "The uploaded file could not be stored.", { cause: copyError });
    }
  }
}
