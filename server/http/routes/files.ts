import fs from "node:fs/promises";
import type { Express, Request, RequestHandler, Response } from "express";

import type { ArchiveService } from "../../archive/archiveService.js";
import type { SessionAuthenticator } from "../../auth/authenticator.js";
import { accessDenied, FileServiceError } from "../../errors.js";
import { classifyFileName } from "../../storage/fileKinds.js";
import type { FileOperations } from "../../storage/fileOperations.js";
import { parseRequestPath, type PathResolver, type ResolvedPath } from "../../storage/pathResolver.js";
import { firstParam, readSessionToken, sendRouteError } from "../helpers.js";
import { createDirectorySchema, unpackArchiveSchema } from "../schemas.js";

export interface FileRouteDependencies {
  authenticator: SessionAuthenticator;
  resolver: PathResolver;
  fileOperations: FileOperations;
  archives: ArchiveService;
  uploadParser: RequestHandler;
}

function parentOf(target: ResolvedPath): string | null {
  return target.segments.length > 1 ? target.segments.slice(0, -1).join("/") : null;
}

/**
 * Session first, then segment validation, then the tenant check, then the
 * filesystem. `entry` keeps a trailing symlink unresolved.
 */
async function authorizeAndResolve(
  request: Request,
  deps: FileRouteDependencies,
  mode: "target" | "entry" = "target"
): Promise<ResolvedPath> {
  const token = readSessionToken(request);
  if (deps.authenticator.describe(token) === null) {
    throw accessDenied();
  }

  const segments = parseRequestPath(firstParam(request.params["0"]));
  deps.authenticator.authorize(token, segments);
  return mode === "entry" ? deps.resolver.resolveEntry(segments) : deps.resolver.resolve(segments);
}

function sendDownload(
  response: Response,
  absolutePath: string,
  downloadName: string,
  onFinished: () => void = () => undefined
): void {
  response.download(absolutePath, downloadName, { dotfiles: "allow" }, (error) => {
    onFinished();
    if (!error) {
      return;
    }
    console.error("[files] transfer failed", error);
    if (!response.headersSent) {
      response.status(500).json({ error: "Transfer failed" });
    }
  });
}

export function registerFileRoutes(app: Express, deps: FileRouteDependencies): void {
  app.get("/api/files/list/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps);
      const listing = await deps.fileOperations.list(target);
      const diskUsagePercent = await deps.fileOperations.diskUsagePercent(target);

      response.json({
        path: target.relativePath,
        parent: parentOf(target),
        directories: listing.directories,
        files: listing.files.map((name) => ({ name, kind: classifyFileName(name) })),
        diskUsagePercent
      });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/files/download/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps);
      const download = await deps.fileOperations.openDownload(target);
      sendDownload(response, download.absolutePath, download.fileName);
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.get("/api/files/zip/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps);
      const artifact = await deps.archives.downloadAsZip(target);
      sendDownload(response, artifact.artifactPath, artifact.downloadName, artifact.release);
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/files/directories/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps);
      const input = createDirectorySchema.parse(request.body ?? {});
      const name = await deps.fileOperations.createDirectory(target, input.name);
      response.status(201).json({ ok: true, name });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.delete("/api/files/entries/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps, "entry");
      const parent = await deps.fileOperations.delete(target);
      response.json({ ok: true, parent });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/files/unpack/*", async (request: Request, response: Response) => {
    try {
      const target = await authorizeAndResolve(request, deps);
      const input = unpackArchiveSchema.parse(request.body ?? {});
      const directory = await deps.archives.unpackArchive(target, input.archiveName);
      response.json({ ok: true, directory });
    } catch (error) {
      sendRouteError(error, response);
    }
  });

  app.post("/api/files/upload/*", deps.uploadParser, async (request: Request, response: Response) => {
    const staged = request.file;
    try {
      const target = await authorizeAndResolve(request, deps);
      if (!staged) {
        throw new FileServiceError("invalid_input", "No file was uploaded.");
      }

      const name = await deps.fileOperations.upload(target, {
        originalName: staged.originalname,
        tempPath: staged.path
      });
      response.status(201).json({ ok: true, name });
    } catch (error) {
      if (staged) {
        await fs.rm(staged.path, { force: true }).catch((cleanupError: unknown) => {
          console.warn("[files] could not discard staged upload", cleanupError);
        });
      }
      sendRouteError(error, response);
    }
  });
}
