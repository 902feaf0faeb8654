import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { isFileServiceError } from "../../server/errors.js";
import {
  isPathWithinRoot,
  normalizeSegments,
  parseRequestPath,
  PathResolver
} from "../../server/storage/pathResolver.js";

function errorCodeOf(operation: () => unknown): string | undefined {
  try {
    operation();
  } catch (error) {
    return isFileServiceError(error) ? error.code : "unexpected";
  }
  return undefined;
}

describe("path resolver", () => {
  let storageRoot = "";

  beforeEach(async () => {
    storageRoot = await mkdtemp(path.join(tmpdir(), "homevault-paths-"));
    await mkdir(path.join(storageRoot, "alice", "docs"), { recursive: true });
    await mkdir(path.join(storageRoot, "bob"), { recursive: true });
    await writeFile(path.join(storageRoot, "alice", "docs", "a.txt"), "a", "utf8");
    await writeFile(path.join(storageRoot, "bob", "secret.txt"), "b", "utf8");
  });

  afterEach(async () => {
    await rm(storageRoot, { recursive: true, force: true });
  });

  it("drops empty and current-directory segments", () => {
    expect(normalizeSegments(["alice", "", ".", "docs"])).toEqual(["alice", "docs"]);
    expect(parseRequestPath("alice/docs/")).toEqual(["alice", "docs"]);
  });

  it("rejects parent references, separators and empty paths", () => {
    expect(errorCodeOf(() => normalizeSegments(["alice", "..", "bob"]))).toBe("invalid_path");
    expect(errorCodeOf(() => normalizeSegments(["alice", "a\0b"]))).toBe("invalid_path");
    expect(errorCodeOf(() => normalizeSegments(["", "."]))).toBe("invalid_path");
    expect(errorCodeOf(() => parseRequestPath("alice\\docs"))).toBe("invalid_path");
    expect(errorCodeOf(() => parseRequestPath("alice/../bob"))).toBe("invalid_path");
  });

  it("classifies resolved targets", async () => {
    const resolver = new PathResolver(storageRoot);

    const home = await resolver.resolve(["alice"]);
    expect(home).toEqual({
      segments: ["alice"],
      relativePath: "alice",
      absolutePath: path.join(storageRoot, "alice"),
      tenant: "alice",
      kind: "directory"
    });

    const file = await resolver.resolveChild(await resolver.resolve(["alice", "docs"]), "a.txt");
    expect(file.kind).toBe("file");
    expect(file.relativePath).toBe("alice/docs/a.txt");

    expect((await resolver.resolve(["alice", "missing"])).kind).toBe("absent");
    expect((await resolver.resolve(["alice", "docs", "a.txt", "below"])).kind).toBe("absent");
    expect(resolver.tmpDirectory).toBe(path.join(storageRoot, "tmp"));
  });

  it("follows links that stay inside the home directory", async () => {
    await symlink(path.join(storageRoot, "alice", "docs"), path.join(storageRoot, "alice", "shortcut"));
    const resolver = new PathResolver(storageRoot);

    const resolved = await resolver.resolve(["alice", "shortcut", "a.txt"]);
    expect(resolved.kind).toBe("file");
    expect(resolved.absolutePath).toBe(path.join(storageRoot, "alice", "shortcut", "a.txt"));
  });

  it("rejects links that lead into another home", async () => {
    await symlink(path.join(storageRoot, "bob"), path.join(storageRoot, "alice", "escape"));
    const resolver = new PathResolver(storageRoot);

    await expect(resolver.resolve(["alice", "escape"])).rejects.toMatchObject({ code: "invalid_path" });
    await expect(resolver.resolve(["alice", "escape", "secret.txt"])).rejects.toMatchObject({
      code: "invalid_path"
    });
    await expect(resolver.resolve(["alice", "escape", "new-folder"])).rejects.toMatchObject({
      code: "invalid_path"
    });
  });

  it("names a trailing link as an entry without following it", async () => {
    await symlink(path.join(storageRoot, "bob"), path.join(storageRoot, "alice", "escape"));
    await symlink(path.join(storageRoot, "alice", "nowhere"), path.join(storageRoot, "alice", "dangling"));
    const resolver = new PathResolver(storageRoot);

    await expect(resolver.resolveEntry(["alice", "escape"])).resolves.toEqual({
      segments: ["alice", "escape"],
      relativePath: "alice/escape",
      absolutePath: path.join(storageRoot, "alice", "escape"),
      tenant: "alice",
      kind: "file"
    });
    expect((await resolver.resolveEntry(["alice", "dangling"])).kind).toBe("file");
    expect((await resolver.resolveEntry(["alice", "docs"])).kind).toBe("directory");
    expect((await resolver.resolveEntry(["alice"])).kind).toBe("directory");
    await expect(resolver.resolveEntry(["alice", "escape", "secret.txt"])).rejects.toMatchObject({
      code: "invalid_path"
    });
  });

  it("compares roots on segment boundaries", () => {
    expect(isPathWithinRoot("/data/alice", "/data/alice/docs")).toBe(true);
    expect(isPathWithinRoot("/data/alice", "/data/alice")).toBe(true);
    expect(isPathWithinRoot("/data/alice", "/data/alice2")).toBe(false);
  });
});
