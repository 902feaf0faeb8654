import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode } from "../errors.js";
import { computeCredentialDigest } from "./store.js";

export const TMP_DIRECTORY_NAME = "tmp";

export function validateUsername(username: string): string | null {
  if (username.length === 0) {
    return "Username must not be empty.";
  }
  if (username === "." || username === "..") {
    return "Username must not be a relative path reference.";
  }
  if (username === TMP_DIRECTORY_NAME) {
    return `Username "${TMP_DIRECTORY_NAME}" is reserved for temporary archives.`;
  }
  if (/[;/\\\0\r\n]/.test(username)) {
    return "Username must not contain ';', path separators or control characters.";
  }
  return null;
}

export function formatCredentialLine(username: string, password: string): string {
  return `${computeCredentialDigest(username, password)};${username}`;
}

export async function appendCredential(usersFile: string, username: string, password: string): Promise<void> {
  const problem = validateUsername(username);
  if (problem) {
    throw new Error(problem);
  }
  if (password.length === 0) {
    throw new Error("Password must not be empty.");
  }

  await fs.mkdir(path.dirname(usersFile), { recursive: true });
  const existing = await fs.readFile(usersFile, "utf8").catch((error: unknown) => {
    if (errnoCode(error) === "ENOENT") {
      return "";
    }
    throw error;
  });
  const prefix = existing.length > 0 && !existing.endsWith("\n") ? "\n" : "";
  await fs.appendFile(usersFile, `${prefix}${formatCredentialLine(username, password)}\n`, "utf8");
}

/** Creates the temp area and any missing home directory. Returns the homes it created. */
export async function ensureHomeDirectories(storageRoot: string, usernames: readonly string[]): Promise<string[]> {
  await fs.mkdir(path.join(storageRoot, TMP_DIRECTORY_NAME), { recursive: true });

  const created: string[] = [];
  for (const username of new Set(usernames)) {
    if (validateUsername(username)) {
      console.warn(`[provisioning] skipping home directory for invalid username "${username}"`);
      continue;
    }

    const home = path.join(storageRoot, username);
    try {
      await fs.mkdir(home);
      created.push(username);
    } catch (error) {
      if (errnoCode(error) !== "EEXIST") {
        throw error;
      }
    }
  }
  return created;
}
