import { createHash, timingSafeEqual } from "node:crypto";
import fs from "node:fs/promises";

export interface Credential {
  digest: string;
  username: string;
}

/** Lowercase hex SHA-384 of the password immediately followed by the username. */
export function computeCredentialDigest(username: string, password: string): string {
  return createHash("sha384").update(`${password}${username}`, "utf8").digest("hex");
}

function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left);
  const rightBuffer = Buffer.from(right);
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }
  return timingSafeEqual(leftBuffer, rightBuffer);
}

export class CredentialFormatError extends Error {
  readonly lineNumber: number;

  constructor(lineNumber: number, message: string) {
    super(`Credential list line ${lineNumber}: ${message}`);
    this.name = "CredentialFormatError";
    this.lineNumber = lineNumber;
  }
}

export function parseCredentialList(content: string): Credential[] {
  const credentials: Credential[] = [];
  const lines = content.split("\n");

  lines.forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, "");
    if (line.trim().length === 0) {
      return;
    }

    const separatorIndex = line.indexOf(";");
    if (separatorIndex < 0) {
      throw new CredentialFormatError(index + 1, "expected <digest>;<username>.");
    }

    const digest = line.slice(0, separatorIndex).trim().toLowerCase();
    const username = line.slice(separatorIndex + 1);
    if (digest.length === 0 || username.length === 0) {
      throw new CredentialFormatError(index + 1, "digest and username must both be present.");
    }

    credentials.push({ digest, username });
  });

  return credentials;
}

/**
 * Read-only list of credential records. Usernames are assumed unique; when they
 * are not, the first record matching a digest wins.
 */
export class CredentialStore {
  private readonly records: readonly Credential[];

  constructor(records: readonly Credential[]) {
    this.records = records.map((record) => ({ ...record }));
  }

  static async load(filePath: string): Promise<CredentialStore> {
    const content = await fs.readFile(filePath, "utf8");
    return new CredentialStore(parseCredentialList(content));
  }

  get size(): number {
    return this.records.length;
  }

  usernames(): string[] {
    return this.records.map((record) => record.username);
  }

  lookup(digest: string): string | null {
    const normalized = digest.trim().toLowerCase();
    for (const record of this.records) {
      if (constantTimeEquals(record.digest, normalized)) {
        return record.username;
      }
    }
    return null;
  }

  has(username: string): boolean {
    return this.records.some((record) => record.username === username);
  }
}
