#!/usr/bin/env node
import path from "node:path";

import { appendCredential, ensureHomeDirectories } from "./credentials/provisioning.js";
import { resolveRuntimeConfig } from "./runtime/config.js";

const usage = "Usage: homevault-add-user <username> <password>";

export async function addUser(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [username, password] = argv;
  if (!username || !password || argv.length !== 2) {
    console.error(usage);
    return 2;
  }

  const config = resolveRuntimeConfig(env);
  try {
    await appendCredential(config.usersFile, username, password);
    await ensureHomeDirectories(config.storageRoot, [username]);
  } catch (error) {
    console.error(`[add-user] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  console.log(`[add-user] added ${username} (home: ${path.join(config.storageRoot, username)})`);
  return 0;
}

const invokedPath = process.argv[1] ? path.resolve(process.argv[1]) : "";
if (invokedPath.endsWith(`${path.sep}addUser.js`) || invokedPath.endsWith(`${path.sep}addUser.ts`)) {
  process.exitCode = await addUser(process.argv.slice(2));
}
