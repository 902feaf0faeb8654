import path from "node:path";

import fileKindTable from "./fileKinds.json" with { type: "json" };

type ListedKind = keyof typeof fileKindTable;
export type FileKind = ListedKind | "file";

const listedKinds = ["image", "archive", "video", "music", "executable", "pdf", "code"] as const satisfies readonly ListedKind[];

const kindByExtension = new Map<string, FileKind>();
for (const kind of listedKinds) {
  for (const extension of fileKindTable[kind]) {
    kindByExtension.set(extension, kind);
  }
}

export function classifyFileName(fileName: string): FileKind {
  const extension = path.extname(fileName).slice(1).toLowerCase();
  if (extension.length === 0) {
    return "file";
  }
  return kindByExtension.get(extension) ?? "file";
}
