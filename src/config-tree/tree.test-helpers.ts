import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach } from "vitest";

const temporaryDirectories: string[] = [];

export function registerTreeTempCleanup(): void {
  afterEach(() => {
    for (const directoryPath of temporaryDirectories) {
      fs.rmSync(directoryPath, { recursive: true, force: true });
    }
    temporaryDirectories.length = 0;
  });
}

export function makeTemporaryDirectory(prefix: string): string {
  const directoryPath = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  temporaryDirectories.push(directoryPath);
  return directoryPath;
}

/** Writes `files` (relative path -> contents) under `root`, creating directories as needed. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, contents] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents, "utf8");
  }
}

export function makeTree(files: Record<string, string>): string {
  const root = makeTemporaryDirectory("strata-tree-");
  writeTree(root, files);
  return root;
}

export function yamlLines(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}
