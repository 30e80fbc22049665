// ──────────────────────────────────────────────
// MEDIAFORGE - Input File Reader
// ──────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { basename, isAbsolute, relative, resolve } from "node:path";

export interface InputFile {
  filename: string;
  data: Uint8Array;
}

export interface InputFileReader {
  read(path: string): Promise<InputFile>;
}

/** Reads files under `rootDir`; paths resolving outside it are rejected. */
export function createFileInputReader(rootDir: string): InputFileReader {
  const root = resolve(rootDir);

  return {
    async read(path) {
      const fullPath = resolve(root, path);
      const fromRoot = relative(root, fullPath);
      if (fromRoot.length === 0 || fromRoot.startsWith("..") || isAbsolute(fromRoot)) {
        throw new Error(`Input file "${path}" is outside the input directory`);
      }

      const data = await readFile(fullPath);
      return { filename: basename(fullPath), data };
    },
  };
}
