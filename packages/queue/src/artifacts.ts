// ──────────────────────────────────────────────
// MEDIAFORGE - Generated Artifacts
// Picks the engine output file and stores it locally
// ──────────────────────────────────────────────

import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import type { GenerationType, HistoryEntry, OutputFileDescriptor } from "@mediaforge/types";
import { createLogger, formatFileTimestamp } from "@mediaforge/utils";

const logger = createLogger("artifact-store");

interface ArtifactLayout {
  subfolder: string;
  prefix: string;
  fallbackExtension: string;
}

export const ARTIFACT_LAYOUT: Record<GenerationType, ArtifactLayout> = {
  audio: { subfolder: "audio", prefix: "audio", fallbackExtension: ".mp3" },
  image: { subfolder: "images", prefix: "image", fallbackExtension: ".png" },
  video: { subfolder: "videos", prefix: "video", fallbackExtension: ".mp4" },
};

/** First output file across all output nodes, checking audio, images, gifs, then videos. */
export function resolveOutputFile(entry: HistoryEntry): OutputFileDescriptor | null {
  for (const output of Object.values(entry.outputs)) {
    const file = output.audio?.[0] ?? output.images?.[0] ?? output.gifs?.[0] ?? output.videos?.[0];
    if (file) return file;
  }
  return null;
}

export interface SaveArtifactInput {
  promptId: string;
  type: GenerationType;
  file: OutputFileDescriptor;
  data: Uint8Array;
  savedAt?: Date;
}

export interface SavedArtifact {
  /** Absolute path on disk. */
  filePath: string;
  /** Path under the output root, e.g. "/audio/audio_p1_20240101_120000.mp3". */
  webPath: string;
}

export interface StoredArtifact {
  type: GenerationType;
  fileName: string;
  webPath: string;
  size: number;
  modifiedAt: Date;
}

export interface ArtifactStore {
  save(input: SaveArtifactInput): Promise<SavedArtifact>;
  /** Stored files of one type, newest first. */
  list(type: GenerationType): Promise<StoredArtifact[]>;
  find(type: GenerationType, fileName: string): Promise<StoredArtifact | null>;
  read(type: GenerationType, fileName: string): Promise<Uint8Array | null>;
}

const CONTENT_TYPES: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".gif": "image/gif",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
};

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

/** Plain file names only; anything that could leave the type folder is rejected. */
export function isArtifactFileName(fileName: string): boolean {
  return fileName.length > 0 && !fileName.startsWith(".") && basename(fileName) === fileName && !fileName.includes("\\");
}

export function artifactWebPath(type: GenerationType, fileName: string): string {
  return `/${ARTIFACT_LAYOUT[type].subfolder}/${fileName}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

export function buildArtifactFileName(input: Omit<SaveArtifactInput, "data">): string {
  const layout = ARTIFACT_LAYOUT[input.type];
  const extension = extname(input.file.filename) || layout.fallbackExtension;
  return `${layout.prefix}_${input.promptId}_${formatFileTimestamp(input.savedAt ?? new Date())}${extension}`;
}

export function createFileArtifactStore(outputDir: string): ArtifactStore {
  const root = resolve(outputDir);

  async function describe(type: GenerationType, fileName: string): Promise<StoredArtifact | null> {
    if (!isArtifactFileName(fileName)) return null;
    try {
      const info = await stat(join(root, ARTIFACT_LAYOUT[type].subfolder, fileName));
      if (!info.isFile()) return null;
      return { type, fileName, webPath: artifactWebPath(type, fileName), size: info.size, modifiedAt: info.mtime };
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  return {
    async save(input) {
      const { subfolder } = ARTIFACT_LAYOUT[input.type];
      const fileName = buildArtifactFileName(input);
      const directory = join(root, subfolder);
      const filePath = join(directory, fileName);

      await mkdir(directory, { recursive: true });
      await writeFile(filePath, input.data);

      logger.info(
        { promptId: input.promptId, type: input.type, filePath, bytes: input.data.byteLength },
        "Generated file saved"
      );
      return { filePath, webPath: artifactWebPath(input.type, fileName) };
    },

    async list(type) {
      let names: string[];
      try {
        names = await readdir(join(root, ARTIFACT_LAYOUT[type].subfolder));
      } catch (err) {
        if (isMissingFile(err)) return [];
        throw err;
      }

      const found = await Promise.all(names.map((name) => describe(type, name)));
      return found
        .filter((artifact): artifact is StoredArtifact => artifact !== null)
        .sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || a.fileName.localeCompare(b.fileName));
    },

    find: describe,

    async read(type, fileName) {
      const artifact = await describe(type, fileName);
      if (!artifact) return null;
      return readFile(join(root, ARTIFACT_LAYOUT[type].subfolder, fileName));
    },
  };
}
