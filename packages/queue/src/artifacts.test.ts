import test from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HistoryEntry, OutputFileDescriptor } from "@mediaforge/types";
import {
  buildArtifactFileName,
  contentTypeFor,
  createFileArtifactStore,
  isArtifactFileName,
  resolveOutputFile,
} from "./artifacts.js";

function file(filename: string): OutputFileDescriptor {
  return { filename, subfolder: "", type: "output" };
}

function entry(outputs: HistoryEntry["outputs"]): HistoryEntry {
  return { promptId: "p-1", outputs, status: null };
}

test("prefers audio over images within a node", () => {
  const picked = resolveOutputFile(entry({ "9": { images: [file("cover.png")], audio: [file("song.mp3")] } }));
  assert.equal(picked?.filename, "song.mp3");
});

test("takes the first output node that has a file", () => {
  const picked = resolveOutputFile(
    entry({ "4": {}, "7": { gifs: [file("loop.gif")] }, "9": { videos: [file("clip.mp4")] } })
  );
  assert.equal(picked?.filename, "loop.gif");
});

test("returns null when no node produced a file", () => {
  assert.equal(resolveOutputFile(entry({ "9": { images: [] } })), null);
});

test("file names carry type prefix, prompt id and local timestamp", () => {
  const savedAt = new Date(2024, 0, 2, 3, 4, 5);

  assert.equal(
    buildArtifactFileName({ promptId: "p-1", type: "audio", file: file("ComfyUI_00001_.flac"), savedAt }),
    "audio_p-1_20240102_030405.flac"
  );
  assert.equal(
    buildArtifactFileName({ promptId: "p-2", type: "video", file: file("ComfyUI_00001"), savedAt }),
    "video_p-2_20240102_030405.mp4"
  );
});

test("file store writes under the type subfolder", async (t) => {
  const outputDir = await mkdtemp(join(tmpdir(), "mediaforge-artifacts-"));
  t.after(() => rm(outputDir, { recursive: true, force: true }));

  const store = createFileArtifactStore(outputDir);
  const saved = await store.save({
    promptId: "p-7",
    type: "image",
    file: file("ComfyUI_00007_.png"),
    data: new Uint8Array([137, 80, 78, 71]),
    savedAt: new Date(2024, 11, 31, 23, 59, 58),
  });

  assert.equal(saved.webPath, "/images/image_p-7_20241231_235958.png");
  assert.equal(saved.filePath, join(outputDir, "images", "image_p-7_20241231_235958.png"));
  assert.deepEqual([...(await readFile(saved.filePath))], [137, 80, 78, 71]);
});

test("file store lists stored files of a type, newest first", async (t) => {
  const outputDir = await mkdtemp(join(tmpdir(), "mediaforge-artifacts-"));
  t.after(() => rm(outputDir, { recursive: true, force: true }));
  const audioDir = join(outputDir, "audio");
  await mkdir(join(audioDir, "nested"), { recursive: true });
  await writeFile(join(audioDir, "audio_old.mp3"), new Uint8Array([1]));
  await writeFile(join(audioDir, "audio_new.mp3"), new Uint8Array([1, 2]));
  await utimes(join(audioDir, "audio_old.mp3"), new Date(2024, 0, 1), new Date(2024, 0, 1));
  await utimes(join(audioDir, "audio_new.mp3"), new Date(2024, 0, 2), new Date(2024, 0, 2));

  const store = createFileArtifactStore(outputDir);
  const listed = await store.list("audio");

  assert.deepEqual(
    listed.map((artifact) => [artifact.fileName, artifact.webPath, artifact.size]),
    [
      ["audio_new.mp3", "/audio/audio_new.mp3", 2],
      ["audio_old.mp3", "/audio/audio_old.mp3", 1],
    ]
  );
  assert.deepEqual(await store.list("video"), []);
});

test("file store finds and reads a stored file by name", async (t) => {
  const outputDir = await mkdtemp(join(tmpdir(), "mediaforge-artifacts-"));
  t.after(() => rm(outputDir, { recursive: true, force: true }));
  const store = createFileArtifactStore(outputDir);
  const saved = await store.save({
    promptId: "p-3",
    type: "image",
    file: file("ComfyUI_00003_.png"),
    data: new Uint8Array([9, 8]),
    savedAt: new Date(2024, 5, 6, 7, 8, 9),
  });

  const found = await store.find("image", "image_p-3_20240606_070809.png");
  assert.equal(found?.webPath, saved.webPath);
  assert.equal(found?.size, 2);
  assert.deepEqual([...((await store.read("image", "image_p-3_20240606_070809.png")) ?? [])], [9, 8]);
  assert.equal(await store.find("image", "missing.png"), null);
  assert.equal(await store.read("audio", "image_p-3_20240606_070809.png"), null);
  assert.equal(await store.read("image", "../images/image_p-3_20240606_070809.png"), null);
});

test("artifact names must stay inside their folder", () => {
  assert.equal(isArtifactFileName("audio_p-1_20240101_000000.mp3"), true);
  assert.equal(isArtifactFileName("../secret.txt"), false);
  assert.equal(isArtifactFileName(".env"), false);
  assert.equal(isArtifactFileName("a\\b.png"), false);
  assert.equal(isArtifactFileName(""), false);
});

test("content types follow the file extension", () => {
  assert.equal(contentTypeFor("clip.MP4"), "video/mp4");
  assert.equal(contentTypeFor("song.flac"), "audio/flac");
  assert.equal(contentTypeFor("notes"), "application/octet-stream");
});
