import test from "node:test";
import assert from "node:assert/strict";
import { createVideoWorkflow } from "./video.js";
import { WorkflowConfigError } from "../errors.js";
import { PLACEHOLDER_IMAGE } from "../mappings.js";

test("falls back to the placeholder image when no image is supplied", () => {
  const graph = createVideoWorkflow();
  assert.deepEqual(graph.findNodesByType("LoadImage")[0]?.widgets_values, [PLACEHOLDER_IMAGE]);
  assert.equal(PLACEHOLDER_IMAGE, "placeholder.png");
});

test("uses the staged image name when one is supplied", () => {
  const graph = createVideoWorkflow({ imageFilePath: "mediaforge/cat.png" });
  assert.deepEqual(graph.findNodesByType("LoadImage")[0]?.widgets_values, ["mediaforge/cat.png"]);
});

test("the text prompt labels the clip without changing the graph", () => {
  const plain = createVideoWorkflow({ seed: 8 });
  const described = createVideoWorkflow({ seed: 8, textPrompt: "waves at dusk" });

  assert.deepEqual(described.toDocument().nodes, plain.toDocument().nodes);
  assert.equal(described.findNodesByType("CLIPTextEncode").length, 0);
});

test("derives frame count and motion bucket for the conditioning node", () => {
  const graph = createVideoWorkflow({ durationSeconds: 5, fps: 24, seed: 4 });
  assert.deepEqual(
    graph.findNodesByType("SVD_img2vid_Conditioning")[0]?.widgets_values,
    [1024, 1024, 120, 191, 24, 0]
  );

  const still = createVideoWorkflow({ durationSeconds: 2.5, fps: 60, motionIntensity: 1, seed: 4 });
  assert.deepEqual(
    still.findNodesByType("SVD_img2vid_Conditioning")[0]?.widgets_values.slice(2, 5),
    [150, 254, 60]
  );
});

test("the sampler's latent comes from the conditioning node's LATENT slot", () => {
  const graph = createVideoWorkflow({ seed: 10 });
  const conditioningId = graph.findNodesByType("SVD_img2vid_Conditioning")[0]?.id;
  const samplerId = graph.findNodesByType("KSampler")[0]?.id;
  const latentLink = graph.toDocument().links.find((l) => l[3] === samplerId && l[4] === 3);

  assert.ok(latentLink);
  assert.equal(latentLink[1], conditioningId);
  assert.equal(latentLink[2], 2);
  assert.equal(latentLink[5], "LATENT");
});

test("an audio track adds a loader wired into the combine node", () => {
  const silent = createVideoWorkflow({ seed: 2 });
  assert.equal(silent.nodeCount, 7);
  assert.equal(silent.linkCount, 11);
  assert.equal(silent.findNodesByType("LoadAudio").length, 0);

  const scored = createVideoWorkflow({ seed: 2, audioFilePath: "theme.mp3" });
  assert.equal(scored.nodeCount, 8);
  assert.equal(scored.linkCount, 12);
  assert.deepEqual(scored.toDocument().links.at(-1), [12, 8, 0, 7, 1, "AUDIO"]);
});

test("combine node gets fps, prefix and the engine format name", () => {
  const graph = createVideoWorkflow({ outputFormat: "webm", seed: 1 });
  assert.deepEqual(
    graph.findNodesByType("VHS_VideoCombine")[0]?.widgets_values,
    [30, 0, "video/ComfyUI", "video/webm", false, true]
  );
});

test("rejects durations and intensities outside their ranges", () => {
  assert.throws(() => createVideoWorkflow({ durationSeconds: 0 }), /durationSeconds:/);
  assert.throws(() => createVideoWorkflow({ durationSeconds: 0.01, fps: 24 }), /at least one frame/);
  assert.throws(() => createVideoWorkflow({ motionIntensity: 1.5 }), WorkflowConfigError);
});
