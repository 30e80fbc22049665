import test from "node:test";
import assert from "node:assert/strict";
import { createImageWorkflow } from "./image.js";
import { WorkflowConfigError } from "../errors.js";

test("maps config fields onto the text-to-image nodes", () => {
  const graph = createImageWorkflow({
    positivePrompt: "red fox in snow",
    negativePrompt: "text, watermark",
    width: 768,
    height: 512,
    seed: 99,
  });

  assert.equal(graph.nodeCount, 7);
  assert.equal(graph.linkCount, 9);
  assert.deepEqual(graph.findNodesByType("EmptyLatentImage")[0]?.widgets_values, [768, 512, 1]);
  assert.deepEqual(
    graph.findNodesByType("CLIPTextEncode").map((n) => [n.title, n.widgets_values[0]]),
    [
      ["Positive Prompt", "red fox in snow"],
      ["Negative Prompt", "text, watermark"],
    ]
  );
  assert.deepEqual(graph.findNodesByType("KSampler")[0]?.widgets_values, [99, "fixed", 20, 7, "euler", "normal", 1]);
  assert.deepEqual(graph.findNodesByType("SaveImage")[0]?.widgets_values, ["image/ComfyUI"]);
  assert.equal(graph.findNodesByType("LoadImage").length, 0);
});

test("both prompt encoders share the checkpoint's CLIP output", () => {
  const document = createImageWorkflow({ seed: 1 }).toDocument();
  const clipLinks = document.links.filter((l) => l[5] === "CLIP").map((l) => [l[1], l[2], l[3], l[4]]);

  assert.deepEqual(clipLinks, [
    [1, 1, 3, 0],
    [1, 1, 4, 0],
  ]);
});

test("rejects out-of-range dimensions and steps", () => {
  assert.throws(() => createImageWorkflow({ width: 1020 }), /width: must be a multiple of 8/);
  assert.throws(() => createImageWorkflow({ height: -64 }), WorkflowConfigError);
  assert.throws(() => createImageWorkflow({ steps: 0 }), /steps:/);
  assert.throws(() => createImageWorkflow({ denoise: 1.5 }), /denoise:/);
});
