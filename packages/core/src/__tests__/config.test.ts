import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadPipelineConfig, loadTopicSpec } from "../config.js";

describe("loadPipelineConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "draftloom-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", async () => {
    const config = await loadPipelineConfig(join(dir, "missing.yml"));
    expect(config.qualityGate.approvalThreshold).toBe(0.8);
    expect(config.qualityGate.maxIterations).toBe(2);
    expect(config.qualityGate.onExhausted).toBe("escalate");
    expect(config.qualityGate.weights).toEqual({
      groundedness: 0.5,
      redundancy: 0.2,
      structure: 0.3,
      reviewer: 0,
    });
    expect(config.chunking).toEqual({ chunkSize: 1000, overlap: 0.2 });
    expect(config.retrieval.topK).toBe(5);
    expect(config.publishing.visibility).toBe("draft");
  });

  it("merges partial files over the defaults", async () => {
    const path = join(dir, "pipeline.yml");
    await writeFile(
      path,
      "qualityGate:\n  approvalThreshold: 0.9\n  maxIterations: 4\nretrieval:\n  perSourceCap: 1\n"
    );
    const config = await loadPipelineConfig(path);
    expect(config.qualityGate.approvalThreshold).toBe(0.9);
    expect(config.qualityGate.maxIterations).toBe(4);
    expect(config.qualityGate.minClaimWords).toBe(4);
    expect(config.retrieval.perSourceCap).toBe(1);
    expect(config.retrieval.topK).toBe(5);
  });

  it("treats an empty file as defaults", async () => {
    const path = join(dir, "pipeline.yml");
    await writeFile(path, "");
    const config = await loadPipelineConfig(path);
    expect(config.research.maxAttempts).toBe(3);
  });

  it("lists every invalid path", async () => {
    const path = join(dir, "pipeline.yml");
    await writeFile(
      path,
      "qualityGate:\n  approvalThreshold: 1.5\n  maxIterations: 0\n"
    );
    await expect(loadPipelineConfig(path)).rejects.toThrow(
      /qualityGate\.approvalThreshold[\s\S]*qualityGate\.maxIterations/
    );
  });
});

describe("loadTopicSpec", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "draftloom-topic-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies topic defaults", async () => {
    const path = join(dir, "topic.yml");
    await writeFile(path, "title: Vector search basics\nkeywords: [embeddings, cosine]\n");
    const topic = await loadTopicSpec(path);
    expect(topic).toEqual({
      title: "Vector search basics",
      description: "",
      keywords: ["embeddings", "cosine"],
      targetAudience: "technical readers",
      tone: "informative and engaging",
    });
  });

  it("rejects a topic without a title", async () => {
    const path = join(dir, "topic.yml");
    await writeFile(path, "description: nothing here\n");
    await expect(loadTopicSpec(path)).rejects.toThrow(/title/);
  });
});
