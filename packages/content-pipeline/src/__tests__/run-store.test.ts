import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { PipelineState } from "@draftloom/core";
import { createInitialState } from "../executor.js";
import { FileRunStore, latestPerRun, toPersistedRun } from "../run-store.js";
import { DRAFT, topic } from "./fixtures.js";

function doneState(runId: string): PipelineState {
  const state = createInitialState(topic, runId);
  state.status = "done";
  state.lastStage = "publish";
  state.completedAt = "2026-01-02T03:04:05.000Z";
  state.final = {
    title: "Alpha and beta systems",
    content: DRAFT,
    metaDescription: "How alpha engines and beta replicas work.",
    slug: "alpha-and-beta",
    tags: ["alpha"],
    category: "Tech",
  };
  return state;
}

function failedState(runId: string): PipelineState {
  const state = createInitialState(topic, runId);
  state.status = "failed";
  state.error = { errorClass: "PublishError", message: "rejected", stage: "publish" };
  return state;
}

const pause = () => new Promise((resolve) => setTimeout(resolve, 5));

describe("FileRunStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "draftloom-runs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the snapshot and exports the post of a completed run", async () => {
    const store = new FileRunStore(dir);
    const path = await store.save(doneState("run-1"));

    const files = (await readdir(dir)).sort();
    expect(files).toHaveLength(2);
    expect(files[0]).toMatch(/^run-1--.+\.json$/);
    expect(files[1]).toMatch(/^run-1--.+\.md$/);
    expect(path).toBe(join(dir, files[0] ?? ""));

    const post = await readFile(join(dir, files[1] ?? ""), "utf-8");
    const [, frontMatter, body] = post.split("---\n");
    expect(parseYaml(frontMatter ?? "")).toEqual({
      title: "Alpha and beta systems",
      slug: "alpha-and-beta",
      description: "How alpha engines and beta replicas work.",
      tags: ["alpha"],
      category: "Tech",
      date: "2026-01-02T03:04:05.000Z",
      runId: "run-1",
    });
    expect(body).toBe(`\n${DRAFT}\n`);
  });

  it("exports no post for a failed run", async () => {
    const store = new FileRunStore(dir);
    await store.save(failedState("run-2"));

    const files = await readdir(dir);
    expect(files.filter((f) => f.endsWith(".md"))).toEqual([]);

    const loaded = await store.load("run-2");
    expect(loaded?.summary.errorClass).toBe("PublishError");
    expect(loaded?.state.error?.stage).toBe("publish");
  });

  it("loads the newest snapshot of a run", async () => {
    const store = new FileRunStore(dir);
    await store.save(failedState("run-3"));
    await pause();
    await store.save(doneState("run-3"));

    const loaded = await store.load("run-3");
    expect(loaded?.state.status).toBe("done");
  });

  it("lists one entry per run, newest first", async () => {
    const store = new FileRunStore(dir);
    await store.save(failedState("run-a"));
    await pause();
    await store.save(failedState("run-b"));
    await pause();
    await store.save(doneState("run-a"));

    const runs = await store.list();
    expect(runs.map((r) => [r.runId, r.summary.status])).toEqual([
      ["run-a", "done"],
      ["run-b", "failed"],
    ]);
  });

  it("returns nothing for a missing directory or run", async () => {
    const store = new FileRunStore(join(dir, "absent"));
    expect(await store.list()).toEqual([]);
    expect(await store.load("run-x")).toBeUndefined();
  });
});

describe("latestPerRun", () => {
  it("keeps the newest snapshot of each run", () => {
    const older = toPersistedRun(failedState("r"), new Date("2026-01-01T00:00:00Z"));
    const newer = toPersistedRun(doneState("r"), new Date("2026-01-02T00:00:00Z"));

    expect(latestPerRun([newer, older])).toEqual([newer]);
  });
});
