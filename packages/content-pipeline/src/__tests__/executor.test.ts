import { describe, it, expect } from "vitest";
import {
  FatalError,
  PublishError,
  TransientError,
  type FinalContent,
  type PipelineConfig,
  type PublishResult,
} from "@draftloom/core";
import { KnowledgeBase } from "@draftloom/knowledge-base";
import { DryRunPublisher, type Publisher } from "@draftloom/publishing";
import { GraphExecutor, type ExecutorCallbacks } from "../executor.js";
import type { ApproveHook } from "../graph.js";
import { MemoryRunStore } from "../run-store.js";
import {
  KeywordEmbedder,
  ScriptedGenerator,
  seededKnowledgeBase,
  testConfig,
  topic,
} from "./fixtures.js";

class RejectingPublisher implements Publisher {
  readonly platform = "rejecting";
  attempts = 0;

  async publish(): Promise<PublishResult> {
    this.attempts++;
    throw new PublishError("Platform rejected the post");
  }
}

async function setup(options: {
  generator: ScriptedGenerator;
  config?: PipelineConfig;
  kb?: KnowledgeBase;
  publisher?: Publisher;
  approve?: ApproveHook;
  signal?: AbortSignal;
  callbacks?: ExecutorCallbacks;
}) {
  const config = options.config ?? testConfig();
  const kb = options.kb ?? (await seededKnowledgeBase());
  const store = new MemoryRunStore();
  const publisher = options.publisher ?? new DryRunPublisher();
  const executor = new GraphExecutor({
    config,
    generator: options.generator,
    retriever: kb.createRetriever(),
    snapshot: kb.registry.pin(),
    publisher,
    store,
    approve: options.approve,
    signal: options.signal,
    callbacks: options.callbacks,
  });
  return { executor, store, kb };
}

describe("GraphExecutor", () => {
  it("loops until the gate approves, then publishes", async () => {
    const generator = new ScriptedGenerator([0.5, 0.65, 0.85]);
    const revisions: number[] = [];
    const { executor, store } = await setup({
      generator,
      callbacks: { onRevision: (loopCount) => revisions.push(loopCount) },
    });

    const state = await executor.run(topic, "run-approve");

    expect(state.status).toBe("done");
    expect(state.loopCount).toBe(2);
    expect(revisions).toEqual([1, 2]);
    expect(state.critiques.map((c) => c.score)).toEqual([0.5, 0.65, 0.85]);
    expect(state.critiques.map((c) => c.decision)).toEqual(["revise", "revise", "approve"]);
    expect(state.draft?.attempt).toBe(3);
    expect(state.publish?.url).toBe("dry-run://alpha-and-beta");
    expect(state.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "research->outline",
      "outline->write",
      "write->critique",
      "critique->write",
      "write->critique",
      "critique->write",
      "write->critique",
      "critique->optimize",
      "optimize->publish",
      "publish->done",
    ]);
    expect(store.snapshots).toHaveLength(1);
    expect(store.snapshots[0]?.summary.status).toBe("done");
  });

  it("escalates after the revision budget with the last critique kept", async () => {
    const generator = new ScriptedGenerator([0.3, 0.4, 0.5]);
    const { executor, store } = await setup({
      generator,
      config: testConfig({ gate: { approvalThreshold: 0.9, maxIterations: 2 } }),
    });

    const state = await executor.run(topic, "run-escalate");

    expect(state.status).toBe("escalated");
    expect(state.loopCount).toBe(2);
    expect(state.critiques).toHaveLength(3);
    expect(state.critiques.at(-1)?.score).toBe(0.5);
    expect(state.critiques.at(-1)?.attempt).toBe(3);
    expect(state.error).toEqual({
      errorClass: "QualityExhausted",
      message: "Quality gate not passed after 2 revision(s); last score 0.50",
      stage: "critique",
    });
    expect(generator.callsFor("optimize")).toHaveLength(0);

    const persisted = await store.load("run-escalate");
    expect(persisted?.summary.lastCritique?.score).toBe(0.5);
    expect(persisted?.summary.errorClass).toBe("QualityExhausted");
  });

  it("never exceeds the configured number of revisions", async () => {
    for (const maxIterations of [1, 2, 3]) {
      const generator = new ScriptedGenerator([0.1]);
      const { executor } = await setup({
        generator,
        config: testConfig({ gate: { maxIterations } }),
      });

      const state = await executor.run(topic);

      expect(state.loopCount).toBe(maxIterations);
      expect(generator.callsFor("write")).toHaveLength(maxIterations + 1);
    }
  });

  it("continues to optimize with a warning when exhaustion is approved", async () => {
    const generator = new ScriptedGenerator([0.2]);
    const { executor } = await setup({
      generator,
      config: testConfig({ gate: { maxIterations: 1, onExhausted: "approve_with_warning" } }),
    });

    const state = await executor.run(topic);

    expect(state.status).toBe("done");
    expect(state.loopCount).toBe(1);
    expect(state.warnings).toContain(
      "Quality gate not passed after 1 revision(s); last score 0.20; continuing with a warning"
    );
  });

  it("fails with InsufficientGrounding once research attempts run out", async () => {
    const generator = new ScriptedGenerator([1]);
    const kb = new KnowledgeBase(new KeywordEmbedder(), testConfig());
    const { executor, store } = await setup({ generator, kb });

    const state = await executor.run(topic);

    expect(state.status).toBe("failed");
    expect(state.researchAttempts).toBe(3);
    expect(state.error?.errorClass).toBe("InsufficientGrounding");
    expect(state.error?.stage).toBe("research");
    expect(state.warnings).toEqual([
      'Research attempt 1 found no grounding for "Alpha and beta systems alpha beta"',
      'Research attempt 2 found no grounding for "Alpha and beta systems alpha beta"',
      'Research attempt 3 found no grounding for "Alpha and beta systems"',
    ]);
    expect(generator.calls).toHaveLength(0);
    expect(store.snapshots).toHaveLength(1);
  });

  it("retries a transient generator failure inside the stage", async () => {
    const generator = new ScriptedGenerator([0.9], {
      write: [new TransientError("rate limited", 429)],
    });
    const { executor } = await setup({ generator });

    const state = await executor.run(topic);

    expect(state.status).toBe("done");
    expect(generator.callsFor("write")).toHaveLength(2);
    expect(state.draft?.attempt).toBe(1);
  });

  it("classifies unknown errors as fatal", async () => {
    const generator = new ScriptedGenerator([0.9], { outline: [new Error("socket hang up")] });
    const { executor } = await setup({ generator });

    const state = await executor.run(topic);

    expect(state.status).toBe("failed");
    expect(state.error).toEqual({ errorClass: "FatalError", message: "socket hang up", stage: "outline" });
  });

  it("cancels between stages and persists the partial state", async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator([0.9]);
    const { executor, store } = await setup({
      generator,
      signal: controller.signal,
      callbacks: {
        onStageComplete: (stage) => {
          if (stage === "outline") controller.abort();
        },
      },
    });

    const state = await executor.run(topic, "run-cancel");

    expect(state.status).toBe("cancelled");
    expect(state.error?.errorClass).toBe("Cancelled");
    expect(state.error?.stage).toBe("write");
    expect(state.outline?.sections).toHaveLength(2);
    expect(state.draft).toBeUndefined();
    expect(generator.callsFor("write")).toHaveLength(0);
    expect((await store.load("run-cancel"))?.state.status).toBe("cancelled");
  });

  it("ends cancelled when publication is declined", async () => {
    const generator = new ScriptedGenerator([0.9]);
    const seen: FinalContent[] = [];
    const publisher = new DryRunPublisher();
    const { executor } = await setup({
      generator,
      publisher,
      config: testConfig({ publishing: { requireApproval: true } }),
      approve: async (content) => {
        seen.push(content);
        return false;
      },
    });

    const state = await executor.run(topic);

    expect(state.status).toBe("cancelled");
    expect(state.error).toEqual({
      errorClass: "Cancelled",
      message: "Publication declined at approval gate",
      stage: "publish",
    });
    expect(seen.map((c) => c.slug)).toEqual(["alpha-and-beta"]);
    expect(publisher.published).toEqual([]);
  });

  it("keeps final content on publish failure and resumes at publish", async () => {
    const generator = new ScriptedGenerator([0.9]);
    const rejecting = new RejectingPublisher();
    const { executor, kb } = await setup({ generator, publisher: rejecting });

    const failed = await executor.run(topic, "run-publish");

    expect(failed.status).toBe("failed");
    expect(failed.error?.errorClass).toBe("PublishError");
    expect(failed.error?.stage).toBe("publish");
    expect(failed.final?.slug).toBe("alpha-and-beta");
    expect(rejecting.attempts).toBe(1);

    const callsBefore = generator.calls.length;
    const dryRun = new DryRunPublisher();
    const retry = new GraphExecutor({
      config: testConfig(),
      generator,
      retriever: kb.createRetriever(),
      snapshot: kb.registry.pin(),
      publisher: dryRun,
    });

    const resumed = await retry.resume(failed);

    expect(resumed.status).toBe("done");
    expect(resumed.error).toBeUndefined();
    expect(resumed.publish?.id).toBe("dry-run-1");
    expect(generator.calls).toHaveLength(callsBefore);
    expect(dryRun.published[0]?.content).toEqual(failed.final);
  });

  it("resumes an escalated run at optimize only when approved", async () => {
    const generator = new ScriptedGenerator([0.1]);
    const { executor } = await setup({
      generator,
      config: testConfig({ gate: { maxIterations: 1 } }),
    });
    const escalated = await executor.run(topic);
    expect(escalated.status).toBe("escalated");

    await expect(executor.resume(escalated)).rejects.toThrow(FatalError);

    const resumed = await executor.resume(escalated, { approve: true });

    expect(resumed.status).toBe("done");
    expect(resumed.warnings).toContain("Approved manually after escalation");
    expect(resumed.critiques).toHaveLength(2);
  });

  it("refuses to resume a completed run", async () => {
    const generator = new ScriptedGenerator([0.9]);
    const { executor } = await setup({ generator });
    const done = await executor.run(topic);

    await expect(executor.resume(done)).rejects.toThrow("already completed");
  });

  it("treats a transient failure that outlasts its retries as fatal for the stage", async () => {
    const generator = new ScriptedGenerator([0.9], {
      outline: [
        new TransientError("overloaded", 529),
        new TransientError("overloaded", 529),
        new TransientError("overloaded", 529),
      ],
    });
    const { executor } = await setup({ generator });

    const state = await executor.run(topic);

    expect(state.status).toBe("failed");
    expect(state.error).toEqual({
      errorClass: "FatalError",
      message: "outline failed after 3 attempt(s): overloaded",
      stage: "outline",
    });
    expect(generator.callsFor("outline")).toHaveLength(3);
  });

  it("falls back to source sentences when key facts are unusable", async () => {
    const generator = new ScriptedGenerator([0.9], {}, { research: '{"facts": []}' });
    const { executor } = await setup({ generator });

    const state = await executor.run(topic);

    expect(state.status).toBe("done");
    expect(state.keyFacts).toEqual([
      "Beta replicas copy alpha data across regions.",
      "Alpha engines compile queries ahead of time.",
    ]);
    expect(state.warnings).toContainEqual(
      expect.stringMatching(/^Key fact fallback: Unusable research output: facts: /)
    );
    expect(generator.callsFor("research")).toHaveLength(2);
  });

  it("publishes the draft as is when the optimizer output is unusable", async () => {
    const generator = new ScriptedGenerator([0.9], {}, { optimize: '{"title": ""}' });
    const { executor } = await setup({ generator });

    const state = await executor.run(topic);

    expect(state.status).toBe("done");
    expect(state.final?.title).toBe(state.draft?.title);
    expect(state.final?.content).toBe(state.draft?.content);
    expect(state.final?.tags).toEqual(["alpha", "beta"]);
    expect(state.warnings).toContainEqual(
      expect.stringMatching(/^Optimize fallback: Unusable optimize output: /)
    );
  });

  it("cancels when the signal aborts while a stage is running", async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator([0.9]);
    const generate = generator.generate.bind(generator);
    generator.generate = async (request) => {
      if (request.purpose === "write") {
        controller.abort();
        throw new TransientError("connection reset");
      }
      return generate(request);
    };
    const { executor, store } = await setup({ generator, signal: controller.signal });

    const state = await executor.run(topic, "run-abort-inside");

    expect(state.status).toBe("cancelled");
    expect(state.error).toEqual({
      errorClass: "Cancelled",
      message: "Run cancelled during write",
      stage: "write",
    });
    expect(state.outline?.sections).toHaveLength(2);
    expect(generator.callsFor("write")).toHaveLength(1);
    expect((await store.load("run-abort-inside"))?.state.status).toBe("cancelled");
  });

  it("cancels during a retry backoff without another attempt", async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator([0.9], {
      write: [new TransientError("rate limited", 429)],
    });
    const generate = generator.generate.bind(generator);
    generator.generate = async (request) => {
      if (request.purpose === "write") setTimeout(() => controller.abort(), 5);
      return generate(request);
    };
    const { executor } = await setup({
      generator,
      signal: controller.signal,
      config: testConfig({ retry: { initialDelayMs: 60_000, maxDelayMs: 60_000 } }),
    });

    const state = await executor.run(topic);

    expect(state.status).toBe("cancelled");
    expect(state.error?.stage).toBe("write");
    expect(generator.callsFor("write")).toHaveLength(1);
  });
});
