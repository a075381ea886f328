import { PipelineConfigSchema, type TopicSpec } from "@draftloom/core";
import { KnowledgeBase, type Embedder } from "@draftloom/knowledge-base";
import type { GeneratePurpose, GenerateRequest, Generator } from "../llm.js";

/** Counts of three marker words, so similarities are easy to reason about. */
export class KeywordEmbedder implements Embedder {
  readonly name = "keyword";
  readonly dimensions = 3;

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => {
      const words = text.toLowerCase().split(/\W+/);
      return ["alpha", "beta", "gamma"].map((k) => words.filter((w) => w === k).length);
    });
  }
}

export const topic: TopicSpec = {
  title: "Alpha and beta systems",
  description: "",
  keywords: ["alpha", "beta"],
  targetAudience: "engineers",
  tone: "plain",
};

export const ALPHA_DOC =
  "Alpha engines compile queries ahead of time. Alpha caching keeps compiled results warm between requests.";
export const BETA_DOC =
  "Beta replicas copy alpha data across regions. Beta failover promotes a replica within seconds.";

export const DRAFT = `# Alpha and beta systems

## Alpha engines
Alpha engines compile queries ahead of time.

## Beta replicas
Beta replicas copy alpha data across regions.`;

export const OPTIMIZED = {
  title: "Alpha and beta systems",
  content: DRAFT,
  metaDescription: "How alpha engines and beta replicas work.",
  slug: "alpha-and-beta",
  tags: ["alpha"],
};

export function testConfig(
  options: {
    gate?: Record<string, unknown>;
    publishing?: Record<string, unknown>;
    research?: Record<string, unknown>;
    retry?: Record<string, unknown>;
  } = {}
) {
  return PipelineConfigSchema.parse({
    retry: { initialDelayMs: 1, maxDelayMs: 2, ...options.retry },
    qualityGate: {
      approvalThreshold: 0.8,
      maxIterations: 5,
      weights: { groundedness: 0, redundancy: 0, structure: 0, reviewer: 1 },
      ...options.gate,
    },
    publishing: options.publishing ?? {},
    research: options.research ?? {},
  });
}

export async function seededKnowledgeBase(): Promise<KnowledgeBase> {
  const kb = new KnowledgeBase(new KeywordEmbedder(), testConfig());
  await kb.ingest([
    { source: "alpha.md", mediaType: "text/markdown", text: ALPHA_DOC },
    { source: "beta.md", mediaType: "text/markdown", text: BETA_DOC },
  ]);
  return kb;
}

/**
 * Canned responses per purpose. Reviewer scores are handed out in order and
 * the last one repeats; queued failures are thrown before answering and a
 * replacement reply stands in for the canned one.
 */
export class ScriptedGenerator implements Generator {
  readonly calls: GenerateRequest[] = [];
  private reviews = 0;

  constructor(
    private readonly reviewScores: number[],
    private readonly failures: Partial<Record<GeneratePurpose, Error[]>> = {},
    private readonly replies: Partial<Record<GeneratePurpose, string>> = {}
  ) {}

  callsFor(purpose: GeneratePurpose): GenerateRequest[] {
    return this.calls.filter((c) => c.purpose === purpose);
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.calls.push(request);

    const failure = this.failures[request.purpose]?.shift();
    if (failure) throw failure;

    const reply = this.replies[request.purpose];
    if (reply !== undefined) return reply;

    switch (request.purpose) {
      case "research":
        return JSON.stringify({ facts: ["Alpha engines compile queries ahead of time."] });
      case "outline":
        return JSON.stringify({
          title: "Alpha and beta systems",
          sections: [
            { heading: "Alpha engines", keyPoints: ["compilation"], chunkIds: [] },
            { heading: "Beta replicas", keyPoints: ["replication"], chunkIds: [] },
          ],
        });
      case "write":
        return DRAFT;
      case "critique": {
        const index = Math.min(this.reviews++, this.reviewScores.length - 1);
        return JSON.stringify({ score: this.reviewScores[index] ?? 0, issues: ["needs more depth"] });
      }
      case "optimize":
        return JSON.stringify(OPTIMIZED);
    }
  }
}
