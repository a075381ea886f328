import { readFileSync } from "node:fs";
import { z } from "zod";
import type {
  CritiqueComponents,
  CritiqueDecision,
  CritiqueIssue,
  CritiqueWeights,
  DraftContent,
  DraftSection,
  Outline,
} from "@draftloom/core";

const STOPWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL("../data/stopwords.json", import.meta.url), "utf-8")))
);

const WORD = /[\p{L}\p{N}]+/gu;

/** Sections sharing at least this much vocabulary are flagged. */
const REDUNDANCY_FLAG = 0.5;

export interface DecisionPolicy {
  approvalThreshold: number;
  maxIterations: number;
}

/**
 * Quality gate decision. Total over every input: a non-finite score counts
 * as 0, `iteration` is the number of Critique→Write traversals so far.
 */
export function decide(score: number, iteration: number, policy: DecisionPolicy): CritiqueDecision {
  const s = Number.isFinite(score) ? score : 0;
  if (s >= policy.approvalThreshold) return "approve";
  if (iteration < policy.maxIterations) return "revise";
  return "escalate";
}

export function contentWords(text: string): string[] {
  return (text.toLowerCase().match(WORD) ?? []).filter((w) => w.length > 1 && !STOPWORDS.has(w));
}

function plainText(markdown: string): string {
  return markdown
    .split("\n")
    .filter((line) => !/^\s*#/.test(line))
    .map((line) => line.replace(/^\s*(?:[-*+]|\d+\.)\s+/, ""))
    .join("\n")
    .replace(/\[([^\]]+)\]\([^)]*\)/g, "$1")
    .replace(/[*_`]/g, "");
}

export function splitSentences(markdown: string): string[] {
  return plainText(markdown)
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export interface ClaimCheck {
  heading: string;
  sentence: string;
  overlap: number;
}

export interface GroundednessResult {
  score: number;
  claims: number;
  ungrounded: ClaimCheck[];
}

/**
 * Fraction of claims traceable to a source. A claim is a sentence with at
 * least `minClaimWords` distinct content words; it is traced when some source
 * contains at least `claimOverlap` of those words. No claims scores 0.
 */
export function scoreGroundedness(
  sections: DraftSection[],
  sources: string[],
  options: { minClaimWords: number; claimOverlap: number }
): GroundednessResult {
  const sourceSets = sources.map((s) => new Set(contentWords(s)));
  let claims = 0;
  let traced = 0;
  const ungrounded: ClaimCheck[] = [];

  for (const section of sections) {
    for (const sentence of splitSentences(section.body)) {
      const words = new Set(contentWords(sentence));
      if (words.size < options.minClaimWords) continue;
      claims++;

      let best = 0;
      for (const source of sourceSets) {
        let shared = 0;
        for (const w of words) if (source.has(w)) shared++;
        best = Math.max(best, shared / words.size);
      }

      if (best >= options.claimOverlap) traced++;
      else ungrounded.push({ heading: section.heading, sentence, overlap: best });
    }
  }

  return { score: claims === 0 ? 0 : traced / claims, claims, ungrounded };
}

export interface RedundancyResult {
  /** max pairwise Jaccard overlap, 0 with fewer than two sections */
  value: number;
  pair?: [string, string];
}

export function scoreRedundancy(sections: DraftSection[]): RedundancyResult {
  const sets = sections
    .map((s) => ({ heading: s.heading, words: new Set(contentWords(s.body)) }))
    .filter((s) => s.words.size > 0);

  let result: RedundancyResult = { value: 0 };
  for (let i = 0; i < sets.length; i++) {
    for (let j = i + 1; j < sets.length; j++) {
      const a = sets[i];
      const b = sets[j];
      if (!a || !b) continue;
      let shared = 0;
      for (const w of a.words) if (b.words.has(w)) shared++;
      const jaccard = shared / (a.words.size + b.words.size - shared);
      if (jaccard > result.value) result = { value: jaccard, pair: [a.heading, b.heading] };
    }
  }
  return result;
}

export interface StructureResult {
  score: number;
  missing: string[];
  empty: string[];
}

function normalizeHeading(heading: string): string {
  return (heading.toLowerCase().match(WORD) ?? []).join(" ");
}

/** Fraction of outline sections present as draft headings with non-empty bodies. */
export function scoreStructure(draft: DraftContent, outline: Outline | undefined): StructureResult {
  if (!outline || outline.sections.length === 0) return { score: 1, missing: [], empty: [] };

  const bodies = new Map<string, string>();
  for (const section of draft.sections) {
    bodies.set(normalizeHeading(section.heading), section.body);
  }

  const missing: string[] = [];
  const empty: string[] = [];
  let present = 0;

  for (const section of outline.sections) {
    const body = bodies.get(normalizeHeading(section.heading));
    if (body === undefined) missing.push(section.heading);
    else if (body.trim().length === 0) empty.push(section.heading);
    else present++;
  }

  return { score: present / outline.sections.length, missing, empty };
}

/**
 * Weighted mean of the enabled components, clamped to [0, 1].
 * Redundancy enters as 1 - redundancy; reviewer only counts when present.
 */
export function combineScore(components: CritiqueComponents, weights: CritiqueWeights): number {
  const parts: Array<[number, number]> = [
    [weights.groundedness, components.groundedness],
    [weights.redundancy, 1 - components.redundancy],
    [weights.structure, components.structure],
  ];
  if (components.reviewer !== undefined) parts.push([weights.reviewer, components.reviewer]);

  let total = 0;
  let weightSum = 0;
  for (const [w, v] of parts) {
    if (w <= 0 || !Number.isFinite(v)) continue;
    total += w * v;
    weightSum += w;
  }
  if (weightSum === 0) return 0;
  return Math.min(1, Math.max(0, total / weightSum));
}

export interface DraftEvaluation {
  components: CritiqueComponents;
  issues: CritiqueIssue[];
}

/** Heuristic components and issues for a draft. The reviewer component is added by the caller. */
export function evaluateDraft(input: {
  draft: DraftContent;
  outline?: Outline;
  sources: string[];
  minClaimWords: number;
  claimOverlap: number;
}): DraftEvaluation {
  const sections =
    input.draft.sections.length > 0
      ? input.draft.sections
      : [{ heading: input.draft.title, body: input.draft.content, chunkIds: [] }];

  const grounded = scoreGroundedness(sections, input.sources, input);
  const redundancy = scoreRedundancy(sections);
  const structure = scoreStructure(input.draft, input.outline);

  const issues: CritiqueIssue[] = [
    ...grounded.ungrounded.map((c) => ({
      kind: "ungrounded_claim" as const,
      location: c.heading,
      message: `Not supported by retrieved sources: "${c.sentence.slice(0, 120)}"`,
    })),
    ...structure.missing.map((heading) => ({
      kind: "missing_section" as const,
      location: heading,
      message: `Outline section "${heading}" is missing from the draft`,
    })),
    ...structure.empty.map((heading) => ({
      kind: "empty_section" as const,
      location: heading,
      message: `Section "${heading}" has no body`,
    })),
  ];

  if (redundancy.pair && redundancy.value >= REDUNDANCY_FLAG) {
    issues.push({
      kind: "redundant_sections",
      location: redundancy.pair.join(" / "),
      message: `Sections overlap by ${Math.round(redundancy.value * 100)}% of their vocabulary`,
    });
  }

  return {
    components: {
      groundedness: grounded.score,
      redundancy: redundancy.value,
      structure: structure.score,
    },
    issues,
  };
}
