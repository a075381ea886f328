import {
  FatalError,
  type CritiqueResult,
  type DraftSection,
  type Outline,
  type PipelineState,
} from "@draftloom/core";
import type { StageContext, StageOutcome, WriteNode } from "../graph.js";
import { formatSources } from "./sources.js";

const HEADING = /^(#{1,3})\s+(.+?)\s*#*\s*$/;

function headingKey(heading: string): string {
  return heading.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, " ").trim();
}

/**
 * Split markdown into a title (first H1) and sections (H2/H3 with bodies).
 * Section sources come from the outline section with the same heading.
 */
export function parseDraft(
  markdown: string,
  outline: Outline | undefined
): { title?: string; sections: DraftSection[] } {
  const sourcesByHeading = new Map(
    (outline?.sections ?? []).map((s) => [headingKey(s.heading), s.chunkIds])
  );

  let title: string | undefined;
  const sections: DraftSection[] = [];
  let current: { heading: string; lines: string[] } | undefined;

  const flush = () => {
    if (!current) return;
    sections.push({
      heading: current.heading,
      body: current.lines.join("\n").trim(),
      chunkIds: sourcesByHeading.get(headingKey(current.heading)) ?? [],
    });
  };

  for (const line of markdown.split("\n")) {
    const match = HEADING.exec(line);
    const level = match?.[1]?.length;
    const text = match?.[2];
    if (level === 1 && text && title === undefined && !current) {
      title = text;
      continue;
    }
    if (level !== undefined && level >= 2 && text) {
      flush();
      current = { heading: text, lines: [] };
      continue;
    }
    current?.lines.push(line);
  }
  flush();

  return { title, sections };
}

function revisionNotes(critique: CritiqueResult | undefined): string {
  if (!critique) return "";
  const issues = critique.issues.slice(0, 15).map((i) => `- [${i.kind}] ${i.location}: ${i.message}`);
  return `

REVISION REQUIRED (previous score ${critique.score.toFixed(2)}). Fix these issues:
${issues.join("\n") || "- Improve grounding and structure."}`;
}

/**
 * Write: full markdown draft from the outline, revised against the latest
 * critique when looping back.
 */
export const writeNode: WriteNode = {
  stage: "write",

  async execute(state: PipelineState, ctx: StageContext): Promise<StageOutcome> {
    const { outline, topic } = state;
    if (!outline) {
      return { kind: "fail", error: new FatalError("Write requires an outline") };
    }

    const attempt = (state.draft?.attempt ?? 0) + 1;
    const lastCritique = state.critiques.at(-1);
    ctx.logger.info({ runId: state.runId, attempt }, "Starting write stage");

    const system = `You are writing a long-form article for ${topic.targetAudience}.
Tone: ${topic.tone}
Target length: about ${ctx.config.generation.targetWordCount} words.

RULES:
1. ONLY state facts that appear in the sources or key facts. Do NOT invent information.
2. Use exactly the outline's section headings as "## " markdown headings, in order.
3. Start with "# " and the title.
4. Every section needs a substantive body; do not repeat material across sections.${revisionNotes(lastCritique)}`;

    const outlineText = outline.sections
      .map((s) => `## ${s.heading}\n${s.keyPoints.map((p) => `- ${p}`).join("\n")}\nSources: ${s.chunkIds.join(", ")}`)
      .join("\n\n");

    const prompt = `Title: ${outline.title}
Introduction: ${outline.introduction}

Outline:
${outlineText}

Conclusion: ${outline.conclusion}

Key facts:
${state.keyFacts.map((f) => `- ${f}`).join("\n")}

Sources:

${formatSources(state.retrieval)}
${attempt > 1 && state.draft ? `\nPrevious draft:\n\n${state.draft.content}\n` : ""}
Write the article in markdown.`;

    const content = (
      await ctx.call("write", () =>
        ctx.generator.generate({ purpose: "write", tier: "opus", system, prompt })
      )
    ).trim();

    if (!content) {
      return { kind: "fail", error: new FatalError("Writer returned an empty draft") };
    }

    const parsed = parseDraft(content, outline);
    state.draft = {
      title: parsed.title ?? outline.title,
      content,
      sections: parsed.sections,
      wordCount: content.split(/\s+/).filter(Boolean).length,
      attempt,
    };

    ctx.logger.info(
      { runId: state.runId, attempt, wordCount: state.draft.wordCount, sections: parsed.sections.length },
      "Draft complete"
    );
    return { kind: "advance", state, next: "critique" };
  },
};
