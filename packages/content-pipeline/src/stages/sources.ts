import type { RetrievalContext } from "@draftloom/core";

/** Numbered source listing shared by the prompts. */
export function formatSources(context: RetrievalContext | undefined, maxChars = 1200): string {
  if (!context || context.items.length === 0) return "(no sources)";
  return context.items
    .map(
      ({ chunk, score }) =>
        `[${chunk.id}] (${chunk.source}, relevance ${score.toFixed(2)})\n${chunk.text.slice(0, maxChars)}`
    )
    .join("\n\n");
}

export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .slice(0, 80)
    .replace(/^-+|-+$/g, "");
  return slug || "untitled";
}
