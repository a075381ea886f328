import type { Chunk, ChunkingConfig, Document, Span } from "@draftloom/core";

const SEPARATORS = ["\n\n", "\n", " "] as const;

/**
 * Split text into overlapping windows of at most `chunkSize` characters.
 *
 * Spans start at 0, end at text.length, and both starts and ends strictly
 * increase. Consecutive spans share up to floor(chunkSize * overlap) chars.
 * Text no longer than chunkSize is a single span.
 */
export function splitSpans(text: string, config: ChunkingConfig): Span[] {
  const size = Math.max(1, Math.floor(config.chunkSize));
  const overlapChars = Math.floor(size * config.overlap);
  const length = text.length;

  if (length <= size) return [{ start: 0, end: length }];

  const spans: Span[] = [];
  let start = 0;
  let prevEnd = 0;

  for (;;) {
    const windowEnd = start + size;
    if (windowEnd >= length) {
      spans.push({ start, end: length });
      return spans;
    }

    const minEnd = Math.max(start + Math.floor(size / 2), prevEnd + 1);
    let end = findBoundary(text, minEnd, windowEnd);
    if (splitsPair(text, end)) end = end - 1 > Math.max(start, prevEnd) ? end - 1 : end + 1;
    spans.push({ start, end });

    prevEnd = end;
    let next = end - overlapChars;
    if (splitsPair(text, next)) next--;
    start = Math.max(next, start + 1);
    if (splitsPair(text, start)) start++;
  }
}

// True when a cut at i would separate a UTF-16 surrogate pair.
function splitsPair(text: string, i: number): boolean {
  if (i <= 0 || i >= text.length) return false;
  const before = text.charCodeAt(i - 1);
  const after = text.charCodeAt(i);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

// Latest separator ending inside [minEnd, windowEnd], by preference order.
function findBoundary(text: string, minEnd: number, windowEnd: number): number {
  for (const sep of SEPARATORS) {
    const idx = text.lastIndexOf(sep, windowEnd - sep.length);
    if (idx >= 0 && idx + sep.length >= minEnd) {
      return idx + sep.length;
    }
  }
  return windowEnd;
}

export function chunkDocument(document: Document, config: ChunkingConfig): Chunk[] {
  return splitSpans(document.text, config).map((span, ordinal) => ({
    id: `${document.id}:${ordinal}`,
    documentId: document.id,
    source: document.source,
    ordinal,
    span,
    text: document.text.slice(span.start, span.end),
  }));
}
