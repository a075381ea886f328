import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import PDFParser from "pdf2json";
import { IngestionError, createChildLogger, type MediaType } from "@draftloom/core";

const logger = createChildLogger({ module: "knowledge-base:loaders" });

export interface LoadedSource {
  source: string;
  mediaType: MediaType;
  text: string;
}

const EXTENSIONS: Record<string, MediaType> = {
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".txt": "text/plain",
  ".pdf": "application/pdf",
};

export function mediaTypeFor(path: string): MediaType | undefined {
  return EXTENSIONS[extname(path).toLowerCase()];
}

/**
 * Strict UTF-8 decode. Invalid byte sequences, NUL bytes and whitespace-only
 * content are all ingestion failures.
 */
export function decodeText(bytes: Uint8Array, source: string): string {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new IngestionError(`${source} is not valid UTF-8`, source, { cause: err });
  }
  return validateText(text, source);
}

export function validateText(text: string, source: string): string {
  if (text.includes("\u0000")) {
    throw new IngestionError(`${source} contains NUL bytes`, source);
  }
  if (text.trim().length === 0) {
    throw new IngestionError(`${source} has no text content`, source);
  }
  return text;
}

export async function loadSourceFile(path: string): Promise<LoadedSource> {
  const mediaType = mediaTypeFor(path);
  if (!mediaType) {
    throw new IngestionError(`Unsupported file type: ${extname(path) || "(none)"}`, path);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new IngestionError(`Cannot read ${path}`, path, { cause: err });
  }

  const text =
    mediaType === "application/pdf"
      ? validateText(await extractPdfText(bytes, path), path)
      : decodeText(bytes, path);

  logger.debug({ source: path, mediaType, chars: text.length }, "Loaded source");
  return { source: path, mediaType, text };
}

const PAGE_BREAK = /-+Page \(\d+\) Break-+/g;

function extractPdfText(bytes: Buffer, source: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const parser = new PDFParser(null, true);

    parser.on("pdfParser_dataError", (errData) => {
      reject(
        new IngestionError(`PDF parsing error in ${source}`, source, {
          cause: errData.parserError,
        })
      );
    });

    parser.on("pdfParser_dataReady", () => {
      const raw = parser.getRawTextContent();
      resolve(raw.replace(/\r\n/g, "\n").replace(PAGE_BREAK, "\n\n").trim());
    });

    parser.parseBuffer(bytes);
  });
}
