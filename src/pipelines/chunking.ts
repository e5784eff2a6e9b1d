import { ConfigurationError } from "../domain/errors.js";
import { DocumentRecord, PassageRecord } from "../domain/types.js";
import { normalizeText } from "../utils/text.js";

export interface ChunkSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface TextSpan {
  start: number;
  end: number;
  overlapStart: number;
}

// A cut is only moved back to a natural boundary when it keeps at least this share of the window.
const MIN_BOUNDARY_RATIO = 0.55;

const BOUNDARY_SEPARATORS = ["\n\n", "\n- ", "\n* ", "\n", ". ", "! ", "? ", "; ", ", ", " "];

export class ChunkSplitter {
  constructor(private readonly options: ChunkSplitterOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${options.chunkSize}.`);
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new ConfigurationError(
        `Chunk overlap must be in [0, ${options.chunkSize}), got ${options.chunkOverlap}.`,
      );
    }
  }

  split(document: DocumentRecord): PassageRecord[] {
    const text = prepareText(document.text);
    return splitIntoSpans(text, this.options.chunkSize, this.options.chunkOverlap).map(
      (span, ordinal) => ({
        id: createPassageId(document.id, ordinal),
        sourceId: document.id,
        ordinal,
        text: text.slice(span.start, span.end),
        start: span.start,
        end: span.end,
        overlapStart: span.overlapStart,
        metadata: { ...document.metadata },
      }),
    );
  }
}

export function createPassageId(sourceId: string, ordinal: number): string {
  return `${sourceId}:${ordinal}`;
}

/** Line endings, tabs and whitespace runs are normalized before splitting. */
export function prepareText(text: string): string {
  return normalizeText(text).replace(/ {2,}/g, " ").replace(/\n{3,}/g, "\n\n");
}

export function splitIntoSpans(text: string, maxChars: number, overlap: number): TextSpan[] {
  if (!text) {
    return [];
  }
  if (text.length <= maxChars) {
    return [{ start: 0, end: text.length, overlapStart: 0 }];
  }

  const spans: TextSpan[] = [];
  let start = 0;
  let overlapStart = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + maxChars, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const cut = findLastBoundary(text.slice(start, hardEnd));
      if (cut >= Math.floor(maxChars * MIN_BOUNDARY_RATIO)) {
        end = start + cut;
      }
    }

    spans.push({ start, end, overlapStart });

    if (end >= text.length) {
      break;
    }

    const nextStart = Math.max(0, end - overlap);
    const resolvedStart = nextStart > start ? nextStart : end;
    overlapStart = end - resolvedStart;
    start = resolvedStart;
  }

  return spans;
}

/** Position just after the last separator in the window, or -1. */
function findLastBoundary(window: string): number {
  for (const separator of BOUNDARY_SEPARATORS) {
    const index = window.lastIndexOf(separator);
    if (index >= 0 && index + separator.length >= Math.floor(window.length * MIN_BOUNDARY_RATIO)) {
      return index + separator.length;
    }
  }
  return -1;
}
