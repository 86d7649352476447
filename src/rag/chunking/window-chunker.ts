import { RAG_CONFIG } from "../config.js";
import type { PageContent, TextChunk } from "../types.js";
import { composeFullText } from "./full-text.js";
import type { ChunkingStrategy } from "./types.js";

export interface WindowOptions {
  /** Tokens per chunk at most. */
  maxTokens: number;
  /** Tokens repeated at the start of the next chunk. */
  overlapTokens: number;
  /** How far back from a full window to look for a sentence end. */
  lookbackTokens: number;
}

interface Token {
  start: number;
  end: number;
}

const SENTENCE_END = /[.!?:;]["')\]]*$/;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    tokens.push({ start, end: start + match[0].length });
  }
  return tokens;
}

export function validateWindowOptions(options: WindowOptions): void {
  const { maxTokens, overlapTokens, lookbackTokens } = options;
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new RangeError(`maxTokens must be a positive integer, got ${maxTokens}`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0 || overlapTokens >= maxTokens) {
    throw new RangeError(`overlapTokens must be in [0, ${maxTokens}), got ${overlapTokens}`);
  }
  if (!Number.isInteger(lookbackTokens) || lookbackTokens < 0) {
    throw new RangeError(`lookbackTokens must be a non-negative integer, got ${lookbackTokens}`);
  }
}

/**
 * Moves a window end back to just after the closest sentence end, if one
 * lies within the look-back distance. The window never shrinks to the point
 * where the next one would start at or before this one.
 */
function preferSentenceEnd(
  text: string,
  tokens: Token[],
  start: number,
  end: number,
  options: WindowOptions,
): number {
  for (let e = end; e > start + options.overlapTokens && end - e <= options.lookbackTokens; e--) {
    const token = tokens[e - 1];
    if (SENTENCE_END.test(text.slice(token.start, token.end))) return e;
  }
  return end;
}

/**
 * Sliding window over whitespace-delimited tokens, one page at a time.
 * Windows never span two pages and the first window of a page starts at the
 * page's first character.
 */
export class WindowChunker implements ChunkingStrategy {
  readonly name = "window-chunker";
  private readonly options: WindowOptions;

  constructor(options: Partial<WindowOptions> = {}) {
    this.options = {
      maxTokens: options.maxTokens ?? RAG_CONFIG.maxChunkTokens,
      overlapTokens: options.overlapTokens ?? RAG_CONFIG.chunkOverlapTokens,
      lookbackTokens: options.lookbackTokens ?? RAG_CONFIG.chunkLookbackTokens,
    };
    validateWindowOptions(this.options);
  }

  chunk(pages: PageContent[]): TextChunk[] {
    const { pageOffsets } = composeFullText(pages);
    const chunks: TextChunk[] = [];

    pages.forEach((page, pageIdx) => {
      const tokens = tokenize(page.text);
      if (tokens.length === 0) return;
      const base = pageOffsets[pageIdx];

      let start = 0;
      while (true) {
        let end = Math.min(start + this.options.maxTokens, tokens.length);
        if (end < tokens.length) {
          end = preferSentenceEnd(page.text, tokens, start, end, this.options);
        }

        const from = start === 0 ? 0 : tokens[start].start;
        const to = tokens[end - 1].end;
        chunks.push({
          index: chunks.length,
          page: page.pageNumber,
          text: page.text.slice(from, to),
          start: base + from,
          end: base + to,
        });

        if (end >= tokens.length) break;
        start = Math.max(end - this.options.overlapTokens, start + 1);
      }
    });

    return chunks;
  }
}
