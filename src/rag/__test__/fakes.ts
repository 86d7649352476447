import type { EmbeddingModel } from "../embedding-service.js";
import type { ImageDescriber } from "../image-describer.js";
import type { RetrievedChunk, StoredChunk } from "../types.js";
import type { SearchOptions, VectorStore } from "../vector-store.js";

function cosine(a: number[], b: number[]): number {
  const dot = a.reduce((sum, x, i) => sum + x * b[i], 0);
  const norms = Math.hypot(...a) * Math.hypot(...b);
  return norms === 0 ? 0 : dot / norms;
}

const KEYWORDS = ["introduction", "caching", "conclusion", "figure"];

/** One dimension per keyword plus a constant, so no vector is zero. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return [...KEYWORDS.map((word) => (lower.includes(word) ? 1 : 0)), 0.1];
}

export const KEYWORD_DIMENSIONS = KEYWORDS.length + 1;

export class FakeEmbeddingModel implements EmbeddingModel {
  readonly name = "fake-embedding";
  readonly calls: string[][] = [];
  /** Errors thrown by the next calls, in order. */
  failures: unknown[] = [];
  alwaysFail: unknown = null;

  async embedBatch(batch: string[]): Promise<number[][]> {
    this.calls.push(batch);
    if (this.alwaysFail) throw this.alwaysFail;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return batch.map(keywordVector);
  }
}

export class FakeDescriber implements ImageDescriber {
  calls = 0;

  constructor(private readonly describeFn: (png: Uint8Array) => Promise<string>) {}

  async describe(png: Uint8Array): Promise<string> {
    this.calls++;
    return this.describeFn(png);
  }
}

/** Same ordering rules as the vectra store, without touching disk. */
export class MemoryVectorStore implements VectorStore {
  private docs = new Map<string, StoredChunk[]>();

  async replace(slug: string, chunks: StoredChunk[]): Promise<void> {
    this.docs.set(slug, chunks);
  }

  async clear(slug: string): Promise<void> {
    this.docs.delete(slug);
  }

  async chunks(slug: string): Promise<StoredChunk[]> {
    return this.docs.get(slug) ?? [];
  }

  async count(slug: string): Promise<number> {
    return (await this.chunks(slug)).length;
  }

  async search(slug: string, queryVector: number[], k: number, options: SearchOptions = {}): Promise<RetrievedChunk[]> {
    return (await this.chunks(slug))
      .filter((chunk) => options.page === undefined || chunk.page === options.page)
      .map(({ vector, ...chunk }) => ({ ...chunk, score: cosine(queryVector, vector) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, k);
  }
}

export function storedChunks(pages: Array<[number, string]>): StoredChunk[] {
  return pages.map(([page, text], index) => ({
    index,
    page,
    text,
    start: 0,
    end: text.length,
    vector: keywordVector(text),
  }));
}
