import { rename, rm } from "node:fs/promises";
import { LocalIndex } from "vectra";
import { KeyedLock } from "./concurrency.js";
import { RetrievalError } from "./errors.js";
import type { RetrievedChunk, StoredChunk } from "./types.js";

export interface SearchOptions {
  page?: number;
}

export interface VectorStore {
  /** Atomically sets the chunks of a document. Indices must run 0..n-1. */
  replace(slug: string, chunks: StoredChunk[]): Promise<void>;
  clear(slug: string): Promise<void>;
  search(slug: string, queryVector: number[], k: number, options?: SearchOptions): Promise<RetrievedChunk[]>;
  chunks(slug: string): Promise<StoredChunk[]>;
  count(slug: string): Promise<number>;
}

function toStoredChunk(id: string, vector: number[], metadata: Record<string, unknown>): StoredChunk {
  const { index, page, text, start, end } = metadata;
  if (
    typeof index !== "number" ||
    typeof page !== "number" ||
    typeof text !== "string" ||
    typeof start !== "number" ||
    typeof end !== "number"
  ) {
    throw new RetrievalError(`Corrupt index entry ${id}`);
  }
  return { index, page, text, start, end, vector };
}

export function assertDenseChunks(chunks: StoredChunk[]): void {
  chunks.forEach((chunk, i) => {
    if (chunk.index !== i) {
      throw new RangeError(`Chunk at position ${i} has index ${chunk.index}`);
    }
    if (chunk.vector.length === 0 || chunk.vector.length !== chunks[0].vector.length) {
      throw new RangeError(`Chunk ${i} has a vector of length ${chunk.vector.length}`);
    }
  });
}

/**
 * One vectra LocalIndex per document. A document's index is written to a
 * staging folder and renamed into place, so readers see either the previous
 * state or the complete new one. Reads and writes of the same slug are
 * serialized; different slugs do not wait on each other.
 */
export class VectraStore implements VectorStore {
  private lock = new KeyedLock();
  private indexes = new Map<string, LocalIndex>();

  constructor(private readonly indexDir: (slug: string) => string) {}

  async replace(slug: string, chunks: StoredChunk[]): Promise<void> {
    assertDenseChunks(chunks);
    await this.lock.run(slug, async () => {
      const dir = this.indexDir(slug);
      const staging = `${dir}.staging`;
      await rm(staging, { recursive: true, force: true });

      const index = new LocalIndex(staging);
      await index.createIndex();
      await index.beginUpdate();
      for (const chunk of chunks) {
        await index.insertItem({
          id: String(chunk.index),
          vector: chunk.vector,
          metadata: {
            index: chunk.index,
            page: chunk.page,
            text: chunk.text,
            start: chunk.start,
            end: chunk.end,
          },
        });
      }
      await index.endUpdate();

      await rm(dir, { recursive: true, force: true });
      await rename(staging, dir);
      this.indexes.delete(slug);
    });
  }

  clear(slug: string): Promise<void> {
    return this.lock.run(slug, async () => {
      await rm(this.indexDir(slug), { recursive: true, force: true });
      this.indexes.delete(slug);
    });
  }

  chunks(slug: string): Promise<StoredChunk[]> {
    return this.lock.run(slug, async () => {
      const index = await this.open(slug);
      if (!index) return [];
      const items = await index.listItems();
      return items
        .map((item) => toStoredChunk(item.id, item.vector, item.metadata))
        .sort((a, b) => a.index - b.index);
    });
  }

  async count(slug: string): Promise<number> {
    return (await this.chunks(slug)).length;
  }

  /**
   * The k chunks most similar to `queryVector` by cosine similarity, best
   * first; equal scores keep chunk order. k beyond the chunk count returns
   * every chunk.
   */
  search(
    slug: string,
    queryVector: number[],
    k: number,
    options: SearchOptions = {},
  ): Promise<RetrievedChunk[]> {
    return this.lock.run(slug, async () => {
      const index = await this.open(slug);
      if (!index || k <= 0) return [];
      const items = await index.listItems();
      if (items.length === 0) return [];
      if (queryVector.length !== items[0].vector.length) {
        throw new RetrievalError(
          `Query vector has ${queryVector.length} dimensions, index has ${items[0].vector.length}`,
        );
      }

      // every item is ranked so a tie at the k-th place is cut by chunk order
      const filter = options.page === undefined ? undefined : { page: { $eq: options.page } };
      const results = await index.queryItems(queryVector, "", items.length, filter);
      return results
        .map((r) => {
          const { vector: _vector, ...chunk } = toStoredChunk(r.item.id, r.item.vector, r.item.metadata);
          return { ...chunk, score: r.score };
        })
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, k);
    });
  }

  private async open(slug: string): Promise<LocalIndex | null> {
    const cached = this.indexes.get(slug);
    if (cached) return cached;

    const index = new LocalIndex(this.indexDir(slug));
    if (!(await index.isIndexCreated())) return null;
    this.indexes.set(slug, index);
    return index;
  }
}
