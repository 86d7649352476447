import { RAG_CONFIG } from "./config.js";
import type { Embedder } from "./embedding-service.js";
import { RetrievalError, errorMessage, isAbortError } from "./errors.js";
import type { RetrievedChunk } from "./types.js";
import type { VectorStore } from "./vector-store.js";

export interface RetrieveOptions {
  k?: number;
  page?: number;
  signal?: AbortSignal;
}

export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly topK: number = RAG_CONFIG.topK,
  ) {}

  async retrieve(slug: string, query: string, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    const k = options.k ?? this.topK;
    try {
      const queryVector = await this.embedder.embedQuery(query, options.signal);
      return await this.store.search(slug, queryVector, k, { page: options.page });
    } catch (err) {
      if (isAbortError(err) || err instanceof RetrievalError) throw err;
      throw new RetrievalError(`Retrieval failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
