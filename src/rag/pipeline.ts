import { RAG_CONFIG } from "./config.js";
import { composeFullText, composePageText, getChunkingStrategy } from "./chunking/index.js";
import type { ChunkingStrategy } from "./chunking/index.js";
import type { Embedder } from "./embedding-service.js";
import { describeImages, type ImageDescriber } from "./image-describer.js";
import type { DocumentLibrary } from "./library.js";
import { extractPdf } from "./pdf-extractor.js";
import type { JobContext, JobResult, JobRunner } from "./scheduler.js";
import type { DocumentMeta, ExtractedDocument, ImageRecord, PageContent, StoredChunk } from "./types.js";
import type { VectorStore } from "./vector-store.js";

export interface PipelineDeps {
  library: DocumentLibrary;
  describer: ImageDescriber;
  embedder: Embedder;
  store: VectorStore;
  chunker?: ChunkingStrategy;
  extract?: (bytes: Uint8Array, log: (msg: string) => void) => Promise<ExtractedDocument>;
  describeConcurrency?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
}

/** Page text with each page's figure descriptions appended in reading order. */
export function pagesWithFigures(pages: PageContent[], images: ImageRecord[]): PageContent[] {
  return pages.map((page) => ({
    pageNumber: page.pageNumber,
    text: composePageText(
      page.text,
      images.filter((image) => image.pageNumber === page.pageNumber).map((image) => image.description),
    ),
  }));
}

/**
 * extract -> describe images -> chunk -> embed -> store, for one document.
 * Each phase is entered through the job context so the status is on disk
 * before the phase does any work. Chunks reach the vector store only once
 * every one of them has a vector.
 */
export class IngestionPipeline implements JobRunner {
  private readonly chunker: ChunkingStrategy;
  private readonly extract: (bytes: Uint8Array, log: (msg: string) => void) => Promise<ExtractedDocument>;

  constructor(private readonly deps: PipelineDeps) {
    this.chunker = deps.chunker ?? getChunkingStrategy("window-chunker");
    this.extract = deps.extract ?? ((bytes, log) => extractPdf(bytes, { log }));
  }

  async run(document: Readonly<DocumentMeta>, job: JobContext): Promise<JobResult> {
    const { library, describer, embedder, store } = this.deps;
    const { slug } = document;

    await job.enter("extracting");
    await store.clear(slug);
    const extracted = await this.extract(await library.readPdf(slug), job.log);
    const title = extracted.title ?? document.title;
    job.log(`extracted ${extracted.pages.length} pages, ${extracted.images.length} images`);

    await job.enter("describing_images", { title, pageCount: extracted.pages.length });
    const described = await describeImages(extracted.images, describer, {
      concurrency: this.deps.describeConcurrency ?? RAG_CONFIG.describeConcurrency,
      attempts: this.deps.retryAttempts ?? RAG_CONFIG.retryAttempts,
      baseDelayMs: this.deps.retryBaseDelayMs ?? RAG_CONFIG.retryBaseDelayMs,
      log: job.log,
    });
    const images = await library.saveImages(slug, described);
    const describedCount = images.filter((image) => image.description !== null).length;
    job.log(`described ${describedCount}/${images.length} images`);

    await job.enter("chunking", { imageCount: images.length });
    const pages = pagesWithFigures(extracted.pages, images);
    await library.writeFullText(slug, composeFullText(pages).text);
    const chunks = this.chunker.chunk(pages);
    job.log(`created ${chunks.length} chunks`);

    await job.enter("embedding");
    const vectors = await embedder.embedTexts(
      chunks.map((chunk) => chunk.text),
      { onProgress: (done, total) => job.log(`embedding ${done}/${total}`) },
    );
    const stored: StoredChunk[] = chunks.map((chunk, i) => ({ ...chunk, vector: vectors[i] }));
    await store.replace(slug, stored);

    return {
      title,
      pageCount: extracted.pages.length,
      chunkCount: stored.length,
      imageCount: images.length,
    };
  }
}
