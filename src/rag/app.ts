import { ChatAgent } from "./agent/chat-agent.js";
import { ProcessAgent } from "./agent/process-agent.js";
import type { Agent } from "./agent/types.js";
import { AnswerOrchestrator } from "./answer/orchestrator.js";
import { RAG_CONFIG, type AgentKind } from "./config.js";
import { Embedder, OpenRouterEmbeddingModel } from "./embedding-service.js";
import { OpenRouterImageDescriber } from "./image-describer.js";
import { DocumentLibrary } from "./library.js";
import type { OpenRouterOptions } from "./openrouter.js";
import { IngestionPipeline } from "./pipeline.js";
import { Retriever } from "./retriever.js";
import { IngestionScheduler } from "./scheduler.js";
import { VectraStore } from "./vector-store.js";

export interface Folio {
  library: DocumentLibrary;
  store: VectraStore;
  embedder: Embedder;
  retriever: Retriever;
  scheduler: IngestionScheduler;
  orchestrator: AnswerOrchestrator;
}

export interface FolioOptions {
  apiKey: string;
  dataDir?: string;
  agent?: AgentKind;
  log?: (msg: string) => void;
}

export function createEmbedder(api: OpenRouterOptions, log?: (msg: string) => void): Embedder {
  return new Embedder(new OpenRouterEmbeddingModel(api, RAG_CONFIG.embeddingModel), { log });
}

function createAgent(kind: AgentKind, api: OpenRouterOptions, library: DocumentLibrary): Agent {
  if (kind === "process") {
    return new ProcessAgent({
      documentDir: (slug) => library.documentDir(slug),
      dataDir: library.root,
    });
  }
  return new ChatAgent(api);
}

/**
 * Wires the library, index, remote models, scheduler and answer
 * orchestrator from `RAG_CONFIG`, and restores persisted statuses.
 */
export async function initFolio(options: FolioOptions): Promise<Folio> {
  const log = options.log ?? (() => {});
  const api: OpenRouterOptions = { apiKey: options.apiKey, timeoutMs: RAG_CONFIG.requestTimeoutMs };

  const library = new DocumentLibrary(options.dataDir ?? RAG_CONFIG.dataDir);
  const store = new VectraStore((slug) => library.indexDir(slug));
  const embedder = createEmbedder(api, log);
  const retriever = new Retriever(embedder, store);

  const pipeline = new IngestionPipeline({
    library,
    describer: new OpenRouterImageDescriber(api, RAG_CONFIG.visionModel),
    embedder,
    store,
  });
  const scheduler = new IngestionScheduler(library, pipeline, { log });
  await scheduler.restore();

  const agent = createAgent(options.agent ?? RAG_CONFIG.agent, api, library);
  const orchestrator = new AnswerOrchestrator(scheduler, retriever, agent, { log });

  const docs = scheduler.list();
  const ready = docs.filter((doc) => doc.status === "ready").length;
  log(`library: ${docs.length} documents (${ready} ready) in ${library.root}`);

  return { library, store, embedder, retriever, scheduler, orchestrator };
}
