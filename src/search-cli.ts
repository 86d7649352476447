#!/usr/bin/env node
import { parseArgs } from "node:util";
import { createEmbedder } from "./rag/app.js";
import { RAG_CONFIG } from "./rag/config.js";
import { errorMessage } from "./rag/errors.js";
import { DocumentLibrary, isValidSlug } from "./rag/library.js";
import { Retriever } from "./rag/retriever.js";
import type { RetrievedChunk } from "./rag/types.js";
import { VectraStore } from "./rag/vector-store.js";

const USAGE = "Usage: folio-search <slug> <query> [--top N] [--page P]";

function formatResults(results: RetrievedChunk[]): string {
  if (results.length === 0) return "No results.";
  return results
    .map((r, i) => `--- Result ${i + 1} (page ${r.page}, score ${r.score.toFixed(3)}) ---\n${r.text}`)
    .join("\n\n");
}

function positiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`--${name} must be a positive integer`);
  return n;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      top: { type: "string", short: "k" },
      page: { type: "string", short: "p" },
      help: { type: "boolean", short: "h" },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const [slug, ...words] = positionals;
  const query = words.join(" ").trim();
  if (!slug || !query) throw new Error(USAGE);
  if (!isValidSlug(slug)) throw new Error(`Invalid document slug: ${slug}`);
  if (!RAG_CONFIG.apiKey) throw new Error("OPENROUTER_API_KEY environment variable is required.");

  const library = new DocumentLibrary();
  const meta = await library.readMeta(slug);
  if (!meta) throw new Error(`Unknown document: ${slug}`);
  if (meta.status !== "ready") throw new Error(`Document is not ready (status: ${meta.status})`);

  const embedder = createEmbedder({ apiKey: RAG_CONFIG.apiKey, timeoutMs: RAG_CONFIG.requestTimeoutMs });
  const retriever = new Retriever(embedder, new VectraStore((s) => library.indexDir(s)));
  const results = await retriever.retrieve(slug, query, {
    k: positiveInt(values.top, "top"),
    page: positiveInt(values.page, "page"),
  });
  console.log(formatResults(results));
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
