import "dotenv/config";
import path from "node:path";

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export type AgentKind = "chat" | "process";

function envAgent(): AgentKind {
  return process.env["FOLIO_AGENT"] === "process" ? "process" : "chat";
}

export const RAG_CONFIG = {
  dataDir: path.resolve(process.env["FOLIO_DATA_DIR"] ?? "pdfs"),
  port: envNumber("FOLIO_PORT", 8000),
  maxUploadBytes: 100 * 1024 * 1024,

  apiKey: process.env["OPENROUTER_API_KEY"] ?? "",
  apiBaseUrl: "https://openrouter.ai/api/v1",

  embeddingModel: process.env["FOLIO_EMBEDDING_MODEL"] ?? "openai/text-embedding-3-small",
  embeddingDimensions: envNumber("FOLIO_EMBEDDING_DIMENSIONS", 1536),
  embeddingBatchSize: 64,
  embeddingConcurrency: 4,

  queryPrefix: process.env["FOLIO_QUERY_PREFIX"] ?? "",

  visionModel: process.env["FOLIO_VISION_MODEL"] ?? "openai/gpt-4o-mini",
  describeConcurrency: 4,
  minImageBytes: 5000,

  chatModel: process.env["FOLIO_CHAT_MODEL"] ?? "openai/gpt-4o",
  agent: envAgent(),
  agentCommand: process.env["FOLIO_AGENT_COMMAND"] ?? "claude",
  maxToolRounds: 6,

  maxChunkTokens: 300,
  chunkOverlapTokens: 40,
  chunkLookbackTokens: 20,

  topK: 5,

  requestTimeoutMs: 60_000,
  answerTimeoutMs: 300_000,
  retryAttempts: 4,
  retryBaseDelayMs: 500,
} as const;
