import { INGESTION_PHASES, type IngestionStatus } from "./types.js";

export function isTerminal(status: IngestionStatus): boolean {
  return status === "ready" || status === "error";
}

/**
 * Forward moves only: each phase to the one after it, and any non-terminal
 * status to `error`.
 */
export function canAdvance(from: IngestionStatus, to: IngestionStatus): boolean {
  if (to === "error") return !isTerminal(from);
  if (from === "error") return false;
  return INGESTION_PHASES.indexOf(to) === INGESTION_PHASES.indexOf(from) + 1;
}

/**
 * Whether a new job may start from `queued`. A ready document stays ready;
 * failed documents and ones a crash left mid-pipeline start over.
 */
export function canRestart(status: IngestionStatus): boolean {
  return status !== "ready";
}

export const STATUS_LABELS: Record<IngestionStatus, string> = {
  queued: "Queued...",
  extracting: "Extracting text...",
  describing_images: "Describing images...",
  chunking: "Chunking...",
  embedding: "Embedding...",
  ready: "Ready",
  error: "Error",
};
