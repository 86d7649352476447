import type { ChunkingStrategy } from "./types.js";
import { WindowChunker } from "./window-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new WindowChunker());

export { WindowChunker, type WindowOptions } from "./window-chunker.js";
export { composeFullText, composePageText, type FullText } from "./full-text.js";
export type { ChunkingStrategy } from "./types.js";
