import type { PageContent, TextChunk } from "../types.js";

export interface ChunkingStrategy {
  readonly name: string;
  chunk(pages: PageContent[]): TextChunk[];
}
