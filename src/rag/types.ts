export const INGESTION_PHASES = [
  "queued",
  "extracting",
  "describing_images",
  "chunking",
  "embedding",
  "ready",
] as const;

export type IngestionPhase = (typeof INGESTION_PHASES)[number];

export type IngestionStatus = IngestionPhase | "error";

export interface DocumentMeta {
  slug: string;
  title: string;
  status: IngestionStatus;
  createdAt: string;
  updatedAt: string;
  pageCount: number;
  chunkCount: number;
  imageCount: number;
  error: string | null;
}

export interface PageContent {
  pageNumber: number;
  text: string;
}

/** Placement of an image on its page, in points from the top-left corner. */
export interface ImageRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ExtractedImage {
  pageNumber: number;
  png: Uint8Array;
  region: ImageRegion | null;
}

export interface ExtractedDocument {
  title: string | null;
  pages: PageContent[];
  images: ExtractedImage[];
}

export interface DescribedImage extends ExtractedImage {
  description: string | null;
}

export interface ImageRecord {
  file: string;
  pageNumber: number;
  region: ImageRegion | null;
  description: string | null;
}

export interface TextChunk {
  index: number;
  page: number;
  text: string;
  start: number;
  end: number;
}

export interface StoredChunk extends TextChunk {
  vector: number[];
}

export interface RetrievedChunk extends TextChunk {
  score: number;
}
