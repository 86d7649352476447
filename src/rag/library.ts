import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { RAG_CONFIG } from "./config.js";
import { slugForFile, slugify, titleFromSlug } from "./slug.js";
import { INGESTION_PHASES } from "./types.js";
import type { DescribedImage, DocumentMeta, ImageRecord, ImageRegion, IngestionStatus } from "./types.js";

const SLUG_PATTERN = /^[a-z0-9_][a-z0-9_-]*$/;

export function isValidSlug(slug: string): boolean {
  return slug.length <= 90 && SLUG_PATTERN.test(slug);
}

function isStatus(value: unknown): value is IngestionStatus {
  return value === "error" || INGESTION_PHASES.some((phase) => phase === value);
}

function parseMeta(slug: string, value: unknown): DocumentMeta | null {
  if (typeof value !== "object" || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  const status = record["status"];
  if (!isStatus(status)) return null;
  const str = (key: string, fallback: string) => {
    const v = record[key];
    return typeof v === "string" ? v : fallback;
  };
  const num = (key: string) => {
    const v = record[key];
    return typeof v === "number" && Number.isFinite(v) ? v : 0;
  };
  const error = record["error"];
  return {
    slug,
    title: str("title", titleFromSlug(slug)),
    status,
    createdAt: str("createdAt", new Date(0).toISOString()),
    updatedAt: str("updatedAt", str("createdAt", new Date(0).toISOString())),
    pageCount: num("pageCount"),
    chunkCount: num("chunkCount"),
    imageCount: num("imageCount"),
    error: typeof error === "string" ? error : null,
  };
}

function parseRegion(value: unknown): ImageRegion | null {
  if (typeof value !== "object" || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  const { x, y, width, height } = record;
  if (typeof x !== "number" || typeof y !== "number") return null;
  if (typeof width !== "number" || typeof height !== "number") return null;
  return { x, y, width, height };
}

function parseImageRecords(value: unknown): ImageRecord[] {
  if (!Array.isArray(value)) return [];
  const entries: unknown[] = value;
  const records: ImageRecord[] = [];
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null) continue;
    const record: Record<string, unknown> = { ...entry };
    const { file, pageNumber, region, description } = record;
    if (typeof file !== "string" || typeof pageNumber !== "number") continue;
    records.push({
      file,
      pageNumber,
      region: parseRegion(region),
      description: typeof description === "string" ? description : null,
    });
  }
  return records;
}

async function writeAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, filePath);
}

/**
 * The on-disk home of every document: one directory per slug holding the
 * uploaded PDF, meta.json, fulltext.txt, the img/ folder with images.json,
 * and the vector index.
 */
export class DocumentLibrary {
  constructor(readonly root: string = RAG_CONFIG.dataDir) {}

  documentDir(slug: string): string {
    if (!isValidSlug(slug)) throw new Error(`Invalid document slug: ${slug}`);
    return path.join(this.root, slug);
  }

  pdfPath(slug: string): string {
    return path.join(this.documentDir(slug), "document.pdf");
  }

  metaPath(slug: string): string {
    return path.join(this.documentDir(slug), "meta.json");
  }

  fullTextPath(slug: string): string {
    return path.join(this.documentDir(slug), "fulltext.txt");
  }

  imagesDir(slug: string): string {
    return path.join(this.documentDir(slug), "img");
  }

  indexDir(slug: string): string {
    return path.join(this.documentDir(slug), "index");
  }

  private imageManifestPath(slug: string): string {
    return path.join(this.documentDir(slug), "images.json");
  }

  /**
   * Stores an uploaded PDF under a fresh slug derived from its file name,
   * suffixing `-1`, `-2`... when the slug is taken, and records it as queued.
   */
  async create(filename: string, bytes: Uint8Array, now = new Date()): Promise<DocumentMeta> {
    await mkdir(this.root, { recursive: true });
    const base = slugForFile(filename);

    for (let n = 0; ; n++) {
      const slug = n === 0 ? base : `${base}-${n}`;
      try {
        await mkdir(path.join(this.root, slug));
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
        throw err;
      }

      await mkdir(this.imagesDir(slug), { recursive: true });
      await writeAtomic(this.pdfPath(slug), bytes);
      const meta: DocumentMeta = {
        slug,
        title: titleFromSlug(slug),
        status: "queued",
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
        pageCount: 0,
        chunkCount: 0,
        imageCount: 0,
        error: null,
      };
      await this.writeMeta(meta);
      return meta;
    }
  }

  async list(): Promise<DocumentMeta[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch {
      // no library yet
      return [];
    }

    const docs: DocumentMeta[] = [];
    for (const name of entries.sort()) {
      if (!isValidSlug(name)) continue;
      const meta = await this.readMeta(name);
      if (meta) docs.push(meta);
    }
    return docs;
  }

  async readMeta(slug: string): Promise<DocumentMeta | null> {
    let data: string;
    try {
      data = await readFile(this.metaPath(slug), "utf-8");
    } catch {
      return null;
    }
    return parseMeta(slug, JSON.parse(data));
  }

  async writeMeta(meta: DocumentMeta): Promise<void> {
    await writeAtomic(this.metaPath(meta.slug), JSON.stringify(meta, null, 2));
  }

  async readPdf(slug: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(this.pdfPath(slug)));
  }

  async writeFullText(slug: string, text: string): Promise<void> {
    await writeAtomic(this.fullTextPath(slug), text);
  }

  async readFullText(slug: string): Promise<string | null> {
    try {
      return await readFile(this.fullTextPath(slug), "utf-8");
    } catch {
      return null;
    }
  }

  /**
   * Replaces the document's images. Files are named after their description
   * (`fig3-loss-curve-over-epochs.png`) so a directory listing reads as an
   * index of figures.
   */
  async saveImages(slug: string, images: DescribedImage[]): Promise<ImageRecord[]> {
    const dir = this.imagesDir(slug);
    await rm(dir, { recursive: true, force: true });
    await mkdir(dir, { recursive: true });

    const records: ImageRecord[] = [];
    for (const [i, image] of images.entries()) {
      const label = (image.description && slugify(image.description)) || `page-${image.pageNumber}`;
      const file = `fig${i + 1}-${label}.png`;
      await writeFile(path.join(dir, file), image.png);
      records.push({
        file,
        pageNumber: image.pageNumber,
        region: image.region,
        description: image.description,
      });
    }

    await writeAtomic(this.imageManifestPath(slug), JSON.stringify(records, null, 2));
    return records;
  }

  async readImages(slug: string): Promise<ImageRecord[]> {
    try {
      const data = await readFile(this.imageManifestPath(slug), "utf-8");
      return parseImageRecords(JSON.parse(data));
    } catch {
      return [];
    }
  }
}
