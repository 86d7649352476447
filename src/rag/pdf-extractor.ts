import { extractImages, getDocumentProxy, getMeta, getResolvedPDFJS } from "unpdf";
import { RAG_CONFIG } from "./config.js";
import { ExtractionError, errorMessage } from "./errors.js";
import { encodePng } from "./image-encoder.js";
import type { ExtractedDocument, ExtractedImage, ImageRegion, PageContent } from "./types.js";

type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;
type Matrix = [number, number, number, number, number, number];

export interface ExtractOptions {
  /** Encoded images smaller than this are icons or rules, not figures. */
  minImageBytes?: number;
  log?: (msg: string) => void;
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[2] * n[1],
    m[1] * n[0] + m[3] * n[1],
    m[0] * n[2] + m[2] * n[3],
    m[1] * n[2] + m[3] * n[3],
    m[0] * n[4] + m[2] * n[5] + m[4],
    m[1] * n[4] + m[3] * n[5] + m[5],
  ];
}

function asMatrix(args: unknown): Matrix | null {
  if (!Array.isArray(args) || args.length < 6) return null;
  const values: unknown[] = args.slice(0, 6);
  if (!values.every((v): v is number => typeof v === "number")) return null;
  const [a, b, c, d, e, f] = values;
  return [a, b, c, d, e, f];
}

/** Maps the unit square an image is painted into through the CTM. */
function regionOf(ctm: Matrix, view: number[]): ImageRegion {
  const corners = [
    [0, 0],
    [1, 0],
    [0, 1],
    [1, 1],
  ].map(([x, y]) => [ctm[0] * x + ctm[2] * y + ctm[4], ctm[1] * x + ctm[3] * y + ctm[5]]);
  const xs = corners.map((c) => c[0]);
  const ys = corners.map((c) => c[1]);
  const [left, top] = [view[0] ?? 0, view[3] ?? 0];
  return {
    x: Math.min(...xs) - left,
    y: top - Math.max(...ys),
    width: Math.max(...xs) - Math.min(...xs),
    height: Math.max(...ys) - Math.min(...ys),
  };
}

/**
 * Walks the page's operator list, tracking the transformation matrix, and
 * records where each image XObject is painted. Keyed by pdf.js object id,
 * one entry per paint in drawing order.
 */
async function imagePlacements(page: PdfPage): Promise<Map<string, ImageRegion[]>> {
  const { OPS } = await getResolvedPDFJS();
  const operatorList = await page.getOperatorList();
  const placements = new Map<string, ImageRegion[]>();
  const stack: Matrix[] = [];
  let ctm = IDENTITY;

  operatorList.fnArray.forEach((fn, i) => {
    const args: unknown = operatorList.argsArray[i];
    if (fn === OPS.save) {
      stack.push(ctm);
    } else if (fn === OPS.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === OPS.transform) {
      const m = asMatrix(args);
      if (m) ctm = multiply(ctm, m);
    } else if (fn === OPS.paintImageXObject && Array.isArray(args) && typeof args[0] === "string") {
      const regions = placements.get(args[0]) ?? [];
      regions.push(regionOf(ctm, page.view));
      placements.set(args[0], regions);
    }
  });

  return placements;
}

async function pageText(page: PdfPage): Promise<string> {
  const textContent = await page.getTextContent();
  return textContent.items
    .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
    .join("")
    .replace(/[ \t]+\n/g, "\n")
    .trim();
}

async function pageImages(
  pdf: PdfDocument,
  page: PdfPage,
  pageNumber: number,
  minImageBytes: number,
): Promise<ExtractedImage[]> {
  const raw = await extractImages(pdf, pageNumber);
  if (raw.length === 0) return [];

  const placements = await imagePlacements(page);
  const images: ExtractedImage[] = [];
  for (const image of raw) {
    const png = await encodePng(image);
    const region = placements.get(image.key)?.shift() ?? null;
    if (png.byteLength < minImageBytes) continue;
    images.push({ pageNumber, png, region });
  }

  // top to bottom, then left to right; unplaced images last
  return images.sort((a, b) => {
    if (!a.region || !b.region) return a.region ? -1 : b.region ? 1 : 0;
    return a.region.y - b.region.y || a.region.x - b.region.x;
  });
}

export async function extractPdf(
  bytes: Uint8Array,
  options: ExtractOptions = {},
): Promise<ExtractedDocument> {
  const minImageBytes = options.minImageBytes ?? RAG_CONFIG.minImageBytes;

  let pdf: PdfDocument;
  try {
    pdf = await getDocumentProxy(new Uint8Array(bytes));
  } catch (err) {
    throw new ExtractionError(`Not a readable PDF: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const meta = await getMeta(pdf).catch(() => null);
    const rawTitle: unknown = meta?.info["Title"];
    const title = typeof rawTitle === "string" && rawTitle.trim() ? rawTitle.trim() : null;

    const pages: PageContent[] = [];
    const images: ExtractedImage[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      pages.push({ pageNumber: i, text: await pageText(page) });
      try {
        images.push(...(await pageImages(pdf, page, i, minImageBytes)));
      } catch (err) {
        options.log?.(`extract: skipping images on page ${i}: ${errorMessage(err)}`);
      }
    }

    return { title, pages, images };
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(`PDF extraction failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    await pdf.destroy();
  }
}
