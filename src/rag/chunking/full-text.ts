import type { PageContent } from "../types.js";

export interface FullText {
  text: string;
  /** Offset of each page's first character within `text`, in page order. */
  pageOffsets: number[];
}

export function pageMarker(pageNumber: number): string {
  return `--- PAGE ${pageNumber} ---\n`;
}

/**
 * Body text of a page followed by its figure descriptions, each on its own
 * paragraph as `[Figure: ...]`. Images without a description are left out.
 */
export function composePageText(body: string, descriptions: Array<string | null>): string {
  const figures = descriptions
    .filter((d): d is string => d !== null && d.trim() !== "")
    .map((d) => `[Figure: ${d.trim()}]`);
  return [body.trim(), ...figures].filter((part) => part !== "").join("\n\n");
}

/** The document text stored as fulltext.txt; chunk offsets point into it. */
export function composeFullText(pages: PageContent[]): FullText {
  let text = "";
  const pageOffsets: number[] = [];
  pages.forEach((page, i) => {
    if (i > 0) text += "\n\n";
    text += pageMarker(page.pageNumber);
    pageOffsets.push(text.length);
    text += page.text;
  });
  return { text, pageOffsets };
}
