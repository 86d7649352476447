export interface FixtureImage {
  width: number;
  height: number;
  /** One RGB color for every pixel; each channel a printable ASCII code. */
  rgb: [number, number, number];
  /** The `cm` matrix the image is painted through. */
  cm: [number, number, number, number, number, number];
}

export interface FixturePage {
  text?: string;
  images?: FixtureImage[];
}

function pdfString(text: string): string {
  return text.replace(/[\\()]/g, (c) => `\\${c}`);
}

/**
 * A small valid PDF on 612x792 pages: one Helvetica text line per page,
 * uncompressed DeviceRGB image XObjects, optional Info title. ASCII only, so
 * string offsets are byte offsets for the xref table.
 */
export function minimalPdf(pages: Array<string | FixturePage>, title?: string): Uint8Array {
  const objects = new Map<number, string>();
  let nextId = 4;
  const pageIds: number[] = [];

  objects.set(3, "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>");
  for (const entry of pages) {
    const page: FixturePage = typeof entry === "string" ? { text: entry } : entry;
    const { text = "", images = [] } = page;
    const pageId = nextId++;
    const contentId = nextId++;
    pageIds.push(pageId);

    const xobjects: string[] = [];
    const ops: string[] = [];
    if (text) ops.push(`BT /F1 12 Tf 72 720 Td (${pdfString(text)}) Tj ET`);
    images.forEach((image, i) => {
      const imageId = nextId++;
      const pixels = String.fromCharCode(...image.rgb).repeat(image.width * image.height);
      objects.set(
        imageId,
        `<< /Type /XObject /Subtype /Image /Width ${image.width} /Height ${image.height} ` +
          `/ColorSpace /DeviceRGB /BitsPerComponent 8 /Length ${pixels.length} >>\nstream\n${pixels}\nendstream`,
      );
      xobjects.push(`/Im${i + 1} ${imageId} 0 R`);
      ops.push(`q ${image.cm.join(" ")} cm /Im${i + 1} Do Q`);
    });

    const content = ops.join("\n");
    const xobjectDict = xobjects.length ? ` /XObject << ${xobjects.join(" ")} >>` : "";
    objects.set(
      pageId,
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
        `/Resources << /Font << /F1 3 0 R >>${xobjectDict} >> /Contents ${contentId} 0 R >>`,
    );
    objects.set(contentId, `<< /Length ${content.length} >>\nstream\n${content}\nendstream`);
  }

  objects.set(1, "<< /Type /Catalog /Pages 2 0 R >>");
  objects.set(2, `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pages.length} >>`);
  const infoId = nextId++;
  if (title !== undefined) objects.set(infoId, `<< /Title (${pdfString(title)}) >>`);

  const size = Math.max(...objects.keys()) + 1;
  let out = "%PDF-1.4\n";
  const offsets = new Map<number, number>();
  for (let id = 1; id < size; id++) {
    const body = objects.get(id);
    if (body === undefined) continue;
    offsets.set(id, out.length);
    out += `${id} 0 obj\n${body}\nendobj\n`;
  }

  const xrefOffset = out.length;
  out += `xref\n0 ${size}\n0000000000 65535 f \n`;
  for (let id = 1; id < size; id++) {
    const offset = offsets.get(id);
    out +=
      offset === undefined ? "0000000000 65535 f \n" : `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  const info = title !== undefined ? ` /Info ${infoId} 0 R` : "";
  out += `trailer\n<< /Size ${size} /Root 1 0 R${info} >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new TextEncoder().encode(out);
}
