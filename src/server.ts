import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { pipeline } from "node:stream/promises";
import { encodeDone, encodeEvent } from "./rag/answer/events.js";
import type { AnswerOrchestrator } from "./rag/answer/orchestrator.js";
import { RAG_CONFIG } from "./rag/config.js";
import { errorMessage } from "./rag/errors.js";
import { isValidSlug, type DocumentLibrary } from "./rag/library.js";
import type { IngestionScheduler } from "./rag/scheduler.js";

export interface ServerDeps {
  library: DocumentLibrary;
  scheduler: IngestionScheduler;
  orchestrator: AnswerOrchestrator;
  maxUploadBytes?: number;
  log?: (msg: string) => void;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(data),
  });
  res.end(data);
}

async function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new HttpError(413, `Upload exceeds ${limit} bytes`);
    chunks.push(buf);
  }
  return Buffer.concat(chunks);
}

async function readJson(req: IncomingMessage): Promise<Record<string, unknown>> {
  const body = await readBody(req, 1024 * 1024);
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString("utf-8"));
  } catch {
    throw new HttpError(400, "Request body must be JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new HttpError(400, "Request body must be a JSON object");
  }
  return { ...parsed };
}

/** Writes one SSE frame, waiting for `drain` when the socket buffer is full. */
function writeFrame(res: ServerResponse, frame: string): Promise<boolean> {
  if (res.destroyed || res.writableEnded) return Promise.resolve(false);
  if (res.write(frame)) return Promise.resolve(true);
  return new Promise((resolve) => {
    const settle = (ok: boolean) => {
      res.off("drain", onDrain);
      res.off("close", onClose);
      resolve(ok);
    };
    const onDrain = () => settle(true);
    const onClose = () => settle(false);
    res.once("drain", onDrain);
    res.once("close", onClose);
  });
}

interface AskBody {
  question: string;
  selectedText?: string;
  page?: number;
}

function parseAskBody(body: Record<string, unknown>): AskBody {
  const { question, selected_text: selectedText, page } = body;
  if (typeof question !== "string" || !question.trim()) {
    throw new HttpError(400, "question is required");
  }
  if (selectedText !== undefined && selectedText !== null && typeof selectedText !== "string") {
    throw new HttpError(400, "selected_text must be a string");
  }
  if (page !== undefined && page !== null && (typeof page !== "number" || !Number.isInteger(page) || page < 1)) {
    throw new HttpError(400, "page must be a positive integer");
  }
  return {
    question: question.trim(),
    selectedText: typeof selectedText === "string" && selectedText.trim() ? selectedText : undefined,
    page: typeof page === "number" ? page : undefined,
  };
}

/**
 * The HTTP surface: document list, upload, status, the stored PDF and the
 * streamed answer. Answers are sent as server-sent events; the next event is
 * only pulled from the orchestrator once the previous one has been written,
 * and a closed connection cancels the answer.
 */
export function createFolioServer(deps: ServerDeps): Server {
  const { library, scheduler, orchestrator } = deps;
  const maxUploadBytes = deps.maxUploadBytes ?? RAG_CONFIG.maxUploadBytes;
  const log = deps.log ?? (() => {});

  function requireDocument(slug: string) {
    const meta = isValidSlug(slug) ? scheduler.getStatus(slug) : null;
    if (!meta) throw new HttpError(404, `Unknown document: ${slug}`);
    return meta;
  }

  async function upload(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const filename = url.searchParams.get("filename") ?? "";
    if (!filename.toLowerCase().endsWith(".pdf")) {
      throw new HttpError(400, "Only PDF files are accepted");
    }
    const bytes = await readBody(req, maxUploadBytes);
    if (bytes.length === 0) throw new HttpError(400, "Empty upload");

    const meta = await library.create(filename, new Uint8Array(bytes));
    const status = await scheduler.submit(meta);
    log(`upload: ${filename} -> ${meta.slug} (${bytes.length} bytes)`);
    sendJson(res, 200, { slug: status.slug, status: status.status });
  }

  /** Re-queues an existing document; a running or finished job is left alone. */
  async function ingest(res: ServerResponse, slug: string): Promise<void> {
    const meta = requireDocument(slug);
    const status = await scheduler.submit({ ...meta });
    log(`ingest: ${slug} -> ${status.status}`);
    sendJson(res, 200, { slug: status.slug, status: status.status });
  }

  async function sendPdf(res: ServerResponse, slug: string): Promise<void> {
    requireDocument(slug);
    const file = library.pdfPath(slug);
    const info = await stat(file);
    res.writeHead(200, { "Content-Type": "application/pdf", "Content-Length": info.size });
    await pipeline(createReadStream(file), res);
  }

  async function ask(req: IncomingMessage, res: ServerResponse, slug: string): Promise<void> {
    requireDocument(slug);
    const body = parseAskBody(await readJson(req));

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    log(`ask[${slug}]: ${body.question}`);
    for await (const event of orchestrator.ask({ slug, ...body }, controller.signal)) {
      if (!(await writeFrame(res, encodeEvent(event)))) {
        controller.abort();
        return;
      }
    }
    if (await writeFrame(res, encodeDone())) res.end();
  }

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";
    const docRoute = /^\/api\/pdfs\/([^/]+)\/(status|pdf|ask|ingest)$/.exec(url.pathname);

    if (method === "GET" && url.pathname === "/api/pdfs") {
      sendJson(
        res,
        200,
        scheduler.list().map((doc) => ({ slug: doc.slug, title: doc.title, status: doc.status })),
      );
      return;
    }
    if (method === "POST" && url.pathname === "/api/upload") return upload(req, res, url);

    if (docRoute) {
      const slug = decodeURIComponent(docRoute[1]);
      const action = docRoute[2];
      if (method === "GET" && action === "status") {
        const meta = requireDocument(slug);
        sendJson(res, 200, {
          status: meta.status,
          title: meta.title,
          chunks: meta.chunkCount,
          images: meta.imageCount,
          pages: meta.pageCount,
          ...(meta.error ? { error: meta.error } : {}),
        });
        return;
      }
      if (method === "GET" && action === "pdf") return sendPdf(res, slug);
      if (method === "POST" && action === "ask") return ask(req, res, slug);
      if (method === "POST" && action === "ingest") return ingest(res, slug);
    }

    throw new HttpError(404, "Not found");
  }

  return createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        log(`http: ${req.method} ${req.url} failed after headers: ${errorMessage(err)}`);
        res.destroy();
        return;
      }
      if (err instanceof HttpError) {
        sendJson(res, err.status, { error: err.message });
        return;
      }
      log(`http: ${req.method} ${req.url} failed: ${errorMessage(err)}`);
      sendJson(res, 500, { error: errorMessage(err) });
    });
  });
}
