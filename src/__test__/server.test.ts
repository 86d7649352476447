import { mkdtemp, rm } from "node:fs/promises";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FakeEmbeddingModel, KEYWORD_DIMENSIONS, MemoryVectorStore } from "../rag/__test__/fakes.js";
import type { Agent, AgentEvent, AgentRequest } from "../rag/agent/types.js";
import { AnswerOrchestrator } from "../rag/answer/orchestrator.js";
import { Embedder } from "../rag/embedding-service.js";
import { DocumentLibrary } from "../rag/library.js";
import { Retriever } from "../rag/retriever.js";
import { IngestionScheduler, type JobContext, type JobResult, type JobRunner } from "../rag/scheduler.js";
import type { DocumentMeta } from "../rag/types.js";
import { createFolioServer } from "../server.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Walks every phase; can hold a job in `extracting` and fail the next run. */
class GatedRunner implements JobRunner {
  runs = 0;
  failNext = false;
  gate: Promise<void> = Promise.resolve();
  started = deferred();

  async run(_document: Readonly<DocumentMeta>, job: JobContext): Promise<JobResult> {
    this.runs++;
    await job.enter("extracting");
    this.started.resolve();
    await this.gate;
    if (this.failNext) {
      this.failNext = false;
      throw new Error("extraction failed");
    }
    await job.enter("describing_images", { pageCount: 3 });
    await job.enter("chunking");
    await job.enter("embedding");
    return { chunkCount: 4, imageCount: 0 };
  }
}

/** Answers in one paragraph; for "Keep going" it then waits to be cancelled. */
class WaitingAgent implements Agent {
  stopped = deferred();

  async *run(request: AgentRequest, signal: AbortSignal): AsyncGenerator<AgentEvent> {
    yield { type: "text", text: `About ${request.slug}.` };
    if (request.question !== "Keep going") return;
    await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    this.stopped.resolve();
  }
}

describe("HTTP server", () => {
  let root: string;
  let server: Server;
  let scheduler: IngestionScheduler;
  let base: string;
  let runner: GatedRunner;
  let agent: WaitingAgent;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "folio-server-"));
    const library = new DocumentLibrary(root);
    runner = new GatedRunner();
    agent = new WaitingAgent();
    scheduler = new IngestionScheduler(library, runner);
    const embedder = new Embedder(new FakeEmbeddingModel(), { dimensions: KEYWORD_DIMENSIONS, attempts: 1 });
    const retriever = new Retriever(embedder, new MemoryVectorStore(), 2);
    const orchestrator = new AnswerOrchestrator(scheduler, retriever, agent);
    server = createFolioServer({ library, scheduler, orchestrator, maxUploadBytes: 64 });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on a port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await scheduler.idle();
    await rm(root, { recursive: true, force: true });
  });

  async function upload(filename: string, body: Uint8Array): Promise<Response> {
    return fetch(`${base}/api/upload?filename=${encodeURIComponent(filename)}`, { method: "POST", body });
  }

  test("upload queues the document and ingestion makes it ready", async () => {
    const res = await upload("Deep Notes.pdf", new Uint8Array([37, 80, 68, 70]));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ slug: "deep-notes", status: "queued" });

    await scheduler.idle();
    const status = await fetch(`${base}/api/pdfs/deep-notes/status`);
    expect(await status.json()).toEqual({ status: "ready", title: "Deep Notes", chunks: 4, images: 0, pages: 3 });

    const list = await fetch(`${base}/api/pdfs`);
    expect(await list.json()).toEqual([{ slug: "deep-notes", title: "Deep Notes", status: "ready" }]);

    const pdf = await fetch(`${base}/api/pdfs/deep-notes/pdf`);
    expect(pdf.headers.get("content-type")).toBe("application/pdf");
    expect(new Uint8Array(await pdf.arrayBuffer())).toEqual(new Uint8Array([37, 80, 68, 70]));
  });

  test("uploads that are not PDFs, empty or too large", async () => {
    const notPdf = await upload("notes.txt", new Uint8Array([1]));
    expect(notPdf.status).toBe(400);
    expect(await notPdf.json()).toEqual({ error: "Only PDF files are accepted" });

    const empty = await upload("a.pdf", new Uint8Array());
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ error: "Empty upload" });

    const large = await upload("a.pdf", new Uint8Array(65));
    expect(large.status).toBe(413);
  });

  test("unknown documents and routes are 404", async () => {
    const status = await fetch(`${base}/api/pdfs/missing/status`);
    expect(status.status).toBe(404);
    expect(await status.json()).toEqual({ error: "Unknown document: missing" });

    expect((await fetch(`${base}/api/nothing`)).status).toBe(404);
  });

  test("ask streams answer events and the end sentinel", async () => {
    await upload("paper.pdf", new Uint8Array([1, 2, 3]));
    await scheduler.idle();

    const res = await fetch(`${base}/api/pdfs/paper/ask`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ question: "What is it?", selected_text: null, page: 2 }),
    });

    expect(res.headers.get("content-type")).toBe("text/event-stream");
    expect(await res.text()).toBe(
      'data: {"text":"About paper.","final":false}\n\n' +
        'data: {"text":"About paper.","final":true}\n\n' +
        "data: [DONE]\n\n",
    );
  });

  test("ask validates the body", async () => {
    await upload("paper.pdf", new Uint8Array([1]));
    await scheduler.idle();

    const res = await fetch(`${base}/api/pdfs/paper/ask`, {
      method: "POST",
      body: JSON.stringify({ question: "  ", page: 0 }),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "question is required" });
  });

  function ingest(slug: string): Promise<Response> {
    return fetch(`${base}/api/pdfs/${slug}/ingest`, { method: "POST" });
  }

  test("ingest during a running job returns its status and starts nothing new", async () => {
    const hold = deferred();
    runner.gate = hold.promise;
    await upload("paper.pdf", new Uint8Array([1]));
    await runner.started.promise;

    const first = await ingest("paper");
    const second = await ingest("paper");
    expect(await first.json()).toEqual({ slug: "paper", status: "extracting" });
    expect(await second.json()).toEqual({ slug: "paper", status: "extracting" });
    expect(runner.runs).toBe(1);

    hold.resolve();
    await scheduler.idle();
    expect(await (await ingest("paper")).json()).toEqual({ slug: "paper", status: "ready" });
    expect(runner.runs).toBe(1);
  });

  test("ingest restarts a document that failed", async () => {
    runner.failNext = true;
    await upload("paper.pdf", new Uint8Array([1]));
    await scheduler.idle();
    expect(scheduler.getStatus("paper")?.status).toBe("error");

    expect(await (await ingest("paper")).json()).toEqual({ slug: "paper", status: "queued" });
    await scheduler.idle();
    expect(scheduler.getStatus("paper")?.status).toBe("ready");
    expect(runner.runs).toBe(2);

    expect((await ingest("missing")).status).toBe(404);
  });

  test("a client that disconnects mid-answer stops the agent", async () => {
    await upload("paper.pdf", new Uint8Array([1]));
    await scheduler.idle();

    const client = new AbortController();
    const res = await fetch(`${base}/api/pdfs/paper/ask`, {
      method: "POST",
      body: JSON.stringify({ question: "Keep going" }),
      signal: client.signal,
    });
    if (!res.body) throw new Error("answer has no body");
    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let received = "";
    while (!received.includes("\n\n")) {
      const { value, done } = await reader.read();
      if (done) break;
      received += decoder.decode(value, { stream: true });
    }
    expect(received).toBe('data: {"text":"About paper.","final":false}\n\n');

    client.abort();
    await agent.stopped.promise;
  });
});
