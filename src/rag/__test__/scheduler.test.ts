import { describe, expect, test } from "vitest";
import { IngestionScheduler, type JobContext, type JobResult, type JobRunner, type StatusStore } from "../scheduler.js";
import type { DocumentMeta, IngestionStatus } from "../types.js";

class MemoryStore implements StatusStore {
  readonly written: DocumentMeta[] = [];
  docs = new Map<string, DocumentMeta>();

  async list(): Promise<DocumentMeta[]> {
    return [...this.docs.values()];
  }

  async writeMeta(meta: DocumentMeta): Promise<void> {
    this.written.push(meta);
    this.docs.set(meta.slug, meta);
  }
}

function doc(slug: string, status: IngestionStatus = "queued"): DocumentMeta {
  return {
    slug,
    title: slug,
    status,
    createdAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
    pageCount: 0,
    chunkCount: 0,
    imageCount: 0,
    error: null,
  };
}

/** Walks every phase and counts how often it ran. */
class CountingRunner implements JobRunner {
  runs = 0;
  gate: Promise<void> = Promise.resolve();

  async run(_document: Readonly<DocumentMeta>, job: JobContext): Promise<JobResult> {
    this.runs++;
    await job.enter("extracting");
    await this.gate;
    await job.enter("describing_images", { title: "Real Title", pageCount: 2 });
    await job.enter("chunking", { imageCount: 1 });
    await job.enter("embedding");
    return { chunkCount: 3, imageCount: 1 };
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("IngestionScheduler", () => {
  test("moves through every phase and persists each before the next", async () => {
    const store = new MemoryStore();
    const scheduler = new IngestionScheduler(store, new CountingRunner());

    const queued = await scheduler.submit(doc("paper"));
    expect(queued.status).toBe("queued");
    await scheduler.idle();

    expect(store.written.map((m) => m.status)).toEqual([
      "queued",
      "extracting",
      "describing_images",
      "chunking",
      "embedding",
      "ready",
    ]);
    expect(scheduler.getStatus("paper")).toMatchObject({
      status: "ready",
      title: "Real Title",
      pageCount: 2,
      chunkCount: 3,
      imageCount: 1,
      error: null,
    });
  });

  test("a duplicate submission during a job returns the status and runs nothing", async () => {
    const store = new MemoryStore();
    const runner = new CountingRunner();
    const gate = deferred();
    runner.gate = gate.promise;
    const scheduler = new IngestionScheduler(store, runner);

    const [first, second] = await Promise.all([scheduler.submit(doc("paper")), scheduler.submit(doc("paper"))]);
    expect(first.status).toBe("queued");
    expect(second.slug).toBe("paper");
    expect(scheduler.isActive("paper")).toBe(true);

    const third = await scheduler.submit(doc("paper"));
    expect(["queued", "extracting"]).toContain(third.status);

    gate.resolve();
    await scheduler.idle();
    expect(runner.runs).toBe(1);
    expect(scheduler.isActive("paper")).toBe(false);
  });

  test("a ready document is not ingested again", async () => {
    const runner = new CountingRunner();
    const scheduler = new IngestionScheduler(new MemoryStore(), runner);
    await scheduler.submit(doc("paper"));
    await scheduler.idle();

    const again = await scheduler.submit(doc("paper"));
    await scheduler.idle();

    expect(again.status).toBe("ready");
    expect(runner.runs).toBe(1);
  });

  test("a failing phase records the error and stops", async () => {
    const store = new MemoryStore();
    const failing: JobRunner = {
      async run(_document, job) {
        await job.enter("extracting");
        await job.enter("describing_images");
        throw new Error("vision model unavailable");
      },
    };
    const scheduler = new IngestionScheduler(store, failing);

    await scheduler.submit(doc("paper"));
    await scheduler.idle();

    expect(scheduler.getStatus("paper")).toMatchObject({ status: "error", error: "vision model unavailable" });
    expect(store.written.map((m) => m.status)).toEqual(["queued", "extracting", "describing_images", "error"]);
  });

  test("a runner that skips a phase fails the job", async () => {
    const skipping: JobRunner = {
      async run(_document, job) {
        await job.enter("chunking");
        return { chunkCount: 0, imageCount: 0 };
      },
    };
    const scheduler = new IngestionScheduler(new MemoryStore(), skipping);
    await scheduler.submit(doc("paper"));
    await scheduler.idle();

    expect(scheduler.getStatus("paper")?.status).toBe("error");
    expect(scheduler.getStatus("paper")?.error).toBe("Invalid status transition for paper: queued -> chunking");
  });

  test("a failed document restarts from the top", async () => {
    const runner = new CountingRunner();
    const store = new MemoryStore();
    const scheduler = new IngestionScheduler(store, runner);
    store.docs.set("paper", { ...doc("paper", "error"), error: "old failure" });
    await scheduler.restore();

    const queued = await scheduler.submit(doc("paper"));
    expect(queued).toMatchObject({ status: "queued", error: null });
    await scheduler.idle();
    expect(scheduler.getStatus("paper")?.status).toBe("ready");
    expect(runner.runs).toBe(1);
  });

  test("restore keeps a crashed job's last phase without resuming it", async () => {
    const runner = new CountingRunner();
    const store = new MemoryStore();
    store.docs.set("crashed", doc("crashed", "chunking"));
    const scheduler = new IngestionScheduler(store, runner);

    await scheduler.restore();
    await scheduler.idle();

    expect(scheduler.getStatus("crashed")?.status).toBe("chunking");
    expect(runner.runs).toBe(0);
  });

  test("unknown slugs have no status", () => {
    const scheduler = new IngestionScheduler(new MemoryStore(), new CountingRunner());
    expect(scheduler.getStatus("nothing")).toBeNull();
  });

  test("status reads are frozen snapshots", async () => {
    const scheduler = new IngestionScheduler(new MemoryStore(), new CountingRunner());
    await scheduler.submit(doc("paper"));
    const snapshot = scheduler.getStatus("paper");
    const statusThen = snapshot?.status;
    await scheduler.idle();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(statusThen).not.toBe("ready");
    expect(snapshot?.status).toBe(statusThen);
    expect(scheduler.getStatus("paper")?.status).toBe("ready");
  });

  test("subscribers see every committed status until they unsubscribe", async () => {
    const scheduler = new IngestionScheduler(new MemoryStore(), new CountingRunner());
    const seen: string[] = [];
    const unsubscribe = scheduler.onStatus((meta) => seen.push(`${meta.slug}:${meta.status}`));

    await scheduler.submit(doc("a"));
    await scheduler.idle();
    unsubscribe();
    await scheduler.submit(doc("b"));
    await scheduler.idle();

    expect(seen).toEqual(["a:queued", "a:extracting", "a:describing_images", "a:chunking", "a:embedding", "a:ready"]);
  });

  test("jobs for different documents run side by side", async () => {
    const runner = new CountingRunner();
    const gate = deferred();
    runner.gate = gate.promise;
    const scheduler = new IngestionScheduler(new MemoryStore(), runner);

    await scheduler.submit(doc("a"));
    await scheduler.submit(doc("b"));
    expect(scheduler.isActive("a")).toBe(true);
    expect(scheduler.isActive("b")).toBe(true);

    gate.resolve();
    await scheduler.idle();
    expect(runner.runs).toBe(2);
    expect(scheduler.list().map((m) => [m.slug, m.status])).toEqual([
      ["a", "ready"],
      ["b", "ready"],
    ]);
  });
});
