import { errorMessage } from "./errors.js";
import { canAdvance, canRestart } from "./status.js";
import type { DocumentMeta, IngestionPhase, IngestionStatus } from "./types.js";

export type MetaPatch = Partial<Pick<DocumentMeta, "title" | "pageCount" | "chunkCount" | "imageCount">>;

/** Phases a job enters itself; `queued` and `ready` belong to the scheduler. */
export type WorkPhase = Exclude<IngestionPhase, "queued" | "ready">;

export interface JobContext {
  readonly slug: string;
  /** Persists the move into `phase`; resolves once the new status is durable. */
  enter(phase: WorkPhase, patch?: MetaPatch): Promise<void>;
  log(msg: string): void;
}

export interface JobResult extends MetaPatch {
  chunkCount: number;
  imageCount: number;
}

export interface JobRunner {
  run(document: Readonly<DocumentMeta>, job: JobContext): Promise<JobResult>;
}

export interface StatusStore {
  list(): Promise<DocumentMeta[]>;
  writeMeta(meta: DocumentMeta): Promise<void>;
}

export type StatusListener = (meta: Readonly<DocumentMeta>) => void;

export interface SchedulerOptions {
  log?: (msg: string) => void;
  now?: () => Date;
}

interface JobHandle {
  slug: string;
  queued: Promise<void>;
  done: Promise<void>;
}

/**
 * Owns each document's status and runs at most one ingestion job per slug in
 * the background. Status reads come from an in-memory snapshot that is only
 * replaced after the new status has been written, so readers never see a
 * status that is not on disk.
 */
export class IngestionScheduler {
  private statuses = new Map<string, Readonly<DocumentMeta>>();
  private jobs = new Map<string, JobHandle>();
  private listeners = new Set<StatusListener>();
  private readonly log: (msg: string) => void;
  private readonly now: () => Date;

  constructor(
    private readonly store: StatusStore,
    private readonly runner: JobRunner,
    options: SchedulerOptions = {},
  ) {
    this.log = options.log ?? (() => {});
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Loads persisted statuses. Documents a crash left mid-pipeline keep their
   * last committed phase; they are not resumed.
   */
  async restore(): Promise<void> {
    for (const meta of await this.store.list()) {
      if (!this.statuses.has(meta.slug)) this.statuses.set(meta.slug, Object.freeze({ ...meta }));
    }
  }

  getStatus(slug: string): Readonly<DocumentMeta> | null {
    return this.statuses.get(slug) ?? null;
  }

  list(): Readonly<DocumentMeta>[] {
    return [...this.statuses.values()].sort((a, b) => a.slug.localeCompare(b.slug));
  }

  isActive(slug: string): boolean {
    return this.jobs.has(slug);
  }

  onStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queues an ingestion job and returns the queued status. While a job for
   * the slug is running, or once the document is ready, this does nothing
   * and returns the current status.
   */
  async submit(document: DocumentMeta): Promise<Readonly<DocumentMeta>> {
    const { slug } = document;
    const active = this.jobs.get(slug);
    if (active) {
      await active.queued;
      return this.statuses.get(slug) ?? document;
    }
    const current = this.statuses.get(slug);
    if (current && !canRestart(current.status)) return current;

    // registered before the first await so a concurrent submit sees it
    const queued = this.commit({
      ...(current ?? document),
      status: "queued",
      error: null,
      chunkCount: 0,
      imageCount: 0,
      updatedAt: this.now().toISOString(),
    });
    const handle: JobHandle = {
      slug,
      queued,
      done: queued
        .then(() => this.runJob(slug))
        .catch((err: unknown) => {
          this.log(`ingest[${slug}]: could not queue job: ${errorMessage(err)}`);
        })
        .finally(() => {
          this.jobs.delete(slug);
        }),
    };
    this.jobs.set(slug, handle);

    await queued;
    this.log(`ingest[${slug}]: queued`);
    return this.statuses.get(slug) ?? document;
  }

  /** Resolves once every running job has settled. */
  async idle(): Promise<void> {
    while (this.jobs.size > 0) {
      await Promise.all([...this.jobs.values()].map((job) => job.done));
    }
  }

  private async runJob(slug: string): Promise<void> {
    const started = this.now().getTime();
    const document = this.statuses.get(slug);
    if (!document) return;

    const context: JobContext = {
      slug,
      enter: (phase, patch) => this.advance(slug, phase, patch),
      log: (msg) => this.log(`ingest[${slug}]: ${msg}`),
    };

    try {
      const result = await this.runner.run(document, context);
      await this.advance(slug, "ready", result);
      const secs = ((this.now().getTime() - started) / 1000).toFixed(1);
      this.log(
        `ingest[${slug}]: ready in ${secs}s (${result.chunkCount} chunks, ${result.imageCount} images)`,
      );
    } catch (err) {
      await this.fail(slug, err);
    }
  }

  private async fail(slug: string, err: unknown): Promise<void> {
    const message = errorMessage(err) || "Ingestion failed";
    this.log(`ingest[${slug}]: failed: ${message}`);
    try {
      await this.advance(slug, "error", {}, message);
    } catch (persistErr) {
      this.log(`ingest[${slug}]: could not record failure: ${errorMessage(persistErr)}`);
    }
  }

  private async advance(
    slug: string,
    to: IngestionStatus,
    patch: MetaPatch = {},
    error: string | null = null,
  ): Promise<void> {
    const current = this.statuses.get(slug);
    if (!current) throw new Error(`Unknown document: ${slug}`);
    if (!canAdvance(current.status, to)) {
      throw new Error(`Invalid status transition for ${slug}: ${current.status} -> ${to}`);
    }
    await this.commit({
      ...current,
      title: patch.title ?? current.title,
      pageCount: patch.pageCount ?? current.pageCount,
      chunkCount: patch.chunkCount ?? current.chunkCount,
      imageCount: patch.imageCount ?? current.imageCount,
      status: to,
      error: to === "error" ? error : null,
      updatedAt: this.now().toISOString(),
    });
    if (to !== "error" && to !== "ready") this.log(`ingest[${slug}]: ${to}`);
  }

  private async commit(meta: DocumentMeta): Promise<void> {
    await this.store.writeMeta(meta);
    const snapshot = Object.freeze({ ...meta });
    this.statuses.set(meta.slug, snapshot);
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.log(`status listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
