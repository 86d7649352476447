import type { Agent, SearchTool } from "../agent/types.js";
import { RAG_CONFIG } from "../config.js";
import { retrievalQuery, type QuestionContext } from "../context-builder.js";
import { AgentError, errorMessage } from "../errors.js";
import type { Retriever } from "../retriever.js";
import type { DocumentMeta } from "../types.js";
import type { AnswerEvent } from "./events.js";

export interface AnswerRequest extends QuestionContext {
  slug: string;
}

export interface StatusSource {
  getStatus(slug: string): Readonly<DocumentMeta> | null;
}

export interface OrchestratorOptions {
  timeoutMs?: number;
  log?: (msg: string) => void;
}

/**
 * Answers one question against one document as a stream of events: partial
 * text blocks in order, then a single `final` or `error`. Every question gets
 * its own agent run and its own abort controller, so concurrent questions
 * share nothing.
 */
export class AnswerOrchestrator {
  private readonly timeoutMs: number;
  private readonly log: (msg: string) => void;

  constructor(
    private readonly status: StatusSource,
    private readonly retriever: Retriever,
    private readonly agent: Agent,
    options: OrchestratorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? RAG_CONFIG.answerTimeoutMs;
    this.log = options.log ?? (() => {});
  }

  /**
   * Aborting `signal` (the caller went away) stops the agent and any
   * retrieval in flight; the stream then ends without another event.
   */
  async *ask(request: AnswerRequest, signal?: AbortSignal): AsyncGenerator<AnswerEvent> {
    const { slug } = request;
    const meta = this.status.getStatus(slug);
    if (!meta) {
      yield { type: "error", error: `Unknown document: ${slug}` };
      return;
    }
    if (meta.status !== "ready") {
      yield { type: "error", error: `Document is not ready (status: ${meta.status})` };
      return;
    }
    if (signal?.aborted) return;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new AgentError(`Answer timed out after ${Math.ceil(this.timeoutMs / 1000)}s`));
    }, this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const partials: string[] = [];
    const seen = new Set<string>();
    let result = "";

    try {
      const context = await this.retriever.retrieve(slug, retrievalQuery(request), {
        signal: controller.signal,
      });
      this.log(`ask[${slug}]: ${context.length} context chunks`);

      const search: SearchTool = (query, options = {}) =>
        this.retriever.retrieve(slug, query, { ...options, signal: controller.signal });

      for await (const event of this.agent.run({ ...request, context, search }, controller.signal)) {
        if (signal?.aborted) return;
        if (event.type === "result") {
          result = event.text.trim();
          continue;
        }
        const text = event.text.trim();
        if (!text || seen.has(text)) continue;
        seen.add(text);
        partials.push(text);
        yield { type: "partial", text };
      }

      if (signal?.aborted) return;
      if (timedOut) throw controller.signal.reason;
      const answer = partials.length > 0 ? partials.join("\n\n") : result;
      if (!answer) throw new AgentError("The agent returned no answer");
      yield { type: "final", text: answer };
    } catch (err) {
      if (signal?.aborted) return;
      const message = timedOut ? errorMessage(controller.signal.reason) : errorMessage(err);
      this.log(`ask[${slug}]: failed: ${message}`);
      yield { type: "error", error: message };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      // stops the agent when the consumer stops pulling early
      controller.abort();
    }
  }
}
