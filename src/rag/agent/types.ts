import type { QuestionContext } from "../context-builder.js";
import type { RetrievedChunk } from "../types.js";

/** `text` is one block of answer prose; `result` is the agent's own closing summary. */
export type AgentEvent = { type: "text"; text: string } | { type: "result"; text: string };

export interface SearchToolOptions {
  page?: number;
  k?: number;
}

export type SearchTool = (query: string, options?: SearchToolOptions) => Promise<RetrievedChunk[]>;

export interface AgentRequest extends QuestionContext {
  slug: string;
  /** Chunks retrieved for the question before the agent starts. */
  context: RetrievedChunk[];
  /** Retrieval scoped to the document, for further lookups. */
  search: SearchTool;
}

/**
 * An external reasoner. Events are produced as the consumer pulls them; when
 * the consumer stops iterating or `signal` aborts, the agent releases
 * whatever it holds (HTTP bodies, child processes).
 */
export interface Agent {
  run(request: AgentRequest, signal: AbortSignal): AsyncIterable<AgentEvent>;
}

export const ANSWER_STYLE = `## Answer style
- Be conversational but keep mathematical, factual and engineering rigor
- Talk like a knowledgeable colleague, not a textbook
- Use LaTeX for math: inline \`$x^2$\` and display \`$$\\sum_{i=1}^n x_i$$\`
- Avoid LaTeX environments (no align, gather, cases)
- Cite page numbers
- Keep answers focused and substantive, no filler`;
