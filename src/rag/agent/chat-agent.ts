import { RAG_CONFIG } from "../config.js";
import { buildContextBlock, buildQuestionPrompt, formatChunks } from "../context-builder.js";
import { AgentError, errorMessage } from "../errors.js";
import { readSseData } from "../line-decoder.js";
import { postOpenRouter, readBody, type ChatMessage, type OpenRouterOptions, type ToolCall } from "../openrouter.js";
import { ANSWER_STYLE, type Agent, type AgentEvent, type AgentRequest, type SearchTool } from "./types.js";

const SEARCH_TOOL = "search_document";

const SYSTEM_PROMPT = `You are answering questions about a single PDF document.

Use the ${SEARCH_TOOL} tool to find passages: start from the retrieved context, \
then search again with different wording or a page filter whenever the context \
does not settle the question. Figures appear in the text as [Figure: description].

${ANSWER_STYLE}`;

const TOOLS = [
  {
    type: "function",
    function: {
      name: SEARCH_TOOL,
      description: "Semantic search over the document. Returns matching passages with page numbers.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", description: "What to look for" },
          page: { type: "integer", description: "Only search this page" },
          top_k: { type: "integer", description: "How many passages to return (default 5)" },
        },
        required: ["query"],
      },
    },
  },
] as const;

interface StreamDelta {
  content?: string | null;
  tool_calls?: Array<{
    index: number;
    id?: string;
    function?: { name?: string; arguments?: string };
  }>;
}

interface StreamChunk {
  choices?: Array<{ delta?: StreamDelta }>;
  error?: { message?: string };
}

/**
 * Splits streamed prose into paragraphs. A paragraph is released once the
 * blank line after it arrives, so joining the released paragraphs with a
 * blank line gives back the text.
 */
export class ParagraphBuffer {
  private buffer = "";

  push(text: string): string[] {
    this.buffer += text;
    const paragraphs: string[] = [];
    let idx: number;
    while ((idx = this.buffer.indexOf("\n\n")) !== -1) {
      paragraphs.push(this.buffer.slice(0, idx));
      this.buffer = this.buffer.slice(idx + 2);
    }
    return paragraphs.map(trimNewlines).filter((p) => p.trim() !== "");
  }

  flush(): string[] {
    const rest = trimNewlines(this.buffer);
    this.buffer = "";
    return rest.trim() ? [rest] : [];
  }
}

function trimNewlines(text: string): string {
  return text.replace(/^\n+|\n+$/g, "");
}

class ToolCallAccumulator {
  private calls = new Map<number, ToolCall>();

  add(delta: NonNullable<StreamDelta["tool_calls"]>[number]): void {
    const call = this.calls.get(delta.index) ?? {
      id: "",
      type: "function" as const,
      function: { name: "", arguments: "" },
    };
    if (delta.id) call.id = delta.id;
    if (delta.function?.name) call.function.name += delta.function.name;
    if (delta.function?.arguments) call.function.arguments += delta.function.arguments;
    this.calls.set(delta.index, call);
  }

  list(): ToolCall[] {
    return [...this.calls.entries()].sort(([a], [b]) => a - b).map(([, call]) => call);
  }
}

export async function runSearchTool(call: ToolCall, search: SearchTool): Promise<string> {
  if (call.function.name !== SEARCH_TOOL) return `Unknown tool: ${call.function.name}`;

  let args: unknown;
  try {
    args = JSON.parse(call.function.arguments || "{}");
  } catch {
    return "Invalid arguments: expected a JSON object";
  }
  if (typeof args !== "object" || args === null) return "Invalid arguments: expected a JSON object";
  const { query, page, top_k: topK }: Record<string, unknown> = { ...args };
  if (typeof query !== "string" || !query.trim()) return "Invalid arguments: query is required";

  const chunks = await search(query, {
    page: typeof page === "number" ? page : undefined,
    k: typeof topK === "number" && topK > 0 ? Math.min(Math.floor(topK), 20) : undefined,
  });
  return formatChunks(chunks);
}

export interface ChatAgentOptions {
  model?: string;
  maxToolRounds?: number;
}

/**
 * Answers through an OpenRouter chat model that can call `search_document`.
 * Each round streams the model's reply; tool calls are run against the
 * document and fed back until the model answers without one. The last round
 * disables tools.
 */
export class ChatAgent implements Agent {
  private readonly model: string;
  private readonly maxToolRounds: number;

  constructor(
    private readonly api: OpenRouterOptions,
    options: ChatAgentOptions = {},
  ) {
    this.model = options.model ?? RAG_CONFIG.chatModel;
    this.maxToolRounds = options.maxToolRounds ?? RAG_CONFIG.maxToolRounds;
  }

  async *run(request: AgentRequest, signal: AbortSignal): AsyncGenerator<AgentEvent> {
    const messages: ChatMessage[] = [
      { role: "system", content: `${SYSTEM_PROMPT}\n\n${buildContextBlock(request.context)}` },
      { role: "user", content: buildQuestionPrompt(request) },
    ];

    for (let round = 1; round <= this.maxToolRounds; round++) {
      const lastRound = round === this.maxToolRounds;
      let res: Response;
      try {
        res = await postOpenRouter(
          "/chat/completions",
          {
            model: this.model,
            messages,
            tools: TOOLS,
            tool_choice: lastRound ? "none" : "auto",
            stream: true,
          },
          this.api,
          signal,
        );
      } catch (err) {
        if (signal.aborted) throw err;
        throw new AgentError(`Chat request failed: ${errorMessage(err)}`, { cause: err });
      }
      if (!res.body) throw new AgentError("Chat response has no body");

      const paragraphs = new ParagraphBuffer();
      const toolCalls = new ToolCallAccumulator();
      let content = "";

      for await (const data of readSseData(readBody(res.body))) {
        if (data === "[DONE]") break;
        let chunk: StreamChunk;
        try {
          chunk = JSON.parse(data) as StreamChunk;
        } catch {
          // keep-alive comments and partial frames
          continue;
        }
        if (chunk.error) throw new AgentError(`Chat model error: ${chunk.error.message ?? "unknown"}`);

        const delta = chunk.choices?.[0]?.delta;
        if (!delta) continue;
        for (const call of delta.tool_calls ?? []) toolCalls.add(call);
        if (delta.content) {
          content += delta.content;
          for (const text of paragraphs.push(delta.content)) yield { type: "text", text };
        }
      }
      for (const text of paragraphs.flush()) yield { type: "text", text };

      const calls = toolCalls.list();
      if (calls.length === 0) return;

      messages.push({ role: "assistant", content: content || null, tool_calls: calls });
      for (const call of calls) {
        messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: await runSearchTool(call, request.search),
        });
      }
    }
  }
}
