import { afterEach, describe, expect, test, vi } from "vitest";
import { AgentError } from "../../errors.js";
import type { ToolCall } from "../../openrouter.js";
import type { RetrievedChunk } from "../../types.js";
import { ChatAgent, ParagraphBuffer, runSearchTool } from "../chat-agent.js";
import type { AgentEvent, AgentRequest, SearchToolOptions } from "../types.js";

const CONCLUSION: RetrievedChunk = { index: 1, page: 2, text: "Conclusion.", start: 0, end: 11, score: 0.5 };

function sse(...payloads: unknown[]): Response {
  const body = payloads.map((p) => `data: ${typeof p === "string" ? p : JSON.stringify(p)}\n\n`).join("");
  return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

function call(args: string, name = "search_document"): ToolCall {
  return { id: "call_1", type: "function", function: { name, arguments: args } };
}

async function collect(source: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const out: AgentEvent[] = [];
  for await (const event of source) out.push(event);
  return out;
}

describe("ParagraphBuffer", () => {
  test("releases paragraphs once the blank line after them arrives", () => {
    const buffer = new ParagraphBuffer();
    expect(buffer.push("One")).toEqual([]);
    expect(buffer.push(" two.\n")).toEqual([]);
    expect(buffer.push("\nThree.\n\n\nFour")).toEqual(["One two.", "Three."]);
    expect(buffer.flush()).toEqual(["Four"]);
    expect(buffer.flush()).toEqual([]);
  });

  test("keeps single newlines inside a paragraph", () => {
    const buffer = new ParagraphBuffer();
    expect(buffer.push("- a\n- b\n\n")).toEqual(["- a\n- b"]);
  });
});

describe("runSearchTool", () => {
  test("runs the search with the parsed arguments", async () => {
    const seen: Array<[string, SearchToolOptions | undefined]> = [];
    const result = await runSearchTool(call('{"query":"conclusion","page":2,"top_k":3}'), async (query, options) => {
      seen.push([query, options]);
      return [CONCLUSION];
    });

    expect(seen).toEqual([["conclusion", { page: 2, k: 3 }]]);
    expect(result).toBe("[Page 2, chunk 1, score 0.500]\nConclusion.");
  });

  test("reports bad calls back to the model", async () => {
    const search = async () => [CONCLUSION];
    expect(await runSearchTool(call("{not json"), search)).toBe("Invalid arguments: expected a JSON object");
    expect(await runSearchTool(call('{"page":1}'), search)).toBe("Invalid arguments: query is required");
    expect(await runSearchTool(call("{}", "delete_everything"), search)).toBe("Unknown tool: delete_everything");
  });

  test("no matches", async () => {
    expect(await runSearchTool(call('{"query":"x"}'), async () => [])).toBe("No matching passages.");
  });
});

describe("ChatAgent", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const request = (search: AgentRequest["search"]): AgentRequest => ({
    slug: "paper",
    question: "How does it end?",
    context: [],
    search,
  });

  test("runs tool calls, then streams the answer by paragraph", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => sse());
    fetchMock
      .mockResolvedValueOnce(
        sse(
          {
            choices: [
              {
                delta: {
                  tool_calls: [
                    { index: 0, id: "call_1", function: { name: "search_document", arguments: '{"query":' } },
                  ],
                },
              },
            ],
          },
          { choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '"conclusion","page":2}' } }] } }] },
          "[DONE]",
        ),
      )
      .mockResolvedValueOnce(
        sse(
          { choices: [{ delta: { content: "The paper ends" } }] },
          { choices: [{ delta: { content: " with a conclusion.\n\nIt is on page 2." } }] },
          "[DONE]",
        ),
      );
    vi.stubGlobal("fetch", fetchMock);

    const searches: string[] = [];
    const agent = new ChatAgent({ apiKey: "test-secret", baseUrl: "http://openrouter.test" }, { model: "test/model" });
    const events = await collect(
      agent.run(
        request(async (query, options) => {
          searches.push(`${query}@${options?.page}`);
          return [CONCLUSION];
        }),
        new AbortController().signal,
      ),
    );

    expect(events).toEqual([
      { type: "text", text: "The paper ends with a conclusion." },
      { type: "text", text: "It is on page 2." },
    ]);
    expect(searches).toEqual(["conclusion@2"]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0][0]).toBe("http://openrouter.test/chat/completions");

    const first = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(first).toMatchObject({ model: "test/model", tool_choice: "auto", stream: true });

    const second = JSON.parse(String(fetchMock.mock.calls[1][1]?.body));
    expect(second.messages.slice(2)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "search_document", arguments: '{"query":"conclusion","page":2}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: "[Page 2, chunk 1, score 0.500]\nConclusion." },
    ]);
  });

  test("the last round forbids tool calls", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      sse({ choices: [{ delta: { content: "Answer." } }] }, "[DONE]"),
    );
    vi.stubGlobal("fetch", fetchMock);

    const agent = new ChatAgent({ apiKey: "test-secret" }, { maxToolRounds: 1 });
    const events = await collect(agent.run(request(async () => []), new AbortController().signal));

    expect(events).toEqual([{ type: "text", text: "Answer." }]);
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toMatchObject({ tool_choice: "none" });
  });

  test("an API error becomes an agent error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("no key", { status: 401 })),
    );

    const agent = new ChatAgent({ apiKey: "test-secret" });
    await expect(collect(agent.run(request(async () => []), new AbortController().signal))).rejects.toThrow(
      new AgentError("Chat request failed: OpenRouter error (401): no key"),
    );
  });

  test("an error in the stream becomes an agent error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => sse({ error: { message: "context too long" } })),
    );

    const agent = new ChatAgent({ apiKey: "test-secret" });
    await expect(collect(agent.run(request(async () => []), new AbortController().signal))).rejects.toThrow(
      "Chat model error: context too long",
    );
  });
});
