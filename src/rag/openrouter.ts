import { RAG_CONFIG } from "./config.js";
import { ApiError } from "./errors.js";
import { timeoutSignal } from "./retry.js";

export interface OpenRouterOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export type TextPart = { type: "text"; text: string };
export type ImagePart = { type: "image_url"; image_url: { url: string } };
export type MessageContent = string | Array<TextPart | ImagePart>;

export interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type ChatMessage =
  | { role: "system" | "user"; content: MessageContent }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

/**
 * POSTs JSON to an OpenRouter endpoint and returns the raw response.
 * Non-2xx responses become an ApiError carrying the body text.
 */
export async function postOpenRouter(
  endpoint: string,
  body: unknown,
  options: OpenRouterOptions,
  signal?: AbortSignal,
): Promise<Response> {
  const baseUrl = options.baseUrl ?? RAG_CONFIG.apiBaseUrl;
  const res = await fetch(`${baseUrl}${endpoint}`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal: options.timeoutMs === undefined ? signal : timeoutSignal(options.timeoutMs, signal),
  });

  if (!res.ok) {
    const text = await res.text().catch(() => "<no body>");
    throw new ApiError(res.status, text, "OpenRouter");
  }
  return res;
}

/** Reads a fetch body chunk by chunk, cancelling it if the consumer stops early. */
export async function* readBody(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    // an errored body rejects cancel() with the same error that is already propagating
    await reader.cancel().catch(() => undefined);
  }
}
