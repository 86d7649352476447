import { readSseData } from "../line-decoder.js";

export type AnswerEvent =
  | { type: "partial"; text: string }
  | { type: "final"; text: string }
  | { type: "error"; error: string };

export type WireEvent = { text: string; final: boolean } | { error: string };

export const DONE_SENTINEL = "[DONE]";

export function toWire(event: AnswerEvent): WireEvent {
  switch (event.type) {
    case "partial":
      return { text: event.text, final: false };
    case "final":
      return { text: event.text, final: true };
    case "error":
      return { error: event.error };
  }
}

export function encodeEvent(event: AnswerEvent): string {
  return `data: ${JSON.stringify(toWire(event))}\n\n`;
}

export function encodeDone(): string {
  return `data: ${DONE_SENTINEL}\n\n`;
}

export function fromWire(value: unknown): AnswerEvent | null {
  if (typeof value !== "object" || value === null) return null;
  if ("error" in value && typeof value.error === "string") {
    return { type: "error", error: value.error };
  }
  if ("text" in value && typeof value.text === "string") {
    const final = "final" in value && value.final === true;
    return final ? { type: "final", text: value.text } : { type: "partial", text: value.text };
  }
  return null;
}

/**
 * Parses an answer stream as sent by the server. Stops at the `[DONE]`
 * sentinel; payloads that are not answer events are skipped.
 */
export async function* decodeAnswerStream(
  source: AsyncIterable<string | Uint8Array>,
): AsyncGenerator<AnswerEvent> {
  for await (const data of readSseData(source)) {
    if (data === DONE_SENTINEL) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      continue;
    }
    const event = fromWire(parsed);
    if (event) yield event;
  }
}

/** Rebuilds the displayed answer from events the way a client renders it. */
export class AnswerTranscript {
  private text = "";

  apply(event: AnswerEvent): string {
    switch (event.type) {
      case "partial":
        this.text = this.text ? `${this.text}\n\n${event.text}` : event.text;
        break;
      case "final":
        if (!this.text) this.text = event.text;
        break;
      case "error":
        this.text += `\n\n**Error:** ${event.error}`;
        break;
    }
    return this.text;
  }

  toString(): string {
    return this.text;
  }
}
