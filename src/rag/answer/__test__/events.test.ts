import { describe, expect, test } from "vitest";
import { AnswerTranscript, decodeAnswerStream, encodeDone, encodeEvent, fromWire, type AnswerEvent } from "../events.js";

async function* chunks(...parts: string[]): AsyncGenerator<string> {
  for (const part of parts) yield part;
}

async function collect(source: AsyncIterable<AnswerEvent>): Promise<AnswerEvent[]> {
  const out: AnswerEvent[] = [];
  for await (const event of source) out.push(event);
  return out;
}

describe("encodeEvent", () => {
  test("renders each event as one data frame", () => {
    expect(encodeEvent({ type: "partial", text: "First." })).toBe('data: {"text":"First.","final":false}\n\n');
    expect(encodeEvent({ type: "final", text: "All." })).toBe('data: {"text":"All.","final":true}\n\n');
    expect(encodeEvent({ type: "error", error: "boom" })).toBe('data: {"error":"boom"}\n\n');
    expect(encodeDone()).toBe("data: [DONE]\n\n");
  });

  test("newlines in text stay inside the JSON", () => {
    expect(encodeEvent({ type: "partial", text: "a\n\nb" })).toBe('data: {"text":"a\\n\\nb","final":false}\n\n');
  });
});

describe("fromWire", () => {
  test("maps wire objects back to events", () => {
    expect(fromWire({ text: "x", final: false })).toEqual({ type: "partial", text: "x" });
    expect(fromWire({ text: "x", final: true })).toEqual({ type: "final", text: "x" });
    expect(fromWire({ error: "e" })).toEqual({ type: "error", error: "e" });
    expect(fromWire({ nope: 1 })).toBeNull();
    expect(fromWire("text")).toBeNull();
  });
});

describe("decodeAnswerStream", () => {
  test("reads events up to the done sentinel", async () => {
    const wire =
      encodeEvent({ type: "partial", text: "One." }) +
      encodeEvent({ type: "final", text: "One." }) +
      encodeDone() +
      encodeEvent({ type: "partial", text: "late" });
    const source = chunks(wire.slice(0, 7), wire.slice(7, 30), wire.slice(30));

    expect(await collect(decodeAnswerStream(source))).toEqual([
      { type: "partial", text: "One." },
      { type: "final", text: "One." },
    ]);
  });

  test("skips payloads that are not events", async () => {
    const source = chunks("data: not json\n\n", 'data: {"error":"failed"}\n\n');
    expect(await collect(decodeAnswerStream(source))).toEqual([{ type: "error", error: "failed" }]);
  });
});

describe("AnswerTranscript", () => {
  test("joins partials with a blank line and ignores the final text", () => {
    const transcript = new AnswerTranscript();
    transcript.apply({ type: "partial", text: "First." });
    expect(transcript.apply({ type: "partial", text: "Second." })).toBe("First.\n\nSecond.");
    expect(transcript.apply({ type: "final", text: "something else" })).toBe("First.\n\nSecond.");
  });

  test("uses the final text when no partial arrived", () => {
    const transcript = new AnswerTranscript();
    expect(transcript.apply({ type: "final", text: "Only answer." })).toBe("Only answer.");
  });

  test("appends errors", () => {
    const transcript = new AnswerTranscript();
    transcript.apply({ type: "partial", text: "Partial." });
    transcript.apply({ type: "error", error: "timed out" });
    expect(transcript.toString()).toBe("Partial.\n\n**Error:** timed out");
  });
});
