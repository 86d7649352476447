/**
 * Turns arbitrarily split text or bytes into complete lines.
 * A line is only emitted once its terminating newline has arrived; `flush`
 * returns whatever is left when the source ends.
 */
export class LineDecoder {
  private buffer = "";
  private decoder = new TextDecoder();

  push(chunk: string | Uint8Array): string[] {
    this.buffer += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";
    return lines.map(stripCarriageReturn);
  }

  flush(): string[] {
    const rest = this.buffer + this.decoder.decode();
    this.buffer = "";
    return rest ? [stripCarriageReturn(rest)] : [];
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/** Payload of an SSE `data:` line, or null for any other line. */
export function sseData(line: string): string | null {
  if (!line.startsWith("data:")) return null;
  const payload = line.slice(5);
  return payload.startsWith(" ") ? payload.slice(1) : payload;
}

/** Yields the `data:` payloads of an SSE byte or text stream, in order. */
export async function* readSseData(
  source: AsyncIterable<string | Uint8Array>,
): AsyncGenerator<string> {
  const decoder = new LineDecoder();
  for await (const chunk of source) {
    for (const line of decoder.push(chunk)) {
      const data = sseData(line);
      if (data !== null) yield data;
    }
  }
  for (const line of decoder.flush()) {
    const data = sseData(line);
    if (data !== null) yield data;
  }
}
