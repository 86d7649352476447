import type { RetrievedChunk } from "./types.js";

export function formatChunk(chunk: RetrievedChunk): string {
  const citation = `[Page ${chunk.page}, chunk ${chunk.index}, score ${chunk.score.toFixed(3)}]`;
  return `${citation}\n${chunk.text}`;
}

/** Retrieved chunks as citation-labelled excerpts, or a note that nothing matched. */
export function formatChunks(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) return "No matching passages.";
  return chunks.map(formatChunk).join("\n\n");
}

export interface QuestionContext {
  question: string;
  selectedText?: string;
  page?: number;
}

/** Text embedded to find candidate chunks: the selected passage, when given, leads. */
export function retrievalQuery({ question, selectedText }: QuestionContext): string {
  const selected = selectedText?.trim();
  return selected ? `${selected}\n\n${question}` : question;
}

/** The user turn handed to the agent. */
export function buildQuestionPrompt(request: QuestionContext): string {
  const parts: string[] = [];
  const selected = request.selectedText?.trim();
  if (selected) {
    parts.push(`Selected text from page ${request.page ?? "?"}:\n"""\n${selected}\n"""`);
  } else if (request.page !== undefined) {
    parts.push(`The reader is looking at page ${request.page}.`);
  }
  parts.push(`Question: ${request.question}`);
  return parts.join("\n\n");
}

export function buildContextBlock(chunks: RetrievedChunk[]): string {
  return (
    "--- Retrieved Context ---\n" +
    "Excerpts from the document that look relevant. " +
    "Cite pages using the [Page N] labels when you rely on them.\n\n" +
    formatChunks(chunks)
  );
}
