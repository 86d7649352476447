export class FolioError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The bytes are not a PDF, or pdf.js could not read them. Fatal for the job. */
export class ExtractionError extends FolioError {}

/** One image could not be described. The image keeps a null description. */
export class DescriptionError extends FolioError {}

/** Embedding failed after retries, or returned vectors of the wrong shape. Fatal for the job. */
export class EmbeddingError extends FolioError {}

export class RetrievalError extends FolioError {}

export class AgentError extends FolioError {}

export class ApiError extends FolioError {
  constructor(
    readonly status: number,
    readonly body: string,
    label = "API",
  ) {
    super(`${label} error (${status}): ${body}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/** Rate limits, server errors, timeouts and network failures are worth another attempt. */
export function isTransient(err: unknown): boolean {
  if (err instanceof ApiError) {
    return err.status === 408 || err.status === 429 || err.status >= 500;
  }
  if (!(err instanceof Error)) return false;
  if (err.name === "TimeoutError") return true;
  // undici reports connection failures as a TypeError with the socket error as cause
  return err instanceof TypeError && err.message === "fetch failed";
}
