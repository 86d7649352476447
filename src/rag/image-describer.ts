import { RAG_CONFIG } from "./config.js";
import { mapWithConcurrency } from "./concurrency.js";
import { DescriptionError, errorMessage } from "./errors.js";
import { postOpenRouter, type OpenRouterOptions } from "./openrouter.js";
import { withRetry } from "./retry.js";
import type { DescribedImage, ExtractedImage } from "./types.js";

const DESCRIBE_PROMPT =
  "Describe this image in 5-10 words for a filename. " +
  "Be specific about what it shows (e.g. 'training loss curve over epochs'). " +
  "Only output the description, nothing else.";

export interface ImageDescriber {
  describe(png: Uint8Array, signal?: AbortSignal): Promise<string>;
}

interface ChatResponse {
  choices: Array<{ message: { content: string | null } }>;
}

export class OpenRouterImageDescriber implements ImageDescriber {
  constructor(
    private readonly api: OpenRouterOptions,
    private readonly model: string = RAG_CONFIG.visionModel,
  ) {}

  async describe(png: Uint8Array, signal?: AbortSignal): Promise<string> {
    const dataUrl = `data:image/png;base64,${Buffer.from(png).toString("base64")}`;
    const res = await postOpenRouter(
      "/chat/completions",
      {
        model: this.model,
        max_tokens: 50,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: DESCRIBE_PROMPT },
              { type: "image_url", image_url: { url: dataUrl } },
            ],
          },
        ],
      },
      this.api,
      signal,
    );
    const json = (await res.json()) as ChatResponse;
    const content = json.choices[0]?.message.content?.trim();
    if (!content) throw new DescriptionError("Vision model returned an empty description");
    return content;
  }
}

export interface DescribeOptions {
  concurrency: number;
  attempts: number;
  baseDelayMs: number;
  log?: (msg: string) => void;
  signal?: AbortSignal;
}

/**
 * Describes every image with bounded concurrency. Transient failures are
 * retried; an image that still fails keeps a null description and the rest
 * carry on.
 */
export async function describeImages(
  images: ExtractedImage[],
  describer: ImageDescriber,
  options: Partial<DescribeOptions> = {},
): Promise<DescribedImage[]> {
  const concurrency = options.concurrency ?? RAG_CONFIG.describeConcurrency;
  const attempts = options.attempts ?? RAG_CONFIG.retryAttempts;
  const baseDelayMs = options.baseDelayMs ?? RAG_CONFIG.retryBaseDelayMs;

  return mapWithConcurrency(images, concurrency, async (image, i) => {
    try {
      const description = await withRetry(() => describer.describe(image.png, options.signal), {
        attempts,
        baseDelayMs,
        signal: options.signal,
      });
      return { ...image, description };
    } catch (err) {
      if (options.signal?.aborted) throw err;
      options.log?.(`describe: image ${i + 1} on page ${image.pageNumber}: ${errorMessage(err)}`);
      return { ...image, description: null };
    }
  });
}
