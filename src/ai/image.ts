import type { ImageConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { FetchFn, ImagePayload, Logger, StageOutcome } from "../types/index.js";

export const POST_EXCERPT_CHARS = 300;

export function buildImagePrompt(postText: string): string {
  return `Professional, modern LinkedIn post image about software development and coding.

Visual style: Clean, modern, tech-focused design with professional color scheme.
Theme: Coding, GitHub commits, software development, programming.
Mood: Professional, engaging, inspiring for developers.
Design elements: Code snippets, GitHub logo, developer tools, clean typography.
Color palette: Professional blues, greens, or modern gradients.
Avoid: Cluttered designs, unprofessional imagery.

The post content is about: ${postText.slice(0, POST_EXCERPT_CHARS)}`;
}

interface Prediction {
  bytesBase64Encoded?: unknown;
  mimeType?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function firstPrediction(body: unknown): Prediction | undefined {
  const predictions: unknown = isRecord(body) ? body["predictions"] : undefined;
  if (!Array.isArray(predictions)) {
    return undefined;
  }
  const first: unknown = predictions[0];
  return isRecord(first) ? first : undefined;
}

/**
 * Google APIs wrap failures as `{ error: { message } }`; other bodies are used as is.
 */
function errorMessageOf(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  const error = isRecord(parsed) ? parsed["error"] : undefined;
  const message = isRecord(error) ? error["message"] : undefined;
  return typeof message === "string" ? message : body;
}

export function isBillingRestriction(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes("billed users") || lower.includes("billing");
}

/**
 * Best-effort image generation through the Imagen predict endpoint. Every
 * failure comes back as a degraded outcome; the post goes out without media.
 */
export class ImageGenerator {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: ImageConfig,
    private readonly logger: Logger,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  get endpoint(): string {
    return `${this.config.baseURL}/models/${this.config.model}:predict`;
  }

  async generate(postText: string): Promise<StageOutcome<ImagePayload>> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      return this.degrade("image API key not configured (GEMINI_API_KEY)");
    }

    const payload = {
      instances: [{ prompt: buildImagePrompt(postText) }],
      parameters: {
        sampleCount: 1,
        aspectRatio: "1:1",
        safetyFilterLevel: "block_some",
        personGeneration: "allow_all",
      },
    };

    let response: Response;
    try {
      this.logger.info(`Calling image API (${this.config.model})...`);
      response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": apiKey,
        },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      return this.degrade(`network error calling image API: ${errorMessage(error)}`);
    }

    this.logger.info(`Image API response status: ${response.status}`);

    if (response.status !== 200) {
      const body = await response.text().catch(() => "");
      const message = errorMessageOf(body);
      if (response.status === 400 && isBillingRestriction(message)) {
        this.logger.warn("The image API requires a Google Cloud account with billing enabled");
        return this.degrade("image API is not available without billing");
      }
      this.logger.error(`Image API error ${response.status}: ${body}`);
      return this.degrade(`image API responded with ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return this.degrade(`image API returned invalid JSON: ${errorMessage(error)}`);
    }

    const prediction = firstPrediction(body);
    if (!prediction) {
      return this.degrade("no predictions in image API response");
    }
    if (typeof prediction.bytesBase64Encoded !== "string" || !prediction.bytesBase64Encoded) {
      return this.degrade("prediction has no bytesBase64Encoded field");
    }

    const mimeType = typeof prediction.mimeType === "string" && prediction.mimeType ? prediction.mimeType : "image/png";
    this.logger.info(`Image generated (${mimeType})`);
    return {
      status: "produced",
      value: { kind: "dataUri", mimeType, base64: prediction.bytesBase64Encoded },
    };
  }

  private degrade(reason: string): StageOutcome<ImagePayload> {
    this.logger.warn(`No image: ${reason}`);
    return { status: "degraded", reason };
  }
}
