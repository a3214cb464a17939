import { Modality, type GenerateContentParameters, type GenerateContentResponse, type Part } from "@google/genai";

import { detectMimeType } from "../asset-source";
import { describeError, HttpError } from "../errors";
import { withRetry, type RetryPolicy } from "../retry";
import type {
  GenerationOutput,
  GenerationProvider,
  GenerationRequest,
  RemoteAssetStore,
} from "../types";

export const REFERENCE_IMAGE_MODEL = "gemini-2.5-flash-image";

/** The slice of the Gemini `models` API this provider calls. */
export interface ImageContentModels {
  generateContent(params: GenerateContentParameters): Promise<Pick<GenerateContentResponse, "candidates">>;
}

export interface ReferenceProviderOptions {
  uploadTimeoutMs: number;
  retry: RetryPolicy;
}

export function buildReferencePrompt(prompt: string, variant: "front" | "angle", hasSource: boolean): string {
  if (hasSource && variant === "angle") {
    return `Edit this image to show the same character from a different angle/perspective. Keep their exact appearance, clothing, facial features, body proportions, and color palette identical. Only change the viewing angle to a 3/4 perspective. Character details: ${prompt}`;
  }
  if (hasSource) {
    return `Use this image as the identity reference. Produce a clean front-facing reference portrait of the same character on a neutral background, keeping face, hair, clothing and color palette identical. Character details: ${prompt}`;
  }
  return `Generate a front-facing character reference image on a neutral background: ${prompt}`;
}

interface InlineImage {
  data: string;
  mimeType: string;
}

/**
 * Downloads the resolved source image so it can travel inline; the model only
 * accepts `fileData` URIs from its own Files API.
 */
async function fetchSourceImage(sourceUrl: string, signal: AbortSignal): Promise<InlineImage> {
  const response = await fetch(sourceUrl, { signal });
  if (!response.ok) {
    throw new HttpError(
      `Source image download failed (${response.status}): ${sourceUrl}`,
      response.status,
      await response.text(),
    );
  }
  const contentType = response.headers.get("content-type")?.split(";")[0].trim();
  const mimeType =
    contentType && contentType.startsWith("image/") ? contentType : detectMimeType(new URL(sourceUrl).pathname);
  return { data: Buffer.from(await response.arrayBuffer()).toString("base64"), mimeType };
}

/**
 * Generates cast reference images with Gemini's image model. The produced
 * bytes are uploaded to the asset store so the job result is a remote URL
 * like every other kind.
 */
export class GeminiReferenceProvider implements GenerationProvider<"reference-generation"> {
  constructor(
    private readonly models: ImageContentModels,
    private readonly assetStore: RemoteAssetStore,
    private readonly options: ReferenceProviderOptions,
  ) {}

  async submit(request: GenerationRequest<"reference-generation">, signal: AbortSignal): Promise<GenerationOutput> {
    const { prompt, variant, sourceUrl } = request.payload;
    const parts: Part[] = [{ text: buildReferencePrompt(prompt, variant, Boolean(sourceUrl)) }];
    if (sourceUrl) {
      parts.push({ inlineData: await fetchSourceImage(sourceUrl, signal) });
    }

    console.log(`[generateReference] Generating ${variant} reference for ${request.targetId}`);
    const response = await this.models.generateContent({
      model: REFERENCE_IMAGE_MODEL,
      contents: [{ role: "user", parts }],
      config: {
        responseModalities: sourceUrl ? [Modality.IMAGE, Modality.TEXT] : [Modality.IMAGE],
        abortSignal: signal,
      },
    });

    const imageData = response.candidates?.[0]?.content?.parts?.find((part) => part.inlineData?.data)?.inlineData;
    if (!imageData?.data) {
      throw new Error(`No image data in response for ${request.targetId}`);
    }
    if (signal.aborted) {
      throw signal.reason;
    }

    const bytes = Buffer.from(imageData.data, "base64");
    const fileName = `${request.targetId}_${variant}.png`;
    let assetUrl: string;
    try {
      assetUrl = await withRetry(
        (uploadSignal) =>
          this.assetStore.upload(
            { key: `generated/${fileName}`, fileName, mimeType: imageData.mimeType ?? "image/png", bytes },
            uploadSignal,
          ),
        { ...this.options.retry, label: `upload ${fileName}`, timeoutMs: this.options.uploadTimeoutMs },
      );
    } catch (error) {
      throw new Error(`Generated reference for ${request.targetId} could not be stored: ${describeError(error)}`, {
        cause: error,
      });
    }

    return { assetUrl, model: REFERENCE_IMAGE_MODEL };
  }
}
