import { setTimeout as delay } from "timers/promises";
import { z } from "zod";

import { HttpError } from "./errors";
import type {
  AspectRatio,
  GenerationOutput,
  GenerationProvider,
  GenerationRequest,
  LocalAsset,
  RemoteAssetStore,
} from "./types";

export interface ComfyClientOptions {
  baseUrl: string;
  token?: string;
  pollIntervalMs?: number;
}

interface JobStatus {
  status: string;
  outputAssetIds: string[];
}

const uploadResponseSchema = z.object({ id: z.string() });
const runResponseSchema = z.object({ job_id: z.string() });
const jobResponseSchema = z.object({
  status: z.string(),
  output_asset_ids: z.array(z.string()).optional(),
});

async function httpError(action: string, response: Response): Promise<HttpError> {
  const body = await response.text().catch(() => "");
  return new HttpError(
    `Failed to ${action}: ${response.status} ${response.statusText}`,
    response.status,
    body.substring(0, 500),
  );
}

/**
 * Client for a ComfyUI-style HTTP API: asset upload/download plus named
 * workflows that run as asynchronous jobs.
 */
export class ComfyClient implements RemoteAssetStore {
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;

  constructor(private readonly options: ComfyClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
  }

  /**
   * Bearer token header if a token is configured, otherwise empty.
   */
  private authHeaders(): Record<string, string> {
    return this.options.token ? { Authorization: `Bearer ${this.options.token}` } : {};
  }

  assetUrl(assetId: string): string {
    return `${this.baseUrl}/assets/${encodeURIComponent(assetId)}/file`;
  }

  async upload(asset: LocalAsset, signal: AbortSignal): Promise<string> {
    const formData = new FormData();
    const blob = new Blob([new Uint8Array(asset.bytes)], { type: asset.mimeType });
    formData.append("file", blob, asset.fileName);

    const response = await fetch(`${this.baseUrl}/assets/upload`, {
      method: "POST",
      headers: this.authHeaders(),
      body: formData,
      signal,
    });

    if (!response.ok) {
      throw await httpError("upload asset", response);
    }

    const data = uploadResponseSchema.parse(await response.json());
    return this.assetUrl(data.id);
  }

  /**
   * Metadata-only existence check. 404/410 mean the asset is gone; other
   * failures are raised so the caller's retry policy can judge them.
   */
  async probe(remoteUrl: string, signal: AbortSignal): Promise<boolean> {
    const response = await fetch(remoteUrl, {
      method: "HEAD",
      headers: this.authHeaders(),
      signal,
    });
    if (response.ok) {
      return true;
    }
    if (response.status === 404 || response.status === 410) {
      return false;
    }
    throw await httpError("probe asset", response);
  }

  async runWorkflow(workflow: string, params: Record<string, unknown>, signal: AbortSignal): Promise<string> {
    const response = await fetch(`${this.baseUrl}/workflows/${workflow}/run`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...this.authHeaders(),
      },
      body: JSON.stringify(params),
      signal,
    });

    if (!response.ok) {
      throw await httpError(`run workflow ${workflow}`, response);
    }

    const data = runResponseSchema.parse(await response.json());
    return data.job_id;
  }

  /**
   * Poll a job until completion or failure. An abort (timeout) cancels the
   * remote job before the abort reason is rethrown.
   */
  async pollJob(jobId: string, signal: AbortSignal): Promise<JobStatus> {
    try {
      while (true) {
        const response = await fetch(`${this.baseUrl}/jobs/${jobId}`, {
          method: "GET",
          headers: this.authHeaders(),
          signal,
        });

        if (!response.ok) {
          throw await httpError(`poll job ${jobId}`, response);
        }

        const data = jobResponseSchema.parse(await response.json());

        if (data.status === "completed") {
          return { status: data.status, outputAssetIds: data.output_asset_ids ?? [] };
        }

        if (data.status === "failed") {
          throw new Error(`Job ${jobId} failed`);
        }

        await delay(this.pollIntervalMs, undefined, { signal });
      }
    } catch (error) {
      if (signal.aborted) {
        await this.cancelJob(jobId);
      }
      throw error;
    }
  }

  /**
   * Cancel a running job (best-effort)
   */
  async cancelJob(jobId: string): Promise<void> {
    try {
      const response = await fetch(`${this.baseUrl}/jobs/${jobId}/cancel`, {
        method: "POST",
        headers: this.authHeaders(),
      });
      if (!response.ok) {
        console.warn(`[comfy] Failed to cancel job ${jobId}: ${response.status}`);
      }
    } catch (err) {
      console.warn(`[comfy] Failed to cancel job ${jobId}:`, err);
    }
  }

  /** Runs a workflow to completion and returns the URL of its first output asset. */
  async runToAsset(workflow: string, params: Record<string, unknown>, signal: AbortSignal): Promise<string> {
    const jobId = await this.runWorkflow(workflow, params, signal);
    console.log(`[comfy] Workflow ${workflow} started: job ${jobId}`);
    const result = await this.pollJob(jobId, signal);
    if (result.outputAssetIds.length === 0) {
      throw new Error(`No output assets returned for job ${jobId}`);
    }
    return this.assetUrl(result.outputAssetIds[0]);
  }
}

export function dimensionsFor(aspect: AspectRatio): { width: number; height: number } {
  switch (aspect) {
    case "horizontal":
      return { width: 1920, height: 1080 };
    case "vertical":
      return { width: 1080, height: 1920 };
    case "square":
      return { width: 1024, height: 1024 };
  }
}

export class ComfyImageProvider implements GenerationProvider<"image-render"> {
  constructor(private readonly client: ComfyClient) {}

  async submit(request: GenerationRequest<"image-render">, signal: AbortSignal): Promise<GenerationOutput> {
    const { prompt, aspect, referenceUrls } = request.payload;
    const workflow = request.payload.model ?? (referenceUrls.length > 0 ? "image_edit" : "text_to_image");
    const params: Record<string, unknown> = { prompt, ...dimensionsFor(aspect) };
    if (referenceUrls.length > 0) {
      params.reference_image_urls = referenceUrls.slice(0, 4);
    }

    const assetUrl = await this.client.runToAsset(workflow, params, signal);
    return { assetUrl, model: `comfyui/${workflow}` };
  }
}

export class ComfyVideoProvider implements GenerationProvider<"video-render"> {
  constructor(private readonly client: ComfyClient) {}

  async submit(request: GenerationRequest<"video-render">, signal: AbortSignal): Promise<GenerationOutput> {
    const { prompt, startFrameUrl, endFrameUrl, durationSeconds } = request.payload;
    const workflow = request.payload.model ?? "frame_to_video";
    // fps=16, frame count 16*duration+1
    const length = 16 * durationSeconds + 1;

    const assetUrl = await this.client.runToAsset(
      workflow,
      {
        prompt,
        start_image_url: startFrameUrl,
        ...(endFrameUrl ? { end_image_url: endFrameUrl } : {}),
        width: 640,
        height: 640,
        length,
        fps: 16,
      },
      signal,
    );
    return { assetUrl, model: `comfyui/${workflow}` };
  }
}
