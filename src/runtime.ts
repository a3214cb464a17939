import { AssetFingerprintCache } from "./asset-cache";
import { FileAssetSource, type AssetSource } from "./asset-source";
import { ComfyClient, ComfyImageProvider, ComfyVideoProvider } from "./comfy-client";
import type { RenderConfig } from "./config";
import { loadPricingTable } from "./cost-tracking";
import { getGoogleClient } from "./google-client";
import type { ProjectPersistence } from "./project-state";
import { ProjectStateStore } from "./project-store";
import { RenderQueue } from "./render-queue";
import { createRenderRunner } from "./render-runner";
import { GeminiReferenceProvider, type ImageContentModels } from "./tools/generate-reference";
import { FileProjectPersistence } from "./tools/state";
import type { GenerationProviders, RemoteAssetStore, RenderJobRequest } from "./types";

export interface RenderRuntime {
  config: RenderConfig;
  store: ProjectStateStore;
  cache: AssetFingerprintCache;
  queue: RenderQueue;
}

/** Seams replaced by tests; everything else is built from config. */
export interface RenderRuntimeOverrides {
  persistence?: ProjectPersistence;
  assetSource?: AssetSource;
  remoteStore?: RemoteAssetStore;
  providers?: GenerationProviders;
}

/**
 * Lazily binds the Gemini client so a missing API key only fails jobs that
 * actually need reference generation.
 */
function lazyGeminiModels(apiKey: string | undefined): ImageContentModels {
  return {
    generateContent: (params) => getGoogleClient(apiKey).models.generateContent(params),
  };
}

export function createRenderRuntime(config: RenderConfig, overrides: RenderRuntimeOverrides = {}): RenderRuntime {
  const store = new ProjectStateStore(overrides.persistence ?? new FileProjectPersistence(config.projectsDir));
  const comfy = new ComfyClient({ baseUrl: config.comfy.baseUrl, token: config.comfy.token });
  const remoteStore = overrides.remoteStore ?? comfy;

  const cache = new AssetFingerprintCache(
    store,
    overrides.assetSource ?? new FileAssetSource(config.projectsDir),
    remoteStore,
    {
      freshnessMs: config.assetCacheFreshnessMs,
      probeTimeoutMs: config.assetProbeTimeoutMs,
      uploadTimeoutMs: config.assetUploadTimeoutMs,
      retry: config.retry,
      prewarmConcurrency: config.maxConcurrency,
    },
  );

  const providers: GenerationProviders = overrides.providers ?? {
    "image-render": new ComfyImageProvider(comfy),
    "video-render": new ComfyVideoProvider(comfy),
    "reference-generation": new GeminiReferenceProvider(lazyGeminiModels(config.geminiApiKey), remoteStore, {
      uploadTimeoutMs: config.assetUploadTimeoutMs,
      retry: config.retry,
    }),
  };

  const runner = createRenderRunner({
    store,
    cache,
    providers,
    pricing: loadPricingTable(config.pricingFile),
    retry: config.retry,
    generationTimeoutMs: config.generationTimeoutMs,
  });

  const queue = new RenderQueue(runner, { maxConcurrency: config.maxConcurrency });
  return { config, store, cache, queue };
}

/** Local asset keys a job will resolve through the cache before submitting. */
export function localAssetKeys(request: RenderJobRequest): string[] {
  switch (request.kind) {
    case "image-render":
      return request.payload.referenceAssets;
    case "reference-generation":
      return request.payload.sourceAsset ? [request.payload.sourceAsset] : [];
    case "video-render":
      return request.payload.endFrame
        ? [request.payload.startFrame, request.payload.endFrame]
        : [request.payload.startFrame];
  }
}
