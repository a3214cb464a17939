import type { AssetFingerprintCache } from "./asset-cache";
import { estimateCost, recordCost, type PricingTable } from "./cost-tracking";
import { describeError } from "./errors";
import { renderKey } from "./project-state";
import type { ProjectStateStore } from "./project-store";
import type { RenderJobRunner } from "./render-queue";
import { withRetry, type RetryPolicy } from "./retry";
import {
  assertNever,
  type GenerationOutput,
  type GenerationProviders,
  type RenderJob,
  type RenderJobResult,
} from "./types";

export interface RenderRunnerDeps {
  store: ProjectStateStore;
  cache: AssetFingerprintCache;
  providers: GenerationProviders;
  pricing: PricingTable;
  retry: RetryPolicy;
  generationTimeoutMs: number;
}

/**
 * Resolves the job's local assets, calls the provider for its kind and returns
 * the provider output. Nothing is written here.
 */
async function generate(job: RenderJob, deps: RenderRunnerDeps): Promise<GenerationOutput> {
  const { cache, providers } = deps;
  const { projectId, targetId } = job;
  const retryOptions = {
    ...deps.retry,
    label: `${job.kind} ${targetId}`,
    timeoutMs: deps.generationTimeoutMs,
  };

  switch (job.kind) {
    case "image-render": {
      const referenceUrls = await Promise.all(
        job.payload.referenceAssets.map((assetKey) => cache.resolve(projectId, assetKey)),
      );
      const request = {
        kind: job.kind,
        projectId,
        targetId,
        payload: {
          prompt: job.payload.prompt,
          aspect: job.payload.aspect,
          model: job.payload.model,
          referenceUrls,
        },
      };
      return withRetry((signal) => providers["image-render"].submit(request, signal), retryOptions);
    }
    case "reference-generation": {
      const { sourceAsset } = job.payload;
      const sourceUrl = sourceAsset ? await cache.resolve(projectId, sourceAsset) : undefined;
      const request = {
        kind: job.kind,
        projectId,
        targetId,
        payload: {
          prompt: job.payload.prompt,
          variant: job.payload.variant,
          sourceUrl,
        },
      };
      return withRetry((signal) => providers["reference-generation"].submit(request, signal), retryOptions);
    }
    case "video-render": {
      const { startFrame, endFrame } = job.payload;
      const [startFrameUrl, endFrameUrl] = await Promise.all([
        cache.resolve(projectId, startFrame),
        endFrame ? cache.resolve(projectId, endFrame) : Promise.resolve(undefined),
      ]);
      const request = {
        kind: job.kind,
        projectId,
        targetId,
        payload: {
          prompt: job.payload.prompt,
          startFrameUrl,
          endFrameUrl,
          durationSeconds: job.payload.durationSeconds,
          model: job.payload.model,
        },
      };
      return withRetry((signal) => providers["video-render"].submit(request, signal), retryOptions);
    }
    default:
      return assertNever(job);
  }
}

async function recordFailure(job: RenderJob, error: unknown, deps: RenderRunnerDeps): Promise<void> {
  try {
    await deps.store.withProjectLock(job.projectId, (state) => {
      const key = renderKey(job.kind, job.targetId);
      const previous = state.renders[key];
      state.renders[key] = {
        kind: job.kind,
        targetId: job.targetId,
        status: "failed",
        assetUrl: previous?.assetUrl,
        model: previous?.model,
        jobId: job.jobId,
        error: describeError(error),
        updatedAt: new Date().toISOString(),
      };
    });
  } catch (commitError) {
    console.error(
      `[renderRunner] Could not record failure of ${job.kind} ${job.targetId}: ${describeError(commitError)}`,
    );
  }
}

/**
 * Job body run by the render queue. A job only succeeds once its render record
 * and cost entry are durably committed in one locked write.
 */
export function createRenderRunner(deps: RenderRunnerDeps): RenderJobRunner {
  return async (job: RenderJob): Promise<RenderJobResult> => {
    let output: GenerationOutput;
    try {
      output = await generate(job, deps);
    } catch (error) {
      await recordFailure(job, error, deps);
      throw error;
    }

    const costUsd = estimateCost(deps.pricing, output.model, output.units ?? 1);
    await deps.store.withProjectLock(job.projectId, (state) => {
      const at = new Date().toISOString();
      state.renders[renderKey(job.kind, job.targetId)] = {
        kind: job.kind,
        targetId: job.targetId,
        status: "done",
        assetUrl: output.assetUrl,
        model: output.model,
        jobId: job.jobId,
        updatedAt: at,
      };
      recordCost(state, {
        model: output.model,
        costUsd,
        at,
        jobId: job.jobId,
        note: `${job.kind}:${job.targetId}`,
      });
    });

    console.log(`[renderRunner] ${job.kind} ${job.targetId} committed ($${costUsd.toFixed(4)})`);
    return { assetUrl: output.assetUrl, model: output.model, costUsd };
  };
}
