import { createHash } from "crypto";

import type { AssetSource } from "./asset-source";
import { describeError } from "./errors";
import type { CacheEntry } from "./project-state";
import type { ProjectStateStore } from "./project-store";
import { withRetry, type RetryPolicy } from "./retry";
import type { LocalAsset, RemoteAssetStore } from "./types";

export interface AssetCacheOptions {
  freshnessMs: number;
  probeTimeoutMs: number;
  uploadTimeoutMs: number;
  retry: RetryPolicy;
  /** Upper bound on resolutions a prewarm runs at once. */
  prewarmConcurrency?: number;
  now?: () => number;
}

export const DEFAULT_PREWARM_CONCURRENCY = 6;

export interface PrewarmReport {
  resolved: Record<string, string>;
  failed: Record<string, string>;
}

export function fingerprintOf(bytes: Buffer): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Maps local project assets to remote CDN URLs. Remote URLs expire, so entries
 * are trusted only inside the freshness window; past it a HEAD-style probe
 * decides between keeping the URL and re-uploading. Nothing is evicted eagerly.
 */
export class AssetFingerprintCache {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly now: () => number;

  constructor(
    private readonly store: ProjectStateStore,
    private readonly source: AssetSource,
    private readonly remote: RemoteAssetStore,
    private readonly options: AssetCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Concurrent calls for the same asset share a single resolution. */
  resolve(projectId: string, assetKey: string): Promise<string> {
    const flightKey = `${projectId}\u0000${assetKey}`;
    const existing = this.inFlight.get(flightKey);
    if (existing) {
      return existing;
    }

    const pending = this.resolveUncached(projectId, assetKey).finally(() => {
      this.inFlight.delete(flightKey);
    });
    this.inFlight.set(flightKey, pending);
    return pending;
  }

  async prewarm(projectId: string, assetKeys: string[]): Promise<PrewarmReport> {
    const report: PrewarmReport = { resolved: {}, failed: {} };
    const unique = [...new Set(assetKeys)];
    const workerCount = Math.min(this.options.prewarmConcurrency ?? DEFAULT_PREWARM_CONCURRENCY, unique.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < unique.length) {
        const key = unique[next++];
        try {
          report.resolved[key] = await this.resolve(projectId, key);
        } catch (error) {
          report.failed[key] = describeError(error);
        }
      }
    };
    await Promise.all(Array.from({ length: workerCount }, worker));

    console.log(
      `[assetCache] Prewarmed ${Object.keys(report.resolved).length}/${unique.length} assets for project ${projectId}`,
    );
    return report;
  }

  private async resolveUncached(projectId: string, assetKey: string): Promise<string> {
    const asset = await this.source.read(projectId, assetKey);
    const fingerprint = fingerprintOf(asset.bytes);
    const state = await this.store.read(projectId);
    const entry = state.assetCache[assetKey];

    if (entry && entry.fingerprint === fingerprint) {
      const age = this.now() - Date.parse(entry.lastValidatedAt);
      if (age < this.options.freshnessMs) {
        return entry.remoteUrl;
      }

      if (await this.probe(entry.remoteUrl)) {
        await this.commit(projectId, assetKey, {
          ...entry,
          lastValidatedAt: new Date(this.now()).toISOString(),
        });
        console.log(`[assetCache] Revalidated ${assetKey}`);
        return entry.remoteUrl;
      }
      console.log(`[assetCache] Remote copy of ${assetKey} is gone, re-uploading`);
    } else if (entry) {
      console.log(`[assetCache] ${assetKey} changed locally, re-uploading`);
    }

    return this.upload(projectId, asset, fingerprint);
  }

  private async probe(remoteUrl: string): Promise<boolean> {
    try {
      return await withRetry((signal) => this.remote.probe(remoteUrl, signal), {
        ...this.options.retry,
        label: `probe ${remoteUrl}`,
        timeoutMs: this.options.probeTimeoutMs,
      });
    } catch (error) {
      console.warn(`[assetCache] Probe failed for ${remoteUrl}: ${describeError(error)}`);
      return false;
    }
  }

  private async upload(projectId: string, asset: LocalAsset, fingerprint: string): Promise<string> {
    console.log(`[assetCache] Uploading ${asset.key} (${asset.bytes.length} bytes)`);
    const remoteUrl = await withRetry((signal) => this.remote.upload(asset, signal), {
      ...this.options.retry,
      label: `upload ${asset.key}`,
      timeoutMs: this.options.uploadTimeoutMs,
    });
    await this.commit(projectId, asset.key, {
      remoteUrl,
      lastValidatedAt: new Date(this.now()).toISOString(),
      fingerprint,
    });
    return remoteUrl;
  }

  private commit(projectId: string, assetKey: string, entry: CacheEntry): Promise<void> {
    return this.store.withProjectLock(projectId, (state) => {
      state.assetCache[assetKey] = entry;
    });
  }
}
