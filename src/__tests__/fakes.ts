import type { AssetSource } from "../asset-source";
import {
  createInitialProjectState,
  projectStateSchema,
  type ProjectPersistence,
  type ProjectState,
} from "../project-state";
import type { RetryPolicy } from "../retry";
import type {
  GenerationOutput,
  GenerationProvider,
  GenerationProviders,
  GenerationRequest,
  JobKind,
  LocalAsset,
  RemoteAssetStore,
  RenderJob,
  RenderJobRequest,
} from "../types";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets every pending promise callback and timer-free continuation run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function instantRetry(maxAttempts = 3): RetryPolicy & { delays: number[] } {
  const delays: number[] = [];
  return {
    maxAttempts,
    baseDelayMs: 2_000,
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

/** Keeps each project as a JSON string, the way the file store does. */
export class MemoryPersistence implements ProjectPersistence {
  readonly documents = new Map<string, string>();
  saves = 0;
  failNextSave: Error | null = null;

  async load(projectId: string): Promise<ProjectState> {
    const raw = this.documents.get(projectId);
    return raw ? projectStateSchema.parse(JSON.parse(raw)) : createInitialProjectState(projectId);
  }

  async save(projectId: string, state: ProjectState): Promise<void> {
    await Promise.resolve();
    if (this.failNextSave) {
      const error = this.failNextSave;
      this.failNextSave = null;
      throw error;
    }
    this.saves++;
    this.documents.set(projectId, JSON.stringify(state));
  }
}

export class MemoryAssetSource implements AssetSource {
  readonly files = new Map<string, Buffer>();
  reads = 0;

  put(key: string, content: string): void {
    this.files.set(key, Buffer.from(content));
  }

  async read(projectId: string, assetKey: string): Promise<LocalAsset> {
    this.reads++;
    const bytes = this.files.get(assetKey);
    if (!bytes) {
      throw new Error(`No asset ${assetKey} in ${projectId}`);
    }
    return { key: assetKey, fileName: assetKey.split("/").pop() ?? assetKey, mimeType: "image/png", bytes };
  }
}

export class FakeRemoteStore implements RemoteAssetStore {
  readonly uploads: LocalAsset[] = [];
  readonly probes: string[] = [];
  probeResult: boolean | Error = true;
  uploadError: Error | null = null;
  uploadDelayMs = 0;
  activeUploads = 0;
  maxActiveUploads = 0;

  async upload(asset: LocalAsset): Promise<string> {
    this.activeUploads++;
    this.maxActiveUploads = Math.max(this.maxActiveUploads, this.activeUploads);
    try {
      if (this.uploadDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.uploadDelayMs));
      } else {
        await Promise.resolve();
      }
      if (this.uploadError) {
        throw this.uploadError;
      }
      this.uploads.push(asset);
      return `https://cdn.test/${asset.key}/${this.uploads.length}`;
    } finally {
      this.activeUploads--;
    }
  }

  async probe(remoteUrl: string): Promise<boolean> {
    this.probes.push(remoteUrl);
    if (this.probeResult instanceof Error) {
      throw this.probeResult;
    }
    return this.probeResult;
  }
}

export class FakeProvider<K extends JobKind> implements GenerationProvider<K> {
  readonly requests: Array<GenerationRequest<K>> = [];
  readonly failures: Error[] = [];
  gate: Promise<void> | null = null;

  constructor(
    private readonly model: string,
    private readonly units?: number,
  ) {}

  async submit(request: GenerationRequest<K>): Promise<GenerationOutput> {
    this.requests.push(request);
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return {
      assetUrl: `https://render.test/${request.kind}/${request.targetId}/${this.requests.length}`,
      model: this.model,
      units: this.units,
    };
  }
}

export function fakeProviders(): {
  image: FakeProvider<"image-render">;
  reference: FakeProvider<"reference-generation">;
  video: FakeProvider<"video-render">;
  providers: GenerationProviders;
} {
  const image = new FakeProvider<"image-render">("fake/image");
  const reference = new FakeProvider<"reference-generation">("fake/reference");
  const video = new FakeProvider<"video-render">("fake/video", 2);
  return {
    image,
    reference,
    video,
    providers: { "image-render": image, "reference-generation": reference, "video-render": video },
  };
}

export function imageRequest(targetId: string, projectId = "p1", referenceAssets: string[] = []): RenderJobRequest {
  return {
    kind: "image-render",
    projectId,
    targetId,
    payload: { prompt: `frame ${targetId}`, aspect: "square", referenceAssets },
  };
}

export function asRunningJob(request: RenderJobRequest, jobId = `job-${request.targetId}`): RenderJob {
  return { ...request, jobId, state: "running", enqueuedAt: "2026-01-01T00:00:00.000Z" };
}
