export type AspectRatio = "horizontal" | "vertical" | "square";

export interface ImageRenderPayload {
  prompt: string;
  aspect: AspectRatio;
  model?: string;
  referenceAssets: string[];   // local asset keys, resolved to remote URLs before submit
}

export interface ReferenceGenerationPayload {
  prompt: string;
  variant: "front" | "angle";
  sourceAsset?: string;        // local asset key of the image to derive from
}

export interface VideoRenderPayload {
  prompt: string;
  startFrame: string;          // local asset key
  endFrame?: string;           // local asset key
  durationSeconds: number;
  model?: string;
}

/** One entry per job kind. Adding a kind here makes every kind switch non-exhaustive until handled. */
export interface JobPayloads {
  "image-render": ImageRenderPayload;
  "reference-generation": ReferenceGenerationPayload;
  "video-render": VideoRenderPayload;
}

export type JobKind = keyof JobPayloads;

export const JOB_KINDS = ["image-render", "reference-generation", "video-render"] as const satisfies readonly JobKind[];

export type JobState = "queued" | "running" | "done" | "failed" | "cancelled";

export type RenderJobRequest = {
  [K in JobKind]: {
    kind: K;
    projectId: string;
    targetId: string;
    payload: JobPayloads[K];
  };
}[JobKind];

export interface RenderJobResult {
  assetUrl: string;
  model: string;
  costUsd: number;
}

export interface JobRuntime {
  jobId: string;
  state: JobState;
  enqueuedAt: string;
  startedAt?: string;
  finishedAt?: string;
  result?: RenderJobResult;
  error?: string;
}

export type RenderJob = RenderJobRequest & JobRuntime;

// ---------------------------------------------------------------------------
// Provider boundary
// ---------------------------------------------------------------------------

export interface ResolvedPayloads {
  "image-render": {
    prompt: string;
    aspect: AspectRatio;
    model?: string;
    referenceUrls: string[];
  };
  "reference-generation": {
    prompt: string;
    variant: "front" | "angle";
    sourceUrl?: string;
  };
  "video-render": {
    prompt: string;
    startFrameUrl: string;
    endFrameUrl?: string;
    durationSeconds: number;
    model?: string;
  };
}

export interface GenerationRequest<K extends JobKind> {
  kind: K;
  projectId: string;
  targetId: string;
  payload: ResolvedPayloads[K];
}

export interface GenerationOutput {
  assetUrl: string;
  model: string;
  units?: number;              // billable units, defaults to 1
}

export interface GenerationProvider<K extends JobKind> {
  submit(request: GenerationRequest<K>, signal: AbortSignal): Promise<GenerationOutput>;
}

export type GenerationProviders = { [K in JobKind]: GenerationProvider<K> };

export interface LocalAsset {
  key: string;
  fileName: string;
  mimeType: string;
  bytes: Buffer;
}

export interface RemoteAssetStore {
  upload(asset: LocalAsset, signal: AbortSignal): Promise<string>;
  probe(remoteUrl: string, signal: AbortSignal): Promise<boolean>;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
