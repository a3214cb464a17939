import { z } from "zod";

import { JOB_KINDS, type JobKind } from "./types";

export const cacheEntrySchema = z.object({
  remoteUrl: z.string().min(1),
  lastValidatedAt: z.string(),
  fingerprint: z.string(),
});

export const renderRecordSchema = z.object({
  kind: z.enum(JOB_KINDS),
  targetId: z.string(),
  status: z.enum(["done", "failed"]),
  assetUrl: z.string().optional(),
  model: z.string().optional(),
  jobId: z.string(),
  error: z.string().optional(),
  updatedAt: z.string(),
});

export const costCallSchema = z.object({
  model: z.string(),
  costUsd: z.number(),
  at: z.string(),
  jobId: z.string().optional(),
  note: z.string().optional(),
});

export const projectStateSchema = z.object({
  projectId: z.string(),
  assetCache: z.record(z.string(), cacheEntrySchema).default({}),
  costs: z
    .object({
      totalUsd: z.number(),
      calls: z.array(costCallSchema),
    })
    .default({ totalUsd: 0, calls: [] }),
  renders: z.record(z.string(), renderRecordSchema).default({}),
  lastSavedAt: z.string(),
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;
export type RenderRecord = z.infer<typeof renderRecordSchema>;
export type CostCall = z.infer<typeof costCallSchema>;
export type ProjectState = z.infer<typeof projectStateSchema>;

export function createInitialProjectState(projectId: string): ProjectState {
  return {
    projectId,
    assetCache: {},
    costs: { totalUsd: 0, calls: [] },
    renders: {},
    lastSavedAt: new Date().toISOString(),
  };
}

const PROJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/** Project ids double as directory names. */
export function isValidProjectId(projectId: string): boolean {
  return PROJECT_ID_PATTERN.test(projectId) && !projectId.includes("..");
}

export function renderKey(kind: JobKind, targetId: string): string {
  return `${kind}:${targetId}`;
}

/** Load/save boundary of the project document store. Both are atomic per document. */
export interface ProjectPersistence {
  load(projectId: string): Promise<ProjectState>;
  save(projectId: string, state: ProjectState): Promise<void>;
}
