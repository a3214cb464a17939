import { z } from "zod";

import { isValidProjectId } from "./project-state";
import type { RenderJobRequest } from "./types";

const assetKey = z.string().trim().min(1);
const targetId = z.string().trim().min(1).max(200);

const imageRenderSchema = z.object({
  kind: z.literal("image-render"),
  targetId,
  payload: z.object({
    prompt: z.string().min(1),
    aspect: z.enum(["horizontal", "vertical", "square"]).default("horizontal"),
    model: z.string().optional(),
    referenceAssets: z.array(assetKey).max(10).default([]),
  }),
});

const referenceGenerationSchema = z.object({
  kind: z.literal("reference-generation"),
  targetId,
  payload: z.object({
    prompt: z.string().min(1),
    variant: z.enum(["front", "angle"]).default("front"),
    sourceAsset: assetKey.optional(),
  }),
});

const videoRenderSchema = z.object({
  kind: z.literal("video-render"),
  targetId,
  payload: z.object({
    prompt: z.string().default(""),
    startFrame: assetKey,
    endFrame: assetKey.optional(),
    durationSeconds: z.number().int().min(1).max(20).default(5),
    model: z.string().optional(),
  }),
});

export const jobDefinitionSchema = z.discriminatedUnion("kind", [
  imageRenderSchema,
  referenceGenerationSchema,
  videoRenderSchema,
]);

export type JobDefinition = z.infer<typeof jobDefinitionSchema>;

/** A job definition plus `priority: true` to move it to the head of the queue. */
export const queuedJobDefinitionSchema = jobDefinitionSchema.and(z.object({ priority: z.boolean().optional() }));

export const renderManifestSchema = z.object({
  projectId: z.string().refine(isValidProjectId, { message: "Invalid project id" }),
  jobs: z.array(queuedJobDefinitionSchema).min(1),
});

export type RenderManifest = z.infer<typeof renderManifestSchema>;

export function toJobRequest(projectId: string, definition: JobDefinition): RenderJobRequest {
  switch (definition.kind) {
    case "image-render":
      return { kind: definition.kind, projectId, targetId: definition.targetId, payload: definition.payload };
    case "reference-generation":
      return { kind: definition.kind, projectId, targetId: definition.targetId, payload: definition.payload };
    case "video-render":
      return { kind: definition.kind, projectId, targetId: definition.targetId, payload: definition.payload };
  }
}

export interface EnqueueBody {
  request: RenderJobRequest;
  priority: boolean;
}

/** Parses an HTTP enqueue body for one project. Throws ZodError on invalid input. */
export function parseEnqueueBody(projectId: string, body: unknown): EnqueueBody {
  const definition = queuedJobDefinitionSchema.parse(body);
  return { request: toJobRequest(projectId, definition), priority: definition.priority ?? false };
}

export const prewarmBodySchema = z.object({
  keys: z.array(assetKey).min(1).max(500),
});
