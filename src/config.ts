import { resolve } from "path";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PROJECTS_DIR: z.string().default("./output/projects"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  // Provider rate limits allow more, but uploads need headroom
  RENDER_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(6),
  ASSET_CACHE_FRESHNESS_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
  ASSET_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  ASSET_UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  COMFYUI_API_URL: z.string().url().default("http://localhost:8000"),
  COMFYUI_API_TOKEN: optionalString,
  GEMINI_API_KEY: optionalString,
  PRICING_FILE: optionalString,
});

export interface RenderConfig {
  projectsDir: string;
  port: number;
  maxConcurrency: number;
  assetCacheFreshnessMs: number;
  assetProbeTimeoutMs: number;
  assetUploadTimeoutMs: number;
  generationTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
  comfy: {
    baseUrl: string;
    token?: string;
  };
  geminiApiKey?: string;
  pricingFile?: string;
}

/**
 * Reads configuration from environment variables (load .env first with
 * `dotenv/config`). Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RenderConfig {
  const parsed = envSchema.parse(env);
  return {
    projectsDir: resolve(parsed.PROJECTS_DIR),
    port: parsed.PORT,
    maxConcurrency: parsed.RENDER_MAX_CONCURRENCY,
    assetCacheFreshnessMs: parsed.ASSET_CACHE_FRESHNESS_MS,
    assetProbeTimeoutMs: parsed.ASSET_PROBE_TIMEOUT_MS,
    assetUploadTimeoutMs: parsed.ASSET_UPLOAD_TIMEOUT_MS,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    },
    comfy: {
      baseUrl: parsed.COMFYUI_API_URL,
      token: parsed.COMFYUI_API_TOKEN,
    },
    geminiApiKey: parsed.GEMINI_API_KEY,
    pricingFile: parsed.PRICING_FILE,
  };
}
