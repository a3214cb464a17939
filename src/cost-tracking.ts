import { readFileSync } from "fs";
import { z } from "zod";

import type { CostCall, ProjectState } from "./project-state";

const COST_CALL_HISTORY_LIMIT = 100;

export const pricingTableSchema = z.object({
  default: z.number().nonnegative(),
  models: z.record(z.string(), z.number().nonnegative()),
});

export type PricingTable = z.infer<typeof pricingTableSchema>;

// USD per billable unit (one image, one clip)
export const DEFAULT_PRICING: PricingTable = {
  default: 0.05,
  models: {
    "gemini-2.5-flash-image": 0.039,
    "comfyui/text_to_image": 0.02,
    "comfyui/image_edit": 0.02,
    "comfyui/frame_to_video": 0.1,
  },
};

export function loadPricingTable(filePath: string | undefined): PricingTable {
  if (!filePath) {
    return DEFAULT_PRICING;
  }
  const parsed = pricingTableSchema.parse(JSON.parse(readFileSync(filePath, "utf-8")));
  return {
    default: parsed.default,
    models: { ...DEFAULT_PRICING.models, ...parsed.models },
  };
}

export function estimateCost(pricing: PricingTable, model: string, units = 1): number {
  const unitPrice = pricing.models[model] ?? pricing.default;
  return roundUsd(unitPrice * units);
}

function roundUsd(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Adds one priced call to the project ledger. Must run inside withProjectLock.
 * The call log keeps the latest entries only; the total covers every call.
 */
export function recordCost(state: ProjectState, call: CostCall): void {
  state.costs.totalUsd = roundUsd(state.costs.totalUsd + call.costUsd);
  state.costs.calls.push(call);
  if (state.costs.calls.length > COST_CALL_HISTORY_LIMIT) {
    state.costs.calls.splice(0, state.costs.calls.length - COST_CALL_HISTORY_LIMIT);
  }
}
