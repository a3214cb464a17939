#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { readFileSync } from "fs";
import { resolve } from "path";

import { loadConfig } from "./config";
import { describeError } from "./errors";
import { renderManifestSchema, toJobRequest } from "./job-requests";
import type { RenderQueueEvent } from "./render-queue";
import { createRenderRuntime, localAssetKeys } from "./runtime";
import { startServer } from "./server";

const program = new Command();

function logQueueEvent(event: RenderQueueEvent): void {
  switch (event.type) {
    case "job_started":
      console.log(`[render] started  ${event.job.kind} ${event.job.targetId}`);
      break;
    case "job_done":
      console.log(`[render] done     ${event.job.kind} ${event.job.targetId} -> ${event.result.assetUrl}`);
      break;
    case "job_failed":
      console.error(`[render] failed   ${event.job.kind} ${event.job.targetId}: ${event.error}`);
      break;
    case "job_cancelled":
      console.log(`[render] cancelled ${event.job.kind} ${event.job.targetId}`);
      break;
    default:
      break;
  }
}

program
  .name("storyboard-render")
  .description("Render queue for storyboard images, cast references and shot videos")
  .version("0.1.0");

program
  .command("render")
  .argument("<manifest>", "Path to a JSON job manifest: { projectId, jobs: [...] }")
  .option("--no-prewarm", "Skip uploading referenced assets before the jobs start")
  .description("Enqueue every job in the manifest and wait for the queue to drain")
  .action(async (manifestFile: string, options: { prewarm: boolean }) => {
    try {
      const manifestPath = resolve(manifestFile);
      const manifest = renderManifestSchema.parse(JSON.parse(readFileSync(manifestPath, "utf-8")));
      const config = loadConfig();
      const runtime = createRenderRuntime(config);
      const { queue, cache, store } = runtime;

      console.log("Storyboard Render");
      console.log("=================");
      console.log(`Manifest: ${manifestPath}`);
      console.log(`Project: ${manifest.projectId}`);
      console.log(`Jobs: ${manifest.jobs.length}`);
      console.log(`Max concurrency: ${config.maxConcurrency}`);
      console.log("");

      const requests = manifest.jobs.map((definition) => ({
        request: toJobRequest(manifest.projectId, definition),
        priority: definition.priority ?? false,
      }));

      if (options.prewarm) {
        const report = await cache.prewarm(
          manifest.projectId,
          requests.flatMap(({ request }) => localAssetKeys(request)),
        );
        for (const [key, error] of Object.entries(report.failed)) {
          console.warn(`[render] Could not prewarm ${key}: ${error}`);
        }
      }

      let failures = 0;
      queue.subscribe((event) => {
        if (event.type === "job_failed") {
          failures++;
        }
        logQueueEvent(event);
      });

      process.on("SIGINT", () => {
        if (queue.isStopped) {
          console.log("\nInterrupted again. Exiting without waiting.");
          process.exit(130);
        }
        const cancelled = queue.cancelAll();
        console.log(
          `\nInterrupted. Cancelled ${cancelled.length} pending jobs, waiting for ${queue.runningCount} running jobs...`,
        );
      });

      for (const { request, priority } of requests) {
        const result = queue.enqueue(request);
        if (!result.accepted) {
          console.log(`[render] duplicate ${request.kind} ${request.targetId}, skipped`);
        } else if (priority) {
          queue.promote(result.job.jobId);
        }
      }

      await queue.onIdle();

      const state = await store.read(manifest.projectId);
      console.log("");
      console.log(`Total project cost: $${state.costs.totalUsd.toFixed(4)}`);
      if (failures > 0) {
        console.error(`${failures} job(s) failed`);
        process.exit(1);
      }
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("status")
  .argument("<projectId>", "Project to inspect")
  .description("Print render records, cached assets and cost totals for a project")
  .action(async (projectId: string) => {
    try {
      const { store } = createRenderRuntime(loadConfig());
      const state = await store.read(projectId);

      console.log(`Project: ${state.projectId}`);
      console.log(`Last saved: ${state.lastSavedAt}`);
      console.log(`Cached assets: ${Object.keys(state.assetCache).length}`);
      console.log(`Total cost: $${state.costs.totalUsd.toFixed(4)} (${state.costs.calls.length} recent calls)`);
      console.log("");
      for (const [key, record] of Object.entries(state.renders)) {
        const detail = record.status === "failed" ? record.error ?? "unknown error" : record.assetUrl ?? "";
        console.log(`  ${record.status.padEnd(6)} ${key}  ${detail}`);
      }
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("serve")
  .description("Start the HTTP API")
  .action(() => {
    startServer(createRenderRuntime(loadConfig()));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
