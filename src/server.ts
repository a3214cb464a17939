import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { ZodError } from "zod";

import { describeError } from "./errors";
import { parseEnqueueBody, prewarmBodySchema } from "./job-requests";
import { isValidProjectId } from "./project-state";
import type { RenderRuntime } from "./runtime";
import { RenderEventStream } from "./server-events";

const MAX_BODY_BYTES = 1_000_000;

class RequestError extends Error {
  constructor(
    message: string,
    readonly statusCode = 400,
  ) {
    super(message);
    this.name = "RequestError";
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  let total = 0;
  const chunks: Buffer[] = [];

  for await (const chunk of req) {
    const asBuffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    total += asBuffer.length;
    if (total > MAX_BODY_BYTES) {
      throw new RequestError("Request body exceeds 1MB limit", 413);
    }
    chunks.push(asBuffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8");
  if (raw.trim().length === 0) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestError("Invalid JSON request body");
  }
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(payload));
}

function setCorsHeaders(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, Last-Event-ID");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
}

function projectIdFrom(segment: string): string {
  const projectId = decodeURIComponent(segment);
  if (!isValidProjectId(projectId)) {
    throw new RequestError(`Invalid project id: ${projectId}`);
  }
  return projectId;
}

export interface RenderServer {
  server: Server;
  events: RenderEventStream;
  /** Stops forwarding queue events and ends open event streams. */
  detach(): void;
}

/**
 * HTTP surface over one render runtime:
 *
 *   GET  /health
 *   GET  /projects/:id/state
 *   GET  /projects/:id/jobs
 *   POST /projects/:id/jobs
 *   POST /projects/:id/jobs/:jobId/promote
 *   POST /projects/:id/assets/prewarm
 *   GET  /projects/:id/events
 *   POST /queue/stop
 */
export function createRenderServer(runtime: RenderRuntime): RenderServer {
  const { queue, store, cache } = runtime;
  const events = new RenderEventStream();
  const unsubscribe = events.attach(queue);

  async function requestHandler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    setCorsHeaders(res);

    if (req.method === "OPTIONS") {
      res.statusCode = 204;
      res.end();
      return;
    }

    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");
    const pathParts = url.pathname.split("/").filter(Boolean);

    try {
      if (method === "GET" && url.pathname === "/health") {
        sendJson(res, 200, {
          ok: true,
          queue: { running: queue.runningCount, pending: queue.pendingCount, stopped: queue.isStopped },
        });
        return;
      }

      if (method === "POST" && url.pathname === "/queue/stop") {
        const cancelled = queue.cancelAll();
        sendJson(res, 200, { cancelled: cancelled.length, running: queue.runningCount });
        return;
      }

      if (pathParts[0] === "projects" && pathParts.length >= 3) {
        const projectId = projectIdFrom(pathParts[1]);
        const resource = pathParts.slice(2);

        if (method === "GET" && resource.length === 1 && resource[0] === "state") {
          sendJson(res, 200, await store.read(projectId));
          return;
        }

        if (method === "GET" && resource.length === 1 && resource[0] === "jobs") {
          sendJson(res, 200, queue.snapshot(projectId));
          return;
        }

        if (method === "POST" && resource.length === 1 && resource[0] === "jobs") {
          const { request, priority } = parseEnqueueBody(projectId, await readJsonBody(req));
          const result = queue.enqueue(request);
          if (result.accepted && priority) {
            queue.promote(result.job.jobId);
          }
          sendJson(res, result.accepted ? 202 : 200, result);
          return;
        }

        if (method === "POST" && resource.length === 3 && resource[0] === "jobs" && resource[2] === "promote") {
          const jobId = decodeURIComponent(resource[1]);
          if (!queue.promote(jobId)) {
            sendJson(res, 404, { error: `No pending job ${jobId}` });
            return;
          }
          sendJson(res, 200, { promoted: true, jobId });
          return;
        }

        if (method === "POST" && resource.length === 2 && resource[0] === "assets" && resource[1] === "prewarm") {
          const { keys } = prewarmBodySchema.parse(await readJsonBody(req));
          sendJson(res, 200, await cache.prewarm(projectId, keys));
          return;
        }

        if (method === "GET" && resource.length === 1 && resource[0] === "events") {
          events.stream(req, res, projectId, url);
          return;
        }
      }

      sendJson(res, 404, { error: "Not found" });
    } catch (error) {
      if (error instanceof ZodError) {
        sendJson(res, 400, { error: "Invalid request body", issues: error.issues });
        return;
      }
      if (error instanceof RequestError) {
        sendJson(res, error.statusCode, { error: error.message });
        return;
      }
      console.error(`[server] ${method} ${url.pathname} failed:`, error);
      sendJson(res, 500, { error: describeError(error) });
    }
  }

  const server = createServer((req, res) => {
    void requestHandler(req, res);
  });

  return {
    server,
    events,
    detach: () => {
      unsubscribe();
      events.closeAll();
    },
  };
}

/**
 * Listens on the configured port. SIGINT/SIGTERM stop the queue, wait for
 * running jobs to commit, then close the server. A second signal exits at once.
 */
export function startServer(runtime: RenderRuntime): RenderServer {
  const renderServer = createRenderServer(runtime);
  const { server } = renderServer;
  let shutdownInProgress = false;

  const initiateShutdown = (reason: string, exitCode: number): void => {
    if (shutdownInProgress) {
      console.error(`[server] ${reason} during shutdown, exiting with ${runtime.queue.runningCount} jobs running`);
      process.exit(exitCode);
    }
    shutdownInProgress = true;
    console.log(`[server] Shutting down (${reason}), waiting for ${runtime.queue.runningCount} running jobs`);

    runtime.queue.cancelAll();
    void runtime.queue.onIdle().then(() => {
      renderServer.detach();
      server.close((error) => {
        if (error) {
          console.error("[server] Close failed:", error);
        }
        process.exit(exitCode);
      });
    });
  };

  process.on("SIGINT", () => {
    initiateShutdown("signal:SIGINT", 130);
  });

  process.on("SIGTERM", () => {
    initiateShutdown("signal:SIGTERM", 143);
  });

  server.listen(runtime.config.port, () => {
    console.log(`Render API listening on http://localhost:${runtime.config.port}`);
    console.log(`[server] Max concurrency ${runtime.config.maxConcurrency}, projects in ${runtime.config.projectsDir}`);
  });

  return renderServer;
}
