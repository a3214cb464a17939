import type { IncomingMessage, ServerResponse } from "http";

import type { RenderQueue, RenderQueueEvent } from "./render-queue";

const EVENT_HISTORY_LIMIT = 2_000;
const SSE_HEARTBEAT_MS = 15_000;

export type RenderEventType = Exclude<RenderQueueEvent["type"], "queue_idle">;

export interface RenderEvent {
  id: number;
  projectId: string;
  type: RenderEventType;
  timestamp: string;
  payload: Record<string, unknown>;
}

function toPayload(event: Exclude<RenderQueueEvent, { type: "queue_idle" }>): Record<string, unknown> {
  switch (event.type) {
    case "job_done":
      return { job: event.job, result: event.result };
    case "job_failed":
      return { job: event.job, error: event.error };
    default:
      return { job: event.job };
  }
}

/**
 * Per-project server-sent event feed of queue activity. Each project keeps a
 * bounded history so reconnecting clients can resume from Last-Event-ID.
 */
export class RenderEventStream {
  private readonly eventsByProjectId = new Map<string, RenderEvent[]>();
  private readonly eventSequenceByProjectId = new Map<string, number>();
  private readonly clientsByProjectId = new Map<string, Set<ServerResponse>>();

  /** Starts forwarding queue events. Returns the unsubscribe function. */
  attach(queue: RenderQueue): () => void {
    return queue.subscribe((event) => {
      if (event.type === "queue_idle") {
        return;
      }
      this.emit(event.job.projectId, event.type, toPayload(event));
    });
  }

  emit(projectId: string, type: RenderEventType, payload: Record<string, unknown>): RenderEvent {
    const event: RenderEvent = {
      id: this.nextEventId(projectId),
      projectId,
      type,
      timestamp: new Date().toISOString(),
      payload,
    };

    const history = this.eventsByProjectId.get(projectId) ?? [];
    history.push(event);
    if (history.length > EVENT_HISTORY_LIMIT) {
      history.splice(0, history.length - EVENT_HISTORY_LIMIT);
    }
    this.eventsByProjectId.set(projectId, history);

    const clients = this.clientsByProjectId.get(projectId);
    if (!clients) {
      return event;
    }

    for (const client of [...clients]) {
      if (client.writableEnded) {
        clients.delete(client);
        continue;
      }
      this.writeSseEvent(client, event);
    }

    if (clients.size === 0) {
      this.clientsByProjectId.delete(projectId);
    }
    return event;
  }

  history(projectId: string, afterId?: number): RenderEvent[] {
    const events = this.eventsByProjectId.get(projectId) ?? [];
    return afterId === undefined ? [...events] : events.filter((event) => event.id > afterId);
  }

  stream(req: IncomingMessage, res: ServerResponse, projectId: string, url: URL): void {
    res.statusCode = 200;
    res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.write("retry: 2000\n\n");

    const clients = this.clientsByProjectId.get(projectId) ?? new Set<ServerResponse>();
    clients.add(res);
    this.clientsByProjectId.set(projectId, clients);

    for (const event of this.history(projectId, this.parseLastEventId(req, url))) {
      this.writeSseEvent(res, event);
    }

    res.write(
      `event: connected\ndata: ${JSON.stringify({ projectId, timestamp: new Date().toISOString() })}\n\n`,
    );

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) {
        res.write(`: heartbeat ${Date.now()}\n\n`);
      }
    }, SSE_HEARTBEAT_MS);

    const cleanup = (): void => {
      clearInterval(heartbeat);
      const existingClients = this.clientsByProjectId.get(projectId);
      if (!existingClients) {
        return;
      }
      existingClients.delete(res);
      if (existingClients.size === 0) {
        this.clientsByProjectId.delete(projectId);
      }
    };

    req.on("close", cleanup);
    req.on("error", cleanup);
  }

  /** Ends every open stream, for shutdown. */
  closeAll(): void {
    for (const clients of this.clientsByProjectId.values()) {
      for (const client of clients) {
        client.end();
      }
    }
    this.clientsByProjectId.clear();
  }

  private nextEventId(projectId: string): number {
    const next = (this.eventSequenceByProjectId.get(projectId) ?? 0) + 1;
    this.eventSequenceByProjectId.set(projectId, next);
    return next;
  }

  private writeSseEvent(res: ServerResponse, event: RenderEvent): void {
    res.write(`id: ${event.id}\n`);
    res.write(`event: ${event.type}\n`);
    res.write(`data: ${JSON.stringify(event)}\n\n`);
  }

  private parseLastEventId(req: IncomingMessage, url: URL): number | undefined {
    const headerValue = req.headers["last-event-id"];
    const rawHeader = Array.isArray(headerValue) ? headerValue[0] : headerValue;
    const raw = rawHeader ?? url.searchParams.get("lastEventId") ?? undefined;
    if (!raw) {
      return undefined;
    }

    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
}
