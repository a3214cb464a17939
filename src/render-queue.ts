import { randomUUID } from "crypto";

import { describeError } from "./errors";
import type { RenderJob, RenderJobRequest, RenderJobResult } from "./types";

export type RenderJobRunner = (job: RenderJob) => Promise<RenderJobResult>;

export type RenderQueueEvent =
  | { type: "job_queued"; job: RenderJob }
  | { type: "job_started"; job: RenderJob }
  | { type: "job_done"; job: RenderJob; result: RenderJobResult }
  | { type: "job_failed"; job: RenderJob; error: string }
  | { type: "job_cancelled"; job: RenderJob }
  | { type: "job_promoted"; job: RenderJob }
  | { type: "queue_idle" };

export type RenderQueueListener = (event: RenderQueueEvent) => void;

export type EnqueueResult = { accepted: boolean; job: RenderJob };

export interface RenderQueueSnapshot {
  stopped: boolean;
  maxConcurrency: number;
  pending: RenderJob[];
  running: RenderJob[];
}

export interface RenderQueueOptions {
  maxConcurrency: number;
}

function dedupeKey(job: RenderJobRequest): string {
  return `${job.projectId}\u0000${job.kind}\u0000${job.targetId}`;
}

function copyJob(job: RenderJob): RenderJob {
  return { ...job };
}

/**
 * Bounded-concurrency dispatcher shared by every job kind.
 *
 * Admission is synchronous on the event loop, so the pending list, running set
 * and stop flag need no lock of their own; only project commits (inside the
 * runner) take the project lock.
 */
export class RenderQueue {
  private readonly pending: RenderJob[] = [];
  private readonly running = new Map<string, RenderJob>();
  private readonly activeByKey = new Map<string, RenderJob>();
  private readonly listeners = new Set<RenderQueueListener>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(
    private readonly runner: RenderJobRunner,
    private readonly options: RenderQueueOptions,
  ) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${options.maxConcurrency}`);
    }
  }

  get runningCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Appends a job unless the same (project, kind, target) is already pending or
   * running, in which case the existing job is returned with accepted=false.
   */
  enqueue(request: RenderJobRequest): EnqueueResult {
    const key = dedupeKey(request);
    const existing = this.activeByKey.get(key);
    if (existing) {
      return { accepted: false, job: copyJob(existing) };
    }

    const job: RenderJob = {
      ...request,
      jobId: randomUUID(),
      state: "queued",
      enqueuedAt: new Date().toISOString(),
    };
    this.pending.push(job);
    this.activeByKey.set(key, job);
    this.emit({ type: "job_queued", job: copyJob(job) });

    if (this.stopped && this.running.size === 0) {
      this.stopped = false;
    }
    this.admit();
    return { accepted: true, job: copyJob(job) };
  }

  /** Drops every pending job. Running jobs finish and commit normally. */
  cancelAll(): RenderJob[] {
    this.stopped = true;
    const cancelled = this.pending.splice(0, this.pending.length);
    const finishedAt = new Date().toISOString();
    for (const job of cancelled) {
      job.state = "cancelled";
      job.finishedAt = finishedAt;
      this.activeByKey.delete(dedupeKey(job));
      this.emit({ type: "job_cancelled", job: copyJob(job) });
    }
    if (cancelled.length > 0 || this.running.size > 0) {
      console.log(`[renderQueue] Stopped: cancelled ${cancelled.length} pending, ${this.running.size} still running`);
    }
    this.settleIfIdle();
    return cancelled.map(copyJob);
  }

  promote(jobId: string): boolean {
    const index = this.pending.findIndex((job) => job.jobId === jobId);
    if (index < 0) {
      return false;
    }
    if (index > 0) {
      const [job] = this.pending.splice(index, 1);
      this.pending.unshift(job);
    }
    this.emit({ type: "job_promoted", job: copyJob(this.pending[0]) });
    return true;
  }

  subscribe(listener: RenderQueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(projectId?: string): RenderQueueSnapshot {
    const matches = (job: RenderJob): boolean => projectId === undefined || job.projectId === projectId;
    return {
      stopped: this.stopped,
      maxConcurrency: this.options.maxConcurrency,
      pending: this.pending.filter(matches).map(copyJob),
      running: [...this.running.values()].filter(matches).map(copyJob),
    };
  }

  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.running.size === 0 && (this.pending.length === 0 || this.stopped);
  }

  private admit(): void {
    while (!this.stopped && this.running.size < this.options.maxConcurrency && this.pending.length > 0) {
      const job = this.pending.shift();
      if (!job) {
        break;
      }
      job.state = "running";
      job.startedAt = new Date().toISOString();
      this.running.set(job.jobId, job);
      this.emit({ type: "job_started", job: copyJob(job) });
      void this.execute(job);
    }
  }

  private async execute(job: RenderJob): Promise<void> {
    try {
      const result = await this.runner(job);
      job.state = "done";
      job.result = result;
      job.finishedAt = new Date().toISOString();
      this.emit({ type: "job_done", job: copyJob(job), result });
    } catch (error) {
      job.state = "failed";
      job.error = describeError(error);
      job.finishedAt = new Date().toISOString();
      console.error(`[renderQueue] ${job.kind} ${job.targetId} failed: ${job.error}`);
      this.emit({ type: "job_failed", job: copyJob(job), error: job.error });
    } finally {
      this.running.delete(job.jobId);
      this.activeByKey.delete(dedupeKey(job));
      // Fully drained after a stop: jobs enqueued since the stop may start
      if (this.stopped && this.running.size === 0 && this.pending.length > 0) {
        this.stopped = false;
      }
      this.admit();
      this.settleIfIdle();
    }
  }

  private settleIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    this.emit({ type: "queue_idle" });
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private emit(event: RenderQueueEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[renderQueue] Listener failed on ${event.type}:`, error);
      }
    }
  }
}
