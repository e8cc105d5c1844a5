import { randomUUID } from "node:crypto";
import { describeError } from "../domain/errors.js";
import { logger } from "../lib/logger.js";
import type { IndexingRunResult } from "./connectorIndexer.js";

const log = logger.child({ module: "indexing-queue" });

export type IndexingJobStatus = "queued" | "running" | "completed" | "failed";

export interface IndexingRequest {
  connectorId: number;
  searchSpaceId: number;
}

export interface IndexingJob extends IndexingRequest {
  id: string;
  status: IndexingJobStatus;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  result: IndexingRunResult | null;
  error: string | null;
}

export type IndexingRunner = (request: IndexingRequest) => Promise<IndexingRunResult>;

const DEFAULT_MAX_RETAINED_JOBS = 500;

/**
 * In-process job queue with a fixed number of workers. Submitting returns at
 * once; a job that throws ends as `failed` instead of rejecting anything.
 * Two jobs for the same connector may run at the same time; callers that
 * need one run per connector must serialize their submissions.
 */
export class IndexingQueue {
  private readonly jobs = new Map<string, IndexingJob>();

  private readonly pending: string[] = [];

  private running = 0;

  private closed = false;

  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly runner: IndexingRunner,
    private readonly concurrency: number = 2,
    private readonly maxRetainedJobs: number = DEFAULT_MAX_RETAINED_JOBS,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Indexing concurrency must be a positive integer, received ${concurrency}.`);
    }
  }

  submit(request: IndexingRequest): IndexingJob {
    if (this.closed) {
      throw new Error("Indexing queue is closed.");
    }

    const job: IndexingJob = {
      id: randomUUID(),
      connectorId: request.connectorId,
      searchSpaceId: request.searchSpaceId,
      status: "queued",
      submittedAt: new Date().toISOString(),
      startedAt: null,
      finishedAt: null,
      result: null,
      error: null,
    };
    this.jobs.set(job.id, job);
    this.pending.push(job.id);
    this.evictFinishedJobs();
    log.info("Indexing job queued", { jobId: job.id, ...request });

    const snapshot = { ...job };
    this.pump();
    return snapshot;
  }

  getJob(id: string): IndexingJob | null {
    const job = this.jobs.get(id);
    return job ? { ...job } : null;
  }

  listJobs(): IndexingJob[] {
    return [...this.jobs.values()].map((job) => ({ ...job }));
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting jobs and waits for the accepted ones to finish. */
  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.running === 0 && this.pending.length === 0;
  }

  private pump(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const id = this.pending.shift();
      const job = id ? this.jobs.get(id) : undefined;
      if (!job) {
        continue;
      }
      this.running += 1;
      void this.execute(job).finally(() => {
        this.running -= 1;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private async execute(job: IndexingJob): Promise<void> {
    job.status = "running";
    job.startedAt = new Date().toISOString();
    try {
      job.result = await this.runner({
        connectorId: job.connectorId,
        searchSpaceId: job.searchSpaceId,
      });
      job.status = "completed";
    } catch (error) {
      job.status = "failed";
      job.error = describeError(error);
      log.error("Indexing job failed", { jobId: job.id, error: job.error });
    } finally {
      job.finishedAt = new Date().toISOString();
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private evictFinishedJobs(): void {
    if (this.jobs.size <= this.maxRetainedJobs) {
      return;
    }
    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= this.maxRetainedJobs) {
        break;
      }
      if (job.status === "completed" || job.status === "failed") {
        this.jobs.delete(id);
      }
    }
  }
}
