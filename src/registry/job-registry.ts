import { randomUUID } from "node:crypto";
import { errorMessage } from "../lib/errors.js";
import { KeyedLock } from "../lib/lock.js";
import { toArtifact } from "../workflow/artifact.js";
import type { RunWorkflow } from "../workflow/engine.js";
import type { WorkflowState } from "../workflow/state.js";
import type { ScrapeArtifact } from "../capabilities/types.js";

export type JobStatus = "pending" | "running" | "completed" | "failed";

export interface Job {
  id: string;
  url: string;
  status: JobStatus;
  result?: ScrapeArtifact;
  error?: string;
  createdAt: Date;
  completedAt?: Date;
}

export interface ListJobsFilter {
  status?: JobStatus;
  limit?: number;
}

export class JobNotFoundError extends Error {
  constructor(id: string) {
    super(`Job ${id} not found`);
    this.name = "JobNotFoundError";
  }
}

export class JobStateError extends Error {
  constructor(id: string, status: JobStatus, expected: JobStatus) {
    super(`Job ${id} is ${status}, expected ${expected}`);
    this.name = "JobStateError";
  }
}

// Deep copy: callers must not reach the stored result through a returned Job.
function snapshot(job: Job): Job {
  return structuredClone(job);
}

/**
 * In-memory job table. Records are only mutated here, and every mutation of a
 * given job runs under that job's lock. Callers receive copies.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>();
  private readonly lock = new KeyedLock();
  private readonly now: () => Date;

  constructor(
    private readonly runWorkflow: RunWorkflow,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  submit(url: string): string {
    const job: Job = {
      id: randomUUID(),
      url,
      status: "pending",
      createdAt: this.now(),
    };

    this.jobs.set(job.id, job);
    console.log(`Job ${job.id} created for ${url}`);

    return job.id;
  }

  /**
   * Run the workflow for a pending job and land it in a terminal status. Only
   * rejects for an unknown or non-pending job; workflow trouble becomes a
   * failed job.
   */
  async start(jobId: string): Promise<Job> {
    const url = await this.lock.run(jobId, () => {
      const job = this.require(jobId);
      if (job.status !== "pending") {
        throw new JobStateError(jobId, job.status, "pending");
      }
      job.status = "running";
      return job.url;
    });

    console.log(`Job ${jobId}: Running workflow for ${url}`);

    let state: WorkflowState;
    try {
      state = await this.runWorkflow(url, `Job ${jobId}`);
    } catch (error) {
      console.error(`Job ${jobId} crashed:`, error);
      return this.fail(jobId, errorMessage(error));
    }

    return this.complete(jobId, state);
  }

  async complete(jobId: string, state: WorkflowState): Promise<Job> {
    return this.lock.run(jobId, () => {
      const job = this.require(jobId);
      job.completedAt = this.now();

      if (state.status === "completed") {
        job.status = "completed";
        job.result = toArtifact(state);
        console.log(`Job ${jobId} completed: ${job.result.data.length} pages summarized`);
      } else {
        job.status = "failed";
        job.error = state.errors.at(-1)?.message ?? "Workflow did not complete";
        console.error(`Job ${jobId} failed: ${job.error}`);
      }

      return snapshot(job);
    });
  }

  get(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job ? snapshot(job) : undefined;
  }

  list({ status, limit }: ListJobsFilter = {}): Job[] {
    const matching = Array.from(this.jobs.values())
      .filter((job) => !status || job.status === status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return (limit === undefined ? matching : matching.slice(0, limit)).map(snapshot);
  }

  async delete(jobId: string): Promise<boolean> {
    return this.lock.run(jobId, () => this.jobs.delete(jobId));
  }

  private async fail(jobId: string, error: string): Promise<Job> {
    return this.lock.run(jobId, () => {
      const job = this.require(jobId);
      job.status = "failed";
      job.error = error;
      job.completedAt = this.now();
      return snapshot(job);
    });
  }

  private require(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }
}
