import { JobNotFoundError, type JobRegistry } from "../registry/job-registry.js";
import type { ScrapeArtifact } from "../capabilities/types.js";
import type {
  CreateJobDto,
  JobCreatedDto,
  JobListDto,
  JobResponseDto,
  ListJobsQueryDto,
} from "../dto/job.dto.js";
import { toJobCreatedDto, toJobResponseDto } from "../dto/job.dto.js";

export type JobResultLookup =
  | { kind: "ready"; result: ScrapeArtifact }
  | { kind: "not_found" }
  | { kind: "not_ready"; status: "pending" | "running" }
  | { kind: "failed"; error: string };

export class JobFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobFailedError";
  }
}

export type JobService = ReturnType<typeof createJobService>;

export function createJobService(registry: JobRegistry) {
  function snapshotOf(id: string) {
    const job = registry.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  // Detached unit of work: submission returns before the workflow starts.
  function startProcessing(id: string): void {
    registry.start(id).catch((error: unknown) => {
      console.error(`Job ${id}: Background processing aborted:`, error);
    });
  }

  return {
    createJob(dto: CreateJobDto): JobCreatedDto {
      const id = registry.submit(dto.url);
      const created = toJobCreatedDto(snapshotOf(id));
      startProcessing(id);
      return created;
    },

    async scrapeSync(dto: CreateJobDto): Promise<ScrapeArtifact> {
      const id = registry.submit(dto.url);
      const job = await registry.start(id);

      if (job.status !== "completed" || !job.result) {
        throw new JobFailedError(job.error ?? "Scraping completed but no data was returned");
      }
      return job.result;
    },

    getJob(id: string): JobResponseDto | undefined {
      const job = registry.get(id);
      return job ? toJobResponseDto(job) : undefined;
    },

    getJobResult(id: string): JobResultLookup {
      const job = registry.get(id);
      if (!job) return { kind: "not_found" };

      switch (job.status) {
        case "pending":
        case "running":
          return { kind: "not_ready", status: job.status };
        case "failed":
          return { kind: "failed", error: job.error ?? "Unknown error" };
        case "completed":
          return job.result ? { kind: "ready", result: job.result } : { kind: "not_found" };
      }
    },

    listJobs(query: ListJobsQueryDto): JobListDto {
      const jobs = registry.list(query).map(toJobResponseDto);
      return { total: jobs.length, jobs };
    },

    deleteJob(id: string): Promise<boolean> {
      return registry.delete(id);
    },
  };
}
