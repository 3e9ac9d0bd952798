import { z } from "zod";
import type { Job, JobStatus } from "../registry/job-registry.js";
import type { ScrapeArtifact } from "../capabilities/types.js";

export const JOB_STATUSES = ["pending", "running", "completed", "failed"] as const;

export const CreateJobSchema = z.object({
  url: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), "url must use http or https"),
});

export const ListJobsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export type CreateJobDto = z.infer<typeof CreateJobSchema>;
export type ListJobsQueryDto = z.infer<typeof ListJobsQuerySchema>;

export interface JobResponseDto {
  jobId: string;
  url: string;
  status: JobStatus;
  result?: ScrapeArtifact;
  error?: string;
  createdAt: string;
  completedAt?: string;
}

export interface JobCreatedDto {
  jobId: string;
  status: JobStatus;
  message: string;
  createdAt: string;
}

export interface JobListDto {
  total: number;
  jobs: JobResponseDto[];
}

export function toJobResponseDto(job: Job): JobResponseDto {
  return {
    jobId: job.id,
    url: job.url,
    status: job.status,
    result: job.result,
    error: job.error,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt?.toISOString(),
  };
}

export function toJobCreatedDto(job: Job): JobCreatedDto {
  return {
    jobId: job.id,
    status: job.status,
    message: "Scraping job created successfully",
    createdAt: job.createdAt.toISOString(),
  };
}
