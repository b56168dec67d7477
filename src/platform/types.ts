import { z } from 'zod';

export const platformJobSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  script: z.string().optional(),
  kernel: z.string().optional(),
  cpu: z.number().optional(),
  memory: z.number().optional(),
  nvidia_gpu: z.number().optional(),
  timeout: z.number().optional(),
  arguments: z.string().optional(),
  // Stored as a JSON-encoded string; some releases return the decoded map
  environment: z.union([z.string(), z.record(z.string())]).optional(),
  attachments: z.array(z.string()).optional(),
  schedule: z.string().optional(),
  parent_id: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type PlatformJob = z.infer<typeof platformJobSchema>;

export const listJobsResponseSchema = z.object({
  jobs: z.array(platformJobSchema).default([]),
  next_page_token: z.string().optional(),
});

export interface CreateJobRequest {
  project_id: string;
  name: string;
  script: string;
  kernel: string;
  cpu: number;
  memory: number;
  nvidia_gpu?: number;
  timeout: number;
  arguments?: string;
  environment?: Record<string, string>;
  attachments?: string[];
  schedule?: string;
  parent_job_id?: string;
}

export interface UpdateJobRequest {
  name: string;
  script: string;
  kernel: string;
  cpu: number;
  memory: number;
  nvidia_gpu: number;
  timeout: number;
  arguments: string;
  environment: string;
  attachments: string[];
  schedule: string;
  parent_id: string;
}

export interface PlatformClient {
  listJobs(projectId: string): Promise<PlatformJob[]>;
  createJob(projectId: string, request: CreateJobRequest): Promise<PlatformJob>;
  updateJob(projectId: string, jobId: string, request: UpdateJobRequest): Promise<PlatformJob>;
}
