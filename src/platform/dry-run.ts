import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../types';
import { createLogger } from '../utils/logger';
import { CreateJobRequest, PlatformClient, PlatformJob, UpdateJobRequest } from './types';

/**
 * Reads go to the wrapped client; writes are only logged and answered with
 * the job the platform would have returned.
 */
export class DryRunPlatform implements PlatformClient {
  constructor(
    private readonly inner: PlatformClient,
    private readonly logger: Logger = createLogger('DryRun')
  ) {}

  async listJobs(projectId: string): Promise<PlatformJob[]> {
    return this.inner.listJobs(projectId);
  }

  async createJob(projectId: string, request: CreateJobRequest): Promise<PlatformJob> {
    const id = `dry-run-${uuidv4()}`;
    this.logger.info(`Would create job "${request.name}" in project ${projectId}`, {
      script: request.script,
      parentJobId: request.parent_job_id ?? null,
      schedule: request.schedule ?? null,
    });

    return {
      id,
      name: request.name,
      script: request.script,
      kernel: request.kernel,
      cpu: request.cpu,
      memory: request.memory,
      nvidia_gpu: request.nvidia_gpu ?? 0,
      timeout: request.timeout,
      arguments: request.arguments ?? '',
      environment: JSON.stringify(request.environment ?? {}),
      attachments: request.attachments ?? [],
      schedule: request.schedule ?? '',
      parent_id: request.parent_job_id ?? '',
    };
  }

  async updateJob(
    projectId: string,
    jobId: string,
    request: UpdateJobRequest
  ): Promise<PlatformJob> {
    this.logger.info(`Would update job "${request.name}" (${jobId}) in project ${projectId}`);
    return { id: jobId, ...request };
  }
}
