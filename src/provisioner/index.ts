import { orderJobs } from '../graph';
import { PlatformClient, PlatformJob } from '../platform/types';
import {
  JobSpec,
  Logger,
  ProvisionCounts,
  ProvisionOutcome,
  ProvisionReport,
} from '../types';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { buildCreateRequest, buildUpdateRequest, diffJob } from './request';

export interface ProvisionOptions {
  logger?: Logger;
  dryRun?: boolean;
}

function indexByName(jobs: PlatformJob[]): Map<string, PlatformJob[]> {
  const byName = new Map<string, PlatformJob[]>();
  for (const job of jobs) {
    const list = byName.get(job.name) ?? [];
    list.push(job);
    byName.set(job.name, list);
  }
  return byName;
}

function countOutcomes(outcomes: ProvisionOutcome[]): ProvisionCounts {
  const counts: ProvisionCounts = { created: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.action]++;
  }
  return counts;
}

/**
 * Create or update one platform job per spec, parents first. Jobs are matched
 * to existing platform jobs by name; dependent jobs get the platform id their
 * parent received (or already had) earlier in the same run.
 */
export async function provisionJobs(
  jobs: JobSpec[],
  platform: PlatformClient,
  projectId: string,
  options: ProvisionOptions = {}
): Promise<ProvisionReport> {
  const logger = options.logger ?? createLogger('Provisioner');
  const ordered = orderJobs(jobs);

  logger.info(`Setting up ${ordered.length} jobs for project: ${projectId}`);

  const existingByName = indexByName(await platform.listJobs(projectId));
  const jobIds = new Map<string, string>();
  const outcomes: ProvisionOutcome[] = [];

  for (const spec of ordered) {
    const outcome: ProvisionOutcome = {
      key: spec.key,
      name: spec.name,
      action: 'failed',
      jobId: null,
      parentJobId: null,
      changedFields: [],
      error: null,
    };
    outcomes.push(outcome);

    let parentJobId: string | undefined;
    if (spec.parentKey) {
      parentJobId = jobIds.get(spec.parentKey);
      if (!parentJobId) {
        outcome.action = 'skipped';
        outcome.error = `parent job "${spec.parentKey}" was not provisioned`;
        logger.warn(`Skipping job '${spec.name}': ${outcome.error}`);
        continue;
      }
      outcome.parentJobId = parentJobId;
    }

    const matches = existingByName.get(spec.name) ?? [];
    if (matches.length > 1) {
      outcome.error = `ambiguous: ${matches.length} existing jobs are named "${spec.name}" (${matches
        .map((job) => job.id)
        .join(', ')})`;
      logger.error(`Error provisioning job '${spec.name}': ${outcome.error}`);
      continue;
    }

    try {
      let jobId: string;
      const existing = matches[0];
      if (!existing) {
        logger.info(`Creating job: ${spec.name}`);
        const created = await platform.createJob(
          projectId,
          buildCreateRequest(spec, projectId, parentJobId)
        );
        outcome.action = 'created';
        jobId = created.id;
        logger.info(`Successfully created job '${spec.name}' with ID: ${created.id}`);
      } else {
        const desired = buildUpdateRequest(spec, parentJobId);
        const changed = diffJob(existing, desired);
        if (changed.length === 0) {
          outcome.action = 'unchanged';
          jobId = existing.id;
          logger.info(`Job '${spec.name}' is up to date (ID: ${existing.id})`);
        } else {
          logger.info(`Updating job: ${spec.name}`, { jobId: existing.id, fields: changed });
          const updated = await platform.updateJob(projectId, existing.id, desired);
          outcome.action = 'updated';
          jobId = updated.id;
          outcome.changedFields = changed;
          logger.info(`Successfully updated job '${spec.name}' with ID: ${updated.id}`);
        }
      }
      outcome.jobId = jobId;
      jobIds.set(spec.key, jobId);
    } catch (error) {
      outcome.action = 'failed';
      outcome.error = errorMessage(error);
      logger.error(`Error provisioning job '${spec.name}': ${outcome.error}`);
    }
  }

  return {
    projectId,
    dryRun: options.dryRun ?? false,
    outcomes,
    jobIds: Object.fromEntries(jobIds),
    counts: countOutcomes(outcomes),
  };
}
