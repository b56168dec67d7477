import { descendantsOf, orderJobs } from '../graph';
import { JobSpec, LocalJobResult, LocalRunReport, Logger } from '../types';
import { createLogger } from '../utils/logger';
import { LocalRunOptions, runScriptLocally } from './executor';

export interface LocalRunnerOptions extends LocalRunOptions {
  logger?: Logger;
}

/**
 * Smoke-test a job graph without the platform: run every script locally in
 * dependency order. A failed job skips all of its descendants; unrelated
 * jobs keep running.
 */
export async function runJobsLocally(
  jobs: JobSpec[],
  options: LocalRunnerOptions = {}
): Promise<LocalRunReport> {
  const logger = options.logger ?? createLogger('LocalRunner');
  const ordered = orderJobs(jobs);
  const blockedBy = new Map<string, string>();
  const results: LocalJobResult[] = [];

  logger.info(`Found ${ordered.length} jobs to test: ${ordered.map((job) => job.key).join(', ')}`);

  for (const spec of ordered) {
    const blocker = blockedBy.get(spec.key);
    if (blocker) {
      logger.warn(`Skipping job '${spec.name}': upstream job "${blocker}" failed`);
      results.push({
        key: spec.key,
        name: spec.name,
        status: 'skipped',
        success: false,
        exitCode: null,
        stdout: '',
        stderr: '',
        durationMs: 0,
        error: `upstream job "${blocker}" failed`,
      });
      continue;
    }

    logger.info(`Testing job: ${spec.name}`, {
      script: spec.script,
      kernel: spec.kernel,
      cpu: spec.cpu,
      memoryGb: spec.memory,
      timeoutSeconds: spec.timeoutSeconds,
    });

    const result = await runScriptLocally(spec, options);
    results.push({
      ...result,
      key: spec.key,
      name: spec.name,
      status: result.success ? 'succeeded' : 'failed',
    });

    const seconds = (result.durationMs / 1000).toFixed(2);
    if (result.success) {
      logger.info(`Job '${spec.name}' succeeded (took ${seconds} seconds)`);
    } else {
      logger.error(`Job '${spec.name}' failed (took ${seconds} seconds): ${result.error}`);
      for (const descendant of descendantsOf(jobs, spec.key)) {
        if (!blockedBy.has(descendant)) blockedBy.set(descendant, spec.key);
      }
    }
  }

  return {
    results,
    succeeded: results.filter((r) => r.status === 'succeeded').map((r) => r.key),
    failed: results.filter((r) => r.status === 'failed').map((r) => r.key),
    skipped: results.filter((r) => r.status === 'skipped').map((r) => r.key),
    totalDurationMs: results.reduce((sum, r) => sum + r.durationMs, 0),
  };
}
