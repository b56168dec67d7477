import { JobSpec, LocalRunReport, ProvisionOutcome, ProvisionReport } from '../types';
import { computeLayers, orderJobs } from '../graph';
import { nextRunAt } from '../utils/schedule';

const colors = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  reset: '\x1b[0m',
};

function paint(message: string, color: string, enabled: boolean): string {
  return enabled ? `${color}${message}${colors.reset}` : message;
}

const actionColor: Record<ProvisionOutcome['action'], string> = {
  created: colors.green,
  updated: colors.cyan,
  unchanged: colors.reset,
  skipped: colors.yellow,
  failed: colors.red,
};

export function formatProvisionReport(report: ProvisionReport, color = false): string[] {
  const lines: string[] = [];
  const heading = report.dryRun
    ? 'Dry run complete, no changes were made. Planned jobs:'
    : 'Job setup complete. Provisioned jobs:';
  lines.push('', paint(heading, colors.blue, color));

  for (const outcome of report.outcomes) {
    let detail: string;
    if (outcome.jobId) {
      detail = outcome.jobId;
    } else {
      detail = outcome.error ?? 'no id';
    }
    const fields = outcome.changedFields.length > 0 ? ` [${outcome.changedFields.join(', ')}]` : '';
    lines.push(
      `- ${outcome.key}: ${detail} ${paint(`(${outcome.action})`, actionColor[outcome.action], color)}${fields}`
    );
  }

  const { counts } = report;
  lines.push(
    '',
    `Created: ${counts.created}, updated: ${counts.updated}, unchanged: ${counts.unchanged}, ` +
      `skipped: ${counts.skipped}, failed: ${counts.failed}`
  );
  return lines;
}

export function formatJobPlan(jobs: JobSpec[], now: Date = new Date()): string[] {
  const layers = computeLayers(jobs);
  const lines: string[] = [];
  lines.push(`Order: ${orderJobs(jobs).map((job) => job.key).join(' -> ')}`);
  lines.push(`${jobs.length} jobs in ${layers.length} dependency layers`);

  layers.forEach((layer, index) => {
    lines.push(`  Layer ${index}: [${layer.map((job) => job.key).join(', ')}]`);
  });

  const scheduled = layers.flat().filter((job) => job.schedule);
  if (scheduled.length > 0) {
    lines.push('Schedules (UTC):');
    for (const job of scheduled) {
      const schedule = job.schedule ?? '';
      lines.push(`  ${job.key}: "${schedule}" next run ${nextRunAt(schedule, now).toISOString()}`);
    }
  }
  return lines;
}

export function formatLocalRunReport(report: LocalRunReport, color = false): string[] {
  const lines = [
    '',
    paint('=== Test Results Summary ===', colors.blue, color),
    `Total jobs tested: ${report.results.length}`,
    paint(`Successful: ${report.succeeded.length}`, colors.green, color),
    paint(`Failed: ${report.failed.length}`, colors.red, color),
    paint(`Skipped: ${report.skipped.length}`, colors.yellow, color),
  ];
  if (report.succeeded.length > 0) lines.push(`Successful jobs: ${report.succeeded.join(', ')}`);
  if (report.failed.length > 0) lines.push(`Failed jobs: ${report.failed.join(', ')}`);
  if (report.skipped.length > 0) lines.push(`Skipped jobs: ${report.skipped.join(', ')}`);
  lines.push(`Total execution time: ${(report.totalDurationMs / 1000).toFixed(2)} seconds`);
  return lines;
}
