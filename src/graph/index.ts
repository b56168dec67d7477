/**
 * Job dependency graph.
 *
 * Every job has at most one parent (`parent_job_id`), so the graph is a
 * forest once it is known to be acyclic: parents are ordered before their
 * children and unrelated jobs keep the order they were declared in.
 */

import { JobSpec } from '../types';
import { ConfigError } from '../utils/errors';

export interface GraphValidation {
  valid: boolean;
  errors: string[];
}

export function validateJobGraph(jobs: JobSpec[]): GraphValidation {
  const byKey = new Map(jobs.map((job) => [job.key, job]));
  const errors: string[] = [];

  const keysByName = new Map<string, string[]>();
  for (const job of jobs) {
    const keys = keysByName.get(job.name) ?? [];
    keys.push(job.key);
    keysByName.set(job.name, keys);
  }
  for (const [name, keys] of keysByName) {
    if (keys.length > 1) {
      errors.push(`Job name "${name}" is used by more than one job: ${keys.join(', ')}`);
    }
  }

  for (const job of jobs) {
    if (!job.parentKey) continue;
    if (job.parentKey === job.key) {
      errors.push(`Job "${job.key}" lists itself as its parent`);
    } else if (!byKey.has(job.parentKey)) {
      errors.push(`Job "${job.key}" depends on "${job.parentKey}" which does not exist`);
    }
  }

  // Walk each parent chain; a key seen twice on one walk closes a cycle.
  const reported = new Set<string>();
  for (const job of jobs) {
    const chain: string[] = [];
    const onChain = new Set<string>();
    let current: JobSpec | undefined = job;

    while (current && !onChain.has(current.key)) {
      chain.push(current.key);
      onChain.add(current.key);
      current = current.parentKey && current.parentKey !== current.key
        ? byKey.get(current.parentKey)
        : undefined;
    }

    if (current) {
      const cycle = chain.slice(chain.indexOf(current.key));
      const id = [...cycle].sort().join('|');
      if (!reported.has(id)) {
        reported.add(id);
        errors.push(`Dependency cycle: ${[...cycle, current.key].join(' -> ')}`);
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Order jobs so that every parent precedes its children.
 */
export function orderJobs(jobs: JobSpec[]): JobSpec[] {
  const validation = validateJobGraph(jobs);
  if (!validation.valid) {
    throw new ConfigError('Invalid job dependency graph', validation.errors);
  }

  const placed = new Set<string>();
  const ordered: JobSpec[] = [];

  while (ordered.length < jobs.length) {
    const before = ordered.length;
    for (const job of jobs) {
      if (placed.has(job.key)) continue;
      if (!job.parentKey || placed.has(job.parentKey)) {
        ordered.push(job);
        placed.add(job.key);
      }
    }
    if (ordered.length === before) {
      throw new ConfigError('Invalid job dependency graph', ['no job could be ordered']);
    }
  }

  return ordered;
}

/**
 * Group jobs by depth: layer 0 has no parent, layer n holds children of layer n-1.
 */
export function computeLayers(jobs: JobSpec[]): JobSpec[][] {
  const ordered = orderJobs(jobs);
  const depth = new Map<string, number>();
  const layers: JobSpec[][] = [];

  for (const job of ordered) {
    const parentDepth = job.parentKey ? depth.get(job.parentKey) : undefined;
    const layer = parentDepth === undefined ? 0 : parentDepth + 1;
    depth.set(job.key, layer);
    (layers[layer] ??= []).push(job);
  }

  return layers;
}

export function descendantsOf(jobs: JobSpec[], key: string): string[] {
  const children = new Map<string, string[]>();
  for (const job of jobs) {
    if (!job.parentKey) continue;
    const list = children.get(job.parentKey) ?? [];
    list.push(job.key);
    children.set(job.parentKey, list);
  }

  const result: string[] = [];
  const seen = new Set<string>([key]);
  const queue = [...(children.get(key) ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    result.push(next);
    queue.push(...(children.get(next) ?? []));
  }
  return result;
}
