import { JobSpec } from '../types';
import { CreateJobRequest, PlatformJob, UpdateJobRequest } from '../platform/types';

export function buildCreateRequest(
  spec: JobSpec,
  projectId: string,
  parentJobId?: string
): CreateJobRequest {
  const request: CreateJobRequest = {
    project_id: projectId,
    name: spec.name,
    script: spec.script,
    kernel: spec.kernel,
    cpu: spec.cpu,
    memory: spec.memory,
    timeout: spec.timeoutSeconds,
  };

  if (spec.nvidiaGpu !== undefined) request.nvidia_gpu = spec.nvidiaGpu;
  if (spec.arguments !== undefined) request.arguments = spec.arguments;
  if (spec.environment !== undefined) request.environment = spec.environment;
  if (spec.attachments !== undefined) request.attachments = spec.attachments;

  // The platform rejects a job that is both scheduled and dependent
  if (spec.schedule) {
    request.schedule = spec.schedule;
  } else if (parentJobId) {
    request.parent_job_id = parentJobId;
  }

  return request;
}

/**
 * Full replacement body: optional settings the job no longer sets are sent
 * empty so the platform drops them.
 */
export function buildUpdateRequest(spec: JobSpec, parentJobId?: string): UpdateJobRequest {
  return {
    name: spec.name,
    script: spec.script,
    kernel: spec.kernel,
    cpu: spec.cpu,
    memory: spec.memory,
    nvidia_gpu: spec.nvidiaGpu ?? 0,
    timeout: spec.timeoutSeconds,
    arguments: spec.arguments ?? '',
    environment: JSON.stringify(spec.environment ?? {}),
    attachments: spec.attachments ?? [],
    schedule: spec.schedule ?? '',
    parent_id: spec.schedule ? '' : parentJobId ?? '',
  };
}

export function decodeEnvironment(value: PlatformJob['environment']): Record<string, string> {
  if (value === undefined || value === '') {
    return {};
  }
  if (typeof value !== 'string') {
    return value;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch {
    return {};
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return {};
  }

  const env: Record<string, string> = {};
  for (const [key, entry] of Object.entries(decoded)) {
    env[key] = typeof entry === 'string' ? entry : JSON.stringify(entry);
  }
  return env;
}

function sameEnvironment(a: Record<string, string>, b: Record<string, string>): boolean {
  const aKeys = Object.keys(a).sort();
  const bKeys = Object.keys(b).sort();
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key, i) => key === bKeys[i] && a[key] === b[key]);
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

/**
 * Names of the managed fields whose remote value differs from the desired one.
 */
export function diffJob(existing: PlatformJob, desired: UpdateJobRequest): string[] {
  const changed: string[] = [];

  const scalars: Array<[keyof UpdateJobRequest, string | number, string | number]> = [
    ['name', existing.name, desired.name],
    ['script', existing.script ?? '', desired.script],
    ['kernel', existing.kernel ?? '', desired.kernel],
    ['cpu', existing.cpu ?? 0, desired.cpu],
    ['memory', existing.memory ?? 0, desired.memory],
    ['nvidia_gpu', existing.nvidia_gpu ?? 0, desired.nvidia_gpu],
    ['timeout', existing.timeout ?? 0, desired.timeout],
    ['arguments', existing.arguments ?? '', desired.arguments],
    ['schedule', existing.schedule ?? '', desired.schedule],
    ['parent_id', existing.parent_id ?? '', desired.parent_id],
  ];

  for (const [field, current, wanted] of scalars) {
    if (current !== wanted) changed.push(field);
  }

  const wantedEnv = decodeEnvironment(desired.environment);
  if (!sameEnvironment(decodeEnvironment(existing.environment), wantedEnv)) {
    changed.push('environment');
  }
  if (!sameList(existing.attachments ?? [], desired.attachments)) {
    changed.push('attachments');
  }

  return changed;
}
