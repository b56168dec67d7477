import * as fs from 'fs';
import * as path from 'path';
import { parse, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { JobSpec } from '../types';
import { ConfigError, errorMessage } from '../utils/errors';
import { isValidSchedule } from '../utils/schedule';

const CONFIG_RELATIVE_PATH = path.join('config', 'jobs_config.yaml');

const envValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const jobEntrySchema = z
  .object({
    name: z.string().min(1),
    script: z.string().min(1),
    kernel: z.enum(['python3', 'r', 'scala']).default('python3'),
    cpu: z.number().positive().default(1),
    memory: z.number().positive().default(1),
    nvidia_gpu: z.number().int().min(0).optional(),
    timeout: z.number().int().positive().default(3600),
    arguments: z.union([z.string(), z.number()]).transform((value) => String(value)).optional(),
    environment: z.record(envValueSchema).optional(),
    attachments: z.array(z.string().min(1)).optional(),
    schedule: z
      .string()
      .refine(isValidSchedule, { message: 'must be a five-field cron expression' })
      .optional(),
    parent_job_id: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((entry, ctx) => {
    if (entry.schedule !== undefined && entry.parent_job_id !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a job cannot have both a schedule and a parent_job_id',
        path: ['schedule'],
      });
    }
  });

const jobsFileSchema = z.object({
  jobs: z
    .record(jobEntrySchema)
    .refine((jobs) => Object.keys(jobs).length > 0, { message: 'at least one job is required' }),
});

type JobEntry = z.infer<typeof jobEntrySchema>;

function toJobSpec(key: string, entry: JobEntry): JobSpec {
  return {
    key,
    name: entry.name,
    script: entry.script,
    kernel: entry.kernel,
    cpu: entry.cpu,
    memory: entry.memory,
    nvidiaGpu: entry.nvidia_gpu,
    timeoutSeconds: entry.timeout,
    arguments: entry.arguments,
    environment: entry.environment,
    attachments: entry.attachments,
    schedule: entry.schedule?.trim(),
    parentKey: entry.parent_job_id,
  };
}

/**
 * Parse a jobs file. Jobs come back in declaration order.
 */
export function parseJobsConfig(text: string, source = 'jobs config'): JobSpec[] {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(`Malformed YAML in ${source}`, [error.message]);
    }
    throw error;
  }

  const result = jobsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid job configuration in ${source}`,
      result.error.errors.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      })
    );
  }

  return Object.entries(result.data.jobs).map(([key, entry]) => toJobSpec(key, entry));
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function resolveConfigPath(
  explicit: string | undefined,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!isFile(resolved)) {
      throw new ConfigError('Jobs config file not found', [resolved]);
    }
    return resolved;
  }

  const candidates: string[] = [];
  if (env.JOBS_CONFIG_PATH) candidates.push(path.resolve(cwd, env.JOBS_CONFIG_PATH));
  candidates.push(path.join(cwd, CONFIG_RELATIVE_PATH));
  candidates.push(path.join(path.dirname(cwd), CONFIG_RELATIVE_PATH));

  const found = candidates.find(isFile);
  if (!found) {
    throw new ConfigError('Could not find a jobs config file', candidates);
  }
  return found;
}

export function loadJobsConfig(configPath: string): JobSpec[] {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError('Could not read jobs config file', [`${configPath}: ${errorMessage(error)}`]);
  }
  return parseJobsConfig(text, configPath);
}
