import { z } from 'zod';
import { PlatformSettings } from '../types';
import { ConfigError } from '../utils/errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  CML_HOST: optionalString,
  CDSW_DOMAIN: optionalString,
  CML_API_KEY: optionalString,
  CDSW_APIV2_KEY: optionalString,
  CML_PROJECT_ID: optionalString,
  CDSW_PROJECT_ID: optionalString,
  CML_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CML_API_PAGE_SIZE: z.coerce.number().int().positive().max(1000).default(100),
});

const hostSchema = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

export interface PlatformOverrides {
  host?: string;
  apiKey?: string;
  projectId?: string;
}

/**
 * Resolve platform connection settings. Explicit overrides (CLI arguments)
 * win over CML_* variables, which win over the CDSW_* variables present
 * inside a running platform session.
 */
export function loadPlatformSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: PlatformOverrides = {}
): PlatformSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid platform environment',
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;

  const host =
    overrides.host ?? vars.CML_HOST ?? (vars.CDSW_DOMAIN ? `https://${vars.CDSW_DOMAIN}` : undefined);
  const apiKey = overrides.apiKey ?? vars.CML_API_KEY ?? vars.CDSW_APIV2_KEY;
  const projectId = overrides.projectId ?? vars.CML_PROJECT_ID ?? vars.CDSW_PROJECT_ID;

  const missing: string[] = [];
  if (!host) missing.push('host (CML_HOST)');
  if (!apiKey) missing.push('API key (CML_API_KEY)');
  if (!projectId) missing.push('project id (CML_PROJECT_ID)');
  if (!host || !apiKey || !projectId) {
    throw new ConfigError('Missing platform connection settings', missing);
  }

  const hostResult = hostSchema.safeParse(host);
  if (!hostResult.success) {
    throw new ConfigError('Invalid platform host', [`${host} is not a valid URL`]);
  }

  return {
    host: hostResult.data,
    apiKey,
    projectId,
    timeoutMs: vars.CML_API_TIMEOUT_MS,
    pageSize: vars.CML_API_PAGE_SIZE,
  };
}
