export type Kernel = 'python3' | 'r' | 'scala';

export interface JobSpec {
  key: string;
  name: string;
  script: string;
  kernel: Kernel;
  cpu: number;
  memory: number;
  nvidiaGpu?: number;
  timeoutSeconds: number;
  arguments?: string;
  environment?: Record<string, string>;
  attachments?: string[];
  schedule?: string;
  parentKey?: string;
}

export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export interface PlatformSettings {
  host: string;
  apiKey: string;
  projectId: string;
  timeoutMs: number;
  pageSize: number;
}

export type ProvisionAction =
  | 'created'
  | 'updated'
  | 'unchanged'
  | 'skipped'
  | 'failed';

export interface ProvisionOutcome {
  key: string;
  name: string;
  action: ProvisionAction;
  jobId: string | null;
  parentJobId: string | null;
  changedFields: string[];
  error: string | null;
}

export interface ProvisionCounts {
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
}

export interface ProvisionReport {
  projectId: string;
  dryRun: boolean;
  outcomes: ProvisionOutcome[];
  jobIds: Record<string, string>;
  counts: ProvisionCounts;
}

export interface LocalRunResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  error?: string;
}

export type LocalJobStatus = 'succeeded' | 'failed' | 'skipped';

export interface LocalJobResult extends LocalRunResult {
  key: string;
  name: string;
  status: LocalJobStatus;
}

export interface LocalRunReport {
  results: LocalJobResult[];
  succeeded: string[];
  failed: string[];
  skipped: string[];
  totalDurationMs: number;
}
