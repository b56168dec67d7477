import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { JobSpec, Kernel, LocalRunResult } from '../types';
import { splitArguments } from '../utils/arguments';
import { errorMessage } from '../utils/errors';

export type InterpreterMap = Partial<Record<Kernel, string>>;

export interface LocalRunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  interpreters?: InterpreterMap;
  killGraceMs?: number;
}

export function defaultInterpreters(env: NodeJS.ProcessEnv = process.env): InterpreterMap {
  return {
    python3: env.PYTHON || 'python3',
    r: 'Rscript',
  };
}

function failure(error: string, startedAt: number): LocalRunResult {
  return {
    success: false,
    exitCode: null,
    stdout: '',
    stderr: '',
    durationMs: Date.now() - startedAt,
    error,
  };
}

/**
 * Run one job's script as a child process, with the job's arguments,
 * environment and timeout. Never rejects: every failure is a result.
 */
export async function runScriptLocally(
  spec: JobSpec,
  options: LocalRunOptions = {}
): Promise<LocalRunResult> {
  const startedAt = Date.now();
  const cwd = options.cwd ?? process.cwd();
  const baseEnv = options.env ?? process.env;
  const interpreters = options.interpreters ?? defaultInterpreters(baseEnv);
  const killGraceMs = options.killGraceMs ?? 5000;

  const scriptPath = path.resolve(cwd, spec.script);
  if (!fs.existsSync(scriptPath)) {
    return failure(`Script not found: ${spec.script}`, startedAt);
  }

  const interpreter = interpreters[spec.kernel];
  if (!interpreter) {
    return failure(`No local interpreter for kernel "${spec.kernel}"`, startedAt);
  }

  let args: string[];
  try {
    args = splitArguments(spec.arguments ?? '');
  } catch (error) {
    return failure(errorMessage(error), startedAt);
  }

  return new Promise<LocalRunResult>((resolve) => {
    const child = spawn(interpreter, [scriptPath, ...args], {
      cwd,
      env: { ...baseEnv, ...spec.environment },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null) child.kill('SIGKILL');
      }, killGraceMs);
    }, spec.timeoutSeconds * 1000);

    const finish = (exitCode: number | null, error: string | undefined) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      resolve({
        success: error === undefined,
        exitCode,
        stdout,
        stderr,
        durationMs: Date.now() - startedAt,
        error,
      });
    };

    // A process that could not be started may never emit 'close'
    child.on('error', (error) => {
      finish(null, `Error running script: ${error.message}`);
    });

    child.on('close', (code) => {
      if (timedOut) {
        finish(code, `Script timed out after ${spec.timeoutSeconds} seconds`);
      } else if (code !== 0) {
        finish(code, `Script exited with code ${code}`);
      } else {
        finish(code, undefined);
      }
    });
  });
}
