import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { runJobsLocally } from '../runner';
import { runScriptLocally } from '../runner/executor';
import { silentLogger } from '../utils/logger';
import { jobSpec } from './helpers/memory-platform';

let workdir: string;

const SCRIPTS: Record<string, string> = {
  'ok.js': [
    "console.log(process.argv.slice(2).join('|'));",
    "console.log(process.env.GREETING || 'no greeting');",
  ].join('\n'),
  'fail.js': "process.stderr.write('bad');\nprocess.exitCode = 3;\n",
  'slow.js': 'setTimeout(() => {}, 30000);\n',
};

beforeAll(() => {
  workdir = fs.mkdtempSync(path.join(os.tmpdir(), 'local-runner-'));
  for (const [name, body] of Object.entries(SCRIPTS)) {
    fs.writeFileSync(path.join(workdir, name), body);
  }
});

afterAll(() => {
  fs.rmSync(workdir, { recursive: true, force: true });
});

const options = () => ({
  cwd: workdir,
  env: {},
  interpreters: { python3: process.execPath },
  killGraceMs: 200,
});

describe('runScriptLocally', () => {
  it('passes arguments and environment to the script', async () => {
    const result = await runScriptLocally(
      jobSpec({
        key: 'ok',
        script: 'ok.js',
        arguments: '--name "Ada Lovelace" plain',
        environment: { GREETING: 'hi' },
      }),
      options()
    );

    expect(result.success).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('--name|Ada Lovelace|plain\nhi\n');
    expect(result.error).toBeUndefined();
  });

  it('reports a non-zero exit with its stderr', async () => {
    const result = await runScriptLocally(jobSpec({ key: 'fail', script: 'fail.js' }), options());

    expect(result).toMatchObject({
      success: false,
      exitCode: 3,
      stderr: 'bad',
      error: 'Script exited with code 3',
    });
  });

  it('kills a script that runs past its timeout', async () => {
    const result = await runScriptLocally(
      jobSpec({ key: 'slow', script: 'slow.js', timeoutSeconds: 1 }),
      options()
    );

    expect(result.success).toBe(false);
    expect(result.error).toBe('Script timed out after 1 seconds');
    expect(result.durationMs).toBeGreaterThanOrEqual(900);
  });

  it('fails without spawning when the script is missing', async () => {
    const result = await runScriptLocally(jobSpec({ key: 'gone', script: 'gone.py' }), options());

    expect(result).toMatchObject({
      success: false,
      exitCode: null,
      error: 'Script not found: gone.py',
    });
  });

  it('fails when no interpreter is known for the kernel', async () => {
    const result = await runScriptLocally(
      jobSpec({ key: 'ok', script: 'ok.js', kernel: 'scala' }),
      options()
    );

    expect(result.error).toBe('No local interpreter for kernel "scala"');
  });

  it('fails on arguments that cannot be split', async () => {
    const result = await runScriptLocally(
      jobSpec({ key: 'ok', script: 'ok.js', arguments: '"open' }),
      options()
    );

    expect(result.error).toBe('Unterminated " quote in arguments: "open');
  });
});

describe('runJobsLocally', () => {
  it('skips the descendants of a failed job and runs unrelated jobs', async () => {
    const report = await runJobsLocally(
      [
        jobSpec({ key: 'setup', script: 'fail.js' }),
        jobSpec({ key: 'child', script: 'ok.js', parentKey: 'setup' }),
        jobSpec({ key: 'grandchild', script: 'ok.js', parentKey: 'child' }),
        jobSpec({ key: 'other', script: 'ok.js' }),
      ],
      { ...options(), logger: silentLogger }
    );

    expect(report.failed).toEqual(['setup']);
    expect(report.skipped).toEqual(['child', 'grandchild']);
    expect(report.succeeded).toEqual(['other']);
    expect(report.results.find((r) => r.key === 'grandchild')?.error).toBe(
      'upstream job "setup" failed'
    );
  });
});
