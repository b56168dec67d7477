#!/usr/bin/env node
import 'dotenv/config';
import { loadPlatformSettings } from '../config/env';
import { loadJobsConfig, resolveConfigPath } from '../config/jobs';
import { HttpPlatformClient } from '../platform/client';
import { DryRunPlatform } from '../platform/dry-run';
import { PlatformClient } from '../platform/types';
import { provisionJobs } from '../provisioner';
import { runJobsLocally } from '../runner';
import { PlatformSettings } from '../types';
import { ConfigError, PlatformApiError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { formatJobPlan, formatLocalRunReport, formatProvisionReport } from './output';

export type Command = 'provision' | 'validate' | 'run-local' | 'help';

export interface CliArgs {
  command: Command;
  positionals: string[];
  configPath?: string;
  cwd?: string;
  dryRun: boolean;
}

const COMMANDS: readonly Command[] = ['provision', 'validate', 'run-local', 'help'];

const USAGE = `Usage: ml-jobs <command> [options]

Commands:
  provision [<host> <api-key> <project-id>]   Create or update platform jobs from the config
  validate                                    Check the config and print the dependency order
  run-local                                   Run every job's script locally in dependency order

Options:
  --config <path>   Jobs config file (default: config/jobs_config.yaml)
  --dry-run         provision: read the project, report planned changes, write nothing
  --cwd <dir>       run-local: directory scripts are resolved and run from
  -h, --help        Show this help

Connection settings fall back to CML_HOST, CML_API_KEY and CML_PROJECT_ID.`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', positionals: [], dryRun: false };
  let commandSeen = false;

  const valueFor = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--help':
      case '-h':
        args.command = 'help';
        return args;
      case '--config':
        args.configPath = valueFor(arg, ++i);
        break;
      case '--cwd':
        args.cwd = valueFor(arg, ++i);
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        if (!commandSeen) {
          if (!isCommand(arg)) {
            throw new Error(`Unknown command: ${arg}`);
          }
          args.command = arg;
          commandSeen = true;
        } else {
          args.positionals.push(arg);
        }
    }
  }

  if (args.command === 'provision' && args.positionals.length > 3) {
    throw new Error('provision takes at most three arguments: <host> <api-key> <project-id>');
  }
  if (args.command !== 'provision' && args.positionals.length > 0) {
    throw new Error(`Unexpected argument: ${args.positionals[0]}`);
  }
  return args;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createPlatform?: (settings: PlatformSettings) => PlatformClient;
  print?: (line: string) => void;
  color?: boolean;
}

const logger = createLogger('CLI');

async function runProvision(args: CliArgs, deps: Required<CliDependencies>): Promise<number> {
  const [host, apiKey, projectId] = args.positionals;
  const settings = loadPlatformSettings(deps.env, { host, apiKey, projectId });
  const configPath = resolveConfigPath(args.configPath, deps.cwd, deps.env);
  const jobs = loadJobsConfig(configPath);
  logger.info(`Loaded ${jobs.length} jobs from ${configPath}`);

  let platform = deps.createPlatform(settings);
  if (args.dryRun) {
    platform = new DryRunPlatform(platform);
  }

  const report = await provisionJobs(jobs, platform, settings.projectId, { dryRun: args.dryRun });
  formatProvisionReport(report, deps.color).forEach(deps.print);
  return report.counts.failed + report.counts.skipped > 0 ? 1 : 0;
}

function runValidate(args: CliArgs, deps: Required<CliDependencies>): number {
  const configPath = resolveConfigPath(args.configPath, deps.cwd, deps.env);
  const jobs = loadJobsConfig(configPath);
  deps.print(`${configPath} is valid`);
  formatJobPlan(jobs).forEach(deps.print);
  return 0;
}

async function runLocal(args: CliArgs, deps: Required<CliDependencies>): Promise<number> {
  const cwd = args.cwd ?? deps.cwd;
  const configPath = resolveConfigPath(args.configPath, cwd, deps.env);
  const jobs = loadJobsConfig(configPath);

  const report = await runJobsLocally(jobs, { cwd, env: deps.env });
  formatLocalRunReport(report, deps.color).forEach(deps.print);
  return report.failed.length + report.skipped.length > 0 ? 1 : 0;
}

export async function main(argv: string[], dependencies: CliDependencies = {}): Promise<number> {
  const deps: Required<CliDependencies> = {
    env: dependencies.env ?? process.env,
    cwd: dependencies.cwd ?? process.cwd(),
    createPlatform:
      dependencies.createPlatform ?? ((settings) => HttpPlatformClient.fromSettings(settings)),
    print: dependencies.print ?? ((line) => console.log(line)),
    color: dependencies.color ?? process.stdout.isTTY === true,
  };

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    logger.error(errorMessage(error));
    deps.print(USAGE);
    return 1;
  }

  try {
    switch (args.command) {
      case 'provision':
        return await runProvision(args, deps);
      case 'validate':
        return runValidate(args, deps);
      case 'run-local':
        return await runLocal(args, deps);
      case 'help':
        deps.print(USAGE);
        return 0;
    }
  } catch (error) {
    if (error instanceof ConfigError || error instanceof PlatformApiError) {
      logger.error(error.message);
    } else {
      logger.error('Unexpected error', { error: error instanceof Error ? error.stack : String(error) });
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
