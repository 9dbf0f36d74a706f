#!/usr/bin/env node
/**
 * sync-cli.ts: run the loop folder synchronization from the command line.
 */

import { resolve } from 'path';
import { config } from 'dotenv';
import { ConfigManager, createExampleConfig, type PathsConfig } from './config.js';
import { SetupError } from './errors.js';
import { errorMessage, logger, normalizeLogLevel } from './logger.js';
import { formatSummary, runPipeline } from './pipeline.js';

export type CliCommand =
  | {
      kind: 'run';
      configPath?: string;
      paths: PathsConfig;
      stages?: number[];
      logLevel?: string;
    }
  | { kind: 'init-config'; outputPath?: string }
  | { kind: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const PATH_FLAGS = new Map<string, keyof PathsConfig>([
  ['--table', 'entityTable'],
  ['--store', 'sourceStore'],
  ['--index', 'referenceIndex'],
  ['--master', 'masterDocument'],
  ['--dest', 'destinationRoot'],
]);

export const USAGE = `
Usage:
  loop-sync run [options]
  loop-sync init-config [path]

Run options:
  --table PATH       Entity table (.xlsx)
  --store DIR        Source store folder
  --index PATH       Reference index (text)
  --master PATH      Master document (.pdf)
  --dest DIR         Destination root
  --config PATH      Configuration file (.yaml, .yml or .json)
  --stages 1,2,...   Run only these stages
  --log-level LEVEL  debug, info, warn or error

Paths may also come from SYNC_ENTITY_TABLE, SYNC_SOURCE_STORE,
SYNC_REFERENCE_INDEX, SYNC_MASTER_DOCUMENT and SYNC_DESTINATION_ROOT.
`;

function parseStages(value: string): number[] {
  const stages = value.split(',').map(part => part.trim()).filter(Boolean);
  if (stages.length === 0 || stages.some(stage => !/^\d+$/.test(stage))) {
    throw new UsageError(`Invalid --stages value: ${value}`);
  }
  return stages.map(stage => Number.parseInt(stage, 10));
}

export function parseArgs(argv: string[]): CliCommand {
  const args = [...argv];
  const command = args.shift();

  if (command === undefined || command === '-h' || command === '--help' || command === 'help') {
    return { kind: 'help' };
  }
  if (command === 'init-config') {
    return { kind: 'init-config', outputPath: args.shift() };
  }
  if (command !== 'run') {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const run: Extract<CliCommand, { kind: 'run' }> = { kind: 'run', paths: {} };
  while (args.length > 0) {
    const arg = args.shift() ?? '';
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    const value = args.shift();
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${arg}`);
    }

    const pathKey = PATH_FLAGS.get(arg);
    if (pathKey) {
      run.paths[pathKey] = resolve(value);
      continue;
    }

    switch (arg) {
      case '--config':
        run.configPath = resolve(value);
        break;
      case '--stages':
        run.stages = parseStages(value);
        break;
      case '--log-level':
        run.logLevel = value;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return run;
}

/**
 * Returns the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  config({ override: false });

  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.log(USAGE);
    return 1;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  if (command.kind === 'init-config') {
    createExampleConfig(command.outputPath);
    return 0;
  }

  const manager = new ConfigManager(command.configPath).applyEnvironment();
  for (const [key, value] of Object.entries(command.paths)) {
    manager.set(`paths.${key}`, value);
  }
  if (command.logLevel) {
    manager.set('logging.level', normalizeLogLevel(command.logLevel, manager.getSection('logging').level));
  }

  const validation = manager.validate();
  if (!validation.valid) {
    for (const message of validation.errors) {
      logger.error(`Invalid configuration: ${message}`);
    }
    return 1;
  }

  try {
    const summary = await runPipeline(manager.getAll(), { stages: command.stages });
    console.log(formatSummary(summary));
    return 0;
  } catch (error) {
    if (error instanceof SetupError) {
      console.error(`Setup failed: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

const isDirectRun = /(sync-cli|loop-sync)(\.[jt]s)?$/.test(process.argv[1] ?? '');
if (isDirectRun) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Run failed', error instanceof Error ? error : new Error(String(error)));
      process.exitCode = 1;
    });
}
