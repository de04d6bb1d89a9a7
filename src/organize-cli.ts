#!/usr/bin/env node
/**
 * organize-cli.ts — organize a directory into category folders and write a run report.
 */

// Must stay the first import: loggers read LOG_LEVEL when their modules load
import 'dotenv/config';
import { ConfigManager, DEFAULT_CONFIG_PATH } from './config.js';
import { AppError, errorMessage } from './logger.js';
import { runOrganization } from './organization-run.js';
import { DuplicatePolicy, OrganizationReport, OrganizeRequest, RunResult, RunStatus, TransferMode } from './types.js';

export interface CliOptions {
  source: string;
  dest: string;
  mode?: TransferMode;
  dryRun: boolean;
  index?: string;
  reportsDir?: string;
  duplicates?: DuplicatePolicy;
  configPath: string;
  help: boolean;
}

export const USAGE = `
Usage:
  file-organizer --source <dir> --dest <dir> [options]

Options:
  --mode move|copy             Move files (default) or copy them
  --dry-run                    Plan only; nothing is created or moved
  --index PATH                 Persisted duplicate index (read at start, saved at end)
  --reports-dir DIR            Where the JSON run report is written
  --duplicates report|quarantine
                               Leave duplicates in place or move them aside
  --config PATH                Config file (default: ${DEFAULT_CONFIG_PATH})
  -h, --help                   Show this help
`;

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR', 400);
    this.name = 'UsageError';
  }
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { source: '', dest: '', dryRun: false, configPath: DEFAULT_CONFIG_PATH, help: false };

  const args = [...argv];
  while (args.length > 0) {
    const arg = args.shift() ?? '';
    switch (arg) {
      case '--source':
        options.source = takeValue(args, arg);
        break;
      case '--dest':
        options.dest = takeValue(args, arg);
        break;
      case '--mode': {
        const mode = takeValue(args, arg);
        if (mode !== 'move' && mode !== 'copy') {
          throw new UsageError('--mode must be move or copy');
        }
        options.mode = mode;
        break;
      }
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--index':
        options.index = takeValue(args, arg);
        break;
      case '--reports-dir':
        options.reportsDir = takeValue(args, arg);
        break;
      case '--duplicates': {
        const policy = takeValue(args, arg);
        if (policy !== 'report' && policy !== 'quarantine') {
          throw new UsageError('--duplicates must be report or quarantine');
        }
        options.duplicates = policy;
        break;
      }
      case '--config':
        options.configPath = takeValue(args, arg);
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!options.help && (!options.source || !options.dest)) {
    throw new UsageError('--source and --dest are required');
  }

  return options;
}

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case 'ok':
      return 0;
    case 'partial_failure':
      return 2;
    default:
      return 1;
  }
}

export function formatSummary(report: OrganizationReport, reportPath: string | null): string[] {
  const { summary } = report;
  const skipped = summary.skippedUnreadable + summary.skippedExists + summary.moveFailures + summary.skippedCancelled;
  const lines = [
    `Status:     ${report.status}${report.dryRun ? ' (dry run)' : ''}`,
    `Scanned:    ${summary.filesScanned}`,
    `Organized:  ${summary.filesOrganized}`,
    `Duplicates: ${summary.duplicatesFound}`,
    `Skipped:    ${skipped}`,
    `Report:     ${reportPath ?? '(not written)'}`,
  ];
  if (report.error) {
    lines.push(`Error:      ${report.error}`);
  }
  return lines;
}

/**
 * Build the run request from flags, falling back to configuration.
 */
export function buildRequest(options: CliOptions, manager: ConfigManager): OrganizeRequest {
  const settings = manager.getAll();
  return {
    sourceDirectory: options.source,
    destinationRoot: options.dest,
    mode: options.mode ?? settings.organizer.mode,
    dryRun: options.dryRun || settings.organizer.dryRun,
    duplicateIndexPath: options.index ?? settings.paths.duplicateIndexPath,
    reportsDir: options.reportsDir ?? settings.paths.reportsDir,
    duplicatePolicy: options.duplicates ?? settings.organizer.duplicatePolicy,
  };
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const manager = new ConfigManager(options.configPath);
  const validation = manager.validate();
  if (!validation.valid) {
    for (const problem of validation.errors) {
      console.error(`Config: ${problem}`);
    }
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  let result: RunResult;
  try {
    result = await runOrganization(buildRequest(options, manager), {
      settings: manager.getAll().organizer,
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  for (const line of formatSummary(result.report, result.reportPath)) {
    console.log(line);
  }
  return exitCodeFor(result.report.status);
}

const entry = process.argv[1] ?? '';
const isDirectRun = entry.includes('organize-cli') || entry.endsWith('file-organizer');
if (isDirectRun) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    error => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  );
}
