/**
 * One complete organization run: index in, files placed, report and index out.
 */

import { randomUUID } from 'crypto';
import path from 'path';
import { DEFAULT_CONFIG, OrganizerConfig } from './config.js';
import { DuplicateIndex } from './duplicate-index.js';
import { FileSystemOps } from './file-mover.js';
import { FileDigest, HashOptions } from './hasher.js';
import { Logger, errorMessage, handleError } from './logger.js';
import { FileOrganizer, OrganizeOutcome } from './organizer.js';
import { buildReport, persistReport } from './reporter.js';
import { OrganizeRequest, RunResult } from './types.js';

const logger = new Logger({ context: 'organization-run' });

export interface RunOptions {
  /** Organizer settings from configuration; the request overrides mode, dry run and policy */
  settings?: Partial<OrganizerConfig>;
  /** Used when the request names no reports directory */
  reportsDir?: string;
  runId?: string;
  signal?: AbortSignal;
  fileSystem?: FileSystemOps;
  hasher?: (filePath: string, options: HashOptions) => Promise<FileDigest>;
}

/**
 * Run the organizer against a request and persist its report. Never
 * rejects: root failures and unexpected errors come back as a
 * `fatal_error` report, and an unwritable report gives `reportPath: null`.
 */
export async function runOrganization(request: OrganizeRequest, options: RunOptions = {}): Promise<RunResult> {
  const settings: OrganizerConfig = { ...DEFAULT_CONFIG.organizer, ...options.settings };
  const mode = request.mode ?? settings.mode;
  const dryRun = request.dryRun ?? settings.dryRun;
  const sourceDirectory = path.resolve(request.sourceDirectory);
  const destinationRoot = path.resolve(request.destinationRoot);
  const reportsDir = path.resolve(request.reportsDir ?? options.reportsDir ?? DEFAULT_CONFIG.paths.reportsDir);
  const indexPath = request.duplicateIndexPath ? path.resolve(request.duplicateIndexPath) : undefined;
  const runId = options.runId ?? randomUUID();
  const startedAt = new Date();
  const started = Date.now();
  const warnings: string[] = [];

  let index = new DuplicateIndex();
  let indexSaveable = true;
  if (indexPath) {
    const loaded = DuplicateIndex.load(indexPath);
    index = loaded.index;
    indexSaveable = loaded.saveable;
    if (loaded.warning) {
      warnings.push(loaded.warning);
    }
  }

  const organizer = new FileOrganizer(
    {
      ...settings,
      sourceDirectory,
      destinationRoot,
      mode,
      dryRun,
      duplicatePolicy: request.duplicatePolicy ?? settings.duplicatePolicy,
      excludePaths: indexPath ? [reportsDir, indexPath] : [reportsDir],
      runId,
      signal: options.signal,
    },
    { index, fileSystem: options.fileSystem, hasher: options.hasher }
  );

  let outcome: OrganizeOutcome | undefined;
  let fatalError: string | undefined;
  try {
    outcome = await organizer.organize();
  } catch (error) {
    fatalError = handleError(error, 'organization-run').message;
  }

  const report = buildReport(outcome?.records ?? [], {
    runId,
    startedAt: outcome?.startedAt ?? startedAt,
    elapsedMs: outcome?.elapsedMs ?? Date.now() - started,
    mode,
    dryRun,
    sourceDirectory,
    destinationRoot,
    warnings: [...warnings, ...(outcome?.warnings ?? [])],
    fatalError,
  });

  let reportPath: string | null = null;
  try {
    reportPath = await persistReport(report, reportsDir);
  } catch (error) {
    logger.error('Report could not be written', error instanceof Error ? error : undefined, 'organization-run');
  }

  if (indexPath && indexSaveable && !dryRun && !fatalError) {
    try {
      index.save(indexPath);
    } catch (error) {
      logger.error(`Duplicate index could not be saved: ${errorMessage(error)}`, undefined, 'organization-run');
    }
  }

  logger.info(`Run ${runId} finished with status ${report.status}`, {
    scanned: report.summary.filesScanned,
    organized: report.summary.filesOrganized,
    duplicates: report.summary.duplicatesFound,
    reportPath,
  });

  return { report, reportPath };
}
