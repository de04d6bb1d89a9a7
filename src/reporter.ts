/**
 * Aggregates organizer records into a run report and persists it as JSON.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { errnoCode } from './errors.js';
import { FileSystemOps, nodeFileSystem, publishFile, removeIfPresent, temporaryPathFor } from './file-mover.js';
import { AppError, Logger } from './logger.js';
import {
  CATEGORIES,
  Category,
  FileRecord,
  OrganizationReport,
  ReportSummary,
  RunStatus,
  TransferMode,
} from './types.js';

const logger = new Logger({ context: 'reporter' });

export const REPORT_FILE_PATTERN = /^organization-report-[0-9TZ-]+(?:-\d+)?\.json$/;

export interface ReportContext {
  runId: string;
  startedAt: Date;
  elapsedMs: number;
  mode: TransferMode;
  dryRun: boolean;
  sourceDirectory: string;
  destinationRoot: string;
  warnings?: string[];
  fatalError?: string;
}

export interface OrganizedFileJson {
  source_path: string;
  destination_path: string;
  category: Category;
  size_bytes: number;
  hash: string;
  collision_resolved: boolean;
}

export interface DuplicateJson {
  source_path: string;
  hash: string;
  duplicate_of: string;
  destination_path: string | null;
}

export interface SkippedJson {
  source_path: string;
  status: FileRecord['status'];
  reason: string | null;
  destination_path: string | null;
}

export interface ReportJson {
  run_id: string;
  timestamp: string;
  status: RunStatus;
  mode: TransferMode;
  dry_run: boolean;
  source_directory: string;
  destination_root: string;
  summary: {
    files_scanned: number;
    files_organized: number;
    duplicates_found: number;
    skipped_unreadable: number;
    skipped_exists: number;
    move_failures: number;
    skipped_cancelled: number;
    total_size_bytes: number;
    total_size_mb: number;
    scanned_size_bytes: number;
    processing_time_seconds: number;
  };
  type_distribution: Record<Category, number>;
  organized_files: OrganizedFileJson[];
  duplicates: DuplicateJson[];
  skipped: SkippedJson[];
  warnings: string[];
  error: string | null;
}

export interface StoredReport {
  name: string;
  path: string;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function emptyDistribution(): Record<Category, number> {
  return { document: 0, image: 0, video: 0, audio: 0, code: 0, archive: 0, other: 0 };
}

export function determineRunStatus(records: readonly FileRecord[], fatalError?: string): RunStatus {
  if (fatalError) {
    return 'fatal_error';
  }
  const degraded = records.some(
    record =>
      record.status === 'skipped_unreadable' ||
      record.status === 'move_failed' ||
      record.status === 'skipped_cancelled'
  );
  return degraded ? 'partial_failure' : 'ok';
}

export function summarize(records: readonly FileRecord[], elapsedMs: number): ReportSummary {
  const count = (status: FileRecord['status']) => records.filter(record => record.status === status).length;
  const organized = records.filter(record => record.status === 'organized');

  return {
    filesScanned: records.length,
    filesOrganized: organized.length,
    duplicatesFound: count('duplicate'),
    skippedUnreadable: count('skipped_unreadable'),
    skippedExists: count('skipped_exists'),
    moveFailures: count('move_failed'),
    skippedCancelled: count('skipped_cancelled'),
    totalBytes: organized.reduce((total, record) => total + record.sizeBytes, 0),
    scannedBytes: records.reduce((total, record) => total + record.sizeBytes, 0),
    processingSeconds: round(elapsedMs / 1000, 3),
  };
}

/**
 * Build the immutable report for one run. Records are copied and frozen;
 * the caller's array is not retained.
 */
export function buildReport(records: readonly FileRecord[], context: ReportContext): OrganizationReport {
  const categoryDistribution = emptyDistribution();
  for (const record of records) {
    if (record.status === 'organized') {
      categoryDistribution[record.category] += 1;
    }
  }

  const frozenRecords = Object.freeze(records.map(record => Object.freeze({ ...record })));

  return Object.freeze({
    runId: context.runId,
    timestamp: context.startedAt.toISOString(),
    status: determineRunStatus(records, context.fatalError),
    mode: context.mode,
    dryRun: context.dryRun,
    sourceDirectory: context.sourceDirectory,
    destinationRoot: context.destinationRoot,
    summary: Object.freeze(summarize(records, context.elapsedMs)),
    categoryDistribution: Object.freeze(categoryDistribution),
    records: frozenRecords,
    warnings: Object.freeze([...(context.warnings ?? [])]),
    error: context.fatalError ?? null,
  });
}

/**
 * JSON view of a report, keys in a fixed order.
 */
export function toReportJson(report: OrganizationReport): ReportJson {
  const organizedFiles: OrganizedFileJson[] = [];
  const duplicates: DuplicateJson[] = [];
  const skipped: SkippedJson[] = [];

  for (const record of report.records) {
    if (record.status === 'organized' && record.destinationPath !== null && record.contentHash !== null) {
      organizedFiles.push({
        source_path: record.sourcePath,
        destination_path: record.destinationPath,
        category: record.category,
        size_bytes: record.sizeBytes,
        hash: record.contentHash,
        collision_resolved: record.collisionResolved,
      });
    } else if (record.status === 'duplicate' && record.contentHash !== null) {
      duplicates.push({
        source_path: record.sourcePath,
        hash: record.contentHash,
        duplicate_of: record.duplicateOf ?? '',
        destination_path: record.destinationPath,
      });
    } else {
      skipped.push({
        source_path: record.sourcePath,
        status: record.status,
        reason: record.reason ?? null,
        destination_path: record.destinationPath,
      });
    }
  }

  const distribution = emptyDistribution();
  for (const category of CATEGORIES) {
    distribution[category] = report.categoryDistribution[category];
  }

  return {
    run_id: report.runId,
    timestamp: report.timestamp,
    status: report.status,
    mode: report.mode,
    dry_run: report.dryRun,
    source_directory: report.sourceDirectory,
    destination_root: report.destinationRoot,
    summary: {
      files_scanned: report.summary.filesScanned,
      files_organized: report.summary.filesOrganized,
      duplicates_found: report.summary.duplicatesFound,
      skipped_unreadable: report.summary.skippedUnreadable,
      skipped_exists: report.summary.skippedExists,
      move_failures: report.summary.moveFailures,
      skipped_cancelled: report.summary.skippedCancelled,
      total_size_bytes: report.summary.totalBytes,
      total_size_mb: round(report.summary.totalBytes / (1024 * 1024), 2),
      scanned_size_bytes: report.summary.scannedBytes,
      processing_time_seconds: report.summary.processingSeconds,
    },
    type_distribution: distribution,
    organized_files: organizedFiles,
    duplicates,
    skipped,
    warnings: [...report.warnings],
    error: report.error,
  };
}

export function serializeReport(report: OrganizationReport): string {
  return `${JSON.stringify(toReportJson(report), null, 2)}\n`;
}

export function reportFileName(timestamp: string, attempt = 0): string {
  const stamp = timestamp.replace(/[:.]/g, '-');
  return attempt === 0 ? `organization-report-${stamp}.json` : `organization-report-${stamp}-${attempt}.json`;
}

/**
 * Write the report under a fresh name in `reportsDir`. Never replaces an
 * existing report: a taken name gets a numeric suffix.
 */
export async function persistReport(
  report: OrganizationReport,
  reportsDir: string,
  fileSystem: FileSystemOps = nodeFileSystem
): Promise<string> {
  await fileSystem.mkdir(reportsDir);
  const content = serializeReport(report);

  for (let attempt = 0; attempt < 1000; attempt++) {
    const target = join(reportsDir, reportFileName(report.timestamp, attempt));
    const tempPath = temporaryPathFor(target);
    try {
      await fileSystem.writeFile(tempPath, content);
    } catch (error) {
      await removeIfPresent(tempPath, fileSystem);
      throw error;
    }

    try {
      await publishFile(tempPath, target, fileSystem);
      logger.info(`Report written to ${target}`, { runId: report.runId, status: report.status });
      return target;
    } catch (error) {
      await removeIfPresent(tempPath, fileSystem);
      if (errnoCode(error) !== 'EEXIST') {
        throw error;
      }
    }
  }

  throw new Error(`Unable to find a free report name in ${reportsDir}`);
}

/**
 * Stored reports, newest first.
 */
export async function listReports(reportsDir: string): Promise<StoredReport[]> {
  let names: string[];
  try {
    names = await readdir(reportsDir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  // Compared without the extension so that `-1` sorts after its base name
  const stem = (name: string) => name.slice(0, -'.json'.length);
  return names
    .filter(name => REPORT_FILE_PATTERN.test(name))
    .sort((left, right) => (stem(left) < stem(right) ? 1 : stem(left) > stem(right) ? -1 : 0))
    .map(name => ({ name, path: join(reportsDir, name) }));
}

/**
 * Load a stored report as plain JSON. Only the presence of a run id is
 * checked; reports are read back for display, not for reprocessing.
 */
export async function readReport(reportPath: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(reportPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed) || !('run_id' in parsed)) {
    throw new AppError(`Not an organization report: ${reportPath}`, 'INVALID_REPORT', 422);
  }
  return { ...parsed };
}
