/**
 * Core types for the file organization engine
 */

export const CATEGORIES = ['document', 'image', 'video', 'audio', 'code', 'archive', 'other'] as const;

export type Category = (typeof CATEGORIES)[number];

export type TransferMode = 'move' | 'copy';

export type DuplicatePolicy = 'report' | 'quarantine';

export type FileStatus =
  | 'organized'
  | 'duplicate'
  | 'skipped_unreadable'
  | 'skipped_exists'
  | 'move_failed'
  | 'skipped_cancelled';

export type RunStatus = 'ok' | 'partial_failure' | 'fatal_error';

/**
 * One entry per file discovered in the source tree.
 */
export interface FileRecord {
  sourcePath: string;
  /** POSIX path relative to the source root; the ordering key */
  relativePath: string;
  sizeBytes: number;
  /** Null only when the file could not be read */
  contentHash: string | null;
  category: Category;
  /** Null for duplicates left in place and for unreadable files */
  destinationPath: string | null;
  isDuplicate: boolean;
  /** Canonical path of the first copy when this record is a duplicate */
  duplicateOf?: string;
  collisionResolved: boolean;
  status: FileStatus;
  reason?: string;
}

export interface ReportSummary {
  filesScanned: number;
  filesOrganized: number;
  duplicatesFound: number;
  skippedUnreadable: number;
  skippedExists: number;
  moveFailures: number;
  skippedCancelled: number;
  /** Bytes of organized files */
  totalBytes: number;
  scannedBytes: number;
  processingSeconds: number;
}

export interface OrganizationReport {
  runId: string;
  timestamp: string;
  status: RunStatus;
  mode: TransferMode;
  dryRun: boolean;
  sourceDirectory: string;
  destinationRoot: string;
  summary: ReportSummary;
  categoryDistribution: Record<Category, number>;
  records: readonly FileRecord[];
  warnings: readonly string[];
  error: string | null;
}

export interface OrganizeRequest {
  sourceDirectory: string;
  destinationRoot: string;
  mode?: TransferMode;
  duplicateIndexPath?: string;
  reportsDir?: string;
  dryRun?: boolean;
  duplicatePolicy?: DuplicatePolicy;
}

export interface RunResult {
  report: OrganizationReport;
  /** Null when the report could not be written */
  reportPath: string | null;
}
