/**
 * Public entry point for the file organization engine
 */

export * from './types.js';
export { classify, extensionOf, extensionsFor, categoryFromMimeType } from './classifier.js';
export { hashFile, hashBuffer, DEFAULT_HASH_ALGORITHM, DEFAULT_CHUNK_SIZE_BYTES } from './hasher.js';
export type { FileDigest, HashOptions } from './hasher.js';
export { DuplicateIndex } from './duplicate-index.js';
export type { DuplicateIndexEntry, IndexReader, LoadedIndex } from './duplicate-index.js';
export { transferFile, publishFile, nodeFileSystem } from './file-mover.js';
export type { FileSystemOps, TransferOptions } from './file-mover.js';
export { scanSourceTree } from './scanner.js';
export type { DiscoveredFile, ScanOptions } from './scanner.js';
export { FileOrganizer, suffixedName } from './organizer.js';
export type { OrganizerOptions, OrganizerDependencies, OrganizeOutcome } from './organizer.js';
export {
  buildReport,
  toReportJson,
  serializeReport,
  persistReport,
  listReports,
  readReport,
  REPORT_FILE_PATTERN,
} from './reporter.js';
export type { ReportContext, ReportJson } from './reporter.js';
export { runOrganization } from './organization-run.js';
export type { RunOptions } from './organization-run.js';
export { FileOrganizationAgent } from './organizer-agent.js';
export type { AgentStatus, AgentCapabilities, ExecuteParameters, ExecuteResult } from './organizer-agent.js';
export { RunQueue } from './run-queue.js';
export type { RunJob, RunJobStatus } from './run-queue.js';
export { createOrganizerRouter, parseRunRequest } from './api.js';
export { ConfigManager, DEFAULT_CONFIG, getConfig } from './config.js';
export type { AppConfig, OrganizerConfig } from './config.js';
export {
  UnreadableFileError,
  MoveFailureError,
  SourceRootError,
  DestinationRootError,
  CorruptIndexError,
  IndexReadError,
} from './errors.js';
export { Logger, logger, AppError } from './logger.js';
