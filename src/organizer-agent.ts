/**
 * Agent facade over organization runs: lifecycle state, cumulative stats
 * and an operation dispatcher for collaborators that speak in operations.
 */

import { AppError, Logger, errorMessage } from './logger.js';
import { OrganizerConfig } from './config.js';
import { RunOptions, runOrganization } from './organization-run.js';
import { CATEGORIES, Category, OrganizeRequest, RunResult } from './types.js';

const logger = new Logger({ context: 'organizer-agent' });

export type AgentState = 'idle' | 'running' | 'completed' | 'failed';

export interface AgentStats {
  runsCompleted: number;
  runsFailed: number;
  filesProcessed: number;
  duplicatesFound: number;
  totalProcessingSeconds: number;
  lastActivity: string | null;
}

export interface AgentStatus {
  name: string;
  status: AgentState;
  stats: AgentStats;
  lastRunId: string | null;
  lastReportPath: string | null;
  lastError: string | null;
}

export interface AgentCapabilities {
  name: string;
  capabilities: string[];
  supportedCategories: readonly Category[];
  operations: string[];
}

export const SUPPORTED_OPERATIONS = ['organize_files', 'process_documents', 'get_status', 'get_capabilities'] as const;

export type ExecuteParameters = { operation?: string } & Partial<OrganizeRequest>;

export type ExecuteResult =
  | { success: true; operation: 'organize_files'; result: RunResult }
  | { success: true; operation: 'get_status'; status: AgentStatus }
  | { success: true; operation: 'get_capabilities'; capabilities: AgentCapabilities }
  | { success: false; error: string; code?: string; supported_operations?: string[] };

export type RunOrganization = (request: OrganizeRequest, options?: RunOptions) => Promise<RunResult>;

export interface AgentOptions {
  name?: string;
  settings?: Partial<OrganizerConfig>;
  reportsDir?: string;
  /** Swappable for tests */
  runner?: RunOrganization;
}

export class FileOrganizationAgent {
  readonly name: string;
  private state: AgentState = 'idle';
  private readonly stats: AgentStats = {
    runsCompleted: 0,
    runsFailed: 0,
    filesProcessed: 0,
    duplicatesFound: 0,
    totalProcessingSeconds: 0,
    lastActivity: null,
  };
  private lastRunId: string | null = null;
  private lastReportPath: string | null = null;
  private lastError: string | null = null;
  private readonly options: AgentOptions;
  private readonly runner: RunOrganization;

  constructor(options: AgentOptions = {}) {
    this.options = options;
    this.name = options.name ?? 'file_organization';
    this.runner = options.runner ?? runOrganization;
  }

  get reportsDir(): string | undefined {
    return this.options.reportsDir;
  }

  isBusy(): boolean {
    return this.state === 'running';
  }

  /**
   * Run one organization. Only one run may be in flight per agent.
   */
  async organize(request: OrganizeRequest, signal?: AbortSignal): Promise<RunResult> {
    if (this.state === 'running') {
      throw new AppError('An organization run is already in progress', 'AGENT_BUSY', 409);
    }

    this.state = 'running';
    this.stats.lastActivity = new Date().toISOString();

    let result: RunResult;
    try {
      result = await this.runner(request, {
        settings: this.options.settings,
        reportsDir: this.options.reportsDir,
        signal,
      });
    } catch (error) {
      this.recordFailure(errorMessage(error));
      throw error;
    }

    const { report } = result;
    this.lastRunId = report.runId;
    this.lastReportPath = result.reportPath;
    this.stats.filesProcessed += report.summary.filesScanned;
    this.stats.duplicatesFound += report.summary.duplicatesFound;
    this.stats.totalProcessingSeconds =
      Math.round((this.stats.totalProcessingSeconds + report.summary.processingSeconds) * 1000) / 1000;
    this.stats.lastActivity = new Date().toISOString();

    if (report.status === 'fatal_error') {
      this.recordFailure(report.error ?? 'Run failed');
    } else {
      this.state = 'completed';
      this.stats.runsCompleted += 1;
      this.lastError = null;
    }

    return result;
  }

  private recordFailure(message: string): void {
    this.state = 'failed';
    this.stats.runsFailed += 1;
    this.lastError = message;
    this.stats.lastActivity = new Date().toISOString();
    logger.warn('Organization run failed', { agent: this.name, error: message });
  }

  getStatus(): AgentStatus {
    return {
      name: this.name,
      status: this.state,
      stats: { ...this.stats },
      lastRunId: this.lastRunId,
      lastReportPath: this.lastReportPath,
      lastError: this.lastError,
    };
  }

  getCapabilities(): AgentCapabilities {
    return {
      name: this.name,
      capabilities: [
        'file_organization',
        'duplicate_detection',
        'file_categorization',
        'batch_processing',
        'report_generation',
      ],
      supportedCategories: CATEGORIES,
      operations: [...SUPPORTED_OPERATIONS],
    };
  }

  async execute(parameters: ExecuteParameters): Promise<ExecuteResult> {
    const operation = parameters.operation ?? 'organize_files';

    switch (operation) {
      case 'get_status':
        return { success: true, operation, status: this.getStatus() };
      case 'get_capabilities':
        return { success: true, operation, capabilities: this.getCapabilities() };
      case 'organize_files':
      case 'process_documents':
        return this.executeOrganize(parameters);
      default:
        return {
          success: false,
          error: `Unknown operation: ${operation}`,
          supported_operations: [...SUPPORTED_OPERATIONS],
        };
    }
  }

  private async executeOrganize(parameters: ExecuteParameters): Promise<ExecuteResult> {
    const { sourceDirectory, destinationRoot } = parameters;
    if (!sourceDirectory || !destinationRoot) {
      return {
        success: false,
        error: 'sourceDirectory and destinationRoot are required',
        code: 'VALIDATION_ERROR',
      };
    }

    try {
      const result = await this.organize({
        sourceDirectory,
        destinationRoot,
        mode: parameters.mode,
        duplicateIndexPath: parameters.duplicateIndexPath,
        reportsDir: parameters.reportsDir,
        dryRun: parameters.dryRun,
        duplicatePolicy: parameters.duplicatePolicy,
      });
      return { success: true, operation: 'organize_files', result };
    } catch (error) {
      return {
        success: false,
        error: errorMessage(error),
        code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
      };
    }
  }
}
