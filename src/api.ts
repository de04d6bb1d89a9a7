/**
 * REST API for triggering organization runs and polling their results
 */

import { Router, Request, Response, NextFunction } from 'express';
import path from 'path';
import { DEFAULT_CONFIG } from './config.js';
import { logger, AppError } from './logger.js';
import { FileOrganizationAgent } from './organizer-agent.js';
import { REPORT_FILE_PATTERN, listReports, readReport } from './reporter.js';
import { RunQueue } from './run-queue.js';
import { DuplicatePolicy, OrganizeRequest, TransferMode } from './types.js';
import { ApiErrorResponse, ApiSuccessResponse, ListResponse } from './api-types.js';

export interface OrganizerRouterOptions {
  /** Queue shared with the caller, e.g. to wait for jobs in tests */
  queue?: RunQueue;
  /** Where GET /reports looks; defaults to the agent's reports directory */
  reportsDir?: string;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

const asyncHandler = (fn: AsyncRoute) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

function success<T>(data: T): ApiSuccessResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

function list<T>(data: T[]): ListResponse<T> {
  return { success: true, data, total: data.length, timestamp: new Date().toISOString() };
}

function invalid(message: string): AppError {
  return new AppError(message, 'VALIDATION_ERROR', 400);
}

function requiredString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid(`${key} is required`);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalid(`${key} must be a non-empty string`);
  }
  return value;
}

/**
 * Validate a POST /runs body into an organize request.
 */
export function parseRunRequest(body: unknown): OrganizeRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw invalid('Request body must be a JSON object');
  }
  const fields: Record<string, unknown> = { ...body };

  const sourceDirectory = requiredString(fields, 'sourceDirectory');
  const destinationRoot = requiredString(fields, 'destinationRoot');

  let mode: TransferMode | undefined;
  if (fields.mode !== undefined) {
    if (fields.mode !== 'move' && fields.mode !== 'copy') {
      throw invalid('mode must be move or copy');
    }
    mode = fields.mode;
  }

  let duplicatePolicy: DuplicatePolicy | undefined;
  if (fields.duplicatePolicy !== undefined) {
    if (fields.duplicatePolicy !== 'report' && fields.duplicatePolicy !== 'quarantine') {
      throw invalid('duplicatePolicy must be report or quarantine');
    }
    duplicatePolicy = fields.duplicatePolicy;
  }

  if (fields.dryRun !== undefined && typeof fields.dryRun !== 'boolean') {
    throw invalid('dryRun must be a boolean');
  }

  return {
    sourceDirectory,
    destinationRoot,
    mode,
    duplicatePolicy,
    dryRun: fields.dryRun,
    duplicateIndexPath: optionalString(fields, 'duplicateIndexPath'),
  };
}

/**
 * Create the organizer router
 */
export function createOrganizerRouter(agent: FileOrganizationAgent, options: OrganizerRouterOptions = {}): Router {
  const router = Router();
  const queue = options.queue ?? new RunQueue(agent);
  const reportsDir = path.resolve(options.reportsDir ?? agent.reportsDir ?? DEFAULT_CONFIG.paths.reportsDir);

  /**
   * POST /runs
   * Queue an organization run
   */
  router.post(
    '/runs',
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseRunRequest(req.body);
      const job = queue.enqueue(request);
      logger.info(`Run job accepted: ${job.id}`, undefined, 'api');
      res.status(202).json(success(job));
    })
  );

  /**
   * GET /runs
   * List run jobs, newest first
   */
  router.get(
    '/runs',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(list(queue.listJobs()));
    })
  );

  /**
   * GET /runs/:id
   */
  router.get(
    '/runs/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const job = queue.getJob(req.params.id);
      if (!job) {
        throw new AppError(`Run job not found: ${req.params.id}`, 'RUN_NOT_FOUND', 404);
      }
      res.json(success(job));
    })
  );

  /**
   * GET /reports
   * Persisted report files, newest first
   */
  router.get(
    '/reports',
    asyncHandler(async (_req: Request, res: Response) => {
      const reports = await listReports(reportsDir);
      res.json(list(reports.map(report => report.name)));
    })
  );

  /**
   * GET /reports/:name
   */
  router.get(
    '/reports/:name',
    asyncHandler(async (req: Request, res: Response) => {
      const { name } = req.params;
      if (!REPORT_FILE_PATTERN.test(name)) {
        throw new AppError(`Report not found: ${name}`, 'REPORT_NOT_FOUND', 404);
      }
      const stored = (await listReports(reportsDir)).find(report => report.name === name);
      if (!stored) {
        throw new AppError(`Report not found: ${name}`, 'REPORT_NOT_FOUND', 404);
      }
      res.json(success(await readReport(stored.path)));
    })
  );

  router.get(
    '/agent/status',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(success(agent.getStatus()));
    })
  );

  router.get(
    '/agent/capabilities',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(success(agent.getCapabilities()));
    })
  );

  /**
   * Error handling middleware
   */
  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      const payload: ApiErrorResponse = {
        error: err.message,
        code: err.code,
        statusCode: err.statusCode,
        details: err.context,
      };
      res.status(err.statusCode).json(payload);
      return;
    }

    logger.error('Unhandled API error', err instanceof Error ? err : undefined, 'api');
    const payload: ApiErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    };
    res.status(500).json(payload);
  });

  return router;
}
