/**
 * In-process job queue for organization runs. Jobs execute one at a time,
 * so there is a single writer for the destination tree and the index.
 */

import { randomUUID } from 'crypto';
import { Logger, errorMessage } from './logger.js';
import { FileOrganizationAgent } from './organizer-agent.js';
import { ReportJson, toReportJson } from './reporter.js';
import { OrganizeRequest, RunStatus } from './types.js';

const logger = new Logger({ context: 'run-queue' });

export type RunJobStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface RunJob {
  id: string;
  status: RunJobStatus;
  request: OrganizeRequest;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  runId: string | null;
  runStatus: RunStatus | null;
  reportPath: string | null;
  report: ReportJson | null;
  error: string | null;
}

export interface RunQueueOptions {
  /** Finished jobs kept for polling; oldest are dropped first */
  maxFinishedJobs?: number;
}

export class RunQueue {
  private readonly jobs: RunJob[] = [];
  private tail: Promise<void> = Promise.resolve();
  private readonly maxFinishedJobs: number;

  constructor(
    private readonly agent: FileOrganizationAgent,
    options: RunQueueOptions = {}
  ) {
    this.maxFinishedJobs = Math.max(1, options.maxFinishedJobs ?? 100);
  }

  enqueue(request: OrganizeRequest): RunJob {
    const job: RunJob = {
      id: randomUUID(),
      status: 'queued',
      request: { ...request },
      createdAt: new Date().toISOString(),
      startedAt: null,
      finishedAt: null,
      runId: null,
      runStatus: null,
      reportPath: null,
      report: null,
      error: null,
    };

    this.jobs.push(job);
    this.tail = this.tail.then(() => this.runJob(job));
    logger.info(`Queued run job ${job.id}`, { source: request.sourceDirectory, destination: request.destinationRoot });

    return { ...job };
  }

  getJob(id: string): RunJob | undefined {
    const job = this.jobs.find(candidate => candidate.id === id);
    return job ? { ...job } : undefined;
  }

  /**
   * Newest first
   */
  listJobs(): RunJob[] {
    return this.jobs
      .slice()
      .reverse()
      .map(job => ({ ...job }));
  }

  /**
   * Resolves once every job queued so far has finished.
   */
  onIdle(): Promise<void> {
    return this.tail;
  }

  private async runJob(job: RunJob): Promise<void> {
    job.status = 'running';
    job.startedAt = new Date().toISOString();

    try {
      const { report, reportPath } = await this.agent.organize(job.request);
      job.runId = report.runId;
      job.runStatus = report.status;
      job.reportPath = reportPath;
      job.report = toReportJson(report);
      job.error = report.error;
      job.status = report.status === 'fatal_error' ? 'failed' : 'completed';
    } catch (error) {
      job.status = 'failed';
      job.error = errorMessage(error);
      logger.warn(`Run job ${job.id} failed`, { error: job.error });
    }

    job.finishedAt = new Date().toISOString();
    this.prune();
  }

  private prune(): void {
    const finished = this.jobs.filter(job => job.status === 'completed' || job.status === 'failed');
    let excess = finished.length - this.maxFinishedJobs;
    for (let position = 0; position < this.jobs.length && excess > 0; ) {
      const status = this.jobs[position].status;
      if (status === 'completed' || status === 'failed') {
        this.jobs.splice(position, 1);
        excess -= 1;
      } else {
        position += 1;
      }
    }
  }
}
