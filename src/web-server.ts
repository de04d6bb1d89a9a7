#!/usr/bin/env node
/**
 * HTTP server for triggering organization runs and polling their reports
 */

// Must stay the first import: loggers read LOG_LEVEL when their modules load
import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import { getConfig } from './config.js';
import { createOrganizerRouter } from './api.js';
import { AppError, handleError, logger } from './logger.js';
import { FileOrganizationAgent } from './organizer-agent.js';
import { RunQueue } from './run-queue.js';

export function createApp(agent: FileOrganizationAgent, queue: RunQueue = new RunQueue(agent)): express.Express {
  const app = express();

  const corsOrigins = (process.env.CORS_ORIGINS || '')
    .split(',')
    .map(origin => origin.trim())
    .filter(Boolean);
  app.use(cors({ origin: corsOrigins.length > 0 ? corsOrigins : true, methods: ['GET', 'POST', 'OPTIONS'] }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', agent: agent.getStatus().status, timestamp: new Date().toISOString() });
  });

  app.use('/api', createOrganizerRouter(agent, { queue }));
  return app;
}

export function startServer(configPath?: string): void {
  const manager = getConfig(configPath);
  const validation = manager.validate();
  if (!validation.valid) {
    throw new AppError(`Invalid configuration: ${validation.errors.join('; ')}`, 'INVALID_CONFIG', 400, {
      errors: validation.errors,
    });
  }
  const settings = manager.getAll();
  const agent = new FileOrganizationAgent({
    settings: settings.organizer,
    reportsDir: settings.paths.reportsDir,
  });
  const app = createApp(agent);

  app.listen(settings.api.port, settings.api.host, () => {
    logger.info(`File organizer API listening on http://${settings.api.host}:${settings.api.port}`, undefined, 'web-server');
    logger.info('Endpoints: POST /api/runs, GET /api/runs[/:id], GET /api/reports[/:name], GET /api/agent/status', undefined, 'web-server');
  });
}

const isDirectRun = process.argv[1] && process.argv[1].includes('web-server');
if (isDirectRun) {
  try {
    startServer(process.env.ORGANIZER_CONFIG);
  } catch (error) {
    handleError(error, 'web-server');
    process.exitCode = 1;
  }
}
