/**
 * logsController.ts
 * Controller for log retrieval
 */

import type { Request, Response } from 'express';

import { logger } from '../utils/logger.js';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Positive integer or nothing */
function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const limit = parseInt(value, 10);
  return limit > 0 ? limit : undefined;
}

export const getLogs = (req: Request, res: Response): void => {
  try {
    const limit = parseLimit(queryString(req.query.limit));
    const level = queryString(req.query.level);
    const since = queryString(req.query.since);

    let logs = logger.getLogs(limit);

    // Filter by level if specified
    if (level) {
      logs = logs.filter(log => log.level === level);
    }

    // Filter by timestamp if since is specified (ISO string)
    if (since) {
      const sinceDate = new Date(since);
      logs = logs.filter(log => new Date(log.timestamp) >= sinceDate);
    }

    res.json({
      logs,
      count: logs.length,
      total: logger.getLogs().length,
    });
  } catch (error) {
    logger.error('Failed to retrieve logs:', { error });
    res.status(500).json({ error: 'Failed to retrieve logs' });
  }
};

export const clearLogs = (_req: Request, res: Response): void => {
  try {
    logger.clearLogs();
    res.json({ message: 'Logs cleared' });
  } catch (error) {
    logger.error('Failed to clear logs:', { error });
    res.status(500).json({ error: 'Failed to clear logs' });
  }
};
