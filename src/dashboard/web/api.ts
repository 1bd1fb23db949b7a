/**
 * Relay API
 *
 * Endpoints the dashboard calls when it is served by the relay rather than
 * opened from disk.
 */

import * as fs from 'fs';
import chalk from 'chalk';
import type { Express, Request, Response } from 'express';
import type { GenerateResult } from '../generate.js';
import type { PinStore } from '../pins.js';
import type { ActivityLog } from '../../sync/activity-log.js';
import type { MachineStateStore } from '../../sync/machine-store.js';
import type { EditorLauncher } from './launcher.js';

export interface RelayContext {
  outputPath: string;
  launcher: EditorLauncher;
  pins: PinStore;
  activity: ActivityLog;
  store: MachineStateStore;
  /** Result of the most recent generation */
  current(): GenerateResult;
  regenerate(): Promise<GenerateResult>;
  now?: () => Date;
  log?: (line: string) => void;
}

function queryString(req: Request, name: string): string | null {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

/**
 * Register API routes on the Express app
 */
export function registerRelayRoutes(app: Express, context: RelayContext): void {
  const log = context.log ?? ((line: string) => console.log(line));
  const now = context.now ?? (() => new Date());

  // Only projects in the current catalog may be opened or pinned
  const knownPath = (projectPath: string | null): string | null => {
    if (!projectPath) return null;
    return context.current().records.some(record => record.localPath === projectPath) ? projectPath : null;
  };

  app.get('/', (_req: Request, res: Response) => {
    if (!fs.existsSync(context.outputPath)) {
      res.status(404).send('Dashboard has not been generated yet');
      return;
    }
    res.sendFile(context.outputPath);
  });

  app.get('/open', async (req: Request, res: Response) => {
    const projectPath = knownPath(queryString(req, 'path'));
    if (!projectPath) {
      res.status(400).json({ status: 'error', message: 'Unknown project path' });
      return;
    }

    const newWindow = queryString(req, 'new') === 'true';
    try {
      await context.launcher.open(projectPath, { newWindow });
    } catch (error) {
      res.status(500).json({ status: 'error', message: errorMessage(error, 'Failed to open editor') });
      return;
    }

    const openedAt = now().toISOString();
    for (const target of [context.activity, context.store]) {
      try {
        target.recordOpen(projectPath, openedAt);
      } catch (error) {
        log(chalk.yellow(`Could not record open of ${projectPath}: ${errorMessage(error, 'write failed')}`));
      }
    }

    log(chalk.green(`Opened${newWindow ? ' (new window)' : ''}: ${projectPath}`));
    res.json({ status: 'ok' });
  });

  app.get('/toggle-pin', (req: Request, res: Response) => {
    const projectPath = knownPath(queryString(req, 'path'));
    if (!projectPath) {
      res.status(400).json({ status: 'error', message: 'Unknown project path' });
      return;
    }

    try {
      const pinned = context.pins.toggle(projectPath);
      log(chalk.cyan(`${pinned ? 'Pinned' : 'Unpinned'}: ${projectPath}`));
      res.json({ status: 'ok', pinned });
    } catch (error) {
      res.status(500).json({ status: 'error', message: errorMessage(error, 'Failed to update pins') });
    }
  });

  app.get('/api/projects', (_req: Request, res: Response) => {
    const { entries, machines } = context.current();
    res.json({ entries, machines });
  });

  app.post('/api/regenerate', async (_req: Request, res: Response) => {
    try {
      const result = await context.regenerate();
      res.json({ status: 'ok', count: result.entries.length, warnings: result.warnings.length });
    } catch (error) {
      res.status(500).json({ status: 'error', message: errorMessage(error, 'Failed to regenerate') });
    }
  });
}
