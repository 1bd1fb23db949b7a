/**
 * Relay Server
 *
 * Express server on localhost that serves the generated dashboard and
 * relays "open in editor" clicks.
 */

import express, { type Express } from 'express';
import * as net from 'net';
import type { Settings } from '../../config/settings.js';
import { ActivityLog } from '../../sync/activity-log.js';
import { MachineStateStore } from '../../sync/machine-store.js';
import { generateDashboard, type GenerateResult } from '../generate.js';
import { PinStore } from '../pins.js';
import { registerRelayRoutes, type RelayContext } from './api.js';
import { createEditorLauncher, openBrowser, type EditorLauncher } from './launcher.js';

const HOST = '127.0.0.1';

/**
 * Find an available port starting from the default
 */
export async function findAvailablePort(startPort: number, attempts: number = 20): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();

    server.once('error', () => {
      if (attempts <= 1) {
        reject(new Error(`No free port found up to ${startPort}`));
        return;
      }
      // Port in use, try next
      resolve(findAvailablePort(startPort + 1, attempts - 1));
    });

    server.listen(startPort, HOST, () => {
      server.close(() => {
        resolve(startPort);
      });
    });
  });
}

export function createRelayApp(context: RelayContext): Express {
  const app = express();
  registerRelayRoutes(app, context);
  return app;
}

export interface ServerOptions {
  settings: Settings;
  /** Generation the server starts out serving */
  initial: GenerateResult;
  port?: number;
  openBrowser?: boolean;
  launcher?: EditorLauncher;
  log?: (line: string) => void;
}

export interface RunningServer {
  port: number;
  url: string;
  close: () => Promise<void>;
}

/**
 * Start the relay server
 */
export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const { settings } = options;
  let current = options.initial;

  const app = createRelayApp({
    outputPath: settings.outputPath,
    launcher: options.launcher ?? createEditorLauncher(settings.editor),
    pins: new PinStore(settings.pinnedFile),
    activity: new ActivityLog(settings.activityFile),
    store: new MachineStateStore({ stateDir: settings.stateDir, machineId: settings.machineId }),
    current: () => current,
    regenerate: async () => {
      current = await generateDashboard(settings);
      return current;
    },
    log: options.log,
  });

  const requested = await findAvailablePort(options.port ?? settings.port);

  return new Promise((resolve, reject) => {
    const server = app.listen(requested, HOST, () => {
      // Port 0 lets the OS choose
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : requested;
      const url = `http://localhost:${port}`;

      if (options.openBrowser !== false) {
        openBrowser(url).catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          options.log?.(`Could not open a browser (${message}); visit ${url}`);
        });
      }

      resolve({
        port,
        url,
        close: () =>
          new Promise((resolveClose, rejectClose) => {
            server.close(error => (error ? rejectClose(error) : resolveClose()));
          }),
      });
    });
    server.once('error', reject);
  });
}
