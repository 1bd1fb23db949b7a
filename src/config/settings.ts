/**
 * Settings
 *
 * Loads ~/.devshelf/config.json (or the file named by --config /
 * DEVSHELF_CONFIG), applies environment overrides and resolves every path.
 *
 * The staleness threshold and the remote-enrichment filters are left
 * without defaults: when `remote` is configured, includeArchived and
 * includeOrgs must be spelled out.
 */

import * as os from 'os';
import * as path from 'path';
import * as crypto from 'crypto';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { readJsonFile } from '../tools/filesystem.js';

export const DEFAULTS = {
  maxDepth: 3,
  recencyDepth: 2,
  declarationFile: 'catalogue.json',
  screenshotFiles: [
    'screenshot.png',
    'screenshot.jpg',
    'screenshot.jpeg',
    'screenshot.gif',
    'screenshot.webp',
  ],
  ignoreDirs: [
    'node_modules',
    'bower_components',
    'vendor',
    'dist',
    'build',
    'out',
    'target',
    'coverage',
    '__pycache__',
    'venv',
    'env',
    'tmp',
    'temp',
    'Library',
    'Applications',
  ],
  editor: {
    urlTemplate: 'cursor://file{path}',
  },
  server: {
    port: 8847,
  },
  recentLimit: 10,
};

const SettingsFileSchema = z
  .object({
    roots: z.array(z.string().min(1)).default([]),
    maxDepth: z.number().int().min(0).default(DEFAULTS.maxDepth),
    recencyDepth: z.number().int().min(0).default(DEFAULTS.recencyDepth),
    declarationFile: z.string().min(1).default(DEFAULTS.declarationFile),
    screenshotFiles: z.array(z.string().min(1)).min(1).default(DEFAULTS.screenshotFiles),
    ignoreDirs: z.array(z.string().min(1)).default(DEFAULTS.ignoreDirs),
    outputPath: z.string().min(1).optional(),
    stateDir: z.string().min(1).optional(),
    pinnedFile: z.string().min(1).optional(),
    activityFile: z.string().min(1).optional(),
    machine: z
      .object({
        id: z
          .string()
          .regex(/^[A-Za-z0-9._-]+$/, 'machine id may only contain letters, digits, ".", "_" and "-"')
          .optional(),
        name: z.string().min(1).optional(),
      })
      .default({}),
    staleAfterHours: z.number().positive().optional(),
    remote: z
      .object({
        provider: z.literal('github'),
        includeArchived: z.boolean(),
        includeOrgs: z.boolean(),
      })
      .optional(),
    editor: z
      .object({
        urlTemplate: z.string().includes('{path}').default(DEFAULTS.editor.urlTemplate),
        command: z.string().min(1).optional(),
      })
      .default(DEFAULTS.editor),
    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      })
      .default(DEFAULTS.server),
    recentLimit: z.number().int().min(0).default(DEFAULTS.recentLimit),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface RemoteSettings {
  provider: 'github';
  includeArchived: boolean;
  includeOrgs: boolean;
}

export interface Settings {
  configPath: string;
  homeDir: string;
  roots: readonly string[];
  maxDepth: number;
  recencyDepth: number;
  declarationFile: string;
  screenshotFiles: readonly string[];
  ignoreDirs: readonly string[];
  outputPath: string;
  stateDir: string;
  pinnedFile: string;
  activityFile: string;
  machineId: string;
  machineName: string;
  staleAfterMs: number | null;
  remote: RemoteSettings | null;
  editor: { urlTemplate: string; command: string | null };
  port: number;
  recentLimit: number;
}

export interface LoadSettingsOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  hostname?: string;
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandPath(value: string, baseDir: string = process.cwd()): string {
  const userHome = os.homedir();
  if (value === '~') return userHome;
  if (value.startsWith('~/')) return path.join(userHome, value.slice(2));
  return path.resolve(baseDir, value);
}

/**
 * Stable machine id derived from the hostname
 */
export function defaultMachineId(hostname: string): string {
  return crypto.createHash('md5').update(hostname).digest('hex').slice(0, 12);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Load and resolve settings. Throws ConfigError on a malformed config file.
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const homeDir = expandPath(env.DEVSHELF_HOME || '~/.devshelf');
  const configPath = expandPath(options.configPath || env.DEVSHELF_CONFIG || path.join(homeDir, 'config.json'));

  const raw = readJsonFile(configPath);
  if (raw.kind === 'invalid') {
    throw new ConfigError('CONFIG_INVALID', `Cannot parse ${configPath}: ${raw.message}`, { configPath });
  }

  const parsed = SettingsFileSchema.safeParse(raw.kind === 'ok' ? raw.value : {});
  if (!parsed.success) {
    throw new ConfigError('CONFIG_INVALID', `Invalid settings in ${configPath}: ${formatIssues(parsed.error)}`, {
      configPath,
    });
  }

  const file = parsed.data;
  // Relative paths in the config file are relative to the file itself
  const configDir = path.dirname(configPath);
  const resolve = (value: string | undefined, fallback: string): string =>
    value !== undefined ? expandPath(value, configDir) : fallback;

  const envRoots = env.DEVSHELF_ROOTS
    ?.split(path.delimiter)
    .map(root => root.trim())
    .filter(root => root.length > 0);
  const roots = (envRoots && envRoots.length > 0 ? envRoots : file.roots).map(root => expandPath(root, configDir));

  const hostname = options.hostname ?? os.hostname();

  return Object.freeze({
    configPath,
    homeDir,
    roots: [...new Set(roots)],
    maxDepth: file.maxDepth,
    recencyDepth: file.recencyDepth,
    declarationFile: file.declarationFile,
    screenshotFiles: file.screenshotFiles,
    ignoreDirs: file.ignoreDirs,
    outputPath: resolve(file.outputPath, path.join(homeDir, 'dashboard.html')),
    stateDir: resolve(file.stateDir, path.join(homeDir, 'machines')),
    pinnedFile: resolve(file.pinnedFile, path.join(homeDir, 'pinned.json')),
    activityFile: resolve(file.activityFile, path.join(homeDir, 'activity.json')),
    machineId: file.machine.id ?? defaultMachineId(hostname),
    machineName: file.machine.name ?? hostname,
    staleAfterMs: file.staleAfterHours !== undefined ? file.staleAfterHours * 3_600_000 : null,
    remote: file.remote ?? null,
    editor: { urlTemplate: file.editor.urlTemplate, command: file.editor.command ?? null },
    port: file.server.port,
    recentLimit: file.recentLimit,
  });
}
