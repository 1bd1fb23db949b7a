/**
 * Dashboard Generation
 *
 * One pass from the filesystem and the shared state directory to the
 * rendered page. Each run builds a fresh catalog; nothing is kept in
 * memory between runs.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Settings } from '../config/settings.js';
import { ConfigError, describeError, isErrnoException, type ScanWarning } from '../errors.js';
import { resolveProjects } from '../catalog/origin.js';
import { scanRoots } from '../catalog/scanner.js';
import type { LocalProject, ProjectRecord } from '../catalog/types.js';
import { github as defaultGithub, type GitHubIntegration } from '../integrations/github.js';
import { ActivityLog } from '../sync/activity-log.js';
import { aggregate, type MachineSummary, type RemoteRepo, type UnifiedEntry } from '../sync/aggregator.js';
import { buildOwnDocument, MachineStateStore, type Observation } from '../sync/machine-store.js';
import type { MachineStateDocument } from '../sync/types.js';
import { writeFileAtomic } from '../tools/filesystem.js';
import { PinStore } from './pins.js';
import { renderDashboard } from './render-html.js';

export type GeneratePhase = 'scan' | 'remote' | 'merge' | 'render' | 'write';

export interface GenerateOptions {
  now?: () => Date;
  github?: Pick<GitHubIntegration, 'listRemoteRepos'>;
  onPhase?: (phase: GeneratePhase) => void;
}

export interface LocalCatalog {
  records: ProjectRecord[];
  projects: LocalProject[];
  warnings: ScanWarning[];
  scanned: number;
  skipped: number;
}

export interface SyncResult extends LocalCatalog {
  document: MachineStateDocument;
}

export interface GenerateResult extends LocalCatalog {
  outputPath: string;
  html: string;
  entries: UnifiedEntry[];
  machines: MachineSummary[];
  document: MachineStateDocument;
  remoteRepos: RemoteRepo[] | null;
}

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

/**
 * Scan the roots and resolve each project's origin
 */
export function discoverLocal(settings: Settings): LocalCatalog {
  const scan = scanRoots({
    roots: settings.roots,
    maxDepth: settings.maxDepth,
    recencyDepth: settings.recencyDepth,
    declarationFile: settings.declarationFile,
    screenshotFiles: settings.screenshotFiles,
    ignoreDirs: settings.ignoreDirs,
  });
  const origins = resolveProjects(scan.records);

  return {
    records: scan.records,
    projects: origins.projects,
    warnings: [...scan.warnings, ...origins.warnings],
    scanned: scan.scanned,
    skipped: scan.skipped,
  };
}

function createStore(settings: Settings): MachineStateStore {
  return new MachineStateStore({ stateDir: settings.stateDir, machineId: settings.machineId });
}

/**
 * This machine's next state document, built from its previous one and the scan
 */
export function buildMachineDocument(
  settings: Settings,
  projects: readonly LocalProject[],
  opens: ReadonlyMap<string, string>,
  previous: MachineStateDocument | null,
  now: Date,
): MachineStateDocument {
  const observations: Observation[] = projects.flatMap(project =>
    project.identity
      ? [
          {
            identity: project.identity,
            localPath: project.record.localPath,
            lastOpened: opens.get(project.record.localPath) ?? null,
            lastPushed: project.lastPushed,
            project: {
              id: project.record.id,
              title: project.record.title,
              oneLiner: project.record.oneLiner,
              kind: project.record.kind,
              categories: project.record.categories,
              tags: project.record.tags,
              status: project.record.status,
            },
          },
        ]
      : [],
  );

  return buildOwnDocument({
    previous,
    machineId: settings.machineId,
    machineName: settings.machineName,
    observations,
    now: now.toISOString(),
  });
}

function ensureWritableDir(dir: string, what: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (error) {
    throw new ConfigError('OUTPUT_UNWRITABLE', `Cannot write ${what} in ${dir}: ${describeError(error)}`, { dir });
  }
}

function ensureWritableFile(filePath: string, what: string): void {
  ensureWritableDir(path.dirname(filePath), what);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw new ConfigError('OUTPUT_UNWRITABLE', `Cannot write ${what} at ${filePath}: ${describeError(error)}`, {
      filePath,
    });
  }

  if (stat.isDirectory()) {
    throw new ConfigError('OUTPUT_UNWRITABLE', `Cannot write ${what}: ${filePath} is a directory`, { filePath });
  }
}

/**
 * Rescan and rewrite only this machine's state document
 */
export function syncMachineState(settings: Settings, options: Pick<GenerateOptions, 'now'> = {}): SyncResult {
  const now = options.now?.() ?? new Date();
  const catalog = discoverLocal(settings);
  const store = createStore(settings);
  const activity = new ActivityLog(settings.activityFile).read();

  ensureWritableDir(settings.stateDir, 'the machine state document');
  const document = buildMachineDocument(settings, catalog.projects, activity.opens, store.readOwn(), now);
  store.writeOwn(document);

  return { ...catalog, warnings: [...catalog.warnings, ...activity.warnings], document };
}

/**
 * Data URIs for every screenshot that can be read
 */
export function loadScreenshots(records: readonly ProjectRecord[], warnings: ScanWarning[]): Map<string, string> {
  const screenshots = new Map<string, string>();

  for (const record of records) {
    if (!record.screenshotPath) continue;
    try {
      const content = fs.readFileSync(record.screenshotPath);
      const type = IMAGE_TYPES[path.extname(record.screenshotPath).toLowerCase()] ?? 'application/octet-stream';
      screenshots.set(record.localPath, `data:${type};base64,${content.toString('base64')}`);
    } catch (error) {
      warnings.push({ kind: 'missing-screenshot', path: record.screenshotPath, message: describeError(error) });
    }
  }

  return screenshots;
}

/**
 * Scan, merge every machine's state, render and write the dashboard.
 * Throws ConfigError before writing anything when roots or outputs are unusable.
 */
export async function generateDashboard(settings: Settings, options: GenerateOptions = {}): Promise<GenerateResult> {
  const now = options.now?.() ?? new Date();
  const github = options.github ?? defaultGithub;

  options.onPhase?.('scan');
  const catalog = discoverLocal(settings);
  const warnings = [...catalog.warnings];

  ensureWritableFile(settings.outputPath, 'the dashboard');
  ensureWritableDir(settings.stateDir, 'the machine state document');

  let remoteRepos: RemoteRepo[] | null = null;
  if (settings.remote) {
    options.onPhase?.('remote');
    const remote = await github.listRemoteRepos(settings.remote);
    remoteRepos = remote.repos;
    if (remote.warning) warnings.push(remote.warning);
  }

  options.onPhase?.('merge');
  const store = createStore(settings);
  const activity = new ActivityLog(settings.activityFile).read();
  const opens = activity.opens;
  warnings.push(...activity.warnings);
  const document = buildMachineDocument(settings, catalog.projects, opens, store.readOwn(), now);

  const stored = store.readAll();
  warnings.push(...stored.warnings);
  const documents = [...stored.documents.filter(doc => doc.machineId !== settings.machineId), document];

  const { entries, machines } = aggregate({
    machine: { id: settings.machineId, name: settings.machineName },
    projects: catalog.projects,
    documents,
    remoteRepos,
    localOpens: opens,
    now: now.toISOString(),
    staleAfterMs: settings.staleAfterMs,
  });

  options.onPhase?.('render');
  const html = renderDashboard({
    machine: { id: settings.machineId, name: settings.machineName },
    entries,
    machines,
    pinned: new PinStore(settings.pinnedFile).list(),
    recentLimit: settings.recentLimit,
    editorUrlTemplate: settings.editor.urlTemplate,
    screenshots: loadScreenshots(catalog.records, warnings),
  });

  options.onPhase?.('write');
  try {
    writeFileAtomic(settings.outputPath, html);
  } catch (error) {
    throw new ConfigError('OUTPUT_UNWRITABLE', `Cannot write ${settings.outputPath}: ${describeError(error)}`, {
      outputPath: settings.outputPath,
    });
  }
  store.writeOwn(document);

  return {
    ...catalog,
    warnings,
    outputPath: settings.outputPath,
    html,
    entries,
    machines,
    document,
    remoteRepos,
  };
}
