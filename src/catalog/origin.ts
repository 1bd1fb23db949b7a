/**
 * Origin Resolver
 *
 * Reads a project's git configuration (without running git) and turns its
 * single remote into a RemoteIdentity. Projects with no remote, several
 * remotes, or a remote URL outside the accepted grammar stay local-only.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ScanWarning } from '../errors.js';
import { mtimeOf } from '../tools/filesystem.js';
import { parseRemoteUrl } from './remote-identity.js';
import type { LocalProject, ProjectRecord, RemoteIdentity } from './types.js';

export type OriginResult =
  | { status: 'resolved'; identity: RemoteIdentity; remote: string; url: string }
  | { status: 'no-repository' }
  | { status: 'no-remote' }
  | { status: 'multiple-remotes'; remotes: string[] }
  | { status: 'unparsable-remote'; remote: string; url: string };

const REMOTE_SECTION = /^\[\s*remote\s+"((?:[^"\\]|\\.)*)"\s*\]/i;
const ANY_SECTION = /^\[/;
const URL_KEY = /^url\s*=\s*(.*)$/i;

function readText(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Locate the directory holding the repository's config and refs. Handles
 * `.git` files (submodules, worktrees) and the worktree `commondir` pointer.
 */
export function findGitDir(projectDir: string): string | null {
  const dotGit = path.join(projectDir, '.git');
  let gitDir: string;

  try {
    const stat = fs.statSync(dotGit);
    if (stat.isDirectory()) {
      gitDir = dotGit;
    } else if (stat.isFile()) {
      const pointer = /^gitdir:\s*(.+)$/m.exec(readText(dotGit) ?? '');
      if (!pointer) return null;
      gitDir = path.resolve(projectDir, pointer[1].trim());
    } else {
      return null;
    }
  } catch {
    return null;
  }

  const commonDir = readText(path.join(gitDir, 'commondir'));
  return commonDir ? path.resolve(gitDir, commonDir.trim()) : gitDir;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Remote name → first configured url, in file order
 */
export function parseRemotes(configText: string): Map<string, string> {
  const remotes = new Map<string, string>();
  let current: string | null = null;

  for (const rawLine of configText.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const section = REMOTE_SECTION.exec(line);
    if (section) {
      current = section[1];
      continue;
    }
    if (ANY_SECTION.test(line)) {
      current = null;
      continue;
    }

    const urlMatch = current !== null ? URL_KEY.exec(line) : null;
    if (current !== null && urlMatch && !remotes.has(current)) {
      const url = unquote(urlMatch[1]);
      if (url) remotes.set(current, url);
    }
  }

  return remotes;
}

export function resolveOrigin(projectDir: string): OriginResult {
  const gitDir = findGitDir(projectDir);
  if (!gitDir) return { status: 'no-repository' };

  const config = readText(path.join(gitDir, 'config'));
  const remotes = config ? parseRemotes(config) : new Map<string, string>();

  if (remotes.size === 0) return { status: 'no-remote' };
  if (remotes.size > 1) return { status: 'multiple-remotes', remotes: [...remotes.keys()] };

  const [[remote, url]] = [...remotes];
  const identity = parseRemoteUrl(url);
  if (!identity) return { status: 'unparsable-remote', remote, url };

  return { status: 'resolved', identity, remote, url };
}

function newestFileMtime(dir: string): number | null {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return null;
  }

  let newest: number | null = null;
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    const mtime = entry.isDirectory() ? newestFileMtime(entryPath) : mtimeOf(entryPath);
    if (mtime !== null && (newest === null || mtime > newest)) {
      newest = mtime;
    }
  }
  return newest;
}

/**
 * When the remote-tracking refs of `remote` last moved (push or fetch), ISO
 */
export function readLastPushed(projectDir: string, remote: string): string | null {
  const gitDir = findGitDir(projectDir);
  if (!gitDir) return null;

  const candidates = [
    newestFileMtime(path.join(gitDir, 'logs', 'refs', 'remotes', remote)),
    newestFileMtime(path.join(gitDir, 'refs', 'remotes', remote)),
  ].filter((mtime): mtime is number => mtime !== null);

  return candidates.length > 0 ? new Date(Math.max(...candidates)).toISOString() : null;
}

export interface ResolveProjectsResult {
  projects: LocalProject[];
  warnings: ScanWarning[];
}

/**
 * Attach origins to scanned records, reporting unparsable remotes
 */
export function resolveProjects(records: readonly ProjectRecord[]): ResolveProjectsResult {
  const warnings: ScanWarning[] = [];

  const projects = records.map((record): LocalProject => {
    const origin = resolveOrigin(record.localPath);

    if (origin.status === 'resolved') {
      return {
        record,
        identity: origin.identity,
        lastPushed: readLastPushed(record.localPath, origin.remote),
      };
    }

    if (origin.status === 'unparsable-remote') {
      warnings.push({
        kind: 'unparsable-remote',
        path: record.localPath,
        message: `Remote "${origin.remote}" has an unrecognized URL: ${origin.url}`,
      });
    }

    return { record, identity: null, lastPushed: null };
  });

  return { projects, warnings };
}
