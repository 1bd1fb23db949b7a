/**
 * Project Scanner
 *
 * Walks the configured roots looking for directories that contain a
 * declaration file. Each such directory becomes one ProjectRecord and is
 * not descended into any further.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, describeError, type ScanWarning } from '../errors.js';
import { isDirectory, newestMtime } from '../tools/filesystem.js';
import { loadDeclaration, toProjectFields } from './declaration.js';
import type { ProjectRecord } from './types.js';

// Checked for recency even though hidden directories are not walked
const RECENCY_MARKERS = ['.git/HEAD', '.git/index'];

export interface ScanOptions {
  roots: readonly string[];
  maxDepth: number;
  recencyDepth: number;
  declarationFile: string;
  screenshotFiles: readonly string[];
  ignoreDirs: readonly string[];
}

export interface ScanResult {
  records: ProjectRecord[];
  warnings: ScanWarning[];
  scanned: number;
  skipped: number;
}

function groupFor(rootDir: string, relativePath: string): string {
  const segments = relativePath.split(path.sep).filter(segment => segment !== '' && segment !== '.');
  return segments.length > 1 ? segments[0] : path.basename(rootDir);
}

/**
 * Scan roots for projects. Throws ConfigError when no configured root exists;
 * everything else is reported through warnings.
 */
export function scanRoots(options: ScanOptions): ScanResult {
  const records: ProjectRecord[] = [];
  const warnings: ScanWarning[] = [];
  const byId = new Map<string, ProjectRecord>();
  // Directory → depth budget it was walked with; nested roots revisit with more
  const seen = new Map<string, number>();
  const projects = new Set<string>();
  const skip = new Set(options.ignoreDirs);
  let scanned = 0;
  let skipped = 0;

  const roots: string[] = [];
  for (const root of options.roots) {
    const resolved = path.resolve(root);
    if (isDirectory(resolved)) {
      roots.push(resolved);
    } else {
      warnings.push({ kind: 'missing-root', path: resolved, message: 'Root directory does not exist' });
    }
  }

  if (roots.length === 0) {
    throw new ConfigError(
      'NO_ROOTS',
      options.roots.length === 0
        ? 'No root directories configured'
        : `None of the configured root directories exist: ${options.roots.join(', ')}`,
      { roots: [...options.roots] },
    );
  }

  function addProject(dir: string, rootDir: string, entries: fs.Dirent[]): void {
    const declaration = loadDeclaration(dir, options.declarationFile);
    if (declaration.kind === 'absent') return;
    if (declaration.kind === 'invalid') {
      warnings.push({ kind: 'invalid-declaration', path: declaration.path, message: declaration.message });
      return;
    }

    const fields = toProjectFields(declaration.declaration, path.basename(dir));

    const existing = byId.get(fields.id);
    if (existing) {
      warnings.push({
        kind: 'duplicate-id',
        path: dir,
        message: `Project id "${fields.id}" is already used by ${existing.localPath}`,
      });
      return;
    }

    const screenshotName = options.screenshotFiles.find(name =>
      entries.some(entry => entry.name === name && !entry.isDirectory()),
    );
    if (!screenshotName) {
      warnings.push({ kind: 'missing-screenshot', path: dir, message: 'No screenshot found' });
    }

    let lastModified: number;
    try {
      lastModified = newestMtime(dir, {
        maxDepth: options.recencyDepth,
        ignoreDirs: options.ignoreDirs,
        markers: RECENCY_MARKERS,
      });
    } catch (error) {
      warnings.push({ kind: 'unreadable-directory', path: dir, message: describeError(error) });
      return;
    }

    const relativePath = path.relative(rootDir, dir) || '.';
    const record: ProjectRecord = {
      ...fields,
      localPath: dir,
      rootDir,
      relativePath,
      group: groupFor(rootDir, relativePath),
      screenshotPath: screenshotName ? path.join(dir, screenshotName) : null,
      screenshotPresent: screenshotName !== undefined,
      lastModified: new Date(lastModified).toISOString(),
    };

    byId.set(record.id, record);
    records.push(record);
  }

  function scan(dir: string, rootDir: string, depth: number): void {
    const budget = options.maxDepth - depth;
    const previous = seen.get(dir);
    if (projects.has(dir) || (previous !== undefined && previous >= budget)) return;
    seen.set(dir, budget);

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      seen.set(dir, Infinity);
      warnings.push({ kind: 'unreadable-directory', path: dir, message: describeError(error) });
      skipped++;
      return;
    }
    if (previous === undefined) scanned++;

    const hasDeclaration = entries.some(entry => entry.name === options.declarationFile && !entry.isDirectory());
    if (hasDeclaration) {
      // Project roots are never nested, even when the declaration is invalid
      projects.add(dir);
      addProject(dir, rootDir, entries);
      return;
    }

    if (depth >= options.maxDepth) return;

    const children = entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();

    for (const name of children) {
      if (name.startsWith('.') || skip.has(name)) {
        if (previous === undefined) skipped++;
        continue;
      }
      scan(path.join(dir, name), rootDir, depth + 1);
    }
  }

  for (const root of roots) {
    scan(root, root, 0);
  }

  return { records, warnings, scanned, skipped };
}
