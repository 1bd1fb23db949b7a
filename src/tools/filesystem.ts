/**
 * Filesystem Tools
 *
 * Synchronous helpers shared by the scanner, the state store and the
 * dashboard writer. Every persisted file goes through writeFileAtomic so a
 * killed process never leaves a half-written document behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { globSync } from 'glob';
import { describeError, isErrnoException } from '../errors.js';

export type ReadJsonResult =
  | { kind: 'absent' }
  | { kind: 'invalid'; message: string }
  | { kind: 'ok'; value: unknown };

/**
 * Read and parse a JSON file. A missing file is not an error.
 */
export function readJsonFile(filePath: string): ReadJsonResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return { kind: 'absent' };
    }
    return { kind: 'invalid', message: describeError(error) };
  }

  try {
    return { kind: 'ok', value: JSON.parse(content) };
  } catch (error) {
    return { kind: 'invalid', message: describeError(error) };
  }
}

/**
 * Write to a temp file beside the target, then rename over it
 */
export function writeFileAtomic(filePath: string, content: string | Buffer): void {
  const absolutePath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.tmp-${process.pid}-${randomUUID()}`;
  try {
    fs.writeFileSync(tempPath, content);
    fs.renameSync(tempPath, absolutePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

export function writeJsonAtomic(filePath: string, value: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(value, null, 2) + '\n');
}

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * mtime in ms, or null when the path does not exist
 */
export function mtimeOf(filePath: string): number | null {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return null;
  }
}

export interface NewestMtimeOptions {
  /** Depth below dir to walk; 0 looks at dir's direct entries only */
  maxDepth: number;
  /** Directory names whose subtree is never visited */
  ignoreDirs: readonly string[];
  /** Extra paths relative to dir checked regardless of depth or visibility */
  markers?: readonly string[];
}

/**
 * Most recent modification time of a directory and its entries up to a
 * bounded depth. Hidden entries are skipped apart from the explicit markers.
 */
export function newestMtime(dir: string, options: NewestMtimeOptions): number {
  const root = path.resolve(dir);
  const skip = new Set(options.ignoreDirs);
  let newest = fs.statSync(root).mtimeMs;

  const skipped = (p: { name: string; fullpath(): string }): boolean =>
    skip.has(p.name) && p.fullpath() !== root;

  const entries = globSync('**', {
    cwd: root,
    maxDepth: options.maxDepth + 1,
    dot: false,
    follow: false,
    stat: true,
    withFileTypes: true,
    ignore: { ignored: skipped, childrenIgnored: skipped },
  });

  for (const entry of entries) {
    const mtime = entry.mtimeMs;
    if (mtime !== undefined && mtime > newest) {
      newest = mtime;
    }
  }

  for (const marker of options.markers ?? []) {
    const mtime = mtimeOf(path.join(root, marker));
    if (mtime !== null && mtime > newest) {
      newest = mtime;
    }
  }

  return newest;
}
