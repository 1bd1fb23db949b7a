/**
 * Activity Log
 *
 * Local record of when each project was last opened from the dashboard,
 * keyed by absolute path. Folded into lastOpened on the next sync and used
 * directly for projects that have no remote identity.
 */

import { z } from 'zod';
import { DevshelfError, type ScanWarning } from '../errors.js';
import { readJsonFile, writeJsonAtomic } from '../tools/filesystem.js';
import { latest } from './time.js';

const ActivityLogSchema = z.object({
  opens: z.record(z.string(), z.unknown()),
});

export type OpenTimes = ReadonlyMap<string, string>;

export interface ActivityReadResult {
  opens: Map<string, string>;
  warnings: ScanWarning[];
  /** False when the file exists but could not be parsed at all */
  writable: boolean;
}

export class ActivityLog {
  constructor(private readonly filePath: string) {}

  /**
   * Last open time per path. Entries that are not timestamps are skipped
   * with a warning; an unparsable file yields no opens and is not writable.
   */
  read(): ActivityReadResult {
    const raw = readJsonFile(this.filePath);
    const opens = new Map<string, string>();
    const warnings: ScanWarning[] = [];
    if (raw.kind === 'absent') return { opens, warnings, writable: true };
    if (raw.kind === 'invalid') {
      warnings.push({ kind: 'invalid-activity-log', path: this.filePath, message: raw.message });
      return { opens, warnings, writable: false };
    }

    const parsed = ActivityLogSchema.safeParse(raw.value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'Invalid activity log';
      warnings.push({ kind: 'invalid-activity-log', path: this.filePath, message });
      return { opens, warnings, writable: false };
    }

    for (const [localPath, openedAt] of Object.entries(parsed.data.opens)) {
      const normalized = typeof openedAt === 'string' ? latest(openedAt) : null;
      if (normalized) {
        opens.set(localPath, normalized);
      } else {
        warnings.push({
          kind: 'invalid-activity-log',
          path: this.filePath,
          message: `Ignoring open of ${localPath}: ${JSON.stringify(openedAt)} is not a timestamp`,
        });
      }
    }
    return { opens, warnings, writable: true };
  }

  /**
   * Record an open. Refuses to overwrite a log it cannot parse.
   */
  recordOpen(localPath: string, at: string): void {
    const current = this.read();
    if (!current.writable) {
      throw new DevshelfError('ACTIVITY_LOG_INVALID', `Not rewriting unreadable activity log ${this.filePath}`, {
        filePath: this.filePath,
      });
    }

    const opens = current.opens;
    const openedAt = latest(opens.get(localPath), at);
    if (openedAt) opens.set(localPath, openedAt);

    const sorted: Record<string, string> = {};
    for (const key of [...opens.keys()].sort()) {
      const value = opens.get(key);
      if (value) sorted[key] = value;
    }
    writeJsonAtomic(this.filePath, { opens: sorted });
  }
}
