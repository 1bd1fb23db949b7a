/**
 * Pinned projects, stored as a JSON array of absolute paths
 */

import * as path from 'path';
import { z } from 'zod';
import { readJsonFile, writeJsonAtomic } from '../tools/filesystem.js';

const PinListSchema = z.array(z.string());

export class PinStore {
  constructor(private readonly filePath: string) {}

  /**
   * Pinned paths in pin order. A missing or corrupted file means no pins.
   */
  list(): string[] {
    const raw = readJsonFile(this.filePath);
    if (raw.kind !== 'ok') return [];
    const parsed = PinListSchema.safeParse(raw.value);
    return parsed.success ? [...new Set(parsed.data)] : [];
  }

  /**
   * Pin or unpin a path; returns whether it is pinned afterwards
   */
  toggle(projectPath: string): boolean {
    const absolutePath = path.resolve(projectPath);
    const pins = this.list();
    const index = pins.indexOf(absolutePath);

    if (index >= 0) {
      pins.splice(index, 1);
    } else {
      pins.push(absolutePath);
    }

    writeJsonAtomic(this.filePath, pins);
    return index < 0;
  }
}
