/**
 * Machine State Store
 *
 * Manages <stateDir>/<machineId>.json: one activity document per machine.
 * Every machine reads all documents but only ever writes its own.
 */

import * as fs from 'fs';
import * as path from 'path';
import { StateOwnershipError, type ScanWarning } from '../errors.js';
import { identityKey, parseIdentityKey } from '../catalog/remote-identity.js';
import type { ProjectFields, RemoteIdentity } from '../catalog/types.js';
import { readJsonFile, writeJsonAtomic } from '../tools/filesystem.js';
import { latest } from './time.js';
import {
  MachineStateDocumentSchema,
  type MachineActivityEntry,
  type MachineStateDocument,
} from './types.js';

export interface MachineStateStoreOptions {
  stateDir: string;
  machineId: string;
}

export interface ReadAllResult {
  documents: MachineStateDocument[];
  warnings: ScanWarning[];
}

type ReadDocumentResult =
  | { kind: 'absent' }
  | { kind: 'invalid'; message: string }
  | { kind: 'ok'; document: MachineStateDocument; droppedKeys: string[] };

/**
 * What this machine currently knows about one cloned repository
 */
export interface Observation {
  identity: RemoteIdentity;
  localPath: string;
  lastOpened: string | null;
  lastPushed: string | null;
  project: ProjectFields;
}

export interface BuildOwnDocumentInput {
  previous: MachineStateDocument | null;
  machineId: string;
  machineName: string;
  observations: readonly Observation[];
  now: string;
}

function sortedRepos(repos: Map<string, MachineActivityEntry>): Record<string, MachineActivityEntry> {
  const result: Record<string, MachineActivityEntry> = {};
  for (const key of [...repos.keys()].sort()) {
    const entry = repos.get(key);
    if (entry) result[key] = entry;
  }
  return result;
}

/**
 * Build the full replacement for this machine's document. Identities that
 * are no longer observed locally are dropped; timestamps never move back.
 */
export function buildOwnDocument(input: BuildOwnDocumentInput): MachineStateDocument {
  const previousRepos =
    input.previous && input.previous.machineId === input.machineId ? input.previous.repos : {};
  const repos = new Map<string, MachineActivityEntry>();

  for (const observation of input.observations) {
    const key = identityKey(observation.identity);
    const existing = repos.get(key);

    if (existing) {
      // Two clones of one repository: the first path stays, timestamps merge
      existing.lastOpened = latest(existing.lastOpened, observation.lastOpened);
      existing.lastPushed = latest(existing.lastPushed, observation.lastPushed);
      continue;
    }

    const previous: MachineActivityEntry | undefined = previousRepos[key];
    repos.set(key, {
      localPath: observation.localPath,
      lastOpened: latest(previous?.lastOpened, observation.lastOpened),
      lastPushed: latest(previous?.lastPushed, observation.lastPushed),
      project: { ...observation.project },
    });
  }

  return {
    version: 1,
    machineId: input.machineId,
    machineName: input.machineName,
    lastSync: new Date(input.now).toISOString(),
    repos: sortedRepos(repos),
  };
}

export class MachineStateStore {
  constructor(private readonly options: MachineStateStoreOptions) {}

  /**
   * Path of this machine's own document
   */
  get ownPath(): string {
    return this.documentPath(this.options.machineId);
  }

  documentPath(machineId: string): string {
    return path.join(this.options.stateDir, `${machineId}.json`);
  }

  private readDocument(filePath: string): ReadDocumentResult {
    const raw = readJsonFile(filePath);
    if (raw.kind !== 'ok') return raw;

    const parsed = MachineStateDocumentSchema.safeParse(raw.value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return {
        kind: 'invalid',
        message: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'Invalid state document',
      };
    }

    const document = parsed.data;
    if (path.basename(filePath) !== `${document.machineId}.json`) {
      return {
        kind: 'invalid',
        message: `Document claims machine "${document.machineId}" but is stored as ${path.basename(filePath)}`,
      };
    }

    // Keys must be canonical identity keys to join across machines
    const droppedKeys = Object.keys(document.repos).filter(key => parseIdentityKey(key) === null);
    for (const key of droppedKeys) {
      delete document.repos[key];
    }

    return { kind: 'ok', document, droppedKeys };
  }

  /**
   * Read every machine's document, this machine's included
   */
  readAll(): ReadAllResult {
    const documents: MachineStateDocument[] = [];
    const warnings: ScanWarning[] = [];

    let fileNames: string[];
    try {
      fileNames = fs
        .readdirSync(this.options.stateDir, { withFileTypes: true })
        .filter(entry => entry.isFile() && entry.name.endsWith('.json'))
        .map(entry => entry.name)
        .sort();
    } catch {
      return { documents, warnings };
    }

    for (const fileName of fileNames) {
      const filePath = path.join(this.options.stateDir, fileName);
      const result = this.readDocument(filePath);

      if (result.kind === 'invalid') {
        warnings.push({ kind: 'invalid-state-document', path: filePath, message: result.message });
        continue;
      }
      if (result.kind === 'absent') continue;

      for (const key of result.droppedKeys) {
        warnings.push({
          kind: 'invalid-state-document',
          path: filePath,
          message: `Ignoring entry with a non-canonical identity key: ${key}`,
        });
      }
      documents.push(result.document);
    }

    return { documents, warnings };
  }

  /**
   * This machine's document, or null when missing or unreadable
   */
  readOwn(): MachineStateDocument | null {
    const result = this.readDocument(this.ownPath);
    return result.kind === 'ok' ? result.document : null;
  }

  /**
   * Replace this machine's document. Other machines' documents are never written.
   */
  writeOwn(document: MachineStateDocument): void {
    if (document.machineId !== this.options.machineId) {
      throw new StateOwnershipError(this.options.machineId, document.machineId);
    }
    writeJsonAtomic(this.ownPath, document);
  }

  /**
   * Record a launch of the clone at localPath. Returns false when this
   * machine's document has no entry for that path.
   */
  recordOpen(localPath: string, at: string): boolean {
    const document = this.readOwn();
    if (!document) return false;

    const entry = Object.values(document.repos).find(repo => repo.localPath === localPath);
    if (!entry) return false;

    entry.lastOpened = latest(entry.lastOpened, at);
    document.lastSync = new Date(at).toISOString();
    this.writeOwn(document);
    return true;
  }
}
