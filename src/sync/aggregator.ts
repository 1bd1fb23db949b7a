/**
 * Unified Aggregator
 *
 * Pure merge of this machine's scan, every machine's state document and the
 * optional list of remotely-known repositories into one ordered catalog.
 * Per identity the merge is a max over timestamps, so the result does not
 * depend on the order documents arrive in.
 */

import { identityKey, parseIdentityKey } from '../catalog/remote-identity.js';
import type {
  LocalProject,
  ProjectFields,
  ProjectRecord,
  ProjectStatus,
  RemoteIdentity,
} from '../catalog/types.js';
import type { OpenTimes } from './activity-log.js';
import { compareRecentFirst, latest, toMillis } from './time.js';
import type { MachineStateDocument, ProjectSummary } from './types.js';

export type Presence = 'cloned' | 'available';

/**
 * A repository as reported by the hosting provider
 */
export interface RemoteRepo {
  identity: RemoteIdentity;
  description: string;
  url: string;
  isArchived: boolean;
  isFork: boolean;
  ownerIsOrganization: boolean;
  pushedAt: string | null;
}

export interface MachineActivity {
  machineId: string;
  machineName: string;
  localPath: string | null;
  lastOpened: string | null;
  lastPushed: string | null;
  stale: boolean;
}

export interface MachineSummary {
  machineId: string;
  machineName: string;
  lastSync: string | null;
  stale: boolean;
  isLocal: boolean;
  repoCount: number;
}

export interface UnifiedEntry {
  /** Identity key, or local:<machineId>/<projectId> for local-only projects */
  key: string;
  identity: RemoteIdentity | null;
  /** Declared project id, or the repository name when nothing declares one */
  id: string;
  title: string;
  oneLiner: string;
  kind: string;
  categories: string[];
  tags: string[];
  status: ProjectStatus;
  presence: Presence;
  mostRecentActivity: string | null;
  /** This machine's clone */
  localPath: string | null;
  record: ProjectRecord | null;
  machines: MachineActivity[];
  remote: RemoteRepo | null;
  /** Every machine reporting this entry is past the staleness threshold */
  stale: boolean;
}

export interface AggregateInput {
  machine: { id: string; name: string };
  projects: readonly LocalProject[];
  documents: readonly MachineStateDocument[];
  /** null when remote enrichment is off or unavailable */
  remoteRepos: readonly RemoteRepo[] | null;
  localOpens?: OpenTimes;
  now: string;
  /** null disables staleness flags */
  staleAfterMs: number | null;
}

export interface AggregateResult {
  entries: UnifiedEntry[];
  machines: MachineSummary[];
}

interface IdentityGroup {
  identity: RemoteIdentity;
  local: LocalProject | null;
  machines: MachineActivity[];
  summaries: Array<{ machineId: string; project: ProjectSummary }>;
  remote: RemoteRepo | null;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order: most recent activity first, then title, then key
 */
export function compareEntries(a: UnifiedEntry, b: UnifiedEntry): number {
  return (
    compareRecentFirst(a.mostRecentActivity, b.mostRecentActivity) ||
    compareText(a.title, b.title) ||
    compareText(a.key, b.key)
  );
}

function richness(project: ProjectSummary): number {
  return [
    project.title !== project.id,
    project.oneLiner !== '',
    project.kind !== 'project',
    project.categories.length > 0,
    project.tags.length > 0,
    project.status !== 'unknown',
  ].filter(Boolean).length;
}

function fieldsOf(record: ProjectRecord): ProjectFields {
  const { id, title, oneLiner, kind, categories, tags, status } = record;
  return { id, title, oneLiner, kind, categories: [...categories], tags: [...tags], status };
}

/**
 * This machine's record first, then the richest summary another machine
 * reported, then whatever the remote knows
 */
function pickFields(group: IdentityGroup): ProjectFields {
  if (group.local) {
    return fieldsOf(group.local.record);
  }

  let best: ProjectSummary | null = null;
  for (const summary of group.summaries) {
    if (!best || richness(summary.project) > richness(best)) {
      best = summary.project;
    }
  }
  if (best) {
    return { ...best, categories: [...best.categories], tags: [...best.tags] };
  }

  return {
    id: group.identity.name,
    title: group.identity.name,
    oneLiner: group.remote?.description ?? '',
    kind: 'project',
    categories: [],
    tags: [],
    status: group.remote?.isArchived ? 'archived' : 'unknown',
  };
}

function isStale(lastSync: string, now: string, staleAfterMs: number | null): boolean {
  if (staleAfterMs === null) return false;
  const syncedAt = toMillis(lastSync);
  const nowMillis = toMillis(now);
  if (syncedAt === null || nowMillis === null) return false;
  return nowMillis - syncedAt > staleAfterMs;
}

export function aggregate(input: AggregateInput): AggregateResult {
  const localOpens: OpenTimes = input.localOpens ?? new Map<string, string>();
  const groups = new Map<string, IdentityGroup>();

  const groupFor = (identity: RemoteIdentity): IdentityGroup => {
    const key = identityKey(identity);
    let group = groups.get(key);
    if (!group) {
      group = { identity, local: null, machines: [], summaries: [], remote: null };
      groups.set(key, group);
    }
    return group;
  };

  const groupForKey = (key: string): IdentityGroup | null => {
    const existing = groups.get(key);
    if (existing) return existing;
    const identity = parseIdentityKey(key);
    return identity ? groupFor(identity) : null;
  };

  // Scan order decides which clone represents this machine
  for (const project of input.projects) {
    if (!project.identity) continue;
    const group = groupFor(project.identity);
    if (!group.local) group.local = project;
  }

  const documents = [...input.documents].sort((a, b) => compareText(a.machineId, b.machineId));
  const machines: MachineSummary[] = [];
  let ownDocument: MachineStateDocument | null = null;

  for (const document of documents) {
    if (machines.some(machine => machine.machineId === document.machineId)) continue;

    const isLocal = document.machineId === input.machine.id;
    if (isLocal) ownDocument = document;
    const stale = isStale(document.lastSync, input.now, input.staleAfterMs);

    machines.push({
      machineId: document.machineId,
      machineName: document.machineName,
      lastSync: document.lastSync,
      stale,
      isLocal,
      repoCount: Object.keys(document.repos).length,
    });

    if (isLocal) continue;

    for (const [key, entry] of Object.entries(document.repos)) {
      const group = groupForKey(key);
      if (!group) continue;
      group.machines.push({
        machineId: document.machineId,
        machineName: document.machineName,
        localPath: entry.localPath,
        lastOpened: latest(entry.lastOpened),
        lastPushed: latest(entry.lastPushed),
        stale,
      });
      if (entry.project) {
        group.summaries.push({ machineId: document.machineId, project: entry.project });
      }
    }
  }

  // This machine: its own document merged with what the scan just saw
  const ownStale = ownDocument ? isStale(ownDocument.lastSync, input.now, input.staleAfterMs) : false;
  const ownKeys = new Set<string>([
    ...Object.keys(ownDocument?.repos ?? {}),
    ...[...groups.entries()].filter(([, group]) => group.local).map(([key]) => key),
  ]);

  for (const key of ownKeys) {
    const documented = ownDocument?.repos[key];
    const group = groupForKey(key);
    if (!group) continue;

    const localPath = group.local?.record.localPath ?? documented?.localPath ?? null;
    group.machines.push({
      machineId: input.machine.id,
      machineName: ownDocument?.machineName ?? input.machine.name,
      localPath,
      lastOpened: latest(documented?.lastOpened, localPath ? localOpens.get(localPath) : null),
      lastPushed: latest(documented?.lastPushed, group.local?.lastPushed),
      stale: ownStale,
    });
    if (!group.local && documented?.project) {
      group.summaries.push({ machineId: input.machine.id, project: documented.project });
    }
  }

  if (!ownDocument) {
    machines.push({
      machineId: input.machine.id,
      machineName: input.machine.name,
      lastSync: null,
      stale: false,
      isLocal: true,
      repoCount: [...groups.values()].filter(group => group.local).length,
    });
  }

  for (const repo of input.remoteRepos ?? []) {
    const group = groupFor(repo.identity);
    if (!group.remote) group.remote = repo;
  }

  const entries: UnifiedEntry[] = [];

  for (const [key, group] of groups) {
    group.machines.sort((a, b) => compareText(a.machineId, b.machineId));
    group.summaries.sort((a, b) => compareText(a.machineId, b.machineId));

    const cloned = group.local !== null || group.machines.some(machine => machine.localPath !== null);
    if (!cloned && !group.remote) continue;

    entries.push({
      key,
      identity: group.identity,
      ...pickFields(group),
      presence: cloned ? 'cloned' : 'available',
      mostRecentActivity: latest(...group.machines.flatMap(machine => [machine.lastOpened, machine.lastPushed])),
      localPath: group.local?.record.localPath ?? null,
      record: group.local?.record ?? null,
      machines: group.machines,
      remote: group.remote,
      stale: group.machines.length > 0 && group.machines.every(machine => machine.stale),
    });
  }

  const localOnlyKeys = new Set<string>();
  for (const project of input.projects) {
    if (project.identity) continue;
    const { record } = project;
    const key = `local:${input.machine.id}/${record.id}`;
    if (localOnlyKeys.has(key)) continue;
    localOnlyKeys.add(key);

    const lastOpened = localOpens.get(record.localPath) ?? null;
    entries.push({
      key,
      identity: null,
      ...fieldsOf(record),
      presence: 'cloned',
      mostRecentActivity: latest(lastOpened),
      localPath: record.localPath,
      record,
      machines: [
        {
          machineId: input.machine.id,
          machineName: ownDocument?.machineName ?? input.machine.name,
          localPath: record.localPath,
          lastOpened: latest(lastOpened),
          lastPushed: null,
          stale: false,
        },
      ],
      remote: null,
      stale: false,
    });
  }

  entries.sort(compareEntries);
  machines.sort((a, b) => compareText(a.machineId, b.machineId));

  return { entries, machines };
}
