import { describe, it, expect } from 'vitest';
import type { LocalProject, ProjectRecord, RemoteIdentity } from '../catalog/types.js';
import { aggregate, type AggregateInput, type RemoteRepo } from './aggregator.js';
import type { MachineActivityEntry, MachineStateDocument, ProjectSummary } from './types.js';

const NOW = '2024-06-01T12:00:00.000Z';
const FOO = 'github.com/alice/foo';

function identity(owner: string, name: string): RemoteIdentity {
  return { host: 'github.com', owner, name };
}

function activity(
  localPath: string | null,
  lastOpened: string | null = null,
  lastPushed: string | null = null,
  project?: ProjectSummary,
): MachineActivityEntry {
  return project ? { localPath, lastOpened, lastPushed, project } : { localPath, lastOpened, lastPushed };
}

function doc(
  machineId: string,
  repos: Record<string, MachineActivityEntry>,
  lastSync: string = '2024-06-01T00:00:00.000Z',
): MachineStateDocument {
  return { version: 1, machineId, machineName: machineId.toUpperCase(), lastSync, repos };
}

function summary(id: string, overrides: Partial<ProjectSummary> = {}): ProjectSummary {
  return { id, title: id, oneLiner: '', kind: 'project', categories: [], tags: [], status: 'unknown', ...overrides };
}

function record(localPath: string, overrides: Partial<ProjectRecord> = {}): ProjectRecord {
  const name = localPath.split('/').pop() ?? localPath;
  return {
    id: name,
    title: name,
    oneLiner: '',
    kind: 'project',
    categories: [],
    tags: [],
    status: 'unknown',
    localPath,
    rootDir: '/work',
    relativePath: name,
    group: 'work',
    screenshotPath: null,
    screenshotPresent: false,
    lastModified: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function local(
  localPath: string,
  id: RemoteIdentity | null,
  lastPushed: string | null = null,
  overrides: Partial<ProjectRecord> = {},
): LocalProject {
  return { record: record(localPath, overrides), identity: id, lastPushed };
}

function remote(owner: string, name: string, overrides: Partial<RemoteRepo> = {}): RemoteRepo {
  return {
    identity: identity(owner, name),
    description: '',
    url: `https://github.com/${owner}/${name}`,
    isArchived: false,
    isFork: false,
    ownerIsOrganization: false,
    pushedAt: null,
    ...overrides,
  };
}

function run(overrides: Partial<AggregateInput> = {}) {
  return aggregate({
    machine: { id: 'this', name: 'This Machine' },
    projects: [],
    documents: [],
    remoteRepos: null,
    now: NOW,
    staleAfterMs: null,
    ...overrides,
  });
}

describe('sync/aggregator', () => {
  describe('cross-machine merge', () => {
    const m1 = doc('m1', { [FOO]: activity('/m1/foo', '2024-01-01T00:00:00.000Z') });
    const m2 = doc('m2', { [FOO]: activity('/m2/foo', '2024-02-01T00:00:00.000Z') });

    it('takes the latest last-opened time across machines', () => {
      const { entries } = run({ documents: [m1, m2] });

      expect(entries).toHaveLength(1);
      expect(entries[0].key).toBe(FOO);
      expect(entries[0].presence).toBe('cloned');
      expect(entries[0].mostRecentActivity).toBe('2024-02-01T00:00:00.000Z');
      expect(entries[0].machines.map(machine => [machine.machineId, machine.localPath])).toEqual([
        ['m1', '/m1/foo'],
        ['m2', '/m2/foo'],
      ]);
      expect(entries[0].localPath).toBeNull();
      expect(entries[0].record).toBeNull();
    });

    it('does not depend on document order', () => {
      expect(run({ documents: [m2, m1] })).toEqual(run({ documents: [m1, m2] }));
    });

    it('moves activity forward for a later timestamp and never backward', () => {
      const later = doc('m3', { [FOO]: activity('/m3/foo', null, '2024-03-01T00:00:00.000Z') });
      const earlier = doc('m3', { [FOO]: activity('/m3/foo', '2023-12-01T00:00:00.000Z') });

      expect(run({ documents: [m1, m2, later] }).entries[0].mostRecentActivity).toBe('2024-03-01T00:00:00.000Z');
      expect(run({ documents: [m1, m2, earlier] }).entries[0].mostRecentActivity).toBe('2024-02-01T00:00:00.000Z');
    });

    it('lists every machine, this one included, by id', () => {
      const { machines } = run({ documents: [m2, m1] });

      expect(machines).toEqual([
        { machineId: 'm1', machineName: 'M1', lastSync: '2024-06-01T00:00:00.000Z', stale: false, isLocal: false, repoCount: 1 },
        { machineId: 'm2', machineName: 'M2', lastSync: '2024-06-01T00:00:00.000Z', stale: false, isLocal: false, repoCount: 1 },
        { machineId: 'this', machineName: 'This Machine', lastSync: null, stale: false, isLocal: true, repoCount: 0 },
      ]);
    });

    it('prefers the richest project summary reported by another machine', () => {
      const plain = doc('m1', { [FOO]: activity('/m1/foo', null, null, summary('foo')) });
      const rich = doc('m2', {
        [FOO]: activity('/m2/foo', null, null, summary('foo', { title: 'Foo', oneLiner: 'Does foo', status: 'active' })),
      });

      const [entry] = run({ documents: [plain, rich] }).entries;

      expect(entry.title).toBe('Foo');
      expect(entry.oneLiner).toBe('Does foo');
      expect(entry.status).toBe('active');
    });
  });

  describe('presence', () => {
    it('marks a repository known only remotely as available', () => {
      const { entries } = run({ remoteRepos: [remote('alice', 'bar', { description: 'Remote only' })] });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        key: 'github.com/alice/bar',
        id: 'bar',
        title: 'bar',
        oneLiner: 'Remote only',
        presence: 'available',
        mostRecentActivity: null,
        machines: [],
        localPath: null,
      });
    });

    it('marks a repository cloned on one machine as cloned even when it is also remote', () => {
      const { entries } = run({
        documents: [doc('m1', { [FOO]: activity('/m1/foo') })],
        remoteRepos: [remote('alice', 'foo')],
      });

      expect(entries).toHaveLength(1);
      expect(entries[0].presence).toBe('cloned');
      expect(entries[0].remote?.url).toBe('https://github.com/alice/foo');
    });

    it('omits an identity that is neither cloned anywhere nor remote', () => {
      const { entries } = run({ documents: [doc('m1', { [FOO]: activity(null, '2024-01-01T00:00:00.000Z') })] });

      expect(entries).toEqual([]);
    });

    it('shows an archived remote-only repository as archived', () => {
      const { entries } = run({ remoteRepos: [remote('alice', 'old', { isArchived: true })] });

      expect(entries[0].status).toBe('archived');
    });
  });

  describe('this machine', () => {
    it('combines the scan, its own document and local opens', () => {
      const { entries, machines } = run({
        projects: [local('/work/foo', identity('alice', 'foo'), '2024-04-01T00:00:00.000Z', { title: 'Foo' })],
        documents: [doc('this', { [FOO]: activity('/work/foo', '2024-03-01T00:00:00.000Z') }, NOW)],
        localOpens: new Map([['/work/foo', '2024-05-01T00:00:00.000Z']]),
      });

      expect(entries).toHaveLength(1);
      expect(entries[0].title).toBe('Foo');
      expect(entries[0].localPath).toBe('/work/foo');
      expect(entries[0].record?.localPath).toBe('/work/foo');
      expect(entries[0].mostRecentActivity).toBe('2024-05-01T00:00:00.000Z');
      expect(entries[0].machines).toEqual([
        {
          machineId: 'this',
          machineName: 'THIS',
          localPath: '/work/foo',
          lastOpened: '2024-05-01T00:00:00.000Z',
          lastPushed: '2024-04-01T00:00:00.000Z',
          stale: false,
        },
      ]);
      expect(machines).toEqual([
        { machineId: 'this', machineName: 'THIS', lastSync: NOW, stale: false, isLocal: true, repoCount: 1 },
      ]);
    });

    it('uses the local record over summaries from other machines', () => {
      const { entries } = run({
        projects: [local('/work/foo', identity('alice', 'foo'), null, { title: 'Local Foo' })],
        documents: [doc('m1', { [FOO]: activity('/m1/foo', null, null, summary('foo', { title: 'Remote Foo', tags: ['x'] })) })],
      });

      expect(entries[0].title).toBe('Local Foo');
    });

    it('keys a project without a remote by machine and id', () => {
      const { entries } = run({
        projects: [local('/work/scratch', null)],
        localOpens: new Map([['/work/scratch', '2024-05-02T00:00:00.000Z']]),
      });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        key: 'local:this/scratch',
        identity: null,
        presence: 'cloned',
        localPath: '/work/scratch',
        mostRecentActivity: '2024-05-02T00:00:00.000Z',
        remote: null,
      });
    });

    it('keeps the first of two clones of the same repository', () => {
      const { entries } = run({
        projects: [local('/work/foo', identity('alice', 'foo')), local('/backup/foo', identity('alice', 'foo'))],
      });

      expect(entries).toHaveLength(1);
      expect(entries[0].localPath).toBe('/work/foo');
    });
  });

  describe('ordering', () => {
    it('sorts by activity, then title, with missing activity last', () => {
      const { entries } = run({
        documents: [
          doc('m1', {
            'github.com/x/zeta': activity('/m1/zeta', '2024-03-01T00:00:00.000Z'),
            'github.com/x/beta': activity('/m1/beta', '2024-03-01T00:00:00.000Z'),
            'github.com/x/gamma': activity('/m1/gamma', '2024-04-01T00:00:00.000Z'),
          }),
        ],
        remoteRepos: [remote('x', 'alpha')],
      });

      expect(entries.map(entry => entry.title)).toEqual(['gamma', 'beta', 'zeta', 'alpha']);
    });
  });

  describe('staleness', () => {
    const old = doc(
      'm1',
      { [FOO]: activity('/m1/foo'), 'github.com/alice/only-old': activity('/m1/only-old') },
      '2024-06-01T00:00:00.000Z',
    );
    const fresh = doc('m2', { [FOO]: activity('/m2/foo') }, '2024-06-01T11:30:00.000Z');

    it('flags machines past the threshold and entries only they report', () => {
      const { entries, machines } = run({ documents: [old, fresh], staleAfterMs: 3_600_000 });

      expect(machines.filter(machine => !machine.isLocal).map(machine => machine.stale)).toEqual([true, false]);
      expect(entries.map(entry => [entry.key, entry.stale])).toEqual([
        [FOO, false],
        ['github.com/alice/only-old', true],
      ]);
    });

    it('flags nothing without a threshold', () => {
      const { entries, machines } = run({ documents: [old, fresh] });

      expect(machines.some(machine => machine.stale)).toBe(false);
      expect(entries.some(entry => entry.stale)).toBe(false);
    });
  });
});
