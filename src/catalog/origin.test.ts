import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findGitDir, parseRemotes, readLastPushed, resolveOrigin, resolveProjects } from './origin.js';
import type { ProjectRecord } from './types.js';

function writeGitConfig(projectDir: string, config: string): void {
  fs.mkdirSync(path.join(projectDir, '.git'), { recursive: true });
  fs.writeFileSync(path.join(projectDir, '.git', 'config'), config);
}

function remoteSection(name: string, url: string): string {
  return `[remote "${name}"]\n\turl = ${url}\n\tfetch = +refs/heads/*:refs/remotes/${name}/*\n`;
}

function record(localPath: string): ProjectRecord {
  return {
    id: path.basename(localPath),
    title: path.basename(localPath),
    oneLiner: '',
    kind: 'project',
    categories: [],
    tags: [],
    status: 'unknown',
    localPath,
    rootDir: path.dirname(localPath),
    relativePath: path.basename(localPath),
    group: 'root',
    screenshotPath: null,
    screenshotPresent: false,
    lastModified: '2024-01-01T00:00:00.000Z',
  };
}

describe('catalog/origin', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devshelf-origin-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parseRemotes', () => {
    it('maps each remote to its first url and ignores other sections', () => {
      const config = [
        '[core]',
        '\trepositoryformatversion = 0',
        '# a comment',
        '[remote "origin"]',
        '\turl = "https://github.com/alice/foo.git"',
        '\turl = https://github.com/alice/mirror.git',
        '[branch "main"]',
        '\turl = https://github.com/ignored/branch.git',
      ].join('\n');

      expect([...parseRemotes(config)]).toEqual([['origin', 'https://github.com/alice/foo.git']]);
    });

    it('returns an empty map when there is no remote', () => {
      expect(parseRemotes('[core]\n\tbare = false\n').size).toBe(0);
    });
  });

  describe('resolveOrigin', () => {
    it('resolves a single remote', () => {
      writeGitConfig(tempDir, remoteSection('origin', 'git@github.com:alice/foo.git'));

      expect(resolveOrigin(tempDir)).toEqual({
        status: 'resolved',
        identity: { host: 'github.com', owner: 'alice', name: 'foo' },
        remote: 'origin',
        url: 'git@github.com:alice/foo.git',
      });
    });

    it('reports a directory that is not a repository', () => {
      expect(resolveOrigin(tempDir)).toEqual({ status: 'no-repository' });
    });

    it('reports a repository without remotes', () => {
      writeGitConfig(tempDir, '[core]\n\tbare = false\n');

      expect(resolveOrigin(tempDir)).toEqual({ status: 'no-remote' });
    });

    it('does not pick between several remotes', () => {
      writeGitConfig(
        tempDir,
        remoteSection('origin', 'git@github.com:alice/foo.git') +
          remoteSection('upstream', 'git@github.com:bob/foo.git'),
      );

      expect(resolveOrigin(tempDir)).toEqual({ status: 'multiple-remotes', remotes: ['origin', 'upstream'] });
    });

    it('reports a remote URL outside the accepted forms', () => {
      writeGitConfig(tempDir, remoteSection('origin', '/srv/git/foo.git'));

      expect(resolveOrigin(tempDir)).toEqual({
        status: 'unparsable-remote',
        remote: 'origin',
        url: '/srv/git/foo.git',
      });
    });

    it('follows a .git file pointing at the real git directory', () => {
      const project = path.join(tempDir, 'worktree');
      const realGitDir = path.join(tempDir, 'real.git');
      fs.mkdirSync(project);
      fs.mkdirSync(realGitDir);
      fs.writeFileSync(path.join(realGitDir, 'config'), remoteSection('origin', 'https://github.com/alice/foo'));
      fs.writeFileSync(path.join(project, '.git'), 'gitdir: ../real.git\n');

      expect(findGitDir(project)).toBe(realGitDir);
      expect(resolveOrigin(project).status).toBe('resolved');
    });
  });

  describe('readLastPushed', () => {
    it('uses the newest remote-tracking ref', () => {
      writeGitConfig(tempDir, remoteSection('origin', 'git@github.com:alice/foo.git'));
      const refs = path.join(tempDir, '.git', 'refs', 'remotes', 'origin');
      fs.mkdirSync(refs, { recursive: true });
      fs.writeFileSync(path.join(refs, 'main'), 'abc\n');
      fs.writeFileSync(path.join(refs, 'dev'), 'def\n');
      fs.utimesSync(path.join(refs, 'main'), new Date('2024-05-01T10:00:00.000Z'), new Date('2024-05-01T10:00:00.000Z'));
      fs.utimesSync(path.join(refs, 'dev'), new Date('2024-04-01T10:00:00.000Z'), new Date('2024-04-01T10:00:00.000Z'));

      expect(readLastPushed(tempDir, 'origin')).toBe('2024-05-01T10:00:00.000Z');
    });

    it('is null when the remote was never fetched or pushed', () => {
      writeGitConfig(tempDir, remoteSection('origin', 'git@github.com:alice/foo.git'));

      expect(readLastPushed(tempDir, 'origin')).toBeNull();
    });
  });

  describe('resolveProjects', () => {
    it('attaches identities and warns about unparsable remotes', () => {
      const linked = path.join(tempDir, 'linked');
      const odd = path.join(tempDir, 'odd');
      const plain = path.join(tempDir, 'plain');
      writeGitConfig(linked, remoteSection('origin', 'https://github.com/alice/linked'));
      writeGitConfig(odd, remoteSection('origin', 'file:///srv/odd.git'));
      fs.mkdirSync(plain);

      const result = resolveProjects([record(linked), record(odd), record(plain)]);

      expect(result.projects.map(project => project.identity)).toEqual([
        { host: 'github.com', owner: 'alice', name: 'linked' },
        null,
        null,
      ]);
      expect(result.projects[0].lastPushed).toBeNull();
      expect(result.warnings).toEqual([
        {
          kind: 'unparsable-remote',
          path: odd,
          message: 'Remote "origin" has an unrecognized URL: file:///srv/odd.git',
        },
      ]);
    });
  });
});
