import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors.js';
import { scanRoots, type ScanOptions } from './scanner.js';

function writeProject(dir: string, declaration: unknown, files: string[] = []): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(
    path.join(dir, 'catalogue.json'),
    typeof declaration === 'string' ? declaration : JSON.stringify(declaration),
  );
  for (const file of files) {
    fs.writeFileSync(path.join(dir, file), 'x');
  }
}

describe('catalog/scanner', () => {
  let root: string;
  let options: ScanOptions;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'devshelf-scan-'));
    options = {
      roots: [root],
      maxDepth: 3,
      recencyDepth: 2,
      declarationFile: 'catalogue.json',
      screenshotFiles: ['screenshot.png', 'screenshot.jpg'],
      ignoreDirs: ['node_modules'],
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists projects with and without screenshots', () => {
    writeProject(path.join(root, 'alpha'), { id: 'alpha', title: 'Alpha' }, ['screenshot.png']);
    writeProject(path.join(root, 'beta'), { title: 'Beta' });

    const result = scanRoots(options);

    expect(result.records.map(record => record.id)).toEqual(['alpha', 'beta']);

    const [alpha, beta] = result.records;
    expect(alpha.screenshotPresent).toBe(true);
    expect(alpha.screenshotPath).toBe(path.join(root, 'alpha', 'screenshot.png'));
    expect(alpha.relativePath).toBe('alpha');
    expect(alpha.group).toBe(path.basename(root));
    expect(alpha.rootDir).toBe(root);

    expect(beta.screenshotPresent).toBe(false);
    expect(beta.screenshotPath).toBeNull();
    expect(result.warnings).toEqual([
      { kind: 'missing-screenshot', path: path.join(root, 'beta'), message: 'No screenshot found' },
    ]);
  });

  it('excludes a project with an invalid declaration and keeps its siblings', () => {
    writeProject(path.join(root, 'broken'), { title: 42 }, ['screenshot.png']);
    writeProject(path.join(root, 'good'), { title: 'Good' }, ['screenshot.png']);

    const result = scanRoots(options);

    expect(result.records.map(record => record.id)).toEqual(['good']);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].kind).toBe('invalid-declaration');
    expect(result.warnings[0].path).toBe(path.join(root, 'broken', 'catalogue.json'));
  });

  it('keeps the first of two projects sharing an id', () => {
    writeProject(path.join(root, 'one'), { id: 'same' }, ['screenshot.png']);
    writeProject(path.join(root, 'two'), { id: 'same' }, ['screenshot.png']);

    const result = scanRoots(options);

    expect(result.records.map(record => record.localPath)).toEqual([path.join(root, 'one')]);
    expect(result.warnings).toEqual([
      {
        kind: 'duplicate-id',
        path: path.join(root, 'two'),
        message: `Project id "same" is already used by ${path.join(root, 'one')}`,
      },
    ]);
  });

  it('does not descend into a project', () => {
    writeProject(path.join(root, 'outer'), { id: 'outer' }, ['screenshot.png']);
    writeProject(path.join(root, 'outer', 'inner'), { id: 'inner' }, ['screenshot.png']);

    expect(scanRoots(options).records.map(record => record.id)).toEqual(['outer']);
  });

  it('stops at maxDepth', () => {
    writeProject(path.join(root, 'a', 'shallow'), { id: 'shallow' }, ['screenshot.png']);
    writeProject(path.join(root, 'a', 'b', 'deep'), { id: 'deep' }, ['screenshot.png']);

    const result = scanRoots({ ...options, maxDepth: 2 });

    expect(result.records.map(record => record.id)).toEqual(['shallow']);
    expect(result.records[0].relativePath).toBe(path.join('a', 'shallow'));
    expect(result.records[0].group).toBe('a');
  });

  it('skips hidden and ignored directories', () => {
    writeProject(path.join(root, '.hidden', 'secret'), { id: 'secret' });
    writeProject(path.join(root, 'node_modules', 'dep'), { id: 'dep' });
    writeProject(path.join(root, 'visible'), { id: 'visible' }, ['screenshot.png']);

    const result = scanRoots(options);

    expect(result.records.map(record => record.id)).toEqual(['visible']);
    expect(result.skipped).toBe(2);
    // root and visible
    expect(result.scanned).toBe(2);
  });

  it('picks the first configured screenshot name that exists', () => {
    writeProject(path.join(root, 'pics'), { id: 'pics' }, ['screenshot.jpg', 'screenshot.png']);

    const [record] = scanRoots(options).records;

    expect(record.screenshotPath).toBe(path.join(root, 'pics', 'screenshot.png'));
  });

  it('produces identical records on repeated scans', () => {
    writeProject(path.join(root, 'alpha'), { id: 'alpha', tags: ['x', 'x'] }, ['screenshot.png']);
    writeProject(path.join(root, 'group', 'beta'), { id: 'beta' });

    expect(scanRoots(options)).toEqual(scanRoots(options));
  });

  it('takes lastModified from the newest visible entry', () => {
    const dir = path.join(root, 'timed');
    writeProject(dir, { id: 'timed' }, ['screenshot.png', 'main.ts']);
    fs.mkdirSync(path.join(dir, 'node_modules'));
    fs.writeFileSync(path.join(dir, 'node_modules', 'lib.js'), 'x');
    fs.mkdirSync(path.join(dir, '.cache'));
    fs.writeFileSync(path.join(dir, '.cache', 'blob'), 'x');

    const old = new Date('2024-01-01T00:00:00.000Z');
    const edited = new Date('2024-01-02T00:00:00.000Z');
    const ignored = new Date('2024-03-01T00:00:00.000Z');
    for (const file of ['catalogue.json', 'screenshot.png']) {
      fs.utimesSync(path.join(dir, file), old, old);
    }
    fs.utimesSync(path.join(dir, 'main.ts'), edited, edited);
    fs.utimesSync(path.join(dir, 'node_modules', 'lib.js'), ignored, ignored);
    fs.utimesSync(path.join(dir, 'node_modules'), ignored, ignored);
    fs.utimesSync(path.join(dir, '.cache', 'blob'), ignored, ignored);
    fs.utimesSync(path.join(dir, '.cache'), ignored, ignored);
    fs.utimesSync(dir, old, old);

    const [record] = scanRoots(options).records;

    expect(record.lastModified).toBe('2024-01-02T00:00:00.000Z');
  });

  it('counts the git index and HEAD towards recency', () => {
    const dir = path.join(root, 'committed');
    writeProject(dir, { id: 'committed' }, ['screenshot.png']);
    fs.mkdirSync(path.join(dir, '.git'));
    fs.writeFileSync(path.join(dir, '.git', 'HEAD'), 'ref: refs/heads/main\n');

    const old = new Date('2024-01-01T00:00:00.000Z');
    const committed = new Date('2024-02-01T00:00:00.000Z');
    fs.utimesSync(path.join(dir, 'catalogue.json'), old, old);
    fs.utimesSync(path.join(dir, 'screenshot.png'), old, old);
    fs.utimesSync(path.join(dir, '.git', 'HEAD'), committed, committed);
    fs.utimesSync(path.join(dir, '.git'), old, old);
    fs.utimesSync(dir, old, old);

    expect(scanRoots(options).records[0].lastModified).toBe('2024-02-01T00:00:00.000Z');
  });

  it('warns about a missing root when another root exists', () => {
    const missing = path.join(root, 'does-not-exist');
    writeProject(path.join(root, 'alpha'), { id: 'alpha' }, ['screenshot.png']);

    const result = scanRoots({ ...options, roots: [missing, root] });

    expect(result.records).toHaveLength(1);
    expect(result.warnings).toEqual([
      { kind: 'missing-root', path: missing, message: 'Root directory does not exist' },
    ]);
  });

  it('throws NO_ROOTS when no root is configured', () => {
    expect(() => scanRoots({ ...options, roots: [] })).toThrow(ConfigError);
    expect(() => scanRoots({ ...options, roots: [] })).toThrow('No root directories configured');
  });

  it('throws NO_ROOTS when no configured root exists', () => {
    const missing = path.join(root, 'nope');

    try {
      scanRoots({ ...options, roots: [missing] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('NO_ROOTS');
      }
    }
  });

  it('returns no records for a root without projects', () => {
    fs.mkdirSync(path.join(root, 'empty', 'deeper'), { recursive: true });

    const result = scanRoots(options);

    expect(result.records).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('finds projects under a nested root whichever root comes first', () => {
    const inner = path.join(root, 'x');
    writeProject(path.join(inner, 'p'), { id: 'p' }, ['screenshot.png']);

    const innerFirst = scanRoots({ ...options, roots: [inner, root], maxDepth: 1 });
    const outerFirst = scanRoots({ ...options, roots: [root, inner], maxDepth: 1 });

    expect(innerFirst.records.map(record => record.id)).toEqual(['p']);
    expect(outerFirst.records.map(record => record.id)).toEqual(['p']);
    expect(outerFirst.records[0].rootDir).toBe(inner);
    expect(outerFirst.warnings).toEqual([]);
  });

  it('lists a project reachable from two roots once', () => {
    const inner = path.join(root, 'x');
    writeProject(path.join(inner, 'p'), { id: 'p' }, ['screenshot.png']);

    const result = scanRoots({ ...options, roots: [root, inner] });

    expect(result.records.map(record => record.localPath)).toEqual([path.join(inner, 'p')]);
    expect(result.records[0].rootDir).toBe(root);
    expect(result.warnings).toEqual([]);
  });

  it.skipIf(process.getuid?.() === 0)('skips an unreadable directory with a warning', () => {
    const locked = path.join(root, 'locked');
    fs.mkdirSync(locked);
    writeProject(path.join(root, 'open'), { id: 'open' }, ['screenshot.png']);
    fs.chmodSync(locked, 0o000);

    try {
      const result = scanRoots(options);

      expect(result.records.map(record => record.id)).toEqual(['open']);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatchObject({ kind: 'unreadable-directory', path: locked });
      expect(result.skipped).toBe(1);
    } finally {
      fs.chmodSync(locked, 0o755);
    }
  });
});
