/**
 * Tests for the watched-directory driver
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { WatchCompiler } from '../../src/repair/watch-compiler.js';
import { DEFAULT_REPAIR_SETTINGS } from '../../src/repair/repair-loop.js';
import { DockerLogSource } from '../../src/repair/log-source.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/temp-workspace.js';
import { FakeWatcher } from '../helpers/fake-watcher.js';

describe('WatchCompiler', () => {
  let workspace: TempWorkspace;
  let watchDir: string;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    await workspace.mkdir('css');
    watchDir = join(workspace.root, 'css');
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('should name candidates after the real file', () => {
    const watcher = new FakeWatcher(watchDir, () => null);
    const compiler = new WatchCompiler(watchDir, DEFAULT_REPAIR_SETTINGS, { logs: watcher, clock: watcher });
    const candidate = compiler.candidatePath('/themes/x/sb-vrp.scss');

    expect(candidate).toBe(join(watchDir, 'test-compilation-sb-vrp.scss'));
    expect(compiler.compiledPath(candidate)).toBe(join(watchDir, 'test-compilation-sb-vrp.css'));
  });

  it('should remove stale output before writing candidates', async () => {
    const watcher = new FakeWatcher(watchDir, () => null);
    watcher.time = 5_000;
    const compiler = new WatchCompiler(watchDir, DEFAULT_REPAIR_SETTINGS, { logs: watcher, clock: watcher });
    await workspace.writeFile('css/test-compilation-sb-home.css', 'stale');

    const since = await compiler.submit(new Map([[join(watchDir, 'test-compilation-sb-home.scss'), '.a {}']]));

    expect(since.getTime()).toBe(5_000);
    expect(await workspace.listDir('css')).toEqual(['test-compilation-sb-home.scss']);
  });

  it('should report parsed errors from the log', async () => {
    const watcher = new FakeWatcher(watchDir, () => 'Error: Undefined variable: "$x".\n  on line 2 of test-compilation-sb-home.scss');
    const compiler = new WatchCompiler(watchDir, DEFAULT_REPAIR_SETTINGS, { logs: watcher, clock: watcher });
    const candidate = join(watchDir, 'test-compilation-sb-home.scss');
    const since = await compiler.submit(new Map([[candidate, '.a { color: $x; }']]));

    const result = await compiler.poll([candidate], since, 60_000);

    expect(result).toEqual({
      status: 'errors',
      errors: [
        {
          kind: 'undefined_variable',
          raw: 'Error: Undefined variable: "$x".',
          file: 'test-compilation-sb-home.scss',
          lineNumber: 2,
          captures: { name: 'x' },
        },
      ],
    });
    expect(watcher.tailCalls).toBe(1);
  });

  it('should limit polling to the smaller of the budgets', async () => {
    const watcher = new FakeWatcher(watchDir, () => '');
    const compiler = new WatchCompiler(watchDir, DEFAULT_REPAIR_SETTINGS, { logs: watcher, clock: watcher });
    const candidate = join(watchDir, 'test-compilation-sb-home.scss');
    const since = await compiler.submit(new Map([[candidate, '.a {}']]));

    const result = await compiler.poll([candidate], since, 6_000);

    expect(result).toEqual({ status: 'timeout' });
    expect(watcher.time).toBe(6_000);
    expect(watcher.tailCalls).toBe(2);
  });

  it('should remove candidates and their output on cleanup', async () => {
    const watcher = new FakeWatcher(watchDir, () => null);
    const compiler = new WatchCompiler(watchDir, DEFAULT_REPAIR_SETTINGS, { logs: watcher, clock: watcher });
    await workspace.writeFile('css/test-compilation-sb-home.scss', '.a {}');
    await workspace.writeFile('css/test-compilation-sb-home.css', '.a{}');
    await workspace.writeFile('css/style.scss', '.keep {}');

    await compiler.cleanup([join(watchDir, 'test-compilation-sb-home.scss')]);

    expect(await workspace.listDir('css')).toEqual(['style.scss']);
    expect(watcher.time).toBe(DEFAULT_REPAIR_SETTINGS.pollIntervalMs);
  });
});

describe('DockerLogSource', () => {
  it('should build docker logs arguments', () => {
    const source = new DockerLogSource('assets');

    expect(source.buildArgs(50)).toEqual(['logs', '--tail', '50', 'assets']);
    expect(source.buildArgs(10, new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toEqual([
      'logs',
      '--tail',
      '10',
      '--since',
      '2024-01-02T03:04:05.000Z',
      'assets',
    ]);
  });
});
