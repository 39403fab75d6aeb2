/**
 * Tests for the compile-verify-repair loop against an in-process watcher
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { runRepairLoop, DEFAULT_REPAIR_SETTINGS } from '../../src/repair/repair-loop.js';
import type { RepairSettings } from '../../src/repair/types.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/temp-workspace.js';
import { FakeWatcher, RecordingReverter, undefinedMixinLog } from '../helpers/fake-watcher.js';

describe('runRepairLoop', () => {
  let workspace: TempWorkspace;
  let watchDir: string;
  let output: string;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    await workspace.mkdir('theme/css');
    watchDir = join(workspace.root, 'theme', 'css');
    output = join(workspace.root, 'theme', 'sb-home.scss');
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  async function run(content: string, watcher: FakeWatcher, settings: RepairSettings = DEFAULT_REPAIR_SETTINGS) {
    await workspace.writeFile('theme/sb-home.scss', content);
    const reverter = new RecordingReverter();
    const report = await runRepairLoop(watchDir, new Map([[output, content]]), { logs: watcher, reverter, clock: watcher }, settings);
    return { report, reverter };
  }

  it('should succeed when the candidate compiles on the first cycle', async () => {
    const watcher = new FakeWatcher(watchDir, () => null);
    const { report, reverter } = await run('.a { color: red; }', watcher);

    expect(report.outcome).toBe('succeeded');
    expect(report.stateHistory).toEqual(['submitted', 'polling', 'success', 'succeeded']);
    expect(report.attempts).toEqual([
      { iteration: 1, phase: 'retry', errors: [], fixesApplied: 0, fixDescriptions: [], outcome: 'success' },
    ]);
    expect(report.filesUpdated).toEqual([]);
    expect(watcher.seen).toEqual(['.a { color: red; }']);
    expect(reverter.reverted).toEqual([watchDir]);
    expect(await workspace.listDir('theme/css')).toEqual([]);
  });

  it('should accept the finished markers when no CSS file appears', async () => {
    const watcher = new FakeWatcher(watchDir, () => "Finished 'sass' after 1 s\nFinished 'processCss' after 2 s");
    const { report } = await run('.a { color: red; }', watcher);

    expect(report.outcome).toBe('succeeded');
  });

  it('should fix the reported error, resubmit and write the repaired file', async () => {
    const content = '.a {\n  @include foo;\n  color: red;\n}';
    const watcher = new FakeWatcher(watchDir, (candidate, text) =>
      /^\s*@include foo/m.test(text) ? undefinedMixinLog(candidate, 'foo', 2) : null
    );
    const { report } = await run(content, watcher);

    expect(report.outcome).toBe('succeeded');
    expect(report.stateHistory).toEqual([
      'submitted',
      'polling',
      'errors_found',
      'fixing',
      'submitted',
      'polling',
      'success',
      'succeeded',
    ]);
    expect(report.attempts[0]).toMatchObject({
      iteration: 1,
      phase: 'retry',
      fixesApplied: 1,
      fixDescriptions: ['sb-home.scss: undefined mixin "foo" (1 line(s) commented out)'],
      outcome: 'retry',
    });
    expect(report.alterations).toEqual([
      { file: output, line: 2, before: '  @include foo;', after: '  // @include foo;', reason: 'undefined mixin "foo"' },
    ]);
    expect(report.filesUpdated).toEqual([output]);
    expect(await workspace.readFile('theme/sb-home.scss')).toBe('.a {\n  // @include foo;\n  color: red;\n}');
  });

  it('should escalate to the aggressive fallback when fixes stop helping', async () => {
    const watcher = new FakeWatcher(watchDir, (_candidate, text) => (text.includes('COMPILE FIX') ? null : 'Error: boom'));
    const { report } = await run('.a {\n  width: $w;\n  color: red;\n}', watcher);

    expect(report.outcome).toBe('succeeded');
    expect(report.attempts.map((a) => [a.phase, a.outcome])).toEqual([
      ['retry', 'escalate'],
      ['aggressive', 'success'],
    ]);
    expect(await workspace.readFile('theme/sb-home.scss')).toBe('.a {\n  // COMPILE FIX: width: $w;\n  color: red;\n}');
  });

  it('should stop within maxRetries + maxEscalations cycles', async () => {
    const content = '.a {\n  @include a;\n  @include b;\n  @include c;\n  color: red;\n}';
    const watcher = new FakeWatcher(watchDir, (candidate, text) => {
      const lines = text.split('\n');
      const index = lines.findIndex((line) => /^\s*@include/.test(line));
      if (index === -1) return 'Error: boom';
      const name = lines[index].trim().replace(/^@include\s+/, '').replace(/;$/, '');
      return undefinedMixinLog(candidate, name, index + 1);
    });
    const settings = { ...DEFAULT_REPAIR_SETTINGS, maxRetries: 2, maxEscalations: 2 };
    const { report, reverter } = await run(content, watcher, settings);

    expect(report.outcome).toBe('failed');
    expect(report.attempts.map((a) => [a.iteration, a.phase, a.outcome])).toEqual([
      [1, 'retry', 'retry'],
      [2, 'retry', 'escalate'],
      [3, 'aggressive', 'exhausted'],
    ]);
    expect(report.stateHistory[report.stateHistory.length - 1]).toBe('failed');
    expect(report.filesUpdated).toEqual([]);
    expect(await workspace.readFile('theme/sb-home.scss')).toBe(content);
    expect(reverter.reverted).toEqual([watchDir]);
    expect(await workspace.listDir('theme/css')).toEqual([]);
  });

  it('should time out a cycle when the compiler never answers', async () => {
    const watcher = new FakeWatcher(watchDir, () => '');
    const settings = { ...DEFAULT_REPAIR_SETTINGS, cycleTimeoutMs: 9_000, cleanupTimeoutMs: 3_000 };
    const { report } = await run('.a { color: red; }', watcher, settings);

    expect(report.outcome).toBe('failed');
    expect(report.stateHistory).toEqual(['submitted', 'polling', 'fixing', 'aggressive_fixing', 'failed']);
    expect(report.attempts).toEqual([
      { iteration: 1, phase: 'retry', errors: [], fixesApplied: 0, fixDescriptions: [], outcome: 'exhausted' },
    ]);
    expect(watcher.seen).toHaveLength(3);
  });

  it('should stop polling, clean up and revert when aborted', async () => {
    const controller = new AbortController();
    const watcher = new FakeWatcher(watchDir, () => 'Error: boom');
    watcher.onSleep = () => controller.abort();
    await workspace.writeFile('theme/sb-home.scss', '.a {}');
    const reverter = new RecordingReverter();

    const report = await runRepairLoop(watchDir, new Map([[output, '.a {}']]), {
      logs: watcher,
      reverter,
      clock: watcher,
      signal: controller.signal,
    });

    expect(report.outcome).toBe('aborted');
    expect(report.stateHistory).toEqual(['submitted', 'polling', 'aborted']);
    expect(reverter.reverted).toEqual([watchDir]);
    expect(await workspace.listDir('theme/css')).toEqual([]);
  });

  it('should finish even when reverting fails', async () => {
    const watcher = new FakeWatcher(watchDir, () => null);
    await workspace.writeFile('theme/sb-home.scss', '.a {}');
    const reverter = new RecordingReverter(new Error('not a git repository'));

    const report = await runRepairLoop(watchDir, new Map([[output, '.a {}']]), {
      logs: watcher,
      reverter,
      clock: watcher,
    });

    expect(report.outcome).toBe('succeeded');
    expect(reverter.reverted).toEqual([watchDir]);
  });
});
