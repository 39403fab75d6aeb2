/**
 * In-process stand-in for the watch-compiler container
 *
 * Acts as both the clock and the log source of the repair loop. Every
 * sleep advances virtual time and lets the "compiler" look at the
 * candidates in the watched directory: a candidate the judge accepts gets
 * its `.css`, otherwise the judge's text becomes the log.
 */

import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Clock } from '../../src/repair/clock.js';
import type { LogSource } from '../../src/repair/log-source.js';
import type { VcsReverter } from '../../src/repair/vcs.js';

/** Null accepts the candidate; a string is written to the log instead */
export type Judge = (candidate: string, content: string) => string | null;

export const FINISHED_LOG = "[10:00:02] Finished 'sass' after 12 ms";

export class FakeWatcher implements Clock, LogSource {
  time = 0;
  log = '';
  /** Candidate contents in the order the watcher saw them */
  readonly seen: string[] = [];
  tailCalls = 0;
  /** Runs before each reaction */
  onSleep?: () => void;

  constructor(
    private readonly watchDir: string,
    private readonly judge: Judge,
    private readonly prefix = 'test-compilation-'
  ) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.time += ms;
    this.onSleep?.();
    await this.react();
  }

  async tail(): Promise<string> {
    this.tailCalls++;
    return this.log;
  }

  private async react(): Promise<void> {
    const names = (await readdir(this.watchDir)).filter((name) => name.startsWith(this.prefix) && name.endsWith('.scss'));
    if (names.length === 0) {
      this.log = FINISHED_LOG;
      return;
    }
    for (const name of names) {
      const content = await readFile(join(this.watchDir, name), 'utf-8');
      this.seen.push(content);
      const verdict = this.judge(name, content);
      if (verdict === null) {
        await writeFile(join(this.watchDir, name.replace(/\.scss$/, '.css')), '/* compiled */', 'utf-8');
      } else {
        this.log = verdict;
      }
    }
  }
}

export class RecordingReverter implements VcsReverter {
  readonly reverted: string[] = [];

  constructor(private readonly failWith?: Error) {}

  async revert(dir: string): Promise<void> {
    this.reverted.push(dir);
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/**
 * Log the compiler prints for an `@include` of an unknown mixin
 */
export function undefinedMixinLog(candidate: string, name: string, line: number): string {
  return [
    'Error: Undefined mixin.',
    '  ╷',
    `${line} │   @include ${name};`,
    '  │   ^^^^^^^^^^^^',
    '  ╵',
    `  ${candidate} ${line}:3  root stylesheet`,
  ].join('\n');
}
