/**
 * Watched-directory driver - submit candidates, poll for the outcome, clean up
 *
 * The watch-compiler has no completion callback. Each candidate is written
 * into the watched directory under a fixed prefix; a compiled `.css` next to
 * every candidate is the primary success signal, the log tail the secondary
 * one and the only source of error detail.
 */

import { writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { pathExists, removeFiles } from '../edge/file-writer.js';
import { errorMessage } from '../errors.js';
import type { Clock } from './clock.js';
import { hasErrorIndicator, hasFinishedMarkers, parseCompilationErrors } from './error-parser.js';
import type { LogSource } from './log-source.js';
import type { CompilationError, RepairSettings } from './types.js';

export type PollResult =
  | { status: 'success' }
  | { status: 'errors'; errors: CompilationError[] }
  | { status: 'timeout' }
  | { status: 'aborted' };

/** Log line the watch-compiler prints once a sass run is over */
export const SASS_FINISHED_MARKER = "finished 'sass'";

export interface WatchCompilerDeps {
  logs: LogSource;
  clock: Clock;
  signal?: AbortSignal;
}

export class WatchCompiler {
  constructor(
    readonly watchDir: string,
    private readonly settings: RepairSettings,
    private readonly deps: WatchCompilerDeps
  ) {}

  /**
   * Path of the candidate standing in for a real output file
   */
  candidatePath(file: string): string {
    return join(this.watchDir, `${this.settings.candidatePrefix}${basename(file)}`);
  }

  compiledPath(candidate: string): string {
    return candidate.replace(/\.s[ac]ss$/, '') + '.css';
  }

  /**
   * Write candidates (keyed by candidate path) after removing stale output.
   * Returns the submission time; older log entries are ignored.
   */
  async submit(candidates: ReadonlyMap<string, string>): Promise<Date> {
    const paths = [...candidates.keys()];
    await removeFiles(paths.map((path) => this.compiledPath(path)));
    const submittedAt = new Date(this.deps.clock.now());
    await Promise.all(paths.map((path) => writeFile(path, candidates.get(path) ?? '', 'utf-8')));
    return submittedAt;
  }

  /**
   * Sleep-poll until every candidate compiled, errors show up, or the budget runs out
   */
  async poll(candidates: readonly string[], since: Date, budgetMs: number): Promise<PollResult> {
    const { clock, signal } = this.deps;
    const { pollIntervalMs, logTailLines, finishedMarkers, errorIndicators } = this.settings;
    const deadline = clock.now() + Math.min(budgetMs, this.settings.cycleTimeoutMs);

    while (clock.now() < deadline) {
      await clock.sleep(pollIntervalMs);
      if (signal?.aborted) {
        return { status: 'aborted' };
      }

      const compiled = await Promise.all(candidates.map((path) => pathExists(this.compiledPath(path))));
      if (compiled.every(Boolean)) {
        return { status: 'success' };
      }

      let log: string;
      try {
        log = await this.deps.logs.tail(logTailLines, since);
      } catch (error) {
        console.error('[repair-loop] Reading compiler log failed:', errorMessage(error));
        continue;
      }

      const errors = parseCompilationErrors(log);
      if (errors.length > 0 || hasErrorIndicator(log, errorIndicators)) {
        return { status: 'errors', errors };
      }
      if (hasFinishedMarkers(log, finishedMarkers)) {
        return { status: 'success' };
      }
    }

    return { status: 'timeout' };
  }

  /**
   * Remove candidates and their output, then wait for the compiler's own
   * cleanup run to show up in the log
   */
  async cleanup(candidates: readonly string[]): Promise<void> {
    const { clock, signal } = this.deps;
    const started = new Date(clock.now());
    await removeFiles([...candidates, ...candidates.map((path) => this.compiledPath(path))]);

    if (signal?.aborted) {
      return;
    }

    const deadline = clock.now() + this.settings.cleanupTimeoutMs;
    while (clock.now() < deadline) {
      await clock.sleep(this.settings.pollIntervalMs);
      try {
        const log = await this.deps.logs.tail(this.settings.logTailLines, started);
        if (log.toLowerCase().includes(SASS_FINISHED_MARKER)) {
          return;
        }
      } catch (error) {
        console.error('[repair-loop] Reading compiler log failed:', errorMessage(error));
        return;
      }
    }
    console.error(`[repair-loop] Compiler cleanup not observed within ${this.settings.cleanupTimeoutMs}ms`);
  }
}
