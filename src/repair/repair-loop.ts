/**
 * Compile-verify-repair loop
 *
 * SUBMITTED → POLLING → SUCCESS | ERRORS_FOUND → FIXING → SUBMITTED, for at
 * most `maxRetries` cycles. A cycle without a productive fix (or without
 * parseable errors) escalates to AGGRESSIVE_FIXING, itself bounded by
 * `maxEscalations`. Cleanup runs in every outcome.
 */

import { basename } from 'path';
import { writeFileAtomic } from '../edge/file-writer.js';
import { errorMessage } from '../errors.js';
import { applyAggressiveFallback } from './aggressive-fallback.js';
import { systemClock, type Clock } from './clock.js';
import { applyFix } from './fixers.js';
import type { LogSource } from './log-source.js';
import type { VcsReverter } from './vcs.js';
import { WatchCompiler, type PollResult } from './watch-compiler.js';
import type {
  CompilationError,
  FixResult,
  RepairAttemptOutcome,
  RepairPhase,
  RepairReport,
  RepairSettings,
  RepairState,
} from './types.js';

export const DEFAULT_REPAIR_SETTINGS: RepairSettings = {
  candidatePrefix: 'test-compilation-',
  maxRetries: 3,
  maxEscalations: 3,
  pollIntervalMs: 3_000,
  cycleTimeoutMs: 45_000,
  totalTimeoutMs: 300_000,
  cleanupTimeoutMs: 15_000,
  logTailLines: 50,
  finishedMarkers: ["finished 'sass'", "finished 'processcss'"],
  errorIndicators: ['error:', 'failed', 'scss compilation error', 'syntax error'],
};

export interface RepairLoopDeps {
  logs: LogSource;
  reverter: VcsReverter;
  clock?: Clock;
  /** Interrupt: the loop stops polling and goes straight to cleanup */
  signal?: AbortSignal;
}

interface CandidateEntry {
  /** Real output file */
  file: string;
  candidate: string;
  original: string;
  content: string;
}

interface FixRound {
  applied: number;
  descriptions: string[];
}

/**
 * Errors with a line number go last-line-first so earlier fixes in the same
 * round do not shift the lines of later ones
 */
function byDescendingLine(a: CompilationError, b: CompilationError): number {
  return (b.lineNumber ?? 0) - (a.lineNumber ?? 0);
}

class RepairRun {
  readonly report: RepairReport = {
    outcome: 'failed',
    attempts: [],
    alterations: [],
    stateHistory: [],
    filesUpdated: [],
  };

  private readonly compiler: WatchCompiler;
  private readonly clock: Clock;
  private readonly startedAt: number;
  private cycles = 0;

  readonly entries: CandidateEntry[];

  constructor(
    private readonly watchDir: string,
    files: ReadonlyMap<string, string>,
    private readonly settings: RepairSettings,
    private readonly deps: RepairLoopDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.compiler = new WatchCompiler(watchDir, settings, {
      logs: deps.logs,
      clock: this.clock,
      signal: deps.signal,
    });
    this.entries = [...files].map(([file, content]) => ({
      file,
      candidate: this.compiler.candidatePath(file),
      original: content,
      content,
    }));
    this.startedAt = this.clock.now();
  }

  private enter(state: RepairState): void {
    this.report.stateHistory.push(state);
  }

  private remainingMs(): number {
    return this.settings.totalTimeoutMs - (this.clock.now() - this.startedAt);
  }

  private recordAttempt(
    phase: RepairPhase,
    errors: CompilationError[],
    round: FixRound,
    outcome: RepairAttemptOutcome
  ): void {
    this.report.attempts.push({
      iteration: this.cycles,
      phase,
      errors,
      fixesApplied: round.applied,
      fixDescriptions: round.descriptions,
      outcome,
    });
  }

  private async cycle(): Promise<PollResult> {
    if (this.deps.signal?.aborted) {
      return { status: 'aborted' };
    }
    this.cycles++;
    this.enter('submitted');
    const since = await this.compiler.submit(new Map(this.entries.map((e) => [e.candidate, e.content])));
    this.enter('polling');
    return this.compiler.poll(
      this.entries.map((e) => e.candidate),
      since,
      this.remainingMs()
    );
  }

  private apply(entry: CandidateEntry, fix: FixResult, round: FixRound): void {
    if (!fix.changed) return;
    entry.content = fix.content;
    round.applied++;
    round.descriptions.push(`${basename(entry.file)}: ${fix.description}`);
    this.report.alterations.push(...fix.alterations.map((a) => ({ file: entry.file, ...a })));
  }

  /**
   * Errors naming a file go to that candidate only; others to every candidate
   */
  private targetsOf(error: CompilationError): CandidateEntry[] {
    if (!error.file) return this.entries;
    const name = basename(error.file);
    return this.entries.filter((e) => basename(e.candidate) === name || basename(e.file) === name);
  }

  private fixErrors(errors: CompilationError[], round: FixRound): void {
    for (const error of [...errors].sort(byDescendingLine)) {
      for (const entry of this.targetsOf(error)) {
        this.apply(entry, applyFix(entry.content, error), round);
      }
    }
  }

  private async succeed(): Promise<void> {
    this.enter('succeeded');
    this.report.outcome = 'succeeded';
    for (const entry of this.entries) {
      if (entry.content !== entry.original) {
        await writeFileAtomic(entry.file, entry.content);
        this.report.filesUpdated.push(entry.file);
      }
    }
  }

  private abort(): void {
    this.enter('aborted');
    this.report.outcome = 'aborted';
  }

  /**
   * Bounded retries with targeted fixers. Returns the last errors seen, or
   * null when the run is already decided.
   */
  private async retryPhase(): Promise<CompilationError[] | null> {
    let lastErrors: CompilationError[] = [];

    for (let i = 1; i <= this.settings.maxRetries && this.remainingMs() > 0; i++) {
      const result = await this.cycle();
      if (result.status === 'aborted') {
        this.abort();
        return null;
      }
      if (result.status === 'success') {
        this.enter('success');
        this.recordAttempt('retry', [], { applied: 0, descriptions: [] }, 'success');
        await this.succeed();
        return null;
      }

      lastErrors = result.status === 'errors' ? result.errors : [];
      if (result.status === 'errors') this.enter('errors_found');
      this.enter('fixing');
      const round: FixRound = { applied: 0, descriptions: [] };
      this.fixErrors(lastErrors, round);

      const productive = round.applied > 0;
      this.recordAttempt('retry', lastErrors, round, productive && i < this.settings.maxRetries ? 'retry' : 'escalate');
      if (!productive) break;
    }

    return lastErrors;
  }

  /**
   * Comment out risky constructs and resubmit, at most `maxEscalations` times
   */
  private async aggressivePhase(initialErrors: CompilationError[]): Promise<void> {
    let errors = initialErrors;

    for (let j = 1; j <= this.settings.maxEscalations && this.remainingMs() > 0; j++) {
      this.enter('aggressive_fixing');
      const round: FixRound = { applied: 0, descriptions: [] };
      this.fixErrors(errors, round);
      for (const entry of this.entries) {
        this.apply(entry, applyAggressiveFallback(entry.content), round);
      }

      if (round.applied === 0) {
        const last = this.report.attempts[this.report.attempts.length - 1];
        if (last) last.outcome = 'exhausted';
        return;
      }

      const result = await this.cycle();
      if (result.status === 'aborted') {
        this.abort();
        return;
      }
      if (result.status === 'success') {
        this.enter('success');
        this.recordAttempt('aggressive', [], round, 'success');
        await this.succeed();
        return;
      }

      errors = result.status === 'errors' ? result.errors : [];
      if (result.status === 'errors') this.enter('errors_found');
      this.recordAttempt('aggressive', errors, round, j < this.settings.maxEscalations ? 'escalate' : 'exhausted');
    }
  }

  async run(): Promise<RepairReport> {
    try {
      const errors = await this.retryPhase();
      if (errors !== null) {
        await this.aggressivePhase(errors);
      }
      if (this.report.outcome === 'failed') {
        this.enter('failed');
      }
    } finally {
      await this.cleanup();
    }

    console.error(
      `[repair-loop] Compilation ${this.report.outcome} after ${this.cycles} cycle(s), ` +
        `${this.report.alterations.length} line(s) altered`
    );
    return this.report;
  }

  private async cleanup(): Promise<void> {
    try {
      await this.compiler.cleanup(this.entries.map((e) => e.candidate));
    } catch (error) {
      console.error('[repair-loop] Removing candidates failed:', errorMessage(error));
    }
    try {
      await this.deps.reverter.revert(this.watchDir);
    } catch (error) {
      console.error('[repair-loop] Reverting watched directory failed:', errorMessage(error));
    }
  }
}

/**
 * Drive the watch-compiler over candidates of `files` (real path → content)
 * until they compile or every tier is exhausted
 *
 * @param watchDir - Directory the watch-compiler observes
 */
export async function runRepairLoop(
  watchDir: string,
  files: ReadonlyMap<string, string>,
  deps: RepairLoopDeps,
  settings: RepairSettings = DEFAULT_REPAIR_SETTINGS
): Promise<RepairReport> {
  return new RepairRun(watchDir, files, settings, deps).run();
}
