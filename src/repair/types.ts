/**
 * Types for the compile-verify-repair loop
 */

// ============================================================================
// Compilation errors
// ============================================================================

export type CompilationErrorKind = 'syntax_error' | 'undefined_variable' | 'undefined_mixin' | 'invalid_css';

/**
 * Values captured from the log line, used by the fixers
 */
export interface CompilationErrorCaptures {
  /** Variable or mixin name */
  name?: string;
  /** Token the compiler expected */
  expected?: string;
  /** Token the compiler found */
  found?: string;
  /** Text the compiler had parsed before failing */
  after?: string;
}

/**
 * One classified error from the watch-compiler's log
 */
export interface CompilationError {
  kind: CompilationErrorKind;
  /** Matched log text */
  raw: string;
  /** File named by the log (basename as logged) */
  file?: string;
  /** 1-based line in that file */
  lineNumber?: number;
  captures: CompilationErrorCaptures;
}

// ============================================================================
// Fixes
// ============================================================================

/**
 * A line the repair loop changed or commented out
 */
export interface LineAlteration {
  /** Real output file the line belongs to */
  file: string;
  /** 1-based line number before the change */
  line: number;
  before: string;
  after: string;
  reason: string;
}

/**
 * Result of one fixer on one file's content
 */
export interface FixResult {
  content: string;
  changed: boolean;
  description: string;
  alterations: Array<Omit<LineAlteration, 'file'>>;
}

// ============================================================================
// Loop
// ============================================================================

/**
 * States of the loop
 */
export type RepairState =
  | 'submitted'
  | 'polling'
  | 'success'
  | 'errors_found'
  | 'fixing'
  | 'aggressive_fixing'
  | 'succeeded'
  | 'failed'
  | 'aborted';

export type RepairPhase = 'retry' | 'aggressive';

export type RepairAttemptOutcome = 'retry' | 'escalate' | 'success' | 'exhausted';

/**
 * One submit-and-poll cycle
 */
export interface RepairAttempt {
  /** 1-based cycle number */
  iteration: number;
  phase: RepairPhase;
  errors: CompilationError[];
  fixesApplied: number;
  fixDescriptions: string[];
  outcome: RepairAttemptOutcome;
}

export type RepairOutcome = 'succeeded' | 'failed' | 'aborted';

/**
 * Everything the loop reports back
 */
export interface RepairReport {
  outcome: RepairOutcome;
  attempts: RepairAttempt[];
  /** Every altered line, in the order the changes were made */
  alterations: LineAlteration[];
  stateHistory: RepairState[];
  /** Real files updated with repaired content (success only) */
  filesUpdated: string[];
}

/**
 * Tunables of the loop
 */
export interface RepairSettings {
  /** Prefix of candidate files inside the watched directory */
  candidatePrefix: string;
  maxRetries: number;
  maxEscalations: number;
  pollIntervalMs: number;
  /** Wait budget of one submit-and-poll cycle */
  cycleTimeoutMs: number;
  /** Wait budget of the whole loop across all cycles */
  totalTimeoutMs: number;
  /** Wait budget for the watch-compiler's own cleanup */
  cleanupTimeoutMs: number;
  /** Log lines read per poll */
  logTailLines: number;
  /** All must appear in the log for a finished compile */
  finishedMarkers: string[];
  /** Any of these (case-insensitive) means the compile failed */
  errorIndicators: string[];
}
