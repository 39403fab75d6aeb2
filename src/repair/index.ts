export { runRepairLoop, DEFAULT_REPAIR_SETTINGS } from './repair-loop.js';
export type { RepairLoopDeps } from './repair-loop.js';
export { WatchCompiler, SASS_FINISHED_MARKER } from './watch-compiler.js';
export type { PollResult, WatchCompilerDeps } from './watch-compiler.js';
export { parseCompilationErrors, hasErrorIndicator, hasFinishedMarkers, ERROR_MATCHERS } from './error-parser.js';
export {
  applyFix,
  FIXERS,
  fixUndefinedVariable,
  fixUndefinedMixin,
  fixSyntaxError,
  fixInvalidCss,
} from './fixers.js';
export type { Fixer } from './fixers.js';
export { applyAggressiveFallback, RISKY_CONSTRUCTS } from './aggressive-fallback.js';
export { commentOutLines, FIX_COMMENT_PREFIX, AGGRESSIVE_COMMENT_PREFIX } from './commenting.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { DockerLogSource } from './log-source.js';
export type { LogSource, DockerLogSourceOptions } from './log-source.js';
export { GitReverter } from './vcs.js';
export type { VcsReverter } from './vcs.js';
export type * from './types.js';
