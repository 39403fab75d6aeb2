/**
 * Stylesheet compiler - optional round trip through an external compiler
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { performance } from 'perf_hooks';
import { errorMessage } from '../../errors.js';

const execFileAsync = promisify(execFile);

/**
 * Result of one compilation
 */
export interface CompilationOutcome {
  success: boolean;
  durationMs: number;
  /** Compiled CSS when successful */
  css?: string;
  /** Compiler diagnostics when not */
  error?: string;
}

/**
 * Anything that can compile stylesheet text
 */
export interface StylesheetCompiler {
  /** False when the compiler cannot be run at all */
  isAvailable(): Promise<boolean>;
  compile(content: string): Promise<CompilationOutcome>;
}

export interface SassCliCompilerOptions {
  /** Executable name or path (default: `sass`) */
  binary?: string;
  /** Compile timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Timeout of the `--version` probe in ms (default: 5000) */
  probeTimeoutMs?: number;
}

/**
 * Runs the `sass` command line compiler on a temporary file
 */
export class SassCliCompiler implements StylesheetCompiler {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly probeTimeoutMs: number;
  private available: boolean | undefined;

  constructor(options: SassCliCompilerOptions = {}) {
    this.binary = options.binary ?? 'sass';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
  }

  async isAvailable(): Promise<boolean> {
    if (this.available === undefined) {
      try {
        await execFileAsync(this.binary, ['--version'], { timeout: this.probeTimeoutMs });
        this.available = true;
      } catch {
        this.available = false;
      }
    }
    return this.available;
  }

  async compile(content: string): Promise<CompilationOutcome> {
    const dir = await mkdtemp(join(tmpdir(), 'scss-compile-'));
    const input = join(dir, 'input.scss');
    const output = join(dir, 'output.css');
    const started = performance.now();

    try {
      await writeFile(input, content, 'utf-8');
      await execFileAsync(this.binary, ['--no-source-map', input, output], { timeout: this.timeoutMs });
      const css = await readFile(output, 'utf-8');
      return { success: true, durationMs: performance.now() - started, css };
    } catch (error) {
      const stderr =
        typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string'
          ? error.stderr
          : '';
      return {
        success: false,
        durationMs: performance.now() - started,
        error: stderr.trim() || errorMessage(error),
      };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
