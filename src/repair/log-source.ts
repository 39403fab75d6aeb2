/**
 * Log stream of the watch-compiler
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * Most recent lines of the watch-compiler's log
 */
export interface LogSource {
  /**
   * @param lines - Lines to read from the end
   * @param since - Only entries at or after this time
   */
  tail(lines: number, since?: Date): Promise<string>;
}

export interface DockerLogSourceOptions {
  /** Executable name or path (default: `docker`) */
  binary?: string;
  /** Timeout of one `docker logs` call in ms (default: 10000) */
  timeoutMs?: number;
}

/**
 * Reads `docker logs` of the container running the watch-compiler.
 * The container writes to both streams, so stdout and stderr are joined.
 */
export class DockerLogSource implements LogSource {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly container: string,
    options: DockerLogSourceOptions = {}
  ) {
    this.binary = options.binary ?? 'docker';
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  buildArgs(lines: number, since?: Date): string[] {
    const args = ['logs', '--tail', String(lines)];
    if (since) {
      args.push('--since', since.toISOString());
    }
    args.push(this.container);
    return args;
  }

  async tail(lines: number, since?: Date): Promise<string> {
    const { stdout, stderr } = await execFileAsync(this.binary, this.buildArgs(lines, since), {
      timeout: this.timeoutMs,
      maxBuffer: 4 * 1024 * 1024,
    });
    return [stdout, stderr].filter(Boolean).join('\n');
  }
}
