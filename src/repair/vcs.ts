/**
 * Version-control reset of the watched directory
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface VcsReverter {
  /** Discard tracked-file changes under `dir` */
  revert(dir: string): Promise<void>;
}

export class GitReverter implements VcsReverter {
  constructor(private readonly timeoutMs = 30_000) {}

  async revert(dir: string): Promise<void> {
    await execFileAsync('git', ['checkout', '--', '.'], { cwd: dir, timeout: this.timeoutMs });
  }
}
