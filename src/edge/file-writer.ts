/**
 * File Writer - atomic writes of migrated stylesheets
 *
 * Content goes to a temp file in the target's directory, then is renamed
 * over the target, so readers (including a watch-compiler) never see a
 * half-written file.
 */

import { access, mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { MigrationError, errorMessage } from '../errors.js';

/**
 * Result of writing one file
 */
export interface WriteResult {
  /** Absolute path written */
  path: string;
  /** Bytes written */
  bytes: number;
}

let tempCounter = 0;

function tempPathFor(target: string): string {
  tempCounter = (tempCounter + 1) % Number.MAX_SAFE_INTEGER;
  return join(dirname(target), `.${basename(target)}.${process.pid}.${tempCounter}.tmp`);
}

/**
 * Write a file atomically (temp file + rename)
 *
 * @throws {MigrationError} WRITE_FAILED
 */
export async function writeFileAtomic(target: string, content: string): Promise<WriteResult> {
  const temp = tempPathFor(target);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(temp, content, 'utf-8');
    await rename(temp, target);
    return { path: target, bytes: Buffer.byteLength(content, 'utf8') };
  } catch (error) {
    await rm(temp, { force: true });
    throw new MigrationError(`Failed to write ${target}: ${errorMessage(error)}`, 'WRITE_FAILED', {
      path: target,
    });
  }
}

/**
 * Write several files; stops at the first failure
 */
export async function writeFilesAtomic(files: ReadonlyMap<string, string>): Promise<WriteResult[]> {
  const results: WriteResult[] = [];
  for (const [path, content] of files) {
    results.push(await writeFileAtomic(path, content));
  }
  return results;
}

/**
 * Check file existence
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Delete files, ignoring ones that are already gone
 */
export async function removeFiles(paths: readonly string[]): Promise<void> {
  await Promise.all(paths.map((path) => rm(path, { force: true })));
}
