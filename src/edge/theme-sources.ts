/**
 * Theme sources - reads the legacy stylesheets of one theme, per output group
 */

import { glob } from 'glob';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { MigratorConfig, SourceGroup } from '../config-schema.js';
import { SOURCE_GROUPS } from '../config-schema.js';
import { MigrationError } from '../errors.js';

/**
 * One source file that contributed to a group
 */
export interface SourceFile {
  /** Path relative to the theme directory */
  relativePath: string;
  content: string;
}

export interface GroupSource {
  group: SourceGroup;
  files: SourceFile[];
  /** Files joined with a header comment each; empty when no file exists */
  combined: string;
}

export interface ThemeSources {
  slug: string;
  themeDir: string;
  groups: GroupSource[];
  /** Stylesheets of the theme that belong to no group */
  unassigned: string[];
}

export function themeDirectory(config: Pick<MigratorConfig, 'themesDir'>, slug: string): string {
  return join(config.themesDir, slug);
}

/**
 * Header-per-file concatenation of a group's sources
 */
export function combineSources(files: readonly SourceFile[]): string {
  return files
    .filter((file) => file.content.trim() !== '')
    .map((file) => `/* Styles from ${file.relativePath} */\n\n${file.content.trim()}`)
    .join('\n\n');
}

/**
 * Reads every group's sources. A name is looked up under `css/` first, then
 * at the theme root.
 *
 * @throws {MigrationError} SOURCE_NOT_FOUND when the theme has no stylesheets at all
 */
export async function readThemeSources(
  config: Pick<MigratorConfig, 'themesDir' | 'sources'>,
  slug: string
): Promise<ThemeSources> {
  const themeDir = themeDirectory(config, slug);
  const available = new Set(
    (await glob(['css/*.scss', '*.scss'], { cwd: themeDir, nodir: true, posix: true })).sort()
  );

  if (available.size === 0) {
    throw new MigrationError(`No stylesheets found in ${themeDir}`, 'SOURCE_NOT_FOUND', { slug, themeDir });
  }

  const used = new Set<string>();
  const groups: GroupSource[] = [];

  for (const group of SOURCE_GROUPS) {
    const files: SourceFile[] = [];
    for (const name of config.sources[group]) {
      const relativePath = [`css/${name}`, name].find((path) => available.has(path));
      if (!relativePath || used.has(relativePath)) continue;
      used.add(relativePath);
      files.push({ relativePath, content: await readFile(join(themeDir, relativePath), 'utf-8') });
    }
    groups.push({ group, files, combined: combineSources(files) });
  }

  return {
    slug,
    themeDir,
    groups,
    unassigned: [...available].filter((path) => !used.has(path)),
  };
}
