/**
 * Import pass - removes @import / @use / @forward directives
 *
 * The target stylesheet is self-contained: the theme groups are concatenated
 * before processing, so every directive is dropped and recorded.
 */

import type { TransformationContext } from '../context.js';
import type { ImportDirective, ImportStatement } from '../types.js';
import { isInsideSpan, lineNumberAt, segmentSpans, splitArguments, unquote } from '../scanner.js';

export const IMPORT_PASS_NAME = 'imports_removed';

const IMPORT_DIRECTIVE = /[ \t]*@(import|use|forward)\s+([^;]*?)\s*;[ \t]*/g;
const EXTERNAL_PATH = /^(?:https?:|\/\/|url\(|sass:)/i;
const MODULE_CLAUSE = /\s+(?:as|with|show|hide)\s+.*$/s;

function isImportDirective(value: string): value is ImportDirective {
  return value === 'import' || value === 'use' || value === 'forward';
}

/**
 * Paths named by one directive (`@use "x" as y` keeps only "x")
 */
export function parseImportPaths(raw: string): string[] {
  return splitArguments(raw.replace(MODULE_CLAUSE, '')).map(unquote).filter((p) => p.length > 0);
}

/**
 * Remove every import directive, recording one ImportStatement per directive.
 * Directives inside comments and strings are left alone.
 */
export function runImportPass(context: TransformationContext): TransformationContext {
  context.processingStep = 'import_removal';

  const source = context.currentContent;
  const imports: ImportStatement[] = [];
  const skipped = segmentSpans(source, ['comment', 'string']);
  const pattern = new RegExp(IMPORT_DIRECTIVE.source, 'g');

  let content = '';
  let cursor = 0;
  let match = pattern.exec(source);
  while (match) {
    const at = match.index + match[0].indexOf('@');
    if (isInsideSpan(skipped, at)) {
      // resume after the '@'; a real directive may follow within the same match
      pattern.lastIndex = at + 1;
      match = pattern.exec(source);
      continue;
    }

    const directive = match[1];
    if (isImportDirective(directive)) {
      const paths = parseImportPaths(match[2]);
      imports.push(
        Object.freeze({
          directive,
          paths,
          isExternal: paths.some((p) => EXTERNAL_PATH.test(p)),
          sourceLine: lineNumberAt(source, match.index),
        })
      );
    }
    content += source.slice(cursor, match.index);
    cursor = match.index + match[0].length;
    match = pattern.exec(source);
  }
  content += source.slice(cursor);

  context.imports = [...context.imports, ...imports];
  context.updateContent(content, 'import_removal');
  context.addTransformation(IMPORT_PASS_NAME);
  return context;
}
