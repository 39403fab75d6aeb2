/**
 * Content cleaner - final whitespace normalization
 */

import type { TransformationContext } from '../context.js';

export const CLEANUP_PASS_NAME = 'content_cleanup';

/**
 * Normalize line endings, drop trailing whitespace, collapse blank-line runs
 * to a single blank line and trim the ends. Idempotent.
 */
export function cleanContent(content: string): string {
  return content
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();
}

export function runContentCleaner(context: TransformationContext): TransformationContext {
  context.updateContent(cleanContent(context.currentContent), 'cleanup');
  context.addTransformation(CLEANUP_PASS_NAME);
  return context;
}
