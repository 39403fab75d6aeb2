/**
 * Unit tests for the content cleaner
 */

import { describe, it, expect } from 'vitest';
import { TransformationContext } from '../../../src/core/context.js';
import { CLEANUP_PASS_NAME, cleanContent, runContentCleaner } from '../../../src/core/passes/content-cleaner.js';

describe('cleanContent', () => {
  it('should normalize line endings, trailing whitespace and blank runs', () => {
    expect(cleanContent('a  \r\nb\n\n\n\nc\n')).toBe('a\nb\n\nc');
  });

  it('should collapse blank lines holding only whitespace', () => {
    expect(cleanContent('.a {}\n   \n\t\n.b {}')).toBe('.a {}\n\n.b {}');
  });

  it('should be idempotent', () => {
    const once = cleanContent('\n\n.a {  \n  color: red;\n\n\n}\n');
    expect(cleanContent(once)).toBe(once);
  });
});

describe('runContentCleaner', () => {
  it('should record the cleanup transformation', () => {
    const context = runContentCleaner(new TransformationContext('  .a {}  '));
    expect(context.currentContent).toBe('.a {}');
    expect(context.transformationsApplied).toEqual([CLEANUP_PASS_NAME]);
    expect(context.processingStep).toBe('cleanup');
  });
});
