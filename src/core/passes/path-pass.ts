/**
 * Path pass - relative image URLs to absolute theme URLs
 */

import type { TransformationContext } from '../context.js';

export const PATH_PASS_NAME = 'relative_paths_to_absolute';

export const DEFAULT_IMAGE_BASE_URL = '/wp-content/themes/DealerInspireDealerTheme/images/';

const RELATIVE_IMAGE_URL = /url\(\s*(['"]?)\.\.\/images\/([^'")]*?)\1\s*\)/g;

/**
 * Rewrite `url(../images/<file>)` (any quoting) to `url("<imageBaseUrl><file>")`
 */
export function runPathPass(
  context: TransformationContext,
  imageBaseUrl: string = DEFAULT_IMAGE_BASE_URL
): TransformationContext {
  context.processingStep = 'path_conversion';

  const base = imageBaseUrl.endsWith('/') ? imageBaseUrl : `${imageBaseUrl}/`;
  const content = context.currentContent.replace(
    RELATIVE_IMAGE_URL,
    (_match, _quote: string, file: string) => `url("${base}${file}")`
  );

  context.updateContent(content, 'path_conversion');
  context.addTransformation(PATH_PASS_NAME);
  return context;
}
