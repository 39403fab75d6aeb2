import * as prettier from 'prettier';
import { errorMessage } from '../errors.js';

/**
 * Format a stylesheet with prettier. A formatter failure leaves the content
 * as is; formatting is optional.
 */
export async function formatStylesheet(content: string, filepath?: string): Promise<string> {
  try {
    return await prettier.format(content, {
      parser: 'scss',
      singleQuote: false,
      tabWidth: 2,
      filepath,
    });
  } catch (error) {
    console.error(`[migration] Formatting skipped for ${filepath ?? 'stylesheet'}:`, errorMessage(error));
    return content;
  }
}
