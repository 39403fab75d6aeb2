/**
 * Predetermined style fragments appended to the interior output for one
 * brand family
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';

/** Slug substrings that identify the brand family */
export const BRAND_KEYWORDS = ['chrysler', 'dodge', 'jeep', 'ram', 'fiat', 'cdjr'] as const;

export type Brand = (typeof BRAND_KEYWORDS)[number];

export interface PredeterminedFragment {
  /** File under resources/predetermined */
  file: string;
  /** Selector whose presence means the fragment is already there */
  markers: string[];
}

export const PREDETERMINED_FRAGMENTS: readonly PredeterminedFragment[] = [
  { file: 'cookie-banner.scss', markers: ['.cookie-banner'] },
  { file: 'directions-row.scss', markers: ['#mapRow', '#directionsBox'] },
];

const RESOURCE_DIR = new URL('../../resources/predetermined/', import.meta.url);

export function detectBrand(slug: string): Brand | null {
  const lower = slug.toLowerCase();
  return BRAND_KEYWORDS.find((brand) => lower.includes(brand)) ?? null;
}

export async function readFragment(fragment: PredeterminedFragment): Promise<string> {
  return readFile(fileURLToPath(new URL(fragment.file, RESOURCE_DIR)), 'utf-8');
}

export interface AppendResult {
  content: string;
  /** Fragment files appended */
  appended: string[];
}

/**
 * Append every fragment not yet present. Non-brand slugs leave the content as is.
 */
export async function appendPredeterminedStyles(content: string, slug: string): Promise<AppendResult> {
  if (detectBrand(slug) === null) {
    return { content, appended: [] };
  }

  let result = content;
  const appended: string[] = [];
  for (const fragment of PREDETERMINED_FRAGMENTS) {
    if (fragment.markers.some((marker) => result.includes(marker))) continue;
    const styles = (await readFragment(fragment)).trim();
    result = result.trim() === '' ? `${styles}\n` : `${result.trimEnd()}\n\n${styles}\n`;
    appended.push(fragment.file);
  }
  return { content: result, appended };
}
