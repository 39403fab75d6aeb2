/**
 * Tests for brand fragments
 */

import { describe, it, expect } from 'vitest';
import {
  appendPredeterminedStyles,
  detectBrand,
  PREDETERMINED_FRAGMENTS,
  readFragment,
} from '../../src/edge/predetermined-styles.js';

describe('detectBrand', () => {
  it('should find a brand keyword in the slug', () => {
    expect(detectBrand('lakeside-Jeep-dealer')).toBe('jeep');
    expect(detectBrand('citycdjr')).toBe('cdjr');
    expect(detectBrand('acme-motors')).toBeNull();
  });
});

describe('appendPredeterminedStyles', () => {
  it('should leave non-brand themes unchanged', async () => {
    expect(await appendPredeterminedStyles('.a {}', 'acme-motors')).toEqual({ content: '.a {}', appended: [] });
  });

  it('should append every missing fragment after the content', async () => {
    const cookie = (await readFragment(PREDETERMINED_FRAGMENTS[0])).trim();
    const directions = (await readFragment(PREDETERMINED_FRAGMENTS[1])).trim();

    const result = await appendPredeterminedStyles('.a {}\n\n', 'metro-dodge');

    expect(result.appended).toEqual(['cookie-banner.scss', 'directions-row.scss']);
    expect(result.content).toBe(`.a {}\n\n${cookie}\n\n${directions}\n`);
  });

  it('should skip fragments whose selectors are already present', async () => {
    const result = await appendPredeterminedStyles('#mapRow { height: 1px; }', 'metro-ram');

    expect(result.appended).toEqual(['cookie-banner.scss']);
    expect(result.content.startsWith('#mapRow { height: 1px; }\n\n/* Cookie banner */\n.cookie-banner {')).toBe(true);
  });

  it('should start from the fragment when the content is empty', async () => {
    const result = await appendPredeterminedStyles('', 'fiat-of-town');
    expect(result.content.startsWith('/* Cookie banner */')).toBe(true);
  });
});
