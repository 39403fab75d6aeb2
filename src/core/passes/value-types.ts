/**
 * Value type inference for SCSS variable values
 */

import type { VariableType } from '../types.js';

const HEX_COLOR = /^#(?:[0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const COLOR_FUNCTION = /^(?:rgba?|hsla?)\s*\(/i;
const SIZE = /^-?(?:\d+\.?\d*|\.\d+)(?:px|rem|em|%|vh|vw|vmin|vmax|pt|pc|cm|mm|in|ch|ex|fr|s|ms|deg|rad|turn)$/i;
const NUMBER = /^-?(?:\d+\.?\d*|\.\d+)$/;

/**
 * Named colors recognized without further parsing
 */
export const NAMED_COLORS: ReadonlySet<string> = new Set([
  'transparent',
  'currentcolor',
  'black',
  'white',
  'red',
  'green',
  'blue',
  'yellow',
  'orange',
  'purple',
  'gray',
  'grey',
  'silver',
  'maroon',
  'navy',
  'teal',
  'olive',
  'lime',
  'aqua',
  'fuchsia',
  'pink',
  'brown',
  'gold',
  'crimson',
  'darkgray',
  'lightgray',
  'whitesmoke',
]);

export function isColorLiteral(value: string): boolean {
  const v = value.trim();
  return HEX_COLOR.test(v) || COLOR_FUNCTION.test(v) || NAMED_COLORS.has(v.toLowerCase());
}

/**
 * Infer the type of a raw variable value.
 * Checked in order: color, size, boolean, quoted string, list, map, number.
 */
export function inferValueType(rawValue: string): VariableType {
  const value = rawValue.trim();

  if (isColorLiteral(value)) {
    return 'color';
  }
  if (SIZE.test(value)) {
    return 'size';
  }
  if (value === 'true' || value === 'false') {
    return 'boolean';
  }
  if (value.startsWith('"') || value.startsWith("'")) {
    return 'string';
  }
  if (value.includes(',') && !value.startsWith('(')) {
    return 'list';
  }
  if (value.startsWith('(') && value.endsWith(')') && value.includes(':')) {
    return 'map';
  }
  if (NUMBER.test(value)) {
    return 'number';
  }
  return 'unknown';
}
