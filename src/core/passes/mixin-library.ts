/**
 * Mixin library - literal CSS for the mixins legacy themes pull in from
 * their shared framework
 *
 * Each expander receives the split argument list (with `$refs` already
 * converted) and the include's content block, and returns declarations or
 * null when the arguments are not understood.
 */

import { splitArguments } from '../scanner.js';

export type MixinExpander = (args: string[], content: string | null) => string | null;

/**
 * Media queries behind `@include breakpoint(<name>)`
 */
export const BREAKPOINTS: Readonly<Record<string, string>> = {
  xxs: '(max-width:320px)',
  xs: '(max-width:767px)',
  'mobile-tablet': '(max-width:1024px)',
  'tablet-only': '(min-width:768px) and (max-width:1024px)',
  sm: '(min-width:768px)',
  md: '(min-width:1025px)',
  lg: '(min-width:1200px)',
  xl: '(min-width:1400px)',
  'sm-desktop': '(max-width:1199px)',
};

const KEYWORD_ARG = /^\$?[\w-]+\s*:\s*/;
const POSITION_KEYS = new Set(['top', 'right', 'bottom', 'left', 'z-index']);

/** Strip a `$name:` keyword prefix from an argument */
function argValue(arg: string | undefined): string | null {
  if (arg === undefined) return null;
  const value = arg.replace(KEYWORD_ARG, '').trim();
  return value.length > 0 ? value : null;
}

function single(property: string): MixinExpander {
  return (args) => {
    const value = argValue(args[0]);
    return value ? `${property}: ${value};` : null;
  };
}

function fixed(css: string): MixinExpander {
  return () => css;
}

function joined(property: string): MixinExpander {
  return (args) => (args.length > 0 ? `${property}: ${args.map((a) => a.replace(KEYWORD_ARG, '')).join(', ')};` : null);
}

function prefixed(property: string, prefixes: string[]): MixinExpander {
  return (args) => {
    const value = argValue(args[0]);
    if (!value) return null;
    return [...prefixes.map((p) => `${p}${property}: ${value};`), `${property}: ${value};`].join('\n');
  };
}

/**
 * `absolute((top: 0, left: 10px))`, `absolute(top: 0, left: 10px)` or
 * `absolute(0, 10px)` (top right bottom left)
 */
function positioned(position: string): MixinExpander {
  return (args) => {
    const lines = [`position: ${position};`];
    let entries = args;
    const first = args[0];
    if (args.length === 1 && first !== undefined && first.startsWith('(') && first.endsWith(')')) {
      entries = splitArguments(first.slice(1, -1));
    }

    const order = ['top', 'right', 'bottom', 'left'];
    entries.forEach((entry, index) => {
      const keyword = entry.match(/^\$?([\w-]+)\s*:\s*(.+)$/);
      if (keyword && POSITION_KEYS.has(keyword[1])) {
        lines.push(`${keyword[1]}: ${keyword[2].trim()};`);
      } else if (!keyword && order[index] && entry !== 'null') {
        lines.push(`${order[index]}: ${entry};`);
      }
    });
    return lines.join('\n');
  };
}

function breakpoint(args: string[], content: string | null): string | null {
  const name = argValue(args[0]);
  const query = name ? BREAKPOINTS[name.replace(/['"]/g, '')] : undefined;
  if (!query || content === null) {
    return null;
  }
  return `@media ${query} {\n${content}\n}`;
}

function placeholderColor(args: string[]): string | null {
  const color = argValue(args[0]);
  return color ? `&::placeholder {\n  color: ${color};\n}` : null;
}

/**
 * Recognized mixin names and their expansions
 */
export const MIXIN_LIBRARY: Readonly<Record<string, MixinExpander>> = {
  flexbox: fixed('display: flex;'),
  'inline-flex': fixed('display: inline-flex;'),
  'flex-direction': single('flex-direction'),
  'flex-wrap': single('flex-wrap'),
  'justify-content': single('justify-content'),
  'align-items': single('align-items'),
  clearfix: fixed('&::after {\n  content: "";\n  display: table;\n  clear: both;\n}'),
  'border-radius': (args) => {
    const radius = argValue(args[0]);
    return radius ? `border-radius: ${radius};\nbackground-clip: padding-box;` : null;
  },
  'box-shadow': joined('box-shadow'),
  transition: joined('transition'),
  transform: single('transform'),
  absolute: positioned('absolute'),
  relative: positioned('relative'),
  fixed: positioned('fixed'),
  appearance: prefixed('appearance', ['-webkit-', '-moz-']),
  'placeholder-color': placeholderColor,
  breakpoint,
};

export const LIBRARY_MIXIN_NAMES: readonly string[] = Object.keys(MIXIN_LIBRARY);

export function getLibraryMixin(name: string): MixinExpander | undefined {
  return Object.prototype.hasOwnProperty.call(MIXIN_LIBRARY, name) ? MIXIN_LIBRARY[name] : undefined;
}
