/**
 * Error parser - classifies watch-compiler log output
 *
 * Matching is purely textual over the log tail. Each log line is tried
 * against an ordered list of matchers; the first match wins for that line.
 * File and line are looked up on the matching line and the few after it,
 * which covers both the "on line N of file" and the "file L:C" styles.
 */

import type { CompilationError, CompilationErrorCaptures, CompilationErrorKind } from './types.js';

interface ErrorMatcher {
  kind: CompilationErrorKind;
  pattern: RegExp;
  captures: (match: RegExpMatchArray) => CompilationErrorCaptures;
}

function stripQuotes(value: string | undefined): string | undefined {
  return value === undefined ? undefined : value.trim().replace(/^["']|["']$/g, '');
}

/**
 * Ordered matchers; earlier entries take precedence
 */
export const ERROR_MATCHERS: readonly ErrorMatcher[] = [
  {
    kind: 'undefined_variable',
    pattern: /undefined variable(?::?\s*["']?\$([\w-]+))?/i,
    captures: (m) => ({ name: m[1] }),
  },
  {
    kind: 'undefined_mixin',
    pattern: /(?:undefined mixin|no mixin named)(?::?\s*["']?@?([\w-]+))?/i,
    captures: (m) => ({ name: m[1] }),
  },
  {
    kind: 'invalid_css',
    pattern: /expected "\)"|unmatched "?\)|mismatched parenthes[ie]s|unclosed parenthes[ie]s/i,
    captures: () => ({ expected: ')' }),
  },
  {
    kind: 'syntax_error',
    pattern: /Invalid CSS after "((?:[^"\\]|\\.)*)":\s*expected ("[^"]*"|[^,]+?)(?:,\s*was "((?:[^"\\]|\\.)*)")?\.?\s*$/i,
    captures: (m) => ({ after: m[1], expected: stripQuotes(m[2]), found: m[3] }),
  },
  {
    kind: 'syntax_error',
    pattern: /property "([\w-]+)" must be followed by a ':'/i,
    captures: (m) => ({ name: m[1], expected: ':' }),
  },
  {
    kind: 'syntax_error',
    pattern: /(?:^|\W)expected "([^"]+)"/i,
    captures: (m) => ({ expected: m[1] }),
  },
  {
    kind: 'syntax_error',
    pattern: /unclosed block|unterminated string|unexpected end of (?:file|input)|expected "}"/i,
    captures: () => ({ expected: '}' }),
  },
  {
    kind: 'invalid_css',
    pattern: /invalid css(?: after "((?:[^"\\]|\\.)*)")?|invalid property|(?:is not|isn't) a valid css value/i,
    captures: (m) => ({ after: m[1] }),
  },
];

const LOCATION_PATTERNS: readonly RegExp[] = [
  /on line (\d+) of ([^\s,]+)/i,
  /([^\s│|:]+\.s[ac]ss)\s+(\d+):\d+/,
  /([^\s│|:]+\.s[ac]ss):(\d+)(?::\d+)?/,
];

/** Lines after the error line searched for a location */
const LOCATION_LOOKAHEAD = 6;

interface Location {
  file?: string;
  lineNumber?: number;
}

function findLocation(lines: readonly string[], start: number): Location {
  const stop = Math.min(lines.length, start + LOCATION_LOOKAHEAD + 1);
  for (let i = start; i < stop; i++) {
    const [onLine, spaced, colon] = LOCATION_PATTERNS.map((pattern) => lines[i].match(pattern));
    if (onLine) {
      return { lineNumber: Number(onLine[1]), file: onLine[2] };
    }
    const fileFirst = spaced ?? colon;
    if (fileFirst) {
      return { file: fileFirst[1], lineNumber: Number(fileFirst[2]) };
    }
  }
  return {};
}

/**
 * Name from the source excerpt printed under the error (`12 │ color: $x;`)
 */
function nameFromExcerpt(lines: readonly string[], start: number, kind: CompilationErrorKind): string | undefined {
  const pattern = kind === 'undefined_variable' ? /\$([\w-]+)/ : /@include\s+([\w-]+)/;
  const stop = Math.min(lines.length, start + LOCATION_LOOKAHEAD + 1);
  for (let i = start + 1; i < stop; i++) {
    if (!/[│|]/.test(lines[i])) continue;
    const match = lines[i].match(pattern);
    if (match) return match[1];
  }
  return undefined;
}

function dedupeKey(error: CompilationError): string {
  return [error.kind, error.captures.name, error.captures.expected, error.file, error.lineNumber].join('|');
}

/**
 * Parse every recognizable error in a log excerpt
 */
export function parseCompilationErrors(log: string): CompilationError[] {
  const lines = log.split(/\r?\n/);
  const errors: CompilationError[] = [];
  const seen = new Set<string>();

  lines.forEach((line, index) => {
    for (const matcher of ERROR_MATCHERS) {
      const match = line.match(matcher.pattern);
      if (!match) continue;

      const captures = matcher.captures(match);
      if (
        (matcher.kind === 'undefined_variable' || matcher.kind === 'undefined_mixin') &&
        captures.name === undefined
      ) {
        captures.name = nameFromExcerpt(lines, index, matcher.kind);
      }

      const error: CompilationError = {
        kind: matcher.kind,
        raw: line.trim(),
        ...findLocation(lines, index),
        captures,
      };

      const key = dedupeKey(error);
      if (!seen.has(key)) {
        seen.add(key);
        errors.push(error);
      }
      break;
    }
  });

  return errors;
}

/**
 * Whether the log shows any of the configured failure substrings
 */
export function hasErrorIndicator(log: string, indicators: readonly string[]): boolean {
  const lower = log.toLowerCase();
  return indicators.some((indicator) => lower.includes(indicator.toLowerCase()));
}

/**
 * Whether every finished marker appears in the log (case-insensitive)
 */
export function hasFinishedMarkers(log: string, markers: readonly string[]): boolean {
  const lower = log.toLowerCase();
  return markers.every((marker) => lower.includes(marker.toLowerCase()));
}
