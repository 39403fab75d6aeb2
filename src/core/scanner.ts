/**
 * Line scanner for SCSS sources
 *
 * Not a grammar. Splits each line into code / string / comment / interpolation
 * segments and tracks brace depth plus the region the line belongs to, so the
 * passes can decide where rewriting is allowed.
 */

export type SegmentKind = 'code' | 'string' | 'comment' | 'interpolation';

export interface LineSegment {
  kind: SegmentKind;
  text: string;
}

/**
 * Region of the stylesheet a line belongs to
 */
export type ScanRegion = 'stylesheet' | 'mixin-body' | 'function-body' | 'map-literal';

export interface ScannedLine {
  /** 0-based line index */
  index: number;
  text: string;
  region: ScanRegion;
  depthBefore: number;
  depthAfter: number;
  segments: LineSegment[];
}

const MIXIN_START = /(?:^|[\s;{}])@mixin\s+[\w-]+/;
const FUNCTION_START = /(?:^|[\s;{}])@function\s+[\w-]+/;
const MAP_START = /^\s*\$[\w-]+\s*:\s*\(/;
const MAP_END = /\)\s*(?:!(?:default|global)\s*)*;\s*$/;

/**
 * Split one line into segments.
 * `inBlockComment` carries an unterminated `/* … *\/` across lines.
 */
export function segmentLine(
  line: string,
  inBlockComment = false
): { segments: LineSegment[]; inBlockComment: boolean } {
  const segments: LineSegment[] = [];
  let code = '';
  let i = 0;
  let inUrl = false;

  const flush = () => {
    if (code) {
      segments.push({ kind: 'code', text: code });
      code = '';
    }
  };

  while (i < line.length) {
    if (inBlockComment) {
      const end = line.indexOf('*/', i);
      if (end === -1) {
        segments.push({ kind: 'comment', text: line.slice(i) });
        i = line.length;
        break;
      }
      segments.push({ kind: 'comment', text: line.slice(i, end + 2) });
      inBlockComment = false;
      i = end + 2;
      continue;
    }

    const ch = line[i];
    const next = line[i + 1];

    if (ch === '/' && next === '*') {
      flush();
      const end = line.indexOf('*/', i + 2);
      if (end === -1) {
        segments.push({ kind: 'comment', text: line.slice(i) });
        inBlockComment = true;
        i = line.length;
        break;
      }
      segments.push({ kind: 'comment', text: line.slice(i, end + 2) });
      i = end + 2;
      continue;
    }

    // `//` after a colon is a URL scheme (http://); inside `url(` it starts a protocol-relative URL
    if (ch === '/' && next === '/' && line[i - 1] !== ':' && !inUrl) {
      flush();
      segments.push({ kind: 'comment', text: line.slice(i) });
      i = line.length;
      break;
    }

    if (ch === '"' || ch === "'") {
      flush();
      const end = findStringEnd(line, i);
      segments.push({ kind: 'string', text: line.slice(i, end) });
      i = end;
      continue;
    }

    if (ch === '#' && next === '{') {
      flush();
      const close = findMatching(line, i + 1, '{', '}');
      const end = close === -1 ? line.length : close + 1;
      segments.push({ kind: 'interpolation', text: line.slice(i, end) });
      i = end;
      continue;
    }

    if (ch === '(' && /url$/i.test(code)) {
      inUrl = true;
    } else if (ch === ')') {
      inUrl = false;
    }
    code += ch;
    i++;
  }

  flush();
  return { segments, inBlockComment };
}

/**
 * Index just past the closing quote, or the line length when unterminated
 */
function findStringEnd(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text[i] === quote) {
      return i + 1;
    }
    i++;
  }
  return text.length;
}

/**
 * Concatenated code segments of a line (strings, comments and interpolation removed)
 */
export function codeText(segments: LineSegment[]): string {
  return segments
    .filter((s) => s.kind === 'code')
    .map((s) => s.text)
    .join('');
}

/**
 * Count braces that open and close blocks (outside strings, comments, interpolation)
 */
export function countBraces(segments: LineSegment[]): { opens: number; closes: number } {
  const code = codeText(segments);
  let opens = 0;
  let closes = 0;
  for (const ch of code) {
    if (ch === '{') opens++;
    else if (ch === '}') closes++;
  }
  return { opens, closes };
}

/**
 * Scan content line by line, assigning each line a region and brace depth
 */
export function scanLines(content: string): ScannedLine[] {
  const lines = content.split('\n');
  const result: ScannedLine[] = [];

  let region: ScanRegion = 'stylesheet';
  let regionDepth = 0;
  let entered = false;
  let depth = 0;
  let inComment = false;

  lines.forEach((text, index) => {
    const scanned = segmentLine(text, inComment);
    inComment = scanned.inBlockComment;
    const code = codeText(scanned.segments);
    const { opens, closes } = countBraces(scanned.segments);
    const depthBefore = depth;
    let lineRegion: ScanRegion = region;

    if (region === 'stylesheet') {
      if (MIXIN_START.test(code)) {
        region = 'mixin-body';
      } else if (FUNCTION_START.test(code)) {
        region = 'function-body';
      } else if (MAP_START.test(code) && !MAP_END.test(code)) {
        // single-line maps stay in the stylesheet region and are declarations like any other
        region = 'map-literal';
        lineRegion = region;
      }
      if (region === 'mixin-body' || region === 'function-body') {
        regionDepth = depthBefore;
        entered = false;
        lineRegion = region;
      }
    } else if (region === 'map-literal') {
      if (MAP_END.test(code)) {
        region = 'stylesheet';
      }
    }

    depth = Math.max(0, depth + opens - closes);

    if (region === 'mixin-body' || region === 'function-body') {
      if (opens > 0 || depth > regionDepth) {
        entered = true;
      }
      if (entered && depth <= regionDepth) {
        region = 'stylesheet';
        entered = false;
      }
    }

    result.push({
      index,
      text,
      region: lineRegion,
      depthBefore,
      depthAfter: depth,
      segments: scanned.segments,
    });
  });

  return result;
}

/**
 * Find the index of the delimiter closing the one at `openIndex`.
 * Quoted strings are skipped. Returns -1 when unbalanced.
 */
export function findMatching(text: string, openIndex: number, open: string, close: string): number {
  let depth = 0;
  let i = openIndex;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = findStringEnd(text, i);
      continue;
    }
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
    i++;
  }
  return -1;
}

/**
 * Split an argument list on top-level commas (parentheses and quotes respected)
 */
export function splitArguments(raw: string): string[] {
  const args: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | null = null;

  for (const ch of raw) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '(') {
      depth++;
      current += ch;
    } else if (ch === ')') {
      depth--;
      current += ch;
    } else if (ch === ',' && depth === 0) {
      args.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.trim()) {
    args.push(current.trim());
  }
  return args;
}

/**
 * 1-based line number of a character index
 */
export function lineNumberAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < content.length; i++) {
    if (content[i] === '\n') line++;
  }
  return line;
}

/**
 * Remove surrounding quotes from a value
 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  if (
    trimmed.length >= 2 &&
    (trimmed[0] === '"' || trimmed[0] === "'") &&
    trimmed[trimmed.length - 1] === trimmed[0]
  ) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Leading whitespace of a line
 */
export function indentationOf(line: string): string {
  const match = line.match(/^[ \t]*/);
  return match ? match[0] : '';
}

/**
 * Character ranges `[start, end)` covered by segments of the given kinds,
 * across the whole content
 */
export function segmentSpans(content: string, kinds: readonly SegmentKind[]): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  let offset = 0;
  let inComment = false;

  for (const line of content.split('\n')) {
    const scanned = segmentLine(line, inComment);
    inComment = scanned.inBlockComment;
    let position = offset;
    for (const segment of scanned.segments) {
      if (kinds.includes(segment.kind)) {
        spans.push([position, position + segment.text.length]);
      }
      position += segment.text.length;
    }
    offset += line.length + 1;
  }

  return spans;
}

export function commentSpans(content: string): Array<[number, number]> {
  return segmentSpans(content, ['comment']);
}

/**
 * Whether a character index falls inside one of the spans
 */
export function isInsideSpan(spans: ReadonlyArray<readonly [number, number]>, index: number): boolean {
  return spans.some(([start, end]) => index >= start && index < end);
}
