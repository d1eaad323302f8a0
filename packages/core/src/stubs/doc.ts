/**
 * Doc-comment analysis
 *
 * Stub comments mix three things: RDoc prose, indented illustrative examples
 * (`ENV['foo'] # => "0"`) and, in hand-written stubs, YARD tags
 * (`@param [String] name`). This module separates and renders them for
 * hover text and for the doc-param validation rule.
 */

import type { DocComment } from '@rbstub/types';

// === EXAMPLES ===

export interface ExampleLine {
  code: string;
  /** Text after `# =>`, or null when the line shows no result */
  result: string | null;
}

export interface DocExample {
  /** 0-based index of the first code line within the doc lines */
  startLine: number;
  lines: ExampleLine[];
}

// === TAGS ===

export interface DocParamTag {
  name: string;
  types: string[];
  description: string | null;
}

export interface DocOptionTag {
  /** Name of the hash parameter the option belongs to */
  param: string;
  key: string;
  types: string[];
  defaultValue: string | null;
  description: string | null;
}

export interface DocTypedTag {
  types: string[];
  description: string | null;
}

export interface DocExampleTag {
  title: string | null;
  code: string;
}

export interface DocTags {
  params: DocParamTag[];
  options: DocOptionTag[];
  yieldParams: DocParamTag[];
  returns: DocTypedTag | null;
  raises: DocTypedTag[];
  examples: DocExampleTag[];
  /** '' for a bare `@deprecated`, null when absent */
  deprecated: string | null;
  see: string[];
  /** Doc lines that are not part of any tag */
  body: string[];
}

type Lines = DocComment | string[] | null;

function linesOf(doc: Lines): string[] {
  if (!doc) return [];
  return Array.isArray(doc) ? doc : doc.lines;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

const LIST_ITEM_RE = /^(?:[-*]|\d+\.|\[\w+\])\s+/;

/** `# =>` or `#=>` */
const RESULT_MARKER_RE = /#\s*=>/;

function splitResult(code: string): ExampleLine {
  const marker = RESULT_MARKER_RE.exec(code);
  if (!marker) {
    return { code: code.trimEnd(), result: null };
  }
  return {
    code: code.slice(0, marker.index).trimEnd(),
    result: code.slice(marker.index + marker[0].length).trim(),
  };
}

/**
 * Classify doc lines as prose or code.
 *
 * A line is code when it is indented at least two columns deeper than the
 * text of the prose line governing it; list items count as prose and move
 * the governing column to their text.
 */
function classifyLines(lines: string[]): Array<'prose' | 'code' | 'blank'> {
  const kinds: Array<'prose' | 'code' | 'blank'> = [];
  let proseColumn = 0;
  let inCode = false;

  for (const line of lines) {
    if (line.trim() === '') {
      kinds.push('blank');
      continue;
    }
    const indent = indentOf(line);
    const body = line.trimStart();
    const listItem = LIST_ITEM_RE.exec(body);

    if (inCode && indent >= proseColumn + 2) {
      kinds.push('code');
      continue;
    }
    if (!listItem && indent >= proseColumn + 2) {
      inCode = true;
      kinds.push('code');
      continue;
    }

    inCode = false;
    kinds.push('prose');
    proseColumn = listItem ? indent + listItem[0].length : indent;
  }

  return kinds;
}

/**
 * Extract indented example blocks; a blank line or prose ends a block.
 */
export function extractExamples(doc: Lines): DocExample[] {
  const lines = linesOf(doc);
  const kinds = classifyLines(lines);
  const examples: DocExample[] = [];
  let block: { startLine: number; raw: string[] } | null = null;

  const flush = (): void => {
    if (!block) return;
    const shift = Math.min(...block.raw.map(indentOf));
    examples.push({
      startLine: block.startLine,
      lines: block.raw.map((raw) => splitResult(raw.slice(shift))),
    });
    block = null;
  };

  lines.forEach((line, idx) => {
    if (kinds[idx] === 'code') {
      if (!block) block = { startLine: idx, raw: [] };
      block.raw.push(line);
    } else {
      flush();
    }
  });
  flush();

  return examples;
}

/**
 * First paragraph of prose, joined into one line.
 */
export function summarize(doc: Lines): string {
  const lines = linesOf(doc);
  const kinds = classifyLines(lines);
  const parts: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (kinds[i] !== 'prose' || trimmed.startsWith('@')) {
      if (parts.length > 0) break;
      continue;
    }
    parts.push(trimmed);
  }

  return parts.join(' ');
}

// === YARD TAGS ===

/**
 * Split a YARD type list, e.g. `String, Array<String>, Hash{Symbol => Integer}`,
 * on top-level `,` or `|`.
 */
export function parseTypeList(text: string): string[] {
  const types: string[] = [];
  let depth = 0;
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '<' || ch === '{' || ch === '(' || ch === '[') {
      depth++;
    } else if ((ch === '>' && text[i - 1] !== '=') || ch === '}' || ch === ')' || ch === ']') {
      depth--;
    }
    if (depth === 0 && (ch === ',' || ch === '|')) {
      if (current.trim()) types.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.trim()) types.push(current.trim());

  return types;
}

/**
 * Read a leading `[Types]` group. Returns the types and the remaining text.
 */
function readTypes(text: string): { types: string[]; rest: string } {
  const trimmed = text.trimStart();
  if (!trimmed.startsWith('[')) {
    return { types: [], rest: trimmed };
  }
  let depth = 0;
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === '[') depth++;
    if (ch === ']') {
      depth--;
      if (depth === 0) {
        return { types: parseTypeList(trimmed.slice(1, i)), rest: trimmed.slice(i + 1).trimStart() };
      }
    }
  }
  return { types: [], rest: trimmed };
}

function orNull(text: string): string | null {
  const trimmed = text.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * `name [Types] desc` or `[Types] name desc`
 */
function readNamedTag(text: string): DocParamTag | null {
  let { types, rest } = readTypes(text);
  const nameMatch = /^([*&]{0,2}[A-Za-z_][A-Za-z0-9_]*)/.exec(rest);
  if (!nameMatch) return null;
  const name = nameMatch[1].replace(/^[*&]+/, '');
  rest = rest.slice(nameMatch[1].length);
  if (types.length === 0) {
    ({ types, rest } = readTypes(rest));
  }
  return { name, types, description: orNull(rest) };
}

function readOptionTag(text: string): DocOptionTag | null {
  const paramMatch = /^([A-Za-z_][A-Za-z0-9_]*)\s+/.exec(text.trimStart());
  if (!paramMatch) return null;
  let { types, rest } = readTypes(text.trimStart().slice(paramMatch[0].length));
  const keyMatch = /^:?([A-Za-z_][A-Za-z0-9_]*[?!]?)/.exec(rest);
  if (!keyMatch) return null;
  rest = rest.slice(keyMatch[0].length).trimStart();
  if (types.length === 0) {
    ({ types, rest } = readTypes(rest));
  }
  let defaultValue: string | null = null;
  const defaultMatch = /^\(([^)]*)\)/.exec(rest);
  if (defaultMatch) {
    defaultValue = defaultMatch[1].trim();
    rest = rest.slice(defaultMatch[0].length);
  }
  return { param: paramMatch[1], key: keyMatch[1], types, defaultValue, description: orNull(rest) };
}

/**
 * Parse YARD tags out of a doc comment.
 *
 * A tag runs until the next tag, a blank line, or an unindented prose line;
 * indented lines continue it. `@example` keeps its indented body as code.
 */
export function parseDocTags(doc: Lines): DocTags {
  const lines = linesOf(doc);
  const tags: DocTags = {
    params: [],
    options: [],
    yieldParams: [],
    returns: null,
    raises: [],
    examples: [],
    deprecated: null,
    see: [],
    body: [],
  };

  let i = 0;
  while (i < lines.length) {
    const match = /^@(\w+)\s*(.*)$/.exec(lines[i].trim());
    if (!match || indentOf(lines[i]) > 0) {
      tags.body.push(lines[i]);
      i++;
      continue;
    }

    const [, tag, first] = match;
    const continuation: string[] = [];
    i++;
    while (i < lines.length && lines[i].trim() !== '' && indentOf(lines[i]) >= 2) {
      continuation.push(lines[i]);
      i++;
    }
    const text = [first, ...continuation.map((l) => l.trim())].join(' ').trim();

    switch (tag) {
      case 'param': {
        const param = readNamedTag(text);
        if (param) tags.params.push(param);
        break;
      }
      case 'yieldparam': {
        const param = readNamedTag(text);
        if (param) tags.yieldParams.push(param);
        break;
      }
      case 'option': {
        const option = readOptionTag(text);
        if (option) tags.options.push(option);
        break;
      }
      case 'return': {
        const { types, rest } = readTypes(text);
        tags.returns = { types, description: orNull(rest) };
        break;
      }
      case 'raise': {
        const { types, rest } = readTypes(text);
        tags.raises.push({ types, description: orNull(rest) });
        break;
      }
      case 'example': {
        const shift = continuation.length > 0 ? Math.min(...continuation.map(indentOf)) : 0;
        tags.examples.push({
          title: orNull(first),
          code: continuation.map((l) => l.slice(shift)).join('\n'),
        });
        break;
      }
      case 'deprecated':
        tags.deprecated = text;
        break;
      case 'see':
        if (text) tags.see.push(text);
        break;
      default:
        // unknown tags stay visible as prose
        tags.body.push(lines[i - continuation.length - 1], ...continuation);
    }
  }

  return tags;
}

/**
 * Format a type list for display: `String` or `(String | Integer)`.
 */
export function formatTypes(types: string[]): string | null {
  if (types.length === 0) return null;
  if (types.length === 1) return types[0];
  return `(${types.join(' | ')})`;
}

// === MARKDOWN ===

const BOUNDARY_BEFORE = '(^|[\\s(\\[{"\'])';
const BOUNDARY_AFTER = '(?=$|[\\s).,;:!?\\]}"\'])';

const INLINE_RULES: Array<[RegExp, string]> = [
  [/<(?:code|tt)>(.*?)<\/(?:code|tt)>/g, '`$1`'],
  [/<b>(.*?)<\/b>/g, '**$1**'],
  [/<(?:i|em)>(.*?)<\/(?:i|em)>/g, '_$1_'],
  [new RegExp(`${BOUNDARY_BEFORE}\\+([^\\s+][^+]*?)\\+${BOUNDARY_AFTER}`, 'g'), '$1`$2`'],
  [new RegExp(`${BOUNDARY_BEFORE}\\*([^\\s*][^*]*?)\\*${BOUNDARY_AFTER}`, 'g'), '$1**$2**'],
  [new RegExp(`${BOUNDARY_BEFORE}_([^\\s_][^_]*?)_${BOUNDARY_AFTER}`, 'g'), '$1*$2*'],
  [/\{([^}]+)\}\[([^\]]+)\]/g, '[$1]($2)'],
  [/\\#/g, '#'],
];

export function inlineMarkdown(text: string): string {
  // code spans first; their content must not be touched by later rules
  const spans: string[] = [];
  let result = text;
  for (const [pattern, replacement] of INLINE_RULES) {
    result = result.replace(pattern, replacement);
    result = result.replace(/`[^`]*`/g, (span) => {
      spans.push(span);
      return `\u0000${spans.length - 1}\u0000`;
    });
  }
  return result.replace(/\u0000(\d+)\u0000/g, (_m, idx: string) => spans[Number(idx)]);
}

/**
 * Render RDoc-flavoured doc lines as Markdown.
 *
 * Headings (`=== Title`) become `### Title`, indented examples become fenced
 * `ruby` blocks, inline markup is converted, YARD tag lines are left out.
 */
export function toMarkdown(doc: Lines): string {
  const lines = parseDocTags(doc).body;
  const kinds = classifyLines(lines);
  const out: string[] = [];
  let fence: string[] | null = null;

  const closeFence = (): void => {
    if (!fence) return;
    const shift = Math.min(...fence.map(indentOf));
    out.push('```ruby', ...fence.map((l) => l.slice(shift)), '```');
    fence = null;
  };

  lines.forEach((line, idx) => {
    if (kinds[idx] === 'code') {
      if (!fence) fence = [];
      fence.push(line);
      return;
    }
    closeFence();
    if (kinds[idx] === 'blank') {
      out.push('');
      return;
    }
    const heading = /^(=+)\s*(.*)$/.exec(line.trim());
    if (heading) {
      out.push(`${'#'.repeat(Math.min(heading[1].length, 6))} ${inlineMarkdown(heading[2])}`);
      return;
    }
    out.push(inlineMarkdown(line));
  });
  closeFence();

  // collapse runs of blank lines and trim the ends
  return out
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
