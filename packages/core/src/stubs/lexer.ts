/**
 * Stub lexer - classifies each line of a stub file
 *
 * Stub files are line oriented: every declaration fits on one line
 * (`def name(args) end`, `class Foo < Bar`, `NAME = _`), so the lexer
 * produces one StubLine per source line and the parser only has to
 * balance scopes and attach comments.
 */

import type { MixinMode, Visibility } from '@rbstub/types';
import { StubSyntaxError } from '../errors/RbstubError.js';

interface LineBase {
  /** 1-based */
  line: number;
  indent: number;
  /** Length of the line without trailing whitespace */
  length: number;
}

export type StubLine =
  | (LineBase & { type: 'blank' })
  | (LineBase & { type: 'magic'; text: string })
  | (LineBase & { type: 'comment'; text: string })
  | (LineBase & { type: 'class'; name: string; superclass: string | null })
  | (LineBase & { type: 'singletonClass' })
  | (LineBase & { type: 'module'; name: string })
  | (LineBase & { type: 'def'; name: string; singleton: boolean; params: string | null })
  | (LineBase & { type: 'constant'; name: string; value: string })
  | (LineBase & { type: 'alias'; newName: string; oldName: string })
  | (LineBase & { type: 'mixin'; mode: MixinMode; target: string })
  | (LineBase & { type: 'visibility'; visibility: Visibility })
  | (LineBase & { type: 'end' });

export type StubLineType = StubLine['type'];

const MAGIC_KEYS = new Set([
  'frozen_string_literal',
  'encoding',
  'coding',
  'warn_indent',
  'shareable_constant_value',
  'typed',
]);

/**
 * Operator method names, longest first so `[]=` wins over `[]`
 * and `<=>` over `<=`.
 */
const OPERATOR_NAMES = [
  '[]=', '<=>', '===', '**',
  '[]', '+@', '-@', '!=', '!~', '=~', '==', '<=', '>=', '<<', '>>',
  '!', '%', '&', '*', '+', '-', '/', '<', '>', '^', '|', '~', '`',
];

function isMixinMode(word: string): word is MixinMode {
  return word === 'include' || word === 'extend' || word === 'prepend';
}

function isVisibility(word: string): word is Visibility {
  return word === 'private' || word === 'protected' || word === 'public';
}

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*[?!=]?/;
const SCOPE_NAME_RE = /^(?:::)?[A-Z][A-Za-z0-9_]*(?:::[A-Z][A-Za-z0-9_]*)*$/;
const CONSTANT_RE = /^(\$\S+|[A-Z][A-Za-z0-9_]*)\s+=\s+(.+)$/;
const MAGIC_RE = /^#\s*([a-z_]+)\s*:\s*\S/;

/**
 * Read a method name at the start of `text`.
 * Returns null when no valid name is there.
 */
export function readMethodName(text: string): string | null {
  const identifier = IDENTIFIER_RE.exec(text);
  if (identifier) {
    return identifier[0];
  }
  for (const op of OPERATOR_NAMES) {
    if (text.startsWith(op)) {
      return op;
    }
  }
  return null;
}

/**
 * Index of the bracket closing the one at `open`, honouring nesting,
 * quoted strings and punctuation globals (`$(`, `$'`). Returns -1 when unbalanced.
 */
export function findClosing(text: string, open: number): number {
  const pairs: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
  const stack: string[] = [];
  let quote: string | null = null;

  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '$') {
      i++;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch in pairs) {
      stack.push(pairs[ch]);
    } else if (ch === ')' || ch === ']' || ch === '}') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

/**
 * Lexer over one stub source
 */
export class StubLexer {
  private readonly lines: string[];
  private inPreamble = true;

  constructor(text: string, private readonly path: string = '<input>') {
    this.lines = text.split(/\r?\n/);
    // split leaves an empty last element for a trailing newline
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
  }

  tokenize(): StubLine[] {
    return this.lines.map((raw, idx) => this.classify(raw, idx + 1));
  }

  private fail(message: string, line: number, suggestion?: string): never {
    throw new StubSyntaxError(message, this.path, line, suggestion);
  }

  private classify(raw: string, line: number): StubLine {
    const trimmedEnd = raw.trimEnd();
    const text = trimmedEnd.trimStart();
    const base: LineBase = {
      line,
      indent: trimmedEnd.length - text.length,
      length: trimmedEnd.length,
    };

    if (text === '') {
      this.inPreamble = false;
      return { ...base, type: 'blank' };
    }

    if (text.startsWith('#')) {
      const magic = MAGIC_RE.exec(text);
      if (this.inPreamble && magic && MAGIC_KEYS.has(magic[1])) {
        return { ...base, type: 'magic', text };
      }
      this.inPreamble = false;
      let body = text.slice(1);
      if (body.startsWith(' ')) body = body.slice(1);
      return { ...base, type: 'comment', text: body };
    }

    this.inPreamble = false;
    const [keyword] = text.split(/\s/, 1);

    switch (keyword) {
      case 'end':
        if (text !== 'end') this.fail(`Unexpected text after 'end': ${text}`, line);
        return { ...base, type: 'end' };
      case 'def':
        return this.lexDef(base, text);
      case 'class':
        return this.lexClass(base, text);
      case 'module': {
        const name = text.slice('module'.length).trim();
        if (!SCOPE_NAME_RE.test(name)) this.fail(`Invalid module name: '${name}'`, line);
        return { ...base, type: 'module', name };
      }
      case 'alias': {
        const parts = text.split(/\s+/);
        if (parts.length !== 3) {
          this.fail(`alias takes exactly two names: ${text}`, line, 'Write: alias new_name old_name');
        }
        return { ...base, type: 'alias', newName: parts[1], oldName: parts[2] };
      }
    }

    if (isMixinMode(keyword)) {
      const target = text.slice(keyword.length).trim();
      if (target === '') this.fail(`${keyword} needs a module name`, line);
      return { ...base, type: 'mixin', mode: keyword, target };
    }

    if (isVisibility(keyword)) {
      if (text !== keyword) {
        this.fail(`Only bare '${keyword}' is supported in stubs: ${text}`, line);
      }
      return { ...base, type: 'visibility', visibility: keyword };
    }

    const constant = CONSTANT_RE.exec(text);
    if (constant) {
      return { ...base, type: 'constant', name: constant[1], value: constant[2].trim() };
    }

    return this.fail(`Unrecognized stub line: ${text}`, line);
  }

  private lexClass(base: LineBase, text: string): StubLine {
    const rest = text.slice('class'.length).trim();
    if (/^<<\s*self$/.test(rest)) {
      return { ...base, type: 'singletonClass' };
    }
    const lt = rest.indexOf('<');
    const name = (lt === -1 ? rest : rest.slice(0, lt)).trim();
    const superclass = lt === -1 ? null : rest.slice(lt + 1).trim();

    if (!SCOPE_NAME_RE.test(name)) this.fail(`Invalid class name: '${name}'`, base.line);
    if (superclass === '') this.fail(`Missing superclass after '<' in class ${name}`, base.line);

    return { ...base, type: 'class', name, superclass };
  }

  /**
   * def [self.]name[(params)] end
   * def [self.]name[(params)]; end
   */
  private lexDef(base: LineBase, text: string): StubLine {
    let rest = text.slice('def'.length).trimStart();
    let singleton = false;
    if (rest.startsWith('self.')) {
      singleton = true;
      rest = rest.slice('self.'.length);
    }

    const name = readMethodName(rest);
    if (!name) this.fail(`Invalid method name in: ${text}`, base.line);
    rest = rest.slice(name.length);

    let params: string | null = null;
    if (rest.startsWith('(')) {
      const close = findClosing(rest, 0);
      if (close === -1) this.fail(`Unbalanced parameter list in: ${text}`, base.line);
      params = rest.slice(1, close);
      rest = rest.slice(close + 1);
    }

    const tail = rest.trim();
    const closesWithEnd = params === null
      ? /^;\s*end;?$/.test(tail)
      : /^(?:;\s*)?end;?$/.test(tail);
    if (!closesWithEnd) {
      this.fail(
        `Method stub must close on the same line: ${text}`,
        base.line,
        params === null ? `Write: def ${name}; end` : `Write: def ${name}(${params}) end`
      );
    }

    return { ...base, type: 'def', name, singleton, params };
  }
}

export function tokenizeStub(text: string, path?: string): StubLine[] {
  return new StubLexer(text, path).tokenize();
}
