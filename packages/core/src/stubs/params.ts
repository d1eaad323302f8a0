/**
 * Parameter list parsing and formatting
 *
 * Works on the text between the parentheses of a `def` line. Only the shape
 * of each parameter is recognized here; ordering rules (optional after
 * required, one rest parameter, ...) are checked by the validator.
 */

import type { ParamDecl, MethodDecl } from '@rbstub/types';
import { LanguageError } from '../errors/RbstubError.js';
import { findClosing } from './lexer.js';

const NAME = '[A-Za-z_][A-Za-z0-9_]*';
const KEYWORD_RE = new RegExp(`^(${NAME}):(?:\\s+(.*))?$`);
const OPTIONAL_RE = new RegExp(`^(${NAME})\\s*=\\s*(.+)$`);
const REQUIRED_RE = new RegExp(`^${NAME}$`);
const PREFIXED_RE = new RegExp(`^(\\*\\*|\\*|&)(${NAME})?$`);

/**
 * Split on commas that are not nested inside brackets or quotes, nor part
 * of a punctuation global such as `$,`.
 * Returns null when brackets or quotes are unbalanced.
 */
export function splitTopLevel(text: string): string[] | null {
  const parts: string[] = [];
  let start = 0;
  let i = 0;
  let quote: string | null = null;

  while (i < text.length) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      i++;
      continue;
    }
    if (ch === '$') {
      // `$,` `$;` `$'` and friends: the punctuation is part of the name
      i += 2;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      const close = findClosing(text, i);
      if (close === -1) return null;
      i = close;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      return null;
    } else if (ch === ',') {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
    i++;
  }

  if (quote) return null;
  parts.push(text.slice(start));
  return parts;
}

/**
 * Classify one parameter. Returns null when the text is not a parameter.
 */
export function parseParam(text: string): ParamDecl | null {
  const param = text.trim();

  if (param === '...') {
    return { kind: 'forward', name: null, defaultValue: null };
  }
  if (param === '**nil') {
    return { kind: 'noKeywords', name: null, defaultValue: null };
  }

  const prefixed = PREFIXED_RE.exec(param);
  if (prefixed) {
    const name = prefixed[2] ?? null;
    switch (prefixed[1]) {
      case '**':
        return { kind: 'keywordRest', name, defaultValue: null };
      case '*':
        return { kind: 'rest', name, defaultValue: null };
      default:
        return { kind: 'block', name, defaultValue: null };
    }
  }

  const keyword = KEYWORD_RE.exec(param);
  if (keyword) {
    const defaultValue = keyword[2]?.trim() || null;
    return defaultValue === null
      ? { kind: 'keyword', name: keyword[1], defaultValue: null }
      : { kind: 'keywordOptional', name: keyword[1], defaultValue };
  }

  const optional = OPTIONAL_RE.exec(param);
  if (optional) {
    return { kind: 'optional', name: optional[1], defaultValue: optional[2].trim() };
  }

  if (REQUIRED_RE.test(param)) {
    return { kind: 'required', name: param, defaultValue: null };
  }

  return null;
}

/**
 * Parse a full parameter list (without the surrounding parentheses).
 *
 * @throws LanguageError ERR_INVALID_PARAM on malformed input
 */
export function parseParams(text: string): ParamDecl[] {
  if (text.trim() === '') {
    return [];
  }

  const parts = splitTopLevel(text);
  if (!parts) {
    throw new LanguageError(`Unbalanced brackets or quotes in parameters: (${text})`, 'ERR_INVALID_PARAM');
  }

  return parts.map((part) => {
    const param = parseParam(part);
    if (!param) {
      const shown = part.trim() === '' ? 'empty parameter' : `'${part.trim()}'`;
      throw new LanguageError(`Invalid parameter ${shown} in (${text})`, 'ERR_INVALID_PARAM');
    }
    return param;
  });
}

export function formatParam(param: ParamDecl): string {
  const name = param.name ?? '';
  switch (param.kind) {
    case 'required':
      return name;
    case 'optional':
      return `${name} = ${param.defaultValue ?? 'nil'}`;
    case 'rest':
      return `*${name}`;
    case 'keyword':
      return `${name}:`;
    case 'keywordOptional':
      return `${name}: ${param.defaultValue ?? 'nil'}`;
    case 'keywordRest':
      return `**${name}`;
    case 'block':
      return `&${name}`;
    case 'forward':
      return '...';
    case 'noKeywords':
      return '**nil';
  }
}

export function formatParams(params: ParamDecl[]): string {
  return params.map(formatParam).join(', ');
}

/**
 * Display signature, e.g. `fetch(name, default = nil, &block)`.
 * Singleton methods are prefixed with `self.`.
 */
export function formatSignature(method: Pick<MethodDecl, 'name' | 'singleton' | 'params' | 'hasParens'>): string {
  const prefix = method.singleton ? 'self.' : '';
  if (!method.hasParens && method.params.length === 0) {
    return `${prefix}${method.name}`;
  }
  return `${prefix}${method.name}(${formatParams(method.params)})`;
}
