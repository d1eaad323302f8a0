/**
 * Stub validation rules
 *
 * Each rule checks one format property of a parsed stub file and reports
 * DiagnosticInput entries. Severity per rule is configurable ('off'
 * disables it). A file that does not parse yields one ERR_STUB_SYNTAX
 * diagnostic and no rule runs.
 */

import type {
  DiagnosticInput,
  MemberDecl,
  MethodDecl,
  ParamDecl,
  Severity,
  StubFile,
} from '@rbstub/types';
import { isScopeDecl } from '@rbstub/types';
import { StubSyntaxError } from '../errors/RbstubError.js';
import { parseStub } from './parser.js';
import { printStub } from './printer.js';
import { parseDocTags } from './doc.js';
import { constantRef, memberRef, qualify } from './names.js';

export const RULE_IDS = [
  'missing-doc',
  'duplicate-scope',
  'duplicate-member',
  'invalid-signature',
  'round-trip',
  'doc-param-mismatch',
] as const;

export type RuleId = typeof RULE_IDS[number];

export type RuleSetting = Severity | 'off';

export interface RuleInfo {
  code: string;
  defaultSeverity: Severity;
  description: string;
}

export const RULES: Record<RuleId, RuleInfo> = {
  'missing-doc': {
    code: 'ERR_MISSING_DOC',
    defaultSeverity: 'warning',
    description: 'Every declaration has a comment block directly above it',
  },
  'duplicate-scope': {
    code: 'ERR_DUPLICATE_SCOPE',
    defaultSeverity: 'error',
    description: 'A scope is declared at most once per file',
  },
  'duplicate-member': {
    code: 'ERR_DUPLICATE_MEMBER',
    defaultSeverity: 'warning',
    description: 'A method or constant is declared at most once per scope',
  },
  'invalid-signature': {
    code: 'ERR_INVALID_SIGNATURE',
    defaultSeverity: 'error',
    description: 'Parameter lists follow the ordering and arity rules of the language',
  },
  'round-trip': {
    code: 'ERR_ROUND_TRIP',
    defaultSeverity: 'error',
    description: 'Printing and re-parsing the file yields the same declarations',
  },
  'doc-param-mismatch': {
    code: 'ERR_DOC_PARAM_MISMATCH',
    defaultSeverity: 'info',
    description: 'Every @param tag names a parameter of its method',
  },
};

export function isRuleId(value: string): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}

export interface ValidateOptions {
  /** Per-rule severity overrides */
  rules?: Partial<Record<RuleId, RuleSetting>>;
  /** Run only these rules */
  only?: RuleId[];
  /** Require docs on alias and include/extend/prepend lines too */
  strictDocs?: boolean;
  /** Indentation passed to the printer by the round-trip rule */
  indent?: number;
}

/** A member together with the qualified name of the scope holding it */
interface Located {
  member: MemberDecl;
  scope: string | null;
}

function walk(members: MemberDecl[], scope: string | null, out: Located[] = []): Located[] {
  for (const member of members) {
    out.push({ member, scope });
    if (isScopeDecl(member)) {
      walk(member.members, qualify(scope, member.name), out);
    } else if (member.kind === 'singletonBlock') {
      walk(member.members, scope, out);
    }
  }
  return out;
}

function describe(located: Located): string {
  const { member, scope } = located;
  switch (member.kind) {
    case 'method':
      return `method ${memberRef(scope, member.name, member.singleton)}`;
    case 'constant':
      return `constant ${constantRef(scope, member.name)}`;
    case 'alias':
      return `alias ${memberRef(scope, member.newName, false)}`;
    case 'mixin':
      return `${member.mode} ${member.target}${scope ? ` in ${scope}` : ''}`;
    case 'singletonBlock':
      return `class << self${scope ? ` in ${scope}` : ''}`;
    case 'visibility':
      return member.visibility;
    default:
      return `${member.kind} ${qualify(scope, member.name)}`;
  }
}

interface Finding {
  message: string;
  line?: number;
  scope?: string;
  suggestion?: string;
}

type RuleCheck = (file: StubFile, members: Located[], options: ValidateOptions) => Finding[];

// === missing-doc ===

const checkMissingDoc: RuleCheck = (_file, members, options) => {
  const findings: Finding[] = [];
  for (const located of members) {
    const { member } = located;
    if (member.kind === 'visibility' || member.kind === 'singletonBlock') continue;
    if (!options.strictDocs && (member.kind === 'alias' || member.kind === 'mixin')) continue;
    if (member.doc) continue;
    findings.push({
      message: `${describe(located)} has no doc comment`,
      line: member.range.start.line,
      scope: located.scope ?? undefined,
      suggestion: 'Add a comment block directly above the declaration (no blank line in between)',
    });
  }
  return findings;
};

// === duplicate-scope ===

const checkDuplicateScope: RuleCheck = (_file, members) => {
  const seen = new Map<string, number>();
  const findings: Finding[] = [];
  for (const { member, scope } of members) {
    if (!isScopeDecl(member)) continue;
    const name = qualify(scope, member.name);
    const first = seen.get(name);
    if (first !== undefined) {
      findings.push({
        message: `${member.kind} ${name} is already declared at line ${first}`,
        line: member.range.start.line,
        scope: name,
        suggestion: 'Merge the declarations into one block',
      });
    } else {
      seen.set(name, member.range.start.line);
    }
  }
  return findings;
};

// === duplicate-member ===

const checkDuplicateMember: RuleCheck = (_file, members) => {
  const seen = new Map<string, number>();
  const findings: Finding[] = [];
  for (const located of members) {
    const { member, scope } = located;
    let key: string | null = null;
    if (member.kind === 'method') {
      key = `m:${memberRef(scope, member.name, member.singleton)}`;
    } else if (member.kind === 'constant') {
      key = `c:${constantRef(scope, member.name)}`;
    }
    if (key === null) continue;

    const first = seen.get(key);
    if (first !== undefined) {
      findings.push({
        message: `${describe(located)} is already declared at line ${first}`,
        line: member.range.start.line,
        scope: scope ?? undefined,
      });
    } else {
      seen.set(key, member.range.start.line);
    }
  }
  return findings;
};

// === invalid-signature ===

const UNARY_OPERATORS = new Set(['+@', '-@', '!', '~']);
const BINARY_OPERATORS = new Set([
  '+', '-', '*', '/', '%', '**', '==', '!=', '<', '>', '<=', '>=', '<=>', '===', '=~', '!~',
  '<<', '>>', '&', '|', '^',
]);

/**
 * Parameter phases in the order the language accepts them:
 * leading required, optional, rest, trailing required, keywords,
 * keyword rest, block.
 */
const PHASE = {
  LEADING: 0,
  OPTIONAL: 1,
  REST: 2,
  TRAILING: 3,
  KEYWORD: 4,
  KEYWORD_REST: 5,
  BLOCK: 6,
} as const;

function phaseOf(param: ParamDecl, current: number): number {
  switch (param.kind) {
    case 'required':
      return current === PHASE.LEADING ? PHASE.LEADING : PHASE.TRAILING;
    case 'optional':
      return PHASE.OPTIONAL;
    case 'rest':
      return PHASE.REST;
    case 'keyword':
    case 'keywordOptional':
      return PHASE.KEYWORD;
    case 'keywordRest':
    case 'noKeywords':
      return PHASE.KEYWORD_REST;
    case 'block':
      return PHASE.BLOCK;
    case 'forward':
      return PHASE.BLOCK;
  }
}

function label(param: ParamDecl): string {
  return param.name ?? param.kind;
}

/**
 * Problems with one method signature; empty when it is well formed.
 */
export function signatureProblems(method: Pick<MethodDecl, 'name' | 'params'>): string[] {
  const problems: string[] = [];
  const { params } = method;
  let phase: number = PHASE.LEADING;

  params.forEach((param, idx) => {
    if (param.kind === 'forward') {
      if (idx !== params.length - 1) {
        problems.push(`'...' must be the last parameter`);
      }
      if (phase !== PHASE.LEADING) {
        problems.push(`'...' may only follow required parameters`);
      }
      phase = PHASE.BLOCK;
      return;
    }

    const next = phaseOf(param, phase);
    const repeatable = next === PHASE.LEADING || next === PHASE.OPTIONAL ||
      next === PHASE.TRAILING || next === PHASE.KEYWORD;
    if (next < phase || (next === phase && !repeatable)) {
      problems.push(`parameter '${label(param)}' (${param.kind}) is out of order`);
    }
    phase = Math.max(phase, next);
  });

  const names = new Set<string>();
  for (const param of params) {
    if (param.name === null || param.name.startsWith('_')) continue;
    if (names.has(param.name)) {
      problems.push(`duplicate parameter name '${param.name}'`);
    }
    names.add(param.name);
  }

  // a lone `*args` or `...` may also receive the assigned value
  const setterParam = params.length === 1 &&
    ['required', 'optional', 'rest', 'forward'].includes(params[0].kind);
  if (/^[A-Za-z_][A-Za-z0-9_]*=$/.test(method.name) && !setterParam) {
    problems.push(`setter '${method.name}' must take exactly one parameter`);
  }
  if (UNARY_OPERATORS.has(method.name) && params.length > 0) {
    problems.push(`unary operator '${method.name}' takes no parameters`);
  }
  if (BINARY_OPERATORS.has(method.name) && method.name !== '-' && method.name !== '+' && params.length !== 1) {
    problems.push(`binary operator '${method.name}' takes exactly one parameter`);
  }
  if ((method.name === '+' || method.name === '-') && params.length > 1) {
    problems.push(`operator '${method.name}' takes at most one parameter`);
  }

  return problems;
}

const checkSignatures: RuleCheck = (_file, members) => {
  const findings: Finding[] = [];
  for (const located of members) {
    const { member, scope } = located;
    if (member.kind !== 'method') continue;
    for (const problem of signatureProblems(member)) {
      findings.push({
        message: `${describe(located)}: ${problem}`,
        line: member.range.start.line,
        scope: scope ?? undefined,
      });
    }
  }
  return findings;
};

// === round-trip ===

/**
 * Drop source positions and the path so two parses can be compared.
 */
export function stripPositions(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripPositions);
  }
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      if (key === 'range' || key === 'path') continue;
      out[key] = stripPositions(inner);
    }
    return out;
  }
  return value;
}

/**
 * Path of the first difference between two plain values, or null when equal.
 */
export function firstDifference(a: unknown, b: unknown, path = ''): string | null {
  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.max(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const diff = firstDifference(a[i], b[i], `${path}[${i}]`);
      if (diff !== null) return diff;
    }
    return null;
  }
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null &&
      !Array.isArray(a) && !Array.isArray(b)) {
    const left = new Map<string, unknown>(Object.entries(a));
    const right = new Map<string, unknown>(Object.entries(b));
    const keys = new Set([...left.keys(), ...right.keys()]);
    for (const key of keys) {
      const diff = firstDifference(left.get(key), right.get(key), path ? `${path}.${key}` : key);
      if (diff !== null) return diff;
    }
    return null;
  }
  return Object.is(a, b) ? null : (path || '<root>');
}

const checkRoundTrip: RuleCheck = (file, _members, options) => {
  const printed = printStub(file, { indent: options.indent });
  let reparsed: StubFile;
  try {
    reparsed = parseStub(printed, file.path);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return [{ message: `Regenerated stub does not parse: ${message}` }];
  }
  const diff = firstDifference(stripPositions(file), stripPositions(reparsed));
  if (diff === null) {
    return [];
  }
  return [{
    message: `Regenerated stub differs from the parsed declarations at ${diff}`,
    suggestion: 'Run: rbstub fmt --write <file>',
  }];
};

// === doc-param-mismatch ===

const checkDocParams: RuleCheck = (_file, members) => {
  const findings: Finding[] = [];
  for (const located of members) {
    const { member, scope } = located;
    if (member.kind !== 'method' || !member.doc) continue;
    // anonymous splats and forwarding accept any name
    if (member.params.some((p) => p.kind === 'forward' || (p.name === null && p.kind !== 'noKeywords'))) {
      continue;
    }
    const names = new Set(member.params.map((p) => p.name));
    for (const tag of parseDocTags(member.doc).params) {
      if (!names.has(tag.name)) {
        findings.push({
          message: `${describe(located)}: @param '${tag.name}' does not match any parameter`,
          line: member.doc.range.start.line,
          scope: scope ?? undefined,
        });
      }
    }
  }
  return findings;
};

const CHECKS: Record<RuleId, RuleCheck> = {
  'missing-doc': checkMissingDoc,
  'duplicate-scope': checkDuplicateScope,
  'duplicate-member': checkDuplicateMember,
  'invalid-signature': checkSignatures,
  'round-trip': checkRoundTrip,
  'doc-param-mismatch': checkDocParams,
};

/**
 * Run the enabled rules over a parsed stub file.
 */
export function validateStubFile(file: StubFile, options: ValidateOptions = {}): DiagnosticInput[] {
  const members = walk(file.members, null);
  const diagnostics: DiagnosticInput[] = [];

  for (const rule of options.only ?? RULE_IDS) {
    const info = RULES[rule];
    const setting = options.rules?.[rule] ?? info.defaultSeverity;
    if (setting === 'off') continue;

    for (const finding of CHECKS[rule](file, members, options)) {
      diagnostics.push({
        code: info.code,
        severity: setting,
        rule,
        file: file.path,
        ...finding,
      });
    }
  }

  return diagnostics;
}

/**
 * Parse then validate. Syntax errors become a single diagnostic.
 */
export function validateStubSource(text: string, path: string, options: ValidateOptions = {}): DiagnosticInput[] {
  let file: StubFile;
  try {
    file = parseStub(text, path);
  } catch (err) {
    if (err instanceof StubSyntaxError) {
      return [{
        code: err.code,
        severity: 'error',
        rule: 'parser',
        file: path,
        line: err.context.lineNumber,
        message: err.message,
        suggestion: err.suggestion,
      }];
    }
    throw err;
  }
  return validateStubFile(file, options);
}
