/**
 * Declaration Types - the model of a parsed stub file
 *
 * A stub file is a tree of scopes (class/module) holding empty-bodied
 * declarations. Each declaration keeps the comment block written directly
 * above it, so the model can be printed back without losing text.
 */

// === SOURCE POSITIONS ===

/** 1-based line/column position in a stub file */
export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceRange {
  start: SourceLocation;
  end: SourceLocation;
}

// === DOC COMMENTS ===

/**
 * Comment block attached to a declaration.
 * Lines have the leading `#` and one following space stripped;
 * empty comment lines (`#`) are kept as ''.
 */
export interface DocComment {
  lines: string[];
  range: SourceRange;
}

// === PARAMETERS ===

export const PARAM_KIND = {
  REQUIRED: 'required',
  OPTIONAL: 'optional',
  REST: 'rest',
  KEYWORD: 'keyword',
  KEYWORD_OPTIONAL: 'keywordOptional',
  KEYWORD_REST: 'keywordRest',
  BLOCK: 'block',
  FORWARD: 'forward',
  NO_KEYWORDS: 'noKeywords',
} as const;

export type ParamKind = typeof PARAM_KIND[keyof typeof PARAM_KIND];

/**
 * One entry of a method parameter list.
 *
 * `name` is null for anonymous markers: `*`, `**`, `&`, `...` and `**nil`.
 * `defaultValue` is the verbatim (trimmed) default expression.
 */
export interface ParamDecl {
  kind: ParamKind;
  name: string | null;
  defaultValue: string | null;
}

// === MEMBERS ===

export type Visibility = 'public' | 'protected' | 'private';

export type MixinMode = 'include' | 'extend' | 'prepend';

export type ScopeKind = 'class' | 'module';

interface DeclBase {
  doc: DocComment | null;
  range: SourceRange;
}

export interface MethodDecl extends DeclBase {
  kind: 'method';
  name: string;
  /** `def self.x`, or any def inside `class << self` */
  singleton: boolean;
  params: ParamDecl[];
  /** `def x() end` vs `def x; end` */
  hasParens: boolean;
  visibility: Visibility;
}

/** `NAME = value`; global variables (`$stdout = _`) use the same shape */
export interface ConstantDecl extends DeclBase {
  kind: 'constant';
  name: string;
  value: string;
}

export interface AliasDecl extends DeclBase {
  kind: 'alias';
  newName: string;
  oldName: string;
}

export interface MixinDecl extends DeclBase {
  kind: 'mixin';
  mode: MixinMode;
  target: string;
}

/** Bare `private` / `protected` / `public` line */
export interface VisibilityDecl {
  kind: 'visibility';
  visibility: Visibility;
  range: SourceRange;
}

export interface ScopeDecl extends DeclBase {
  kind: ScopeKind;
  /** As written; may be a path such as `Errno::ENOENT` */
  name: string;
  superclass: string | null;
  members: MemberDecl[];
}

/** `class << self ... end`; every method inside is a singleton method */
export interface SingletonBlockDecl extends DeclBase {
  kind: 'singletonBlock';
  members: MemberDecl[];
}

export type MemberDecl =
  | SingletonBlockDecl
  | MethodDecl
  | ConstantDecl
  | AliasDecl
  | MixinDecl
  | VisibilityDecl
  | ScopeDecl;

/** Members that can carry a doc comment */
export type DocumentedDecl = Exclude<MemberDecl, VisibilityDecl>;

export interface StubFile {
  /** Path the file was read from, '<input>' for in-memory sources */
  path: string;
  /** `# frozen_string_literal: true` and friends, verbatim */
  magicComments: string[];
  members: MemberDecl[];
}

// === TYPE GUARDS ===

export function isScopeDecl(member: MemberDecl): member is ScopeDecl {
  return member.kind === 'class' || member.kind === 'module';
}

export function isDocumentedDecl(member: MemberDecl): member is DocumentedDecl {
  return member.kind !== 'visibility';
}
