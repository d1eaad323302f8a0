/**
 * @rbstub/core - Stub file parsing, formatting, validation and lookup
 */

// Declaration model
export type {
  StubFile,
  MemberDecl,
  ScopeDecl,
  MethodDecl,
  ConstantDecl,
  AliasDecl,
  MixinDecl,
  SingletonBlockDecl,
  VisibilityDecl,
  ParamDecl,
  DocComment,
  SourceRange,
  Severity,
} from '@rbstub/types';

// Error types
export {
  RbstubError,
  ConfigError,
  FileAccessError,
  LanguageError,
  StubSyntaxError,
  VersionParseError,
} from './errors/RbstubError.js';
export type { ErrorContext, RbstubErrorJSON } from './errors/RbstubError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  isLogLevel,
  silentLogger,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export {
  DiagnosticCollector,
  DiagnosticReporter,
  DiagnosticWriter,
  DIAGNOSTIC_CATEGORIES,
  CODE_TO_CATEGORY,
  isCategoryKey,
  getCategoryForCode,
  getRulesForCategory,
} from './diagnostics/index.js';
export type {
  Diagnostic,
  DiagnosticInput,
  DiagnosticCategoryKey,
  ReportFormat,
  ReportOptions,
  SummaryStats,
} from './diagnostics/index.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  validatePatterns,
  validateRules,
  validateRubyVersion,
  validateIndent,
} from './config/index.js';
export type { RbstubConfig } from './config/index.js';

// Stubs
export { StubLexer, tokenizeStub } from './stubs/lexer.js';
export type { StubLine } from './stubs/lexer.js';
export { StubParser, parseStub } from './stubs/parser.js';
export { parseParams, parseParam, formatParam, formatParams, formatSignature } from './stubs/params.js';
export { printStub, printMethodLine } from './stubs/printer.js';
export type { PrintOptions } from './stubs/printer.js';
export {
  extractExamples,
  summarize,
  parseDocTags,
  parseTypeList,
  formatTypes,
  inlineMarkdown,
  toMarkdown,
} from './stubs/doc.js';
export type { DocExample, DocTags, DocParamTag, DocOptionTag, DocTypedTag } from './stubs/doc.js';
export {
  RULES,
  RULE_IDS,
  isRuleId,
  signatureProblems,
  stripPositions,
  firstDifference,
  validateStubFile,
  validateStubSource,
} from './stubs/validate.js';
export type { RuleId, RuleSetting, ValidateOptions } from './stubs/validate.js';
export { MinorVersion, SUPPORTED_VERSIONS, sortVersions } from './stubs/version.js';
export { StubLoader, fileNameToScopeName } from './stubs/StubLoader.js';
export type { StubLoaderOptions, LoadResult } from './stubs/StubLoader.js';
export { StubRegistry } from './stubs/StubRegistry.js';
export type { ScopeEntry, MethodEntry, ConstantEntry, RegistryStats, CompletionOptions } from './stubs/StubRegistry.js';
export { qualify, memberRef, constantRef } from './stubs/names.js';
