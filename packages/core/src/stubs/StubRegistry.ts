/**
 * StubRegistry - Index of the scopes, methods and constants declared by a stub set
 *
 * Scopes declared in several files (reopened classes) merge into one entry.
 * Nested scopes are registered under their qualified name (`Process::Status`).
 * Top-level methods and constants belong to `Object`, the way the runtime
 * treats them.
 *
 * Lookups follow the runtime's ancestor order: prepended modules, the scope
 * itself, included modules, then the superclass chain. Singleton lookups
 * walk the superclass chain's singleton methods, then modules brought in
 * with `extend`, then `Class`/`Module` instance methods.
 */

import type {
  ConstantDecl,
  DocComment,
  MemberDecl,
  MethodDecl,
  ScopeKind,
  StubFile,
} from '@rbstub/types';
import { isScopeDecl } from '@rbstub/types';
import { formatSignature } from './params.js';
import { toMarkdown } from './doc.js';
import { baseName, constantRef, memberRef, parentName, qualify } from './names.js';

const ROOT_SCOPE = 'Object';

export interface MethodEntry {
  /** Name the method was looked up under (the alias name for aliases) */
  name: string;
  /** Qualified name of the scope declaring the method */
  owner: string;
  singleton: boolean;
  decl: MethodDecl;
  file: string;
  /** Original method name when reached through `alias` */
  aliasOf: string | null;
}

export interface ConstantEntry {
  name: string;
  owner: string;
  decl: ConstantDecl;
  file: string;
}

export interface ScopeEntry {
  name: string;
  kind: ScopeKind;
  superclass: string | null;
  includes: string[];
  extends: string[];
  prepends: string[];
  instanceMethods: Map<string, MethodEntry>;
  singletonMethods: Map<string, MethodEntry>;
  /** alias name → original name */
  instanceAliases: Map<string, string>;
  singletonAliases: Map<string, string>;
  constants: Map<string, ConstantEntry>;
  doc: DocComment | null;
  files: string[];
}

export interface RegistryStats {
  scopes: number;
  methods: number;
  constants: number;
  aliases: number;
  files: number;
}

export interface MethodLookupOptions {
  singleton?: boolean;
}

export interface CompletionOptions {
  /** Complete method names of this scope instead of scope/constant names */
  scope?: string;
  singleton?: boolean;
}

/** One method table searched during lookup */
interface Table {
  scope: string;
  singleton: boolean;
}

export class StubRegistry {
  private scopes = new Map<string, ScopeEntry>();
  private methodIndex = new Map<string, Set<string>>();
  private fileCount = 0;

  constructor(files: StubFile[] = []) {
    for (const file of files) {
      this.addFile(file);
    }
  }

  addFile(file: StubFile): void {
    this.fileCount++;
    this.register(file.members, null, false, file.path);
  }

  // === REGISTRATION ===

  private ensureScope(name: string, kind: ScopeKind, file: string): ScopeEntry {
    let entry = this.scopes.get(name);
    if (!entry) {
      entry = {
        name,
        kind,
        superclass: null,
        includes: [],
        extends: [],
        prepends: [],
        instanceMethods: new Map(),
        singletonMethods: new Map(),
        instanceAliases: new Map(),
        singletonAliases: new Map(),
        constants: new Map(),
        doc: null,
        files: [],
      };
      this.scopes.set(name, entry);
    }
    if (!entry.files.includes(file)) {
      entry.files.push(file);
    }
    return entry;
  }

  private register(members: MemberDecl[], scope: string | null, singleton: boolean, file: string): void {
    for (const member of members) {
      if (isScopeDecl(member)) {
        const name = qualify(scope, member.name);
        const entry = this.ensureScope(name, member.kind, file);
        // first declaration with a superclass or a doc wins
        entry.superclass ??= member.superclass;
        entry.doc ??= member.doc;
        this.register(member.members, name, false, file);
        continue;
      }

      if (member.kind === 'singletonBlock') {
        this.register(member.members, scope, true, file);
        continue;
      }

      const owner = this.ensureScope(scope ?? ROOT_SCOPE, 'class', file);

      switch (member.kind) {
        case 'method': {
          const isSingleton = singleton || member.singleton;
          const table = isSingleton ? owner.singletonMethods : owner.instanceMethods;
          if (!table.has(member.name)) {
            table.set(member.name, {
              name: member.name,
              owner: owner.name,
              singleton: isSingleton,
              decl: member,
              file,
              aliasOf: null,
            });
          }
          if (!isSingleton) {
            this.indexMethod(member.name, owner.name);
          }
          break;
        }
        case 'alias':
          (singleton ? owner.singletonAliases : owner.instanceAliases).set(member.newName, member.oldName);
          if (!singleton) {
            this.indexMethod(member.newName, owner.name);
          }
          break;
        case 'constant':
          if (!owner.constants.has(member.name)) {
            owner.constants.set(member.name, { name: member.name, owner: owner.name, decl: member, file });
          }
          break;
        case 'mixin': {
          const list = member.mode === 'include' ? owner.includes
            : member.mode === 'extend' ? owner.extends
            : owner.prepends;
          // `extend self` inside a module exposes its instance methods as singletons
          const target = member.target === 'self' ? owner.name : member.target;
          if (!list.includes(target)) {
            list.push(target);
          }
          break;
        }
        case 'visibility':
          break;
      }
    }
  }

  private indexMethod(name: string, scope: string): void {
    let owners = this.methodIndex.get(name);
    if (!owners) {
      owners = new Set();
      this.methodIndex.set(name, owners);
    }
    owners.add(scope);
  }

  // === SCOPES ===

  getScope(name: string): ScopeEntry | undefined {
    return this.scopes.get(name.startsWith('::') ? name.slice(2) : name);
  }

  hasScope(name: string): boolean {
    return this.getScope(name) !== undefined;
  }

  /** Qualified names of all scopes, sorted */
  scopeNames(): string[] {
    return [...this.scopes.keys()].sort();
  }

  /**
   * Resolve a scope reference the way a constant lookup does from inside
   * `from`: innermost enclosing namespace first, then top level.
   */
  resolveScopeName(name: string, from: string | null): string {
    if (name.startsWith('::')) {
      return name.slice(2);
    }
    let namespace = from;
    while (namespace) {
      const candidate = `${namespace}::${name}`;
      if (this.scopes.has(candidate)) {
        return candidate;
      }
      namespace = parentName(namespace);
    }
    return name;
  }

  /**
   * Superclass of a class, with the runtime defaults applied:
   * classes without one inherit from Object, Object from BasicObject.
   */
  superclassOf(name: string): string | null {
    const entry = this.scopes.get(name);
    if (!entry || entry.kind === 'module' || name === 'BasicObject') {
      return null;
    }
    if (entry.superclass) {
      return this.resolveScopeName(entry.superclass, parentName(name));
    }
    return name === ROOT_SCOPE ? 'BasicObject' : ROOT_SCOPE;
  }

  /**
   * Linearized ancestors: prepends (last prepended first), the scope,
   * includes (last included first), then the superclass's ancestors.
   * A module already among the superclass's ancestors is not inserted again.
   * Names that are not registered are listed but not expanded.
   */
  ancestors(name: string): string[] {
    return this.linearize(this.resolveScopeName(name, null), new Set());
  }

  /** `path` holds the scopes being expanded, so cycles end the walk */
  private linearize(name: string, path: Set<string>): string[] {
    const entry = this.scopes.get(name);
    if (!entry) {
      return [name];
    }
    if (path.has(name)) {
      return [];
    }
    path.add(name);

    const superclass = this.superclassOf(name);
    const inherited = superclass ? this.linearize(superclass, path) : [];
    const namespace = parentName(name);
    const seen = new Set([...inherited, name]);

    const expand = (modules: string[]): string[] => {
      const out: string[] = [];
      for (const module of [...modules].reverse()) {
        for (const ancestor of this.linearize(this.resolveScopeName(module, namespace), path)) {
          if (!seen.has(ancestor)) {
            seen.add(ancestor);
            out.push(ancestor);
          }
        }
      }
      return out;
    };

    const prepended = expand(entry.prepends);
    const included = expand(entry.includes);
    path.delete(name);
    return [...prepended, name, ...included, ...inherited];
  }

  /** The class itself followed by its superclasses, cycle-safe */
  private superclassChain(name: string): string[] {
    const chain: string[] = [];
    let current: string | null = name;
    while (current && !chain.includes(current)) {
      chain.push(current);
      current = this.superclassOf(current);
    }
    return chain;
  }

  // === METHODS ===

  /**
   * Method tables in lookup order.
   */
  private lookupTables(scope: string, singleton: boolean): Table[] {
    const name = this.resolveScopeName(scope, null);
    const tables: Table[] = [];
    const seen = new Set<string>();
    const add = (table: Table): void => {
      const key = `${table.scope}|${table.singleton}`;
      if (!seen.has(key)) {
        seen.add(key);
        tables.push(table);
      }
    };

    if (!singleton) {
      for (const ancestor of this.ancestors(name)) {
        add({ scope: ancestor, singleton: false });
      }
      return tables;
    }

    for (const klass of this.superclassChain(name)) {
      add({ scope: klass, singleton: true });
      const entry = this.scopes.get(klass);
      const extended = entry ? [...entry.extends].reverse() : [];
      for (const module of extended) {
        for (const ancestor of this.ancestors(this.resolveScopeName(module, parentName(klass)))) {
          add({ scope: ancestor, singleton: false });
        }
      }
    }

    const meta = this.scopes.get(name)?.kind === 'module' ? 'Module' : 'Class';
    if (this.scopes.has(meta)) {
      for (const ancestor of this.ancestors(meta)) {
        add({ scope: ancestor, singleton: false });
      }
    }
    return tables;
  }

  /**
   * Find the method `name` would dispatch to on `scope` (instances, or the
   * scope object itself with `singleton`). Aliases resolve to their target,
   * keeping the alias name.
   */
  findMethod(scope: string, name: string, options: MethodLookupOptions = {}): MethodEntry | null {
    const tables = this.lookupTables(scope, options.singleton ?? false);
    return this.findInTables(tables, 0, name, new Set());
  }

  private findInTables(tables: Table[], start: number, name: string, aliasesSeen: Set<string>): MethodEntry | null {
    for (let i = start; i < tables.length; i++) {
      const entry = this.scopes.get(tables[i].scope);
      if (!entry) continue;

      const methods = tables[i].singleton ? entry.singletonMethods : entry.instanceMethods;
      const method = methods.get(name);
      if (method) {
        return method;
      }

      const aliases = tables[i].singleton ? entry.singletonAliases : entry.instanceAliases;
      const original = aliases.get(name);
      const key = `${i}|${name}`;
      if (original !== undefined && !aliasesSeen.has(key)) {
        aliasesSeen.add(key);
        const target = this.findInTables(tables, i, original, aliasesSeen);
        if (target) {
          return { ...target, name, aliasOf: original };
        }
      }
    }
    return null;
  }

  /**
   * Scopes declaring an instance method (or alias) called `name`, sorted.
   */
  resolveMethod(name: string): string[] {
    return [...(this.methodIndex.get(name) ?? [])].sort();
  }

  /**
   * Method names available on a scope, including inherited ones.
   */
  methodNames(scope: string, options: MethodLookupOptions = {}): string[] {
    const names = new Set<string>();
    for (const table of this.lookupTables(scope, options.singleton ?? false)) {
      const entry = this.scopes.get(table.scope);
      if (!entry) continue;
      const methods = table.singleton ? entry.singletonMethods : entry.instanceMethods;
      const aliases = table.singleton ? entry.singletonAliases : entry.instanceAliases;
      for (const name of [...methods.keys(), ...aliases.keys()]) {
        names.add(name);
      }
    }
    return [...names].sort();
  }

  // === CONSTANTS ===

  /**
   * Constant lookup in a scope and then its ancestors; `$globals` and
   * top-level constants live on Object.
   */
  findConstant(scope: string | null, name: string): ConstantEntry | null {
    const start = scope ? this.resolveScopeName(scope, null) : ROOT_SCOPE;
    for (const ancestor of this.ancestors(start)) {
      const constant = this.scopes.get(ancestor)?.constants.get(name);
      if (constant) {
        return constant;
      }
    }
    return null;
  }

  // === EDITOR QUERIES ===

  /**
   * Completion candidates for `prefix`.
   *
   * Without a scope: scope names and constants, `Foo::Ba` completing inside
   * `Foo`. With a scope: method names available on it.
   */
  complete(prefix: string, options: CompletionOptions = {}): string[] {
    if (options.scope) {
      return this.methodNames(options.scope, { singleton: options.singleton })
        .filter((name) => name.startsWith(prefix));
    }

    const namespace = prefix.includes('::') ? parentName(prefix) : null;
    const partial = namespace ? baseName(prefix) : prefix;
    const candidates = new Set<string>();

    for (const name of this.scopes.keys()) {
      if (parentName(name) === namespace && baseName(name).startsWith(partial)) {
        candidates.add(name);
      }
    }
    const holder = this.scopes.get(namespace ?? ROOT_SCOPE);
    for (const constant of holder?.constants.keys() ?? []) {
      if (constant.startsWith(partial)) {
        candidates.add(constantRef(namespace, constant));
      }
    }
    return [...candidates].sort();
  }

  /**
   * Markdown hover text for `Scope`, `Scope#method`, `Scope.method`,
   * `Scope::CONST`, `$global` or a top-level method name; null when the
   * reference does not resolve.
   */
  hover(ref: string): string | null {
    const instance = /^((?:::)?[A-Z]\w*(?:::[A-Z]\w*)*)#(.+)$/.exec(ref);
    if (instance) {
      return this.methodHover(instance[1], instance[2], false);
    }
    const singleton = /^((?:::)?[A-Z]\w*(?:::[A-Z]\w*)*)\.(.+)$/.exec(ref);
    if (singleton) {
      return this.methodHover(singleton[1], singleton[2], true);
    }

    if (ref.startsWith('$')) {
      return this.constantHover(null, ref);
    }

    if (/^(?:::)?[A-Z]\w*(?:::[A-Z]\w*)*$/.test(ref)) {
      const scope = this.getScope(ref);
      if (scope) {
        const superclass = scope.superclass ? ` < ${scope.superclass}` : '';
        return render(`${scope.kind} ${scope.name}${superclass}`, scope.doc);
      }
      const owner = parentName(ref);
      return this.constantHover(owner, baseName(ref));
    }

    // bare lowercase name: a global function
    return this.methodHover(ROOT_SCOPE, ref, false);
  }

  private methodHover(scope: string, name: string, singleton: boolean): string | null {
    const method = this.findMethod(scope, name, { singleton });
    if (!method) {
      return null;
    }
    const signature = formatSignature({ ...method.decl, name: method.name, singleton: false });
    const header = method.aliasOf
      ? `${memberRef(method.owner, signature, method.singleton)}  # alias of ${method.aliasOf}`
      : memberRef(method.owner, signature, method.singleton);
    return render(header, method.decl.doc);
  }

  private constantHover(scope: string | null, name: string): string | null {
    const constant = this.findConstant(scope, name);
    if (!constant) {
      return null;
    }
    const ref = constant.owner === ROOT_SCOPE ? name : constantRef(constant.owner, name);
    const value = constant.decl.value === '_' ? '' : ` = ${constant.decl.value}`;
    return render(`${ref}${value}`, constant.decl.doc);
  }

  stats(): RegistryStats {
    let methods = 0;
    let constants = 0;
    let aliases = 0;
    for (const entry of this.scopes.values()) {
      methods += entry.instanceMethods.size + entry.singletonMethods.size;
      constants += entry.constants.size;
      aliases += entry.instanceAliases.size + entry.singletonAliases.size;
    }
    return { scopes: this.scopes.size, methods, constants, aliases, files: this.fileCount };
  }
}

function render(header: string, doc: DocComment | null): string {
  const body = toMarkdown(doc);
  const fence = ['```ruby', header, '```'].join('\n');
  return body ? `${fence}\n\n${body}` : fence;
}
