/**
 * Stub printer - regenerates stub text from the declaration model
 *
 * Output is canonical: one declaration per line, `indent` spaces per level,
 * a blank line before every documented member that is not first in its
 * scope, and a blank line after the magic comments.
 */

import type { DocComment, MemberDecl, MethodDecl, StubFile } from '@rbstub/types';
import { formatParams } from './params.js';

export interface PrintOptions {
  /** Spaces per nesting level (default 2) */
  indent?: number;
}

function printDoc(doc: DocComment | null, pad: string, out: string[]): void {
  if (!doc) return;
  for (const line of doc.lines) {
    out.push(line === '' ? `${pad}#` : `${pad}# ${line}`);
  }
}

/**
 * `def name(params) end` / `def name; end`; the `self.` prefix is dropped
 * inside `class << self` blocks.
 */
export function printMethodLine(method: MethodDecl, insideSingletonBlock = false): string {
  const prefix = method.singleton && !insideSingletonBlock ? 'self.' : '';
  if (!method.hasParens) {
    return `def ${prefix}${method.name}; end`;
  }
  return `def ${prefix}${method.name}(${formatParams(method.params)}) end`;
}

class StubPrinter {
  private readonly out: string[] = [];
  private readonly unit: string;

  constructor(options: PrintOptions) {
    this.unit = ' '.repeat(options.indent ?? 2);
  }

  print(file: StubFile): string {
    for (const magic of file.magicComments) {
      this.out.push(magic);
    }
    if (file.magicComments.length > 0 && file.members.length > 0) {
      this.out.push('');
    }
    this.members(file.members, 0, false);
    return this.out.length === 0 ? '' : this.out.join('\n') + '\n';
  }

  private members(members: MemberDecl[], depth: number, singletonBlock: boolean): void {
    members.forEach((member, idx) => {
      const documented = member.kind !== 'visibility' && member.doc !== null;
      const previous = idx > 0 ? members[idx - 1] : null;
      // visibility switches and scopes get breathing room, like hand-written stubs
      const separate = previous !== null && (
        documented ||
        member.kind === 'visibility' ||
        previous.kind === 'visibility' ||
        previous.kind === 'class' ||
        previous.kind === 'module' ||
        previous.kind === 'singletonBlock'
      );
      if (separate) {
        this.out.push('');
      }
      this.member(member, depth, singletonBlock);
    });
  }

  private member(member: MemberDecl, depth: number, singletonBlock: boolean): void {
    const pad = this.unit.repeat(depth);

    switch (member.kind) {
      case 'visibility':
        this.out.push(`${pad}${member.visibility}`);
        return;
      case 'method':
        printDoc(member.doc, pad, this.out);
        this.out.push(`${pad}${printMethodLine(member, singletonBlock)}`);
        return;
      case 'constant':
        printDoc(member.doc, pad, this.out);
        this.out.push(`${pad}${member.name} = ${member.value}`);
        return;
      case 'alias':
        printDoc(member.doc, pad, this.out);
        this.out.push(`${pad}alias ${member.newName} ${member.oldName}`);
        return;
      case 'mixin':
        printDoc(member.doc, pad, this.out);
        this.out.push(`${pad}${member.mode} ${member.target}`);
        return;
      case 'singletonBlock':
        printDoc(member.doc, pad, this.out);
        this.out.push(`${pad}class << self`);
        this.members(member.members, depth + 1, true);
        this.out.push(`${pad}end`);
        return;
      case 'class':
      case 'module': {
        printDoc(member.doc, pad, this.out);
        const superclass = member.superclass ? ` < ${member.superclass}` : '';
        this.out.push(`${pad}${member.kind} ${member.name}${superclass}`);
        this.members(member.members, depth + 1, false);
        this.out.push(`${pad}end`);
        return;
      }
    }
  }
}

export function printStub(file: StubFile, options: PrintOptions = {}): string {
  return new StubPrinter(options).print(file);
}
