/**
 * Stub parser - builds the declaration model from lexed lines
 *
 * Nesting is tracked with a frame stack: `class`, `module` and
 * `class << self` open a frame, `end` closes it. A comment block attaches
 * to the declaration on the very next line; a blank line in between
 * detaches it. Comments right before `end` or at EOF are dropped.
 */

import type {
  DocComment,
  MemberDecl,
  ParamDecl,
  ScopeDecl,
  SingletonBlockDecl,
  SourceRange,
  StubFile,
  Visibility,
} from '@rbstub/types';
import { LanguageError, StubSyntaxError } from '../errors/RbstubError.js';
import { StubLexer, type StubLine } from './lexer.js';
import { parseParams } from './params.js';

type CommentLine = Extract<StubLine, { type: 'comment' }>;

interface Frame {
  decl: ScopeDecl | SingletonBlockDecl | null;
  members: MemberDecl[];
  visibility: Visibility;
  singleton: boolean;
  /** Label used in error messages */
  label: string;
  openedAt: number;
}

function lineRange(line: StubLine): SourceRange {
  return {
    start: { line: line.line, column: line.indent + 1 },
    end: { line: line.line, column: line.length + 1 },
  };
}

function toDoc(comments: CommentLine[]): DocComment | null {
  if (comments.length === 0) {
    return null;
  }
  const first = comments[0];
  const last = comments[comments.length - 1];
  return {
    lines: comments.map((c) => c.text),
    range: {
      start: { line: first.line, column: first.indent + 1 },
      end: { line: last.line, column: last.length + 1 },
    },
  };
}

export class StubParser {
  private readonly stack: Frame[];
  private readonly magicComments: string[] = [];
  private pending: CommentLine[] = [];

  constructor(private readonly text: string, private readonly path: string = '<input>') {
    this.stack = [{
      decl: null,
      members: [],
      visibility: 'public',
      singleton: false,
      label: 'file',
      openedAt: 1,
    }];
  }

  parse(): StubFile {
    const lines = new StubLexer(this.text, this.path).tokenize();
    for (const line of lines) {
      this.visit(line);
    }

    if (this.stack.length > 1) {
      const open = this.current();
      throw new StubSyntaxError(
        `Missing 'end' for ${open.label} opened at line ${open.openedAt}`,
        this.path,
        lines.length,
        `Close ${open.label} with 'end'`
      );
    }

    return {
      path: this.path,
      magicComments: this.magicComments,
      members: this.stack[0].members,
    };
  }

  private current(): Frame {
    return this.stack[this.stack.length - 1];
  }

  private takeDoc(): DocComment | null {
    const doc = toDoc(this.pending);
    this.pending = [];
    return doc;
  }

  private visit(line: StubLine): void {
    const frame = this.current();

    switch (line.type) {
      case 'blank':
        this.pending = [];
        return;

      case 'magic':
        this.magicComments.push(line.text);
        return;

      case 'comment':
        this.pending.push(line);
        return;

      case 'end':
        this.closeFrame(line);
        return;

      case 'class':
      case 'module': {
        const decl: ScopeDecl = {
          kind: line.type,
          name: line.name,
          superclass: line.type === 'class' ? line.superclass : null,
          members: [],
          doc: this.takeDoc(),
          range: lineRange(line),
        };
        frame.members.push(decl);
        this.stack.push({
          decl,
          members: decl.members,
          visibility: 'public',
          singleton: false,
          label: `${line.type} ${line.name}`,
          openedAt: line.line,
        });
        return;
      }

      case 'singletonClass': {
        const decl: SingletonBlockDecl = {
          kind: 'singletonBlock',
          members: [],
          doc: this.takeDoc(),
          range: lineRange(line),
        };
        frame.members.push(decl);
        this.stack.push({
          decl,
          members: decl.members,
          visibility: 'public',
          singleton: true,
          label: 'class << self',
          openedAt: line.line,
        });
        return;
      }

      case 'def': {
        let params: ParamDecl[];
        try {
          params = line.params === null ? [] : parseParams(line.params);
        } catch (err) {
          if (err instanceof LanguageError) {
            throw new StubSyntaxError(err.message, this.path, line.line);
          }
          throw err;
        }
        frame.members.push({
          kind: 'method',
          name: line.name,
          singleton: line.singleton || frame.singleton,
          params,
          hasParens: line.params !== null,
          visibility: frame.visibility,
          doc: this.takeDoc(),
          range: lineRange(line),
        });
        return;
      }

      case 'constant':
        frame.members.push({
          kind: 'constant',
          name: line.name,
          value: line.value,
          doc: this.takeDoc(),
          range: lineRange(line),
        });
        return;

      case 'alias':
        frame.members.push({
          kind: 'alias',
          newName: line.newName,
          oldName: line.oldName,
          doc: this.takeDoc(),
          range: lineRange(line),
        });
        return;

      case 'mixin':
        frame.members.push({
          kind: 'mixin',
          mode: line.mode,
          target: line.target,
          doc: this.takeDoc(),
          range: lineRange(line),
        });
        return;

      case 'visibility':
        this.pending = [];
        frame.visibility = line.visibility;
        frame.members.push({ kind: 'visibility', visibility: line.visibility, range: lineRange(line) });
        return;
    }
  }

  private closeFrame(line: StubLine): void {
    this.pending = [];
    if (this.stack.length === 1) {
      throw new StubSyntaxError(`Unexpected 'end' with no open scope`, this.path, line.line);
    }
    const frame = this.stack.pop();
    if (frame?.decl) {
      frame.decl.range.end = { line: line.line, column: line.length + 1 };
    }
  }
}

/**
 * Parse stub source text into a StubFile.
 *
 * @throws StubSyntaxError when the text is not a well-formed stub
 */
export function parseStub(text: string, path?: string): StubFile {
  return new StubParser(text, path).parse();
}
