/**
 * StubLexer Tests
 *
 * One StubLine per source line:
 * - magic comments only in the preamble
 * - def lines in all accepted shapes, operator names
 * - scope, constant, alias, mixin and visibility lines
 * - syntax errors carry the line number
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { tokenizeStub, StubSyntaxError } from '@rbstub/core';
import type { StubLine } from '@rbstub/core';

function single(line: string): StubLine {
  const lines = tokenizeStub(line);
  assert.strictEqual(lines.length, 1);
  return lines[0];
}

describe('StubLexer', () => {
  describe('comments', () => {
    it('should treat magic comments before the first blank line as magic', () => {
      const lines = tokenizeStub('# frozen_string_literal: true\n\n# encoding: utf-8\n');
      assert.deepStrictEqual(lines.map(l => l.type), ['magic', 'blank', 'comment']);
    });

    it('should strip the hash and one space from comment text', () => {
      const line = single('  #   ENV.clear');
      assert.strictEqual(line.type, 'comment');
      if (line.type === 'comment') {
        assert.strictEqual(line.text, '  ENV.clear');
        assert.strictEqual(line.indent, 2);
      }
    });

    it('should keep an empty comment line as empty text', () => {
      const line = single('#');
      assert.ok(line.type === 'comment' && line.text === '');
    });
  });

  describe('def lines', () => {
    it('should lex a method with parameters', () => {
      const line = single('def fetch(name, default = nil) end');
      assert.strictEqual(line.type, 'def');
      if (line.type === 'def') {
        assert.strictEqual(line.name, 'fetch');
        assert.strictEqual(line.params, 'name, default = nil');
        assert.strictEqual(line.singleton, false);
      }
    });

    it('should lex a method without parentheses', () => {
      const line = single('def self.clear; end');
      assert.ok(line.type === 'def');
      if (line.type === 'def') {
        assert.strictEqual(line.name, 'clear');
        assert.strictEqual(line.singleton, true);
        assert.strictEqual(line.params, null);
      }
    });

    it('should accept empty parentheses followed by a semicolon', () => {
      const line = single('def to_s(); end');
      assert.ok(line.type === 'def' && line.params === '');
    });

    it('should read operator names, longest first', () => {
      const names = ['def <=>(other) end', 'def [](key) end', 'def []=(key, value) end', 'def -@; end', 'def ==(other) end']
        .map(single)
        .map(l => (l.type === 'def' ? l.name : null));
      assert.deepStrictEqual(names, ['<=>', '[]', '[]=', '-@', '==']);
    });

    it('should read predicate, bang, setter and capitalized names', () => {
      const names = ['def empty?; end', 'def merge!(other) end', 'def value=(v) end', 'def Integer(arg) end']
        .map(single)
        .map(l => (l.type === 'def' ? l.name : null));
      assert.deepStrictEqual(names, ['empty?', 'merge!', 'value=', 'Integer']);
    });

    it('should keep nested brackets inside the parameter list', () => {
      const line = single('def each_slice(n, opts = {a: [1, 2]}) end');
      assert.ok(line.type === 'def' && line.params === 'n, opts = {a: [1, 2]}');
    });

    it('should reject a def that does not close on the same line', () => {
      assert.throws(
        () => tokenizeStub('class Foo\n  def bar(x)\nend\n', 'foo.rb'),
        (err: unknown) => {
          assert.ok(err instanceof StubSyntaxError);
          assert.strictEqual(err.context.lineNumber, 2);
          assert.strictEqual(err.context.filePath, 'foo.rb');
          assert.strictEqual(err.suggestion, 'Write: def bar(x) end');
          return true;
        }
      );
    });
  });

  describe('scopes', () => {
    it('should lex a class with a superclass', () => {
      const line = single('class KeyError < IndexError');
      assert.ok(line.type === 'class');
      if (line.type === 'class') {
        assert.strictEqual(line.name, 'KeyError');
        assert.strictEqual(line.superclass, 'IndexError');
      }
    });

    it('should lex nested scope names', () => {
      const line = single('module Process::Sys');
      assert.ok(line.type === 'module' && line.name === 'Process::Sys');
    });

    it('should lex class << self', () => {
      assert.strictEqual(single('  class << self').type, 'singletonClass');
    });

    it('should reject a lowercase class name', () => {
      assert.throws(() => tokenizeStub('class foo'), StubSyntaxError);
    });
  });

  describe('other declarations', () => {
    it('should lex constants and global variables', () => {
      const constant = single('SEPARATOR = _');
      assert.ok(constant.type === 'constant' && constant.name === 'SEPARATOR' && constant.value === '_');
      const global = single('$stdout = _');
      assert.ok(global.type === 'constant' && global.name === '$stdout');
    });

    it('should lex alias, mixins and visibility', () => {
      const lines = tokenizeStub('alias to_str to_s\ninclude Comparable\nextend Forwardable\nprivate\n');
      assert.deepStrictEqual(lines.map(l => l.type), ['alias', 'mixin', 'mixin', 'visibility']);
      const alias = lines[0];
      assert.ok(alias.type === 'alias' && alias.newName === 'to_str' && alias.oldName === 'to_s');
      const extend = lines[2];
      assert.ok(extend.type === 'mixin' && extend.mode === 'extend' && extend.target === 'Forwardable');
    });

    it('should reject visibility with arguments', () => {
      assert.throws(() => tokenizeStub('private :foo'), /Only bare 'private' is supported/);
    });

    it('should reject unrecognized lines', () => {
      assert.throws(() => tokenizeStub('\nputs "hi"'), (err: unknown) =>
        err instanceof StubSyntaxError && err.context.lineNumber === 2 && err.message === 'Unrecognized stub line: puts "hi"'
      );
    });
  });
});
