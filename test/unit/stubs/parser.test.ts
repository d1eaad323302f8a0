/**
 * StubParser Tests
 *
 * - comment blocks attach to the next declaration, blank lines detach them
 * - nesting, class << self and visibility tracking
 * - ranges
 * - syntax errors for unbalanced scopes and bad parameters
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseStub, StubSyntaxError } from '@rbstub/core';
import type { MemberDecl, MethodDecl, ScopeDecl } from '@rbstub/types';

const ENV_STUB = `# frozen_string_literal: true

# Hash-like accessor for environment variables.
class ENV
  # Returns the value for +name+.
  #
  #   ENV['HOME'] # => "/home/user"
  def self.[](name) end

  # Removes every variable.
  def self.clear; end

  # detached comment

  def self.keys; end
end
`;

function scope(member: MemberDecl | undefined): ScopeDecl {
  assert.ok(member && (member.kind === 'class' || member.kind === 'module'), 'expected a scope');
  return member;
}

function method(member: MemberDecl | undefined): MethodDecl {
  assert.ok(member && member.kind === 'method', 'expected a method');
  return member;
}

describe('parseStub', () => {
  it('should collect magic comments and top-level scopes', () => {
    const file = parseStub(ENV_STUB, 'env.rb');
    assert.strictEqual(file.path, 'env.rb');
    assert.deepStrictEqual(file.magicComments, ['# frozen_string_literal: true']);
    assert.strictEqual(file.members.length, 1);

    const env = scope(file.members[0]);
    assert.strictEqual(env.kind, 'class');
    assert.strictEqual(env.name, 'ENV');
    assert.strictEqual(env.superclass, null);
    assert.deepStrictEqual(env.doc?.lines, ['Hash-like accessor for environment variables.']);
  });

  it('should attach the comment block directly above a method', () => {
    const env = scope(parseStub(ENV_STUB).members[0]);
    const lookup = method(env.members[0]);
    assert.strictEqual(lookup.name, '[]');
    assert.strictEqual(lookup.singleton, true);
    assert.deepStrictEqual(lookup.doc?.lines, ['Returns the value for +name+.', '', '  ENV[\'HOME\'] # => "/home/user"']);
    assert.deepStrictEqual(lookup.doc?.range, { start: { line: 5, column: 3 }, end: { line: 7, column: 36 } });
  });

  it('should not attach a comment separated by a blank line', () => {
    const env = scope(parseStub(ENV_STUB).members[0]);
    const keys = method(env.members[2]);
    assert.strictEqual(keys.name, 'keys');
    assert.strictEqual(keys.doc, null);
  });

  it('should record hasParens and parsed parameters', () => {
    const env = scope(parseStub(ENV_STUB).members[0]);
    const lookup = method(env.members[0]);
    const clear = method(env.members[1]);
    assert.strictEqual(lookup.hasParens, true);
    assert.deepStrictEqual(lookup.params, [{ kind: 'required', name: 'name', defaultValue: null }]);
    assert.strictEqual(clear.hasParens, false);
    assert.deepStrictEqual(clear.params, []);
  });

  it('should read defaults that are punctuation globals', () => {
    const array = scope(parseStub("class Array\n  # Joins.\n  def join(separator = $,) end\n\n  # Matches.\n  def post(text = $', close = $)) end\nend\n").members[0]);
    assert.deepStrictEqual(method(array.members[0]).params, [
      { kind: 'optional', name: 'separator', defaultValue: '$,' },
    ]);
    assert.deepStrictEqual(method(array.members[1]).params, [
      { kind: 'optional', name: 'text', defaultValue: "$'" },
      { kind: 'optional', name: 'close', defaultValue: '$)' },
    ]);
  });

  it('should span the scope range from its header to its end line', () => {
    const env = scope(parseStub(ENV_STUB).members[0]);
    assert.deepStrictEqual(env.range, { start: { line: 4, column: 1 }, end: { line: 16, column: 4 } });
  });

  it('should mark methods inside class << self as singleton', () => {
    const file = parseStub([
      'module Math',
      '  class << self',
      '    # Square root.',
      '    def sqrt(x) end',
      '  end',
      '',
      '  def hypot(x, y) end',
      'end',
    ].join('\n'));
    const math = scope(file.members[0]);
    const block = math.members[0];
    assert.strictEqual(block.kind, 'singletonBlock');
    const sqrt = method(block.kind === 'singletonBlock' ? block.members[0] : undefined);
    assert.strictEqual(sqrt.singleton, true);
    assert.deepStrictEqual(sqrt.doc?.lines, ['Square root.']);
    assert.strictEqual(method(math.members[1]).singleton, false);
  });

  it('should apply bare visibility to the methods that follow', () => {
    const file = parseStub('class Foo\n  def a; end\n  private\n  def b; end\nend\n');
    const foo = scope(file.members[0]);
    assert.deepStrictEqual(foo.members.map(m => m.kind), ['method', 'visibility', 'method']);
    assert.strictEqual(method(foo.members[0]).visibility, 'public');
    assert.strictEqual(method(foo.members[2]).visibility, 'private');
  });

  it('should register nested scopes, constants, aliases and mixins in order', () => {
    const file = parseStub([
      'module Process',
      '  # Exit status.',
      '  class Status',
      '    include Comparable',
      '    WNOHANG = _',
      '    def to_i; end',
      '    alias to_int to_i',
      '  end',
      'end',
    ].join('\n'));
    const status = scope(scope(file.members[0]).members[0]);
    assert.strictEqual(status.name, 'Status');
    assert.deepStrictEqual(status.members.map(m => m.kind), ['mixin', 'constant', 'method', 'alias']);
  });

  it('should accept top-level methods and globals', () => {
    const file = parseStub('# Prints.\ndef puts(*objects) end\n\n$PROGRAM_NAME = _\n');
    assert.deepStrictEqual(file.members.map(m => m.kind), ['method', 'constant']);
  });

  describe('errors', () => {
    it('should report a missing end at the last line', () => {
      assert.throws(() => parseStub('class Foo\n  def a; end\n', 'foo.rb'), (err: unknown) => {
        assert.ok(err instanceof StubSyntaxError);
        assert.strictEqual(err.message, "Missing 'end' for class Foo opened at line 1");
        assert.strictEqual(err.context.lineNumber, 2);
        return true;
      });
    });

    it('should report a stray end', () => {
      assert.throws(() => parseStub('end\n'), /Unexpected 'end' with no open scope/);
    });

    it('should turn parameter errors into syntax errors with the line', () => {
      assert.throws(() => parseStub('class Foo\n  def a(1x) end\nend\n'), (err: unknown) =>
        err instanceof StubSyntaxError && err.context.lineNumber === 2 && err.code === 'ERR_STUB_SYNTAX'
      );
    });
  });
});
