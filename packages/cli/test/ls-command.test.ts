/**
 * Tests for `rbstub ls` listings
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseStub, StubRegistry } from '@rbstub/core';
import { describeScope, formatScopeIndex, formatScopeListing } from '../src/commands/ls.js';

const registry = new StubRegistry([
  parseStub([
    '# Text.',
    'class String',
    '  include Comparable',
    '  SEP = _',
    '  def self.new(str = "") end',
    '  def length; end',
    '  def center(width, pad = " ") end',
    'end',
    '',
  ].join('\n'), 'string.rb'),
  parseStub('module Comparable\n  def <(other) end\nend\n', 'comparable.rb'),
]);

describe('rbstub ls', () => {
  it('should describe own members with signatures', () => {
    assert.deepStrictEqual(describeScope(registry, 'String'), {
      name: 'String',
      kind: 'class',
      superclass: 'Object',
      ancestors: ['String', 'Comparable', 'Object'],
      files: ['string.rb'],
      constants: ['SEP'],
      singletonMethods: ['new(str = "")'],
      instanceMethods: ['center(width, pad = " ")', 'length'],
    });
  });

  it('should list inherited method names with --inherited', () => {
    const listing = describeScope(registry, 'String', true);
    assert.deepStrictEqual(listing?.instanceMethods, ['<', 'center', 'length']);
    assert.deepStrictEqual(listing?.singletonMethods, ['new']);
  });

  it('should return null for an unknown scope', () => {
    assert.strictEqual(describeScope(registry, 'Nope'), null);
  });

  it('should format a listing', () => {
    const listing = describeScope(registry, 'String');
    assert.ok(listing);
    assert.deepStrictEqual(formatScopeListing(listing), [
      'class String < Object',
      '  ancestors: String, Comparable, Object',
      '  files: string.rb',
      '',
      '  constants (1):',
      '    SEP',
      '',
      '  singleton methods (1):',
      '    .new(str = "")',
      '',
      '  instance methods (2):',
      '    #center(width, pad = " ")',
      '    #length',
    ]);
  });

  it('should index scopes by name', () => {
    assert.deepStrictEqual(formatScopeIndex(registry), ['module Comparable', 'class  String']);
  });
});
