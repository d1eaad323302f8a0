/**
 * Parameter list parsing and formatting tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseParams, parseParam, formatParams, formatSignature, LanguageError } from '@rbstub/core';

describe('parseParam', () => {
  it('should classify every parameter kind', () => {
    const cases: Array<[string, string, string | null, string | null]> = [
      ['name', 'required', 'name', null],
      ['default = nil', 'optional', 'default', 'nil'],
      ['*args', 'rest', 'args', null],
      ['*', 'rest', null, null],
      ['exception:', 'keyword', 'exception', null],
      ['chomp: false', 'keywordOptional', 'chomp', 'false'],
      ['**opts', 'keywordRest', 'opts', null],
      ['&block', 'block', 'block', null],
      ['&', 'block', null, null],
      ['...', 'forward', null, null],
      ['**nil', 'noKeywords', null, null],
    ];
    for (const [text, kind, name, defaultValue] of cases) {
      assert.deepStrictEqual(parseParam(text), { kind, name, defaultValue }, text);
    }
  });

  it('should return null for text that is not a parameter', () => {
    assert.strictEqual(parseParam('1abc'), null);
    assert.strictEqual(parseParam('a b'), null);
  });
});

describe('parseParams', () => {
  it('should split on top-level commas only', () => {
    const params = parseParams('hash = {a: 1, b: 2}, *rest, &blk');
    assert.deepStrictEqual(params.map(p => p.kind), ['optional', 'rest', 'block']);
    assert.strictEqual(params[0].defaultValue, '{a: 1, b: 2}');
  });

  it('should keep commas inside string defaults', () => {
    const params = parseParams('sep = ", ", limit = 0');
    assert.deepStrictEqual(params.map(p => p.defaultValue), ['", "', '0']);
  });

  it('should keep punctuation globals whole in defaults', () => {
    const params = parseParams("separator = $,, quote = $', rest = $;");
    assert.deepStrictEqual(params.map(p => p.defaultValue), ['$,', "$'", '$;']);
  });

  it('should return an empty list for blank text', () => {
    assert.deepStrictEqual(parseParams('  '), []);
  });

  it('should reject a trailing comma', () => {
    assert.throws(() => parseParams('a,'), (err: unknown) =>
      err instanceof LanguageError && err.code === 'ERR_INVALID_PARAM' && err.message === 'Invalid parameter empty parameter in (a,)'
    );
  });

  it('should reject unbalanced brackets', () => {
    assert.throws(() => parseParams('a = [1, 2'), /Unbalanced brackets or quotes/);
  });
});

describe('formatting', () => {
  it('should print parameters in canonical spacing', () => {
    assert.strictEqual(
      formatParams(parseParams('a,b=1,*c,d:,e:  2,**f,&g')),
      'a, b = 1, *c, d:, e: 2, **f, &g'
    );
  });

  it('should format signatures with and without parentheses', () => {
    assert.strictEqual(
      formatSignature({ name: 'fetch', singleton: false, hasParens: true, params: parseParams('key, default = nil') }),
      'fetch(key, default = nil)'
    );
    assert.strictEqual(formatSignature({ name: 'clear', singleton: true, hasParens: false, params: [] }), 'self.clear');
    assert.strictEqual(formatSignature({ name: 'to_s', singleton: false, hasParens: true, params: [] }), 'to_s()');
  });
});
