/**
 * Tests for `rbstub parse` output and shared CLI utilities
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseStub } from '@rbstub/core';
import { renderModel } from '../src/commands/parse.js';
import { getLogLevel } from '../src/utils/project.js';
import { exitWithRbstubError } from '../src/utils/errorFormatter.js';

describe('renderModel', () => {
  const file = parseStub('# Doc\nclass Foo\nend\n', 'foo.rb');

  it('should drop positions and the path by default', () => {
    assert.strictEqual(
      renderModel(file),
      '{"magicComments":[],"members":[{"kind":"class","name":"Foo","superclass":null,"members":[],"doc":{"lines":["Doc"]}}]}'
    );
  });

  it('should keep ranges with positions', () => {
    const model: unknown = JSON.parse(renderModel(file, { positions: true }));
    assert.ok(typeof model === 'object' && model !== null && 'path' in model);
    assert.strictEqual(model.path, 'foo.rb');
  });

  it('should indent with pretty', () => {
    assert.ok(renderModel(file, { pretty: true }).startsWith('{\n  "magicComments": []'));
  });
});

describe('getLogLevel', () => {
  it('should default to warnings and raise with --verbose', () => {
    assert.strictEqual(getLogLevel({}), 'warnings');
    assert.strictEqual(getLogLevel({ verbose: true }), 'info');
    assert.strictEqual(getLogLevel({ verbose: true, logLevel: 'debug' }), 'debug');
  });
});

describe('exitWithRbstubError', () => {
  it('should rethrow errors it does not own', () => {
    assert.throws(() => exitWithRbstubError(new Error('unexpected')), /unexpected/);
  });
});
