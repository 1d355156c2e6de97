import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractJsonLoose } from '../openai.provider.js';
import { createLLMProvider } from '../factory.js';

describe('extractJsonLoose', () => {
  it('parses plain JSON', () => {
    assert.deepEqual(extractJsonLoose('{"area":"東京"}'), { area: '東京' });
  });

  it('unwraps a json code fence', () => {
    assert.deepEqual(extractJsonLoose('```json\n{"area": null}\n```'), { area: null });
  });

  it('finds the first balanced object in surrounding prose', () => {
    assert.deepEqual(extractJsonLoose('Here you go: {"a":{"b":"}"}} hope that helps'), { a: { b: '}' } });
  });

  it('returns null when there is no JSON', () => {
    assert.equal(extractJsonLoose(''), null);
    assert.equal(extractJsonLoose('no json here {oops}'), null);
  });
});

describe('createLLMProvider', () => {
  it('returns null without an API key', () => {
    assert.equal(createLLMProvider({ apiKey: undefined, model: 'gpt-4o-mini', timeoutMs: 1000 }), null);
  });

  it('builds a provider when a key is set', () => {
    const provider = createLLMProvider({ apiKey: 'test-key', model: 'gpt-4o-mini', timeoutMs: 1000 });
    assert.notEqual(provider, null);
  });
});
