/**
 * LLM Factory Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createLLMProvider } from '../factory.js';
import { OpenAiProvider } from '../openai.provider.js';
import { getConfig } from '../../config/env.js';

describe('createLLMProvider', () => {
  it('builds an OpenAI provider when a key is configured', () => {
    const provider = createLLMProvider(getConfig({ OPENAI_API_KEY: 'test-secret' }));
    assert.ok(provider instanceof OpenAiProvider);
  });

  it('returns null without a key', () => {
    assert.equal(createLLMProvider(getConfig({})), null);
  });

  it('returns null when disabled or unknown', () => {
    assert.equal(createLLMProvider(getConfig({ LLM_PROVIDER: 'none', OPENAI_API_KEY: 'test-secret' })), null);
    assert.equal(createLLMProvider(getConfig({ LLM_PROVIDER: 'mystery', OPENAI_API_KEY: 'test-secret' })), null);
  });
});
