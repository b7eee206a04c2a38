import { loadConfig } from './app.config';

describe('loadConfig', () => {
  // Test: Defaults applied when only the key is set
  it('should build an OpenAI config with defaults', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(config.llm).toEqual({
      provider: 'openai',
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      temperature: 0.3,
      maxTokens: 1000,
      timeoutMs: 60_000,
      baseUrl: undefined
    });
    expect(config.mitigation).toEqual({ temperature: 0.7, maxTokens: 2000 });
    expect(config.lookup.fuzzyThreshold).toBe(0.3);
    expect(config.cache.assessmentTtlMs).toBe(300_000);
    expect(config.server.port).toBe(3001);
  });

  // Test: Grok uses its own key and the OpenAI-compatible endpoint
  it('should point grok at the xAI endpoint with its own key', () => {
    const config = loadConfig({ LLM_PROVIDER: 'grok', XAI_API_KEY: 'test-xai-key' });

    expect(config.llm.provider).toBe('grok');
    expect(config.llm.apiKey).toBe('test-xai-key');
    expect(config.llm.model).toBe('grok-3');
    expect(config.llm.baseUrl).toBe('https://api.x.ai/v1');
  });

  it('should require the provider API key', () => {
    expect(() => loadConfig({})).toThrow('OPENAI_API_KEY environment variable is required');
    expect(() => loadConfig({ LLM_PROVIDER: 'grok', OPENAI_API_KEY: 'test-key' }))
      .toThrow('XAI_API_KEY environment variable is required when LLM_PROVIDER is grok');
  });

  it('should reject an unknown provider', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'other', OPENAI_API_KEY: 'test-key' }))
      .toThrow('LLM_PROVIDER must be either "openai" or "grok"');
  });

  it('should reject out-of-range numeric settings', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', LLM_TEMPERATURE: '3' }))
      .toThrow('LLM_TEMPERATURE must be between 0 and 2');
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', FUZZY_MATCH_THRESHOLD: '1.5' }))
      .toThrow('FUZZY_MATCH_THRESHOLD must be between 0 and 1');
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', LLM_MAX_TOKENS: 'lots' }))
      .toThrow('LLM_MAX_TOKENS must be a non-negative integer');
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key', MITIGATION_TEMPERATURE: '-0.5' }))
      .toThrow('MITIGATION_TEMPERATURE must be between 0 and 2');
  });

  // Test: Returned value is immutable
  it('should return a frozen config', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });
});
