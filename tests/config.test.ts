import path from 'node:path';
import {describe, it, expect} from 'vitest';
import {ConfigurationError} from '../src/agent/errors.js';
import {loadAgentConfig} from '../src/config.js';

describe('loadAgentConfig', () => {
  it('applies defaults around the API key', () => {
    const config = loadAgentConfig({LLM_API_KEY: 'test-key'});

    expect(config.llm).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://aiproxy.sanand.workers.dev/openai/v1',
      model: 'gpt-4o-mini',
      temperature: 0,
      requestTimeoutMs: 60_000
    });
    expect(config.loop).toEqual({
      maxIterations: 15,
      timeBudgetMs: 300_000,
      maxConsecutiveInvalidActions: 2,
      repeatedFailureThreshold: 2
    });
    expect(config.tools).toEqual({
      sandboxRoot: path.resolve('data'),
      shellTimeoutMs: 30_000,
      codeTimeoutMs: 30_000,
      httpTimeoutMs: 20_000,
      maxOutputChars: 4000
    });
    expect(config.logLevel).toBe('info');
  });

  it('reads the proxy token when no explicit key is set', () => {
    expect(loadAgentConfig({AIPROXY_TOKEN: 'test-proxy-token'}).llm.apiKey).toBe('test-proxy-token');
  });

  it('switches to the OpenAI endpoint for the fallback configuration', () => {
    const config = loadAgentConfig({USE_FALLBACK_API: 'true', OPENAI_API_KEY: 'test-openai'});
    expect(config.llm.apiKey).toBe('test-openai');
    expect(config.llm.baseUrl).toBe('https://api.openai.com/v1');
  });

  it('coerces numeric budgets and paths', () => {
    const config = loadAgentConfig({
      LLM_API_KEY: 'test-key',
      AGENT_MAX_ITERATIONS: '4',
      AGENT_TIME_BUDGET_MS: '1000',
      SANDBOX_ROOT: '/srv/sandbox',
      LOG_LEVEL: 'debug'
    });
    expect(config.loop.maxIterations).toBe(4);
    expect(config.loop.timeBudgetMs).toBe(1000);
    expect(config.tools.sandboxRoot).toBe('/srv/sandbox');
    expect(config.logLevel).toBe('debug');
  });

  it('reports every invalid field', () => {
    expect(() => loadAgentConfig({LLM_API_KEY: 'test-key', AGENT_MAX_ITERATIONS: 'many', LOG_LEVEL: 'loud'})).toThrow(
      /AGENT_MAX_ITERATIONS: .*; LOG_LEVEL: /
    );
  });

  it('rejects budgets and timeouts beyond the timer range', () => {
    expect(() => loadAgentConfig({LLM_API_KEY: 'test-key', AGENT_TIME_BUDGET_MS: '3000000000'})).toThrow(
      ConfigurationError
    );
    expect(() => loadAgentConfig({LLM_API_KEY: 'test-key', SHELL_TIMEOUT_MS: '2147483648'})).toThrow(
      /SHELL_TIMEOUT_MS: /
    );
    expect(loadAgentConfig({LLM_API_KEY: 'test-key', AGENT_TIME_BUDGET_MS: '2147483647'}).loop.timeBudgetMs).toBe(
      2_147_483_647
    );
  });

  it('requires an API key', () => {
    expect(() => loadAgentConfig({})).toThrow(ConfigurationError);
  });
});
