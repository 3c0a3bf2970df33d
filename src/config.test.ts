import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './runner/errors.js';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadConfig({});

    expect(config.toolServer).toEqual({ baseUrl: undefined, timeoutMs: 12000 });
    expect(config.logging.level).toBe('info');
    expect(config.augment.apiKey).toBeUndefined();
    expect(config.augment.model).toBe('gpt-4.1-mini');
    expect(config.escalation.notifyTo).toBe('support-leads@example.com');
  });

  it('reads the tool server URL and falls back to the MCP alias', () => {
    expect(loadConfig({ TOOL_SERVER_URL: 'http://tools.local:9000' }).toolServer.baseUrl).toBe('http://tools.local:9000');
    expect(loadConfig({ MCP_SERVER_URL: 'http://mcp.local' }).toolServer.baseUrl).toBe('http://mcp.local');
  });

  it('treats a blank tool server URL as disabled', () => {
    expect(loadConfig({ TOOL_SERVER_URL: '   ' }).toolServer.baseUrl).toBeUndefined();
  });

  it('coerces numeric values and normalizes the log level', () => {
    const config = loadConfig({ TOOL_SERVER_TIMEOUT_MS: '2500', LOG_LEVEL: 'DEBUG' });

    expect(config.toolServer.timeoutMs).toBe(2500);
    expect(config.logging.level).toBe('debug');
  });

  it('uses OPENAI_API_KEY when no dedicated key is set', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key' }).augment.apiKey).toBe('test-key');
  });

  it('raises a ConfigurationError naming invalid variables', () => {
    try {
      loadConfig({ TOOL_SERVER_URL: 'not a url', LOG_LEVEL: 'verbose' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.context.variables).toEqual(['TOOL_SERVER_URL', 'LOG_LEVEL']);
      }
    }
  });
});
