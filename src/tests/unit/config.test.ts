import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

const MISSING_KEY =
  'OpenWeatherMap API key not found. Set the OPENWEATHERMAP_API_KEY environment variable.';

describe('loadConfig', () => {
  it('reads the API key and defaults the log level', () => {
    expect(loadConfig({ OPENWEATHERMAP_API_KEY: 'test-key' })).toEqual({
      openWeatherApiKey: 'test-key',
      logLevel: 'warn',
    });
  });

  it('accepts an explicit log level', () => {
    expect(loadConfig({ OPENWEATHERMAP_API_KEY: 'test-key', LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('fails with ConfigurationError when the API key is missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow(MISSING_KEY);
  });

  it('treats empty and blank API keys as missing', () => {
    expect(() => loadConfig({ OPENWEATHERMAP_API_KEY: '' })).toThrow(MISSING_KEY);
    expect(() => loadConfig({ OPENWEATHERMAP_API_KEY: '   ' })).toThrow(MISSING_KEY);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ OPENWEATHERMAP_API_KEY: 'test-key', LOG_LEVEL: 'loud' })).toThrow(
      /^Configuration validation failed: logLevel: /
    );
  });
});
