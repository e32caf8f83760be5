import { describe, expect, it } from 'vitest';
import { configFromEnv, resolveConfig } from '../src/core/EngineConfig.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig()).toEqual({ logLevel: 'info', logFormat: 'text', colors: true, serializer: 'yaml' });
  });

  it('keeps explicit options', () => {
    expect(resolveConfig({ logLevel: 'silent', serializer: 'plain', logFormat: 'json', colors: false })).toEqual({
      logLevel: 'silent',
      logFormat: 'json',
      colors: false,
      serializer: 'plain',
    });
  });

  it('turns verbose into debug logging', () => {
    expect(resolveConfig({ verbose: true, logLevel: 'error' }).logLevel).toBe('debug');
  });
});

describe('configFromEnv', () => {
  it('reads FLOWCERT_* variables', () => {
    const config = configFromEnv({ FLOWCERT_LOG_LEVEL: ' DEBUG ', FLOWCERT_SERIALIZER: 'plain', FLOWCERT_LOG_FORMAT: '' });

    expect(config).toEqual({ logLevel: 'debug', logFormat: 'text', colors: true, serializer: 'plain' });
  });

  it('ignores unrelated variables', () => {
    expect(configFromEnv({ HOME: '/tmp' })).toEqual(resolveConfig());
  });

  it('rejects unsupported values', () => {
    expect(() => configFromEnv({ FLOWCERT_SERIALIZER: 'xml' })).toThrow(
      /^Invalid engine configuration: serializer: Invalid enum value/
    );
  });
});
