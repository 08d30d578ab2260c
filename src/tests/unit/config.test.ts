import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    expect(parseConfig({})).toEqual({
      host: '0.0.0.0',
      port: 8001,
      locales: ['es', 'en'],
      defaultLocale: 'es',
      lexiconDir: 'data/lexicon',
      intentThreshold: 0.8,
      deviceThreshold: 0.7,
      leadingMatchBonus: 0.05,
      fallbackProvider: 'disabled',
      fallbackTimeoutMs: 8000,
      ollamaBaseUrl: 'http://localhost:11434',
      ollamaModel: 'llama3.2',
      devicesSource: 'json',
      devicesFile: 'data/devices.json',
    });
  });

  it('should coerce numbers and split locale lists', () => {
    const config = parseConfig({ PORT: '9000', INTENT_THRESHOLD: '0.75', LOCALES: ' en , es ', DEFAULT_LOCALE: 'en' });
    expect(config.port).toBe(9000);
    expect(config.intentThreshold).toBe(0.75);
    expect(config.locales).toEqual(['en', 'es']);
    expect(config.defaultLocale).toBe('en');
  });

  it('should treat empty values as unset', () => {
    expect(parseConfig({ PORT: '', ANTHROPIC_API_KEY: '' })).toMatchObject({ port: 8001, anthropicApiKey: undefined });
  });

  it('should require the default locale to be enabled', () => {
    expect(() => parseConfig({ LOCALES: 'es', DEFAULT_LOCALE: 'en' })).toThrow(
      'defaultLocale: must be one of the enabled locales (es)'
    );
  });

  it('should reject unsupported locales and out-of-range thresholds', () => {
    expect(() => parseConfig({ LOCALES: 'es,fr' })).toThrow(ConfigError);
    expect(() => parseConfig({ DEVICE_THRESHOLD: '1.5' })).toThrow(/^Configuration validation failed:\ndeviceThreshold/);
  });

  it('should require provider settings', () => {
    expect(() => parseConfig({ FALLBACK_PROVIDER: 'anthropic' })).toThrow(
      'anthropicApiKey: required when FALLBACK_PROVIDER=anthropic'
    );
    expect(() => parseConfig({ FALLBACK_PROVIDER: 'http' })).toThrow('fallbackUrl: required when FALLBACK_PROVIDER=http');
    expect(parseConfig({ FALLBACK_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-key' }).fallbackProvider).toBe(
      'anthropic'
    );
  });
});
