import { describe, it, expect } from 'vitest';
import {
  type CuratorConfig,
  DEFAULT_USER_AGENT,
  loadConfig,
  resolveLogLevel,
  validateConfig,
} from '../../src/config/curator.config';
import { ValidationError } from '../../src/utils/errors';

function configFrom(env: NodeJS.ProcessEnv): CuratorConfig {
  return loadConfig(env);
}

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(configFrom({})).toEqual({
      logLevel: 'info',
      matching: { defaultThreshold: 90 },
      http: { timeout: 30000, userAgent: DEFAULT_USER_AGENT },
      header: { label: 'Curated', author: 'dat-curator', homepage: '' },
    });
  });

  it('should read every variable', () => {
    const config = configFrom({
      LOG_LEVEL: ' DEBUG ',
      DAT_CURATOR_THRESHOLD: '85',
      DAT_CURATOR_HTTP_TIMEOUT_MS: '5000',
      DAT_CURATOR_USER_AGENT: 'test-agent',
      DAT_CURATOR_HEADER_LABEL: 'Trimmed',
      DAT_CURATOR_AUTHOR: 'someone',
      DAT_CURATOR_HOMEPAGE: 'https://example.org',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      matching: { defaultThreshold: 85 },
      http: { timeout: 5000, userAgent: 'test-agent' },
      header: { label: 'Trimmed', author: 'someone', homepage: 'https://example.org' },
    });
  });

  it('should keep an unknown log level for validation', () => {
    expect(configFrom({ LOG_LEVEL: 'Verbose' }).logLevel).toBe('verbose');
  });

  it('should fall back to defaults for non-numeric values', () => {
    const config = configFrom({ DAT_CURATOR_THRESHOLD: 'high', DAT_CURATOR_HTTP_TIMEOUT_MS: 'soon' });
    expect(config.matching.defaultThreshold).toBe(90);
    expect(config.http.timeout).toBe(30000);
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(configFrom({}))).not.toThrow();
  });

  it('should reject an unknown log level', () => {
    const config = configFrom({ LOG_LEVEL: 'verbose' });
    expect(() => validateConfig(config)).toThrow(ValidationError);
    expect(() => validateConfig(config)).toThrow(
      "LOG_LEVEL must be one of debug, info, warn, error (got 'verbose')"
    );
  });

  it('should reject a threshold outside 0-100 or with a fraction', () => {
    for (const threshold of ['101', '-1', '12.5']) {
      expect(() => validateConfig(configFrom({ DAT_CURATOR_THRESHOLD: threshold }))).toThrow(
        ValidationError
      );
    }
    expect(() => validateConfig(configFrom({ DAT_CURATOR_THRESHOLD: '0' }))).not.toThrow();
    expect(() => validateConfig(configFrom({ DAT_CURATOR_THRESHOLD: '100' }))).not.toThrow();
  });

  it('should reject a non-positive timeout', () => {
    expect(() => validateConfig(configFrom({ DAT_CURATOR_HTTP_TIMEOUT_MS: '0' }))).toThrow(
      'DAT_CURATOR_HTTP_TIMEOUT_MS must be a positive number (got 0)'
    );
    expect(() => validateConfig(configFrom({ DAT_CURATOR_HTTP_TIMEOUT_MS: '-5' }))).toThrow(
      ValidationError
    );
  });

  it('should reject a blank header label', () => {
    const config = configFrom({});
    config.header.label = '  ';
    expect(() => validateConfig(config)).toThrow('DAT_CURATOR_HEADER_LABEL must not be empty');
  });
});

describe('resolveLogLevel', () => {
  it('should start the logger at info for an unknown level', () => {
    expect(resolveLogLevel('warn')).toBe('warn');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});
