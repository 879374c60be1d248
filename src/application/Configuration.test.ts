import { describe, it, expect, afterEach, vi } from 'vitest';
import { Configuration, currentConfiguration, resetConfiguration } from './Configuration.js';
import { defaultFormatter, plainFormatter } from '../infrastructure/formatting/AnsiFormatter.js';

describe('Configuration', () => {
  afterEach(() => {
    resetConfiguration();
    vi.unstubAllEnvs();
  });

  describe('default', () => {
    it('should use warning and the colored formatter', () => {
      const config = Configuration.default();

      expect(config.level).toBe('warning');
      expect(config.formatter).toBe(defaultFormatter);
    });

    it('should be active before any init', () => {
      expect(currentConfiguration()).toEqual(Configuration.default());
    });
  });

  describe('fromEnv', () => {
    it('should equal the default when the variable is unset', () => {
      expect(Configuration.fromEnv('APP_LOG', {})).toEqual(Configuration.default());
    });

    it('should take a recognized level in any casing', () => {
      expect(Configuration.fromEnv('APP_LOG', { APP_LOG: 'DeBuG' }).level).toBe('debug');
      expect(Configuration.fromEnv('APP_LOG', { APP_LOG: 'error' }).level).toBe('error');
    });

    it('should keep the default level for unrecognized values', () => {
      expect(Configuration.fromEnv('APP_LOG', { APP_LOG: 'verbose' }).level).toBe('warning');
      expect(Configuration.fromEnv('APP_LOG', { APP_LOG: '' }).level).toBe('warning');
    });

    it('should keep the default formatter', () => {
      expect(Configuration.fromEnv('APP_LOG', { APP_LOG: 'info' }).formatter).toBe(defaultFormatter);
    });

    it('should read process.env at call time', () => {
      vi.stubEnv('TRACING_CONFIG_TEST', 'info');
      expect(Configuration.fromEnv('TRACING_CONFIG_TEST').level).toBe('info');

      vi.stubEnv('TRACING_CONFIG_TEST', 'trace');
      expect(Configuration.fromEnv('TRACING_CONFIG_TEST').level).toBe('trace');
    });
  });

  describe('withLevel / withFormatter', () => {
    it('should return new values and leave the original alone', () => {
      const base = Configuration.default();
      const changed = base.withLevel('trace').withFormatter(plainFormatter);

      expect(base.level).toBe('warning');
      expect(base.formatter).toBe(defaultFormatter);
      expect(changed.level).toBe('trace');
      expect(changed.formatter).toBe(plainFormatter);
    });
  });

  describe('init', () => {
    it('should replace the process-wide configuration', () => {
      const config = Configuration.default().withLevel('debug');
      config.init();

      expect(currentConfiguration()).toBe(config);
    });

    it('should swap wholesale rather than merge', () => {
      Configuration.default().withFormatter(plainFormatter).init();
      Configuration.default().withLevel('error').init();

      expect(currentConfiguration().level).toBe('error');
      expect(currentConfiguration().formatter).toBe(defaultFormatter);
    });
  });

  it('should restore the built-in default on reset', () => {
    Configuration.default().withLevel('trace').init();
    resetConfiguration();

    expect(currentConfiguration()).toEqual(Configuration.default());
  });
});
