/**
 * Environment Variable Handler Tests
 *
 * Tests for src/config/env.ts
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache } from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    vi.stubEnv('LENS_HOME', '');
    vi.stubEnv('LENS_WORKERS', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('returns undefined for unset variables', () => {
      const env = loadEnv();

      expect(env.LENS_HOME).toBeUndefined();
      expect(env.LENS_WORKERS).toBeUndefined();
    });

    it('loads LENS_HOME when set', () => {
      vi.stubEnv('LENS_HOME', '/tmp/lens-home');

      expect(loadEnv().LENS_HOME).toBe('/tmp/lens-home');
    });

    it('coerces LENS_WORKERS to a number', () => {
      vi.stubEnv('LENS_WORKERS', '6');

      expect(loadEnv().LENS_WORKERS).toBe(6);
    });

    it('rejects a non-numeric LENS_WORKERS', () => {
      vi.stubEnv('LENS_WORKERS', 'lots');

      expect(() => loadEnv()).toThrow(ConfigError);
    });

    it('rejects a LENS_WORKERS below one', () => {
      vi.stubEnv('LENS_WORKERS', '0');

      expect(() => loadEnv()).toThrow(/^Invalid environment variables:\n {2}- LENS_WORKERS: /);
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('LENS_WORKERS', '2');
      const first = loadEnv();

      vi.stubEnv('LENS_WORKERS', '9');
      const second = loadEnv();

      expect(second).toBe(first);
      expect(second.LENS_WORKERS).toBe(2);
    });

    it('reloads after the cache is cleared', () => {
      vi.stubEnv('LENS_WORKERS', '2');
      loadEnv();

      vi.stubEnv('LENS_WORKERS', '9');
      _clearEnvCache();

      expect(loadEnv().LENS_WORKERS).toBe(9);
    });
  });

  describe('getEnv()', () => {
    it('returns a single variable', () => {
      vi.stubEnv('LENS_HOME', '/srv/lens');

      expect(getEnv('LENS_HOME')).toBe('/srv/lens');
    });
  });
});
