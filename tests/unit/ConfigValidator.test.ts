// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { catalogJsonSchema, validateConfig, validateConfigSafe } from '../../src/config/ConfigValidator';
import { DEFAULT_CATALOG, selectDatasets } from '../../src/config/catalog';

const api = { baseUrl: 'https://console.test/web/api/v2.1', token: 'test-token' };

describe('ConfigValidator', () => {
  describe('defaults', () => {
    it('should fill in retry, pagination and output defaults', () => {
      const config = validateConfig({ api });

      expect(config.retry).toEqual({ maxRetries: 3, baseDelay: 2000, backoffFactor: 2, maxDelay: 60000 });
      expect(config.pagination).toEqual({ maxPages: 100, minPageDelay: 0, cursorParam: 'cursor' });
      expect(config.output).toEqual({ dir: 'data_output', writeEmpty: true });
      expect(config.api).toMatchObject({ authScheme: 'ApiToken', timeout: 30000, baseUrlPinned: false });
    });

    it('should use the built-in catalog when no datasets are given', () => {
      const config = validateConfig({ api });

      expect(config.datasets.map((dataset) => dataset.name)).toEqual([
        'sites',
        'policies',
        'exclusions',
        'deployment-packs',
        'agents',
        'rules',
        'alerts',
        'api-tokens',
      ]);
    });

    it('should not share the built-in catalog between configs', () => {
      const config = validateConfig({ api });

      config.datasets[0].alternatePaths.push('/mutated');

      expect(DEFAULT_CATALOG[0].alternatePaths).toEqual([]);
    });

    it('should default descriptor flags', () => {
      const config = validateConfig({ api, datasets: [{ name: 'sites', primaryPath: '/sites' }] });

      expect(config.datasets).toEqual([{ name: 'sites', primaryPath: '/sites', alternatePaths: [], paginate: false }]);
    });
  });

  describe('validation', () => {
    it('should require an API token', () => {
      const result = validateConfigSafe({ api: { baseUrl: api.baseUrl } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toContain('api.token: Required');
      }
    });

    it('should reject duplicate dataset names', () => {
      const result = validateConfigSafe({
        api,
        datasets: [
          { name: 'sites', primaryPath: '/sites' },
          { name: 'sites', primaryPath: '/sites-v2' },
        ],
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toEqual(["datasets.1.name: Duplicate dataset name 'sites'"]);
      }
    });

    it('should reject paths without a leading slash', () => {
      const result = validateConfigSafe({ api, datasets: [{ name: 'sites', primaryPath: 'sites' }] });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toEqual(['datasets.0.primaryPath: Paths must start with "/"']);
      }
    });

    it('should reject maxDelay below baseDelay', () => {
      const result = validateConfigSafe({ api, retry: { baseDelay: 5000, maxDelay: 1000 } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toEqual(['retry: maxDelay must be greater than or equal to baseDelay']);
      }
    });

    it('should throw ZodError from validateConfig', () => {
      expect(() => validateConfig({ api: { ...api, baseUrl: 'not a url' } })).toThrow(ZodError);
    });
  });

  it('should export a JSON Schema for catalog entries', () => {
    const schema = catalogJsonSchema();

    expect(schema).toHaveProperty(['definitions', 'DatasetDescriptor', 'type'], 'object');
    expect(schema).toHaveProperty(['definitions', 'DatasetDescriptor', 'required'], ['name', 'primaryPath']);
  });
});

describe('selectDatasets', () => {
  it('should select everything when no names are given', () => {
    expect(selectDatasets(DEFAULT_CATALOG).selected).toHaveLength(DEFAULT_CATALOG.length);
    expect(selectDatasets(DEFAULT_CATALOG, []).unknown).toEqual([]);
  });

  it('should keep catalog order and report unknown names', () => {
    const { selected, unknown } = selectDatasets(DEFAULT_CATALOG, ['alerts', 'bogus', 'sites']);

    expect(selected.map((dataset) => dataset.name)).toEqual(['sites', 'alerts']);
    expect(unknown).toEqual(['bogus']);
  });
});
