// tests/unit/EndpointResolver.test.ts

import { describe, it, expect } from 'vitest';
import { EndpointResolver, joinUrl } from '../../src/core/fetch/EndpointResolver';
import { descriptor } from '../helpers/fakes';

const PRIMARY = 'https://api.test/web/api/v2.1';
const V20 = 'https://api.test/web/api/v2.0';
const V2 = 'https://api.test/web/api/v2';

describe('EndpointResolver', () => {
  const rules = descriptor({
    name: 'rules',
    primaryPath: '/rules',
    alternatePaths: ['/cloud-detection/rules', '/firewall-control'],
  });

  it('should order primary, alternates, then fallback bases', () => {
    const resolver = new EndpointResolver({
      baseUrl: PRIMARY,
      fallbackBaseUrls: [V20, V2],
      baseUrlPinned: false,
    });

    const candidates = resolver.candidates(rules).map((c) => [c.source, c.baseUrl, c.path]);

    expect(candidates).toEqual([
      ['primary', PRIMARY, '/rules'],
      ['alternate', PRIMARY, '/cloud-detection/rules'],
      ['alternate', PRIMARY, '/firewall-control'],
      ['fallback', V20, '/rules'],
      ['fallback', V2, '/rules'],
      ['fallback', V20, '/cloud-detection/rules'],
      ['fallback', V20, '/firewall-control'],
      ['fallback', V2, '/cloud-detection/rules'],
      ['fallback', V2, '/firewall-control'],
    ]);
  });

  it('should number candidates in priority order', () => {
    const resolver = new EndpointResolver({ baseUrl: PRIMARY, fallbackBaseUrls: [V20], baseUrlPinned: false });

    expect(resolver.candidates(rules).map((c) => c.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('should skip fallback bases when the base URL is pinned', () => {
    const resolver = new EndpointResolver({ baseUrl: PRIMARY, fallbackBaseUrls: [V20], baseUrlPinned: true });

    const candidates = resolver.candidates(rules);

    expect(candidates).toHaveLength(3);
    expect(candidates.every((c) => c.baseUrl === PRIMARY)).toBe(true);
  });

  it('should produce only the primary candidate for a plain dataset', () => {
    const resolver = new EndpointResolver({ baseUrl: PRIMARY, fallbackBaseUrls: [], baseUrlPinned: false });

    expect(resolver.candidates(descriptor({ name: 'sites' }))).toEqual([
      { baseUrl: PRIMARY, path: '/sites', source: 'primary', index: 0 },
    ]);
  });

  it('should drop duplicate URLs', () => {
    const resolver = new EndpointResolver({
      baseUrl: PRIMARY,
      fallbackBaseUrls: [PRIMARY, V20],
      baseUrlPinned: false,
    });

    const candidates = resolver.candidates(
      descriptor({ name: 'sites', primaryPath: '/sites', alternatePaths: ['/sites'] })
    );

    expect(candidates.map((c) => joinUrl(c.baseUrl, c.path))).toEqual([`${PRIMARY}/sites`, `${V20}/sites`]);
  });

  it('should join base URLs and paths with a single slash', () => {
    expect(joinUrl('https://api.test/v2/', '/agents')).toBe('https://api.test/v2/agents');
    expect(joinUrl('https://api.test/v2', 'agents')).toBe('https://api.test/v2/agents');
  });
});
