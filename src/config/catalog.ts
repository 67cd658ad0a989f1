// src/config/catalog.ts

import type { DatasetDescriptor } from '../core/fetch/types';

export const DEFAULT_API_VERSION_PATH = '/web/api/v2.1';
export const FALLBACK_API_VERSION_PATHS = ['/web/api/v2.0'];

/**
 * Datasets collected by a default run, in collection order
 */
export const DEFAULT_CATALOG: DatasetDescriptor[] = [
  {
    name: 'sites',
    primaryPath: '/sites',
    alternatePaths: [],
    params: { limit: 1000 },
    paginate: true,
  },
  {
    name: 'policies',
    primaryPath: '/policies',
    alternatePaths: ['/sites/policy', '/tenant/policy'],
    paginate: false,
  },
  {
    name: 'exclusions',
    primaryPath: '/exclusions',
    alternatePaths: ['/restrictions', '/exclusions/list'],
    params: { limit: 1000 },
    paginate: true,
  },
  {
    name: 'deployment-packs',
    primaryPath: '/deployment-packs',
    alternatePaths: ['/update/agent/packages'],
    params: { limit: 100 },
    paginate: true,
  },
  {
    name: 'agents',
    primaryPath: '/agents',
    alternatePaths: [],
    params: { limit: 1000 },
    paginate: true,
  },
  {
    name: 'rules',
    primaryPath: '/rules',
    alternatePaths: ['/cloud-detection/rules', '/firewall-control'],
    params: { limit: 100 },
    paginate: true,
  },
  {
    name: 'alerts',
    primaryPath: '/alerts',
    alternatePaths: ['/cloud-detection/alerts', '/threats'],
    params: { limit: 100 },
    paginate: true,
  },
  {
    name: 'api-tokens',
    primaryPath: '/api-tokens',
    alternatePaths: ['/users/api-token-details'],
    paginate: false,
    rateLimit: 0.5,
  },
];

/**
 * Pick datasets by name, keeping catalog order
 */
export function selectDatasets(
  catalog: readonly DatasetDescriptor[],
  names?: readonly string[]
): { selected: DatasetDescriptor[]; unknown: string[] } {
  if (!names || names.length === 0) {
    return { selected: [...catalog], unknown: [] };
  }

  const wanted = new Set(names);
  const known = new Set(catalog.map((dataset) => dataset.name));
  return {
    selected: catalog.filter((dataset) => wanted.has(dataset.name)),
    unknown: names.filter((name) => !known.has(name)),
  };
}
