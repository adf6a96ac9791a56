import type { ConnectionKind, ExposedEndpointSet } from './types';

/**
 * Endpoint categories in the order they are exposed/withdrawn
 */
export const ENDPOINT_CATEGORIES: ReadonlyArray<{
  key: keyof ExposedEndpointSet;
  kind: ConnectionKind;
}> = [
  { key: 'subscribers', kind: 'subscriber' },
  { key: 'publishers', kind: 'publisher' },
  { key: 'services', kind: 'service' },
  { key: 'actionClients', kind: 'action-client' },
  { key: 'actionServers', kind: 'action-server' },
];

export function emptyEndpointSet(): ExposedEndpointSet {
  return {
    subscribers: [],
    publishers: [],
    services: [],
    actionClients: [],
    actionServers: [],
  };
}

/**
 * Fill in missing categories and drop duplicate names, keeping first-seen order
 */
export function normalizeEndpointSet(
  endpoints?: Partial<ExposedEndpointSet>,
): ExposedEndpointSet {
  const normalized = emptyEndpointSet();

  for (const { key } of ENDPOINT_CATEGORIES) {
    normalized[key] = [...new Set(endpoints?.[key] ?? [])];
  }

  return normalized;
}

export function countEndpoints(endpoints: ExposedEndpointSet): number {
  return ENDPOINT_CATEGORIES.reduce(
    (total, { key }) => total + endpoints[key].length,
    0,
  );
}
