/**
 * Hash Utilities
 *
 * Short SHA-256 fingerprints used to tie a snapshot to the catalog it was
 * taken against.
 */

import { createHash } from 'node:crypto';

import type { Catalog } from '../config/types.js';

/**
 * Compute a short hash of string content.
 *
 * @returns First 8 characters of the hex SHA-256 digest
 */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 8);
}

/**
 * Fingerprint a catalog. Service order does not matter; process order does.
 */
export function computeCatalogHash(catalog: Catalog): string {
  const canonical = JSON.stringify({
    services: [...catalog.services].sort(),
    processes: [...catalog.processes],
  });
  return computeContentHash(canonical);
}
