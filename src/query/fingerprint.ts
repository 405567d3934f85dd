/**
 * @fileoverview Query fingerprints used as cache keys
 */

import { createHash } from 'node:crypto';

/**
 * Lower-cased, trimmed, whitespace-collapsed query text. Profile detection
 * and filter parsing are case-insensitive, so queries that differ only in
 * case or spacing produce identical alignments.
 */
export function normalizeQueryText(queryText: string): string {
  return queryText.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Fingerprint for alignment cache entries. The registry version is part of
 * the key so entries computed against a replaced profile set never hit.
 */
export function computeQueryFingerprint(queryText: string, registryVersion: number): string {
  return createHash('sha256')
    .update(`${registryVersion}\u0000${normalizeQueryText(queryText)}`, 'utf-8')
    .digest('hex');
}

/**
 * Key for the query-embedding cache. Only surrounding whitespace is dropped:
 * the embedding model may be case-sensitive.
 */
export function embeddingCacheKey(queryText: string): string {
  return createHash('sha256').update(queryText.trim(), 'utf-8').digest('hex');
}
