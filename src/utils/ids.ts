/**
 * ID and key utilities
 */

import { createHash, randomUUID } from 'crypto';

/** Stable for the node's lifetime; never derived from the label alone. */
export function generateNodeId(): string {
  return `node_${randomUUID().replace(/-/g, '').substring(0, 12)}`;
}

export function generateDocumentId(userId: string, topic: string): string {
  const hash = createHash('md5')
    .update(`${userId}:${topic}:${randomUUID()}`)
    .digest('hex')
    .substring(0, 16);
  return `tree_${hash}`;
}

export function generateRecordId(): string {
  return `session_${randomUUID().replace(/-/g, '').substring(0, 16)}`;
}

/** Wire key for a stored edge. Ambiguous when labels contain underscores. */
export function edgeDocumentKey(source: string, target: string): string {
  return `${source}_${target}`;
}

/**
 * Split a wire key on its first underscore.
 * Returns null when the key has no underscore at all.
 */
export function splitEdgeDocumentKey(key: string): [string, string] | null {
  const idx = key.indexOf('_');
  if (idx === -1) return null;
  return [key.substring(0, idx), key.substring(idx + 1)];
}
