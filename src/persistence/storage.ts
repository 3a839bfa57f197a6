import { z } from 'zod';
import type { SessionRecord, TreeDocument } from '../types/graph.js';

export type NodeMap = TreeDocument['nodes'];
export type EdgeMap = TreeDocument['edges'];

/**
 * Storage collaborator. At most one tree per (userId, topic) is expected,
 * but nothing below enforces it: the adapter queries before it writes.
 */
export interface TreeStorage {
  getTree(userId: string, topic: string): Promise<TreeDocument | null>;
  getTreeById(id: string): Promise<TreeDocument | null>;
  /**
   * `update = false` always inserts. `update = true` replaces nodes, edges
   * and updated_at of the (userId, topic) document, inserting if absent.
   */
  saveTree(userId: string, topic: string, nodes: NodeMap, edges: EdgeMap, update: boolean): Promise<string>;
  logSession(record: SessionRecord): Promise<string>;

  listTrees(userId: string): Promise<TreeDocument[]>;
  /** Case-insensitive substring match on topic. */
  searchTopics(userId: string, query: string): Promise<TreeDocument[]>;
  /** Newest first. */
  getLearningHistory(userId: string, limit?: number): Promise<SessionRecord[]>;
}

export const DEFAULT_HISTORY_LIMIT = 10;

export function topicMatches(topic: string, query: string): boolean {
  return topic.toLowerCase().includes(query.trim().toLowerCase());
}

const AttributeEntriesSchema = z.array(z.tuple([z.string(), z.record(z.string(), z.unknown())]));

/**
 * Label-keyed attribute maps as stored on disk. Validated as entries because
 * `z.record` drops a `__proto__` key, and any string is a valid label.
 */
export const AttributeMapSchema = z
  .custom<object>(value => typeof value === 'object' && value !== null && !Array.isArray(value), {
    message: 'Expected an object',
  })
  .transform(value => Object.entries(value))
  .pipe(AttributeEntriesSchema)
  .transform(entries => Object.fromEntries(entries));
