import type { SessionRecord, TreeDocument } from '../types/graph.js';
import { generateDocumentId, generateRecordId } from '../utils/ids.js';
import {
  DEFAULT_HISTORY_LIMIT, topicMatches, type EdgeMap, type NodeMap, type TreeStorage
} from './storage.js';

/** Process-local storage; also the stand-in used by tests. */
export class InMemoryTreeStorage implements TreeStorage {
  private trees: Map<string, TreeDocument> = new Map();
  private sessions: SessionRecord[] = [];
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async getTree(userId: string, topic: string): Promise<TreeDocument | null> {
    for (const tree of this.trees.values()) {
      if (tree.user_id === userId && tree.topic === topic) return cloneTree(tree);
    }
    return null;
  }

  async getTreeById(id: string): Promise<TreeDocument | null> {
    const tree = this.trees.get(id);
    return tree ? cloneTree(tree) : null;
  }

  async saveTree(userId: string, topic: string, nodes: NodeMap, edges: EdgeMap, update: boolean): Promise<string> {
    const timestamp = this.now();

    if (update) {
      for (const tree of this.trees.values()) {
        if (tree.user_id !== userId || tree.topic !== topic) continue;
        tree.nodes = structuredClone(nodes);
        tree.edges = structuredClone(edges);
        tree.updated_at = timestamp;
        return tree.id;
      }
    }

    const id = generateDocumentId(userId, topic);
    this.trees.set(id, {
      id,
      user_id: userId,
      topic,
      nodes: structuredClone(nodes),
      edges: structuredClone(edges),
      created_at: timestamp,
      updated_at: timestamp,
    });
    return id;
  }

  async logSession(record: SessionRecord): Promise<string> {
    const id = record.id ?? generateRecordId();
    this.sessions.push({ ...record, id, nodes_explored: [...record.nodes_explored] });
    return id;
  }

  async listTrees(userId: string): Promise<TreeDocument[]> {
    return Array.from(this.trees.values())
      .filter(tree => tree.user_id === userId)
      .map(cloneTree);
  }

  async searchTopics(userId: string, query: string): Promise<TreeDocument[]> {
    return (await this.listTrees(userId)).filter(tree => topicMatches(tree.topic, query));
  }

  async getLearningHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<SessionRecord[]> {
    return this.sessions
      .filter(record => record.user_id === userId)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, limit)
      .map(record => ({ ...record, nodes_explored: [...record.nodes_explored] }));
  }

  /** Number of stored trees, across users. */
  get treeCount(): number {
    return this.trees.size;
  }
}

function cloneTree(tree: TreeDocument): TreeDocument {
  return structuredClone(tree);
}
