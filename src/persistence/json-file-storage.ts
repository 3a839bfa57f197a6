/**
 * File-backed tree storage
 *
 * Keeps two JSON files in a data directory:
 * - trees.json     every saved tree document, keyed by id
 * - sessions.json  logged learning sessions, oldest first
 *
 * Files are read on construction and rewritten after every change. All file
 * access is synchronous, so two calls in one process never interleave.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { SessionRecord, TreeDocument } from '../types/graph.js';
import { generateDocumentId, generateRecordId } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import {
  AttributeMapSchema, DEFAULT_HISTORY_LIMIT, topicMatches, type EdgeMap, type NodeMap, type TreeStorage
} from './storage.js';

const log = createLogger('JsonFileStorage');

const TreeDocumentSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  topic: z.string(),
  nodes: AttributeMapSchema,
  edges: AttributeMapSchema,
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const SessionRecordSchema = z.object({
  id: z.string().optional(),
  user_id: z.string(),
  topic: z.string(),
  tree_id: z.string(),
  nodes_explored: z.array(z.string()),
  time_spent: z.number(),
  timestamp: z.coerce.date(),
});

const TreesFileSchema = z.record(z.string(), TreeDocumentSchema);
const SessionsFileSchema = z.array(SessionRecordSchema);

export class JsonFileTreeStorage implements TreeStorage {
  private readonly treesPath: string;
  private readonly sessionsPath: string;
  private readonly trees: Map<string, TreeDocument>;
  private sessions: SessionRecord[];
  private readonly now: () => Date;

  constructor(dataDir: string, now: () => Date = () => new Date()) {
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
    this.treesPath = join(dataDir, 'trees.json');
    this.sessionsPath = join(dataDir, 'sessions.json');
    this.trees = new Map(Object.entries(this.load(this.treesPath, TreesFileSchema, {})));
    this.sessions = this.load(this.sessionsPath, SessionsFileSchema, []);
    this.now = now;
    log.info(`Loaded: ${this.trees.size} trees, ${this.sessions.length} sessions from ${dataDir}`);
  }

  async getTree(userId: string, topic: string): Promise<TreeDocument | null> {
    const tree = this.findTree(userId, topic);
    return tree ? structuredClone(tree) : null;
  }

  async getTreeById(id: string): Promise<TreeDocument | null> {
    const tree = this.trees.get(id);
    return tree ? structuredClone(tree) : null;
  }

  async saveTree(userId: string, topic: string, nodes: NodeMap, edges: EdgeMap, update: boolean): Promise<string> {
    const timestamp = this.now();
    const existing = update ? this.findTree(userId, topic) : undefined;

    if (existing) {
      existing.nodes = structuredClone(nodes);
      existing.edges = structuredClone(edges);
      existing.updated_at = timestamp;
      this.writeTrees();
      return existing.id;
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
    this.writeTrees();
    return id;
  }

  async logSession(record: SessionRecord): Promise<string> {
    const id = record.id ?? generateRecordId();
    this.sessions.push({ ...record, id, nodes_explored: [...record.nodes_explored] });
    this.write(this.sessionsPath, this.sessions);
    return id;
  }

  async listTrees(userId: string): Promise<TreeDocument[]> {
    return Array.from(this.trees.values())
      .filter(tree => tree.user_id === userId)
      .sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime())
      .map(tree => structuredClone(tree));
  }

  async searchTopics(userId: string, query: string): Promise<TreeDocument[]> {
    return (await this.listTrees(userId)).filter(tree => topicMatches(tree.topic, query));
  }

  async getLearningHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<SessionRecord[]> {
    return this.sessions
      .filter(record => record.user_id === userId)
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, limit)
      .map(record => structuredClone(record));
  }

  private findTree(userId: string, topic: string): TreeDocument | undefined {
    for (const tree of this.trees.values()) {
      if (tree.user_id === userId && tree.topic === topic) return tree;
    }
    return undefined;
  }

  private writeTrees(): void {
    this.write(this.treesPath, Object.fromEntries(this.trees));
  }

  private load<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    if (!existsSync(path)) return fallback;
    // Corrupt files throw; they are never replaced with an empty store.
    return schema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  }

  private write(path: string, data: unknown): void {
    const tmp = `${path}.tmp`;
    writeFileSync(tmp, JSON.stringify(data, null, 2));
    renameSync(tmp, path);
  }
}
