/**
 * SQLite-backed tree storage (better-sqlite3)
 *
 * One row per tree document and one per learning session. Node and edge maps
 * are stored as JSON text; rows are validated on the way out.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { SessionRecord, TreeDocument } from '../types/graph.js';
import { generateDocumentId, generateRecordId } from '../utils/ids.js';
import { createLogger } from '../utils/logger.js';
import {
  AttributeMapSchema, DEFAULT_HISTORY_LIMIT, topicMatches,
  type EdgeMap, type NodeMap, type TreeStorage
} from './storage.js';

const log = createLogger('SqliteStorage');

const TreeRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  topic: z.string(),
  nodes_json: z.string(),
  edges_json: z.string(),
  created_at: z.number(),
  updated_at: z.number(),
});

const SessionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  topic: z.string(),
  tree_id: z.string(),
  nodes_explored_json: z.string(),
  time_spent: z.number(),
  timestamp: z.number(),
});

const FIRST_TREE_SQL = `
  SELECT * FROM trees WHERE user_id = ? AND topic = ?
  ORDER BY created_at ASC, rowid ASC LIMIT 1
`;

export class SqliteTreeStorage implements TreeStorage {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  /** `filename` may be ':memory:'. */
  constructor(filename: string, now: () => Date = () => new Date()) {
    if (filename !== ':memory:') {
      mkdirSync(dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.now = now;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trees (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        topic TEXT NOT NULL,
        nodes_json TEXT NOT NULL,
        edges_json TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        topic TEXT NOT NULL,
        tree_id TEXT NOT NULL,
        nodes_explored_json TEXT NOT NULL,
        time_spent INTEGER NOT NULL,
        timestamp INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_trees_user_topic ON trees(user_id, topic);
      CREATE INDEX IF NOT EXISTS idx_sessions_user_time ON sessions(user_id, timestamp DESC);
    `);
    log.info(`Opened ${filename}`);
  }

  async getTree(userId: string, topic: string): Promise<TreeDocument | null> {
    const row = this.db.prepare(FIRST_TREE_SQL).get(userId, topic);
    return row === undefined ? null : toTreeDocument(row);
  }

  async getTreeById(id: string): Promise<TreeDocument | null> {
    const row = this.db.prepare('SELECT * FROM trees WHERE id = ?').get(id);
    return row === undefined ? null : toTreeDocument(row);
  }

  async saveTree(userId: string, topic: string, nodes: NodeMap, edges: EdgeMap, update: boolean): Promise<string> {
    const timestamp = this.now().getTime();
    const existing = update ? await this.getTree(userId, topic) : null;

    if (existing) {
      this.db
        .prepare('UPDATE trees SET nodes_json = ?, edges_json = ?, updated_at = ? WHERE id = ?')
        .run(JSON.stringify(nodes), JSON.stringify(edges), timestamp, existing.id);
      return existing.id;
    }

    const id = generateDocumentId(userId, topic);
    this.db
      .prepare(`
        INSERT INTO trees (id, user_id, topic, nodes_json, edges_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(id, userId, topic, JSON.stringify(nodes), JSON.stringify(edges), timestamp, timestamp);
    return id;
  }

  async logSession(record: SessionRecord): Promise<string> {
    const id = record.id ?? generateRecordId();
    this.db
      .prepare(`
        INSERT INTO sessions (id, user_id, topic, tree_id, nodes_explored_json, time_spent, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        id,
        record.user_id,
        record.topic,
        record.tree_id,
        JSON.stringify(record.nodes_explored),
        record.time_spent,
        record.timestamp.getTime()
      );
    return id;
  }

  async listTrees(userId: string): Promise<TreeDocument[]> {
    return this.db
      .prepare('SELECT * FROM trees WHERE user_id = ? ORDER BY updated_at DESC, rowid DESC')
      .all(userId)
      .map(toTreeDocument);
  }

  async searchTopics(userId: string, query: string): Promise<TreeDocument[]> {
    return (await this.listTrees(userId)).filter(tree => topicMatches(tree.topic, query));
  }

  async getLearningHistory(userId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<SessionRecord[]> {
    return this.db
      .prepare('SELECT * FROM sessions WHERE user_id = ? ORDER BY timestamp DESC, rowid DESC LIMIT ?')
      .all(userId, limit)
      .map(toSessionRecord);
  }

  close(): void {
    this.db.close();
  }
}

function toTreeDocument(raw: unknown): TreeDocument {
  const row = TreeRowSchema.parse(raw);
  return {
    id: row.id,
    user_id: row.user_id,
    topic: row.topic,
    nodes: AttributeMapSchema.parse(JSON.parse(row.nodes_json)),
    edges: AttributeMapSchema.parse(JSON.parse(row.edges_json)),
    created_at: new Date(row.created_at),
    updated_at: new Date(row.updated_at),
  };
}

function toSessionRecord(raw: unknown): SessionRecord {
  const row = SessionRowSchema.parse(raw);
  return {
    id: row.id,
    user_id: row.user_id,
    topic: row.topic,
    tree_id: row.tree_id,
    nodes_explored: z.array(z.string()).parse(JSON.parse(row.nodes_explored_json)),
    time_spent: row.time_spent,
    timestamp: new Date(row.timestamp),
  };
}
