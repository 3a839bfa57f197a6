import { PersistenceError } from '../errors.js';
import type { GraphStore } from '../graph/graph-store.js';
import type { TimeTracker } from '../graph/time-tracker.js';
import type { TreeStorage } from '../persistence/storage.js';
import type { SessionRecord } from '../types/graph.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface SessionRecorderOptions {
  /** Records are only kept once cumulative active time exceeds this many seconds. */
  minDwellSeconds?: number;
  now?: () => Date;
  logger?: Logger;
  correlationId?: string;
}

/**
 * Snapshots a session for analytics. Tracker totals are never reset, so
 * recording twice in one long session yields two cumulative snapshots.
 */
export class SessionRecorder {
  private readonly storage: TreeStorage;
  private readonly minDwellSeconds: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly correlationId: string;

  constructor(storage: TreeStorage, options: SessionRecorderOptions = {}) {
    this.storage = storage;
    this.minDwellSeconds = options.minDwellSeconds ?? 30;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('SessionRecorder');
    this.correlationId = options.correlationId ?? 'local';
  }

  buildRecord(graph: GraphStore, tracker: TimeTracker, topic: string, userId: string, treeId: string): SessionRecord {
    return {
      user_id: userId,
      topic,
      tree_id: treeId,
      nodes_explored: tracker.exploredLabels().filter(label => graph.hasNode(label)),
      time_spent: Math.floor(tracker.totalElapsed()),
      timestamp: this.now(),
    };
  }

  shouldRecord(tracker: TimeTracker): boolean {
    return tracker.totalElapsed() > this.minDwellSeconds;
  }

  /** Builds and stores a record; returns null when under the dwell threshold. */
  async record(
    graph: GraphStore,
    tracker: TimeTracker,
    topic: string,
    userId: string,
    treeId: string
  ): Promise<SessionRecord | null> {
    if (!this.shouldRecord(tracker)) return null;

    const record = this.buildRecord(graph, tracker, topic, userId, treeId);
    try {
      record.id = await this.storage.logSession(record);
    } catch (err) {
      const failure = new PersistenceError('logSession', err);
      this.log.error(failure.message);
      throw failure;
    }

    this.log.event('session.recorded', this.correlationId, {
      userId,
      topic,
      treeId,
      nodesExplored: record.nodes_explored.length,
      timeSpent: record.time_spent,
    });
    return record;
  }
}
