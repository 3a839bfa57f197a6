/**
 * Session-scoped context for one user's exploration
 *
 * Owns the graph, the time tracker and the expansion scheduler for the
 * current root topic, and is the only thing callers talk to. Nothing here is
 * global: each request handler (or CLI run) holds its own session.
 *
 * Mutations happen in memory first; persistence follows and its failures are
 * reported next to the result instead of undoing anything.
 */

import { randomUUID } from 'crypto';
import {
  DEFAULT_NODE_SIZES, DEFAULT_PALETTE, type EngineConfig
} from '../config.js';
import { PersistenceError, UnknownNodeError } from '../errors.js';
import {
  ExpansionScheduler, type AutoExpandReport, type ExpansionMode
} from '../graph/expansion.js';
import { GraphStore } from '../graph/graph-store.js';
import { TimeTracker, type Clock } from '../graph/time-tracker.js';
import type { TreeStorage } from '../persistence/storage.js';
import { PersistenceAdapter, type SaveOutcome } from '../persistence/tree-document.js';
import type { AIExplorer } from '../types/explorer.js';
import type { ExpansionDelta, GraphStats, SessionRecord } from '../types/graph.js';
import { generateNodeId } from '../utils/ids.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { SessionRecorder } from './session-recorder.js';

export type SessionSettings = Pick<
  EngineConfig,
  | 'palette'
  | 'nodeSizes'
  | 'explorationDepth'
  | 'autoExpandCount'
  | 'maxAutoLevel'
  | 'expansionTimeoutMs'
  | 'minDwellSeconds'
  | 'removedTime'
>;

export interface ExplorationSessionOptions {
  userId: string;
  explorer: AIExplorer;
  storage: TreeStorage;
  settings?: Partial<SessionSettings>;
  /** Save after every mutation. Defaults to true. */
  autoSave?: boolean;
  directed?: boolean;
  now?: Clock;
  logger?: Logger;
}

export type PersistResult =
  | { saved: SaveOutcome; saveError?: undefined }
  | { saved: null; saveError: PersistenceError }
  | { saved: null; saveError?: undefined };

export type ExpansionOutcome = { delta: ExpansionDelta } & PersistResult;

export interface AutoExpandOutcome extends AutoExpandReport {
  saveErrors: PersistenceError[];
}

export interface SessionSnapshot {
  sessionId: string;
  userId: string;
  topic: string | null;
  treeId: string | null;
  activeLabel: string | null;
  totalSeconds: number;
  stats: GraphStats;
  pending: string[];
}

const DEFAULT_SETTINGS: SessionSettings = {
  palette: DEFAULT_PALETTE,
  nodeSizes: DEFAULT_NODE_SIZES,
  explorationDepth: 1,
  autoExpandCount: 3,
  maxAutoLevel: 3,
  expansionTimeoutMs: 30_000,
  minDwellSeconds: 30,
  removedTime: 'discard',
};

export class ExplorationSession {
  readonly sessionId = randomUUID();
  readonly userId: string;
  private readonly explorer: AIExplorer;
  private readonly settings: SessionSettings;
  private readonly autoSave: boolean;
  private readonly directed: boolean;
  private readonly now: Clock;
  private readonly log: Logger;
  private readonly persistence: PersistenceAdapter;
  private readonly recorder: SessionRecorder;

  private topic: string | null = null;
  private treeId: string | null = null;
  private graph: GraphStore;
  private tracker: TimeTracker;
  private scheduler: ExpansionScheduler;

  constructor(options: ExplorationSessionOptions) {
    this.userId = options.userId;
    this.explorer = options.explorer;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.autoSave = options.autoSave ?? true;
    this.directed = options.directed ?? false;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger('Session');
    this.persistence = new PersistenceAdapter(options.storage, {
      logger: this.log,
      correlationId: this.sessionId,
    });
    this.recorder = new SessionRecorder(options.storage, {
      minDwellSeconds: this.settings.minDwellSeconds,
      now: () => new Date(this.now()),
      logger: this.log,
      correlationId: this.sessionId,
    });

    this.graph = new GraphStore({ directed: this.directed });
    this.tracker = this.createTracker(this.graph);
    this.scheduler = this.createScheduler(this.graph);
  }

  /**
   * Replace whatever was being explored with a fresh graph rooted at `topic`,
   * then expand the root. If the expansion fails the root stays, collapsed.
   */
  async startTopic(topic: string): Promise<ExpansionOutcome> {
    const label = topic.trim();
    if (!label) throw new TypeError('Topic must not be empty');

    this.tracker.deactivate();
    this.attach(new GraphStore({ directed: this.directed }), label, null);

    this.graph.addNode(label, {
      node_id: generateNodeId(),
      type: 'root',
      level: 0,
      size: this.settings.nodeSizes.root,
      color: this.scheduler.colorForLevel(0),
      title: label,
      summary: '',
    });
    this.tracker.activate(label);
    this.log.info(`Started "${label}" for ${this.userId}`);

    return this.expand(label);
  }

  /** Reopen a stored tree by id. False if there is no such tree. */
  async reopen(treeId: string): Promise<boolean> {
    const loaded = await this.persistence.load(treeId, { directed: this.directed });
    if (!loaded) return false;
    this.restore(loaded.graph, loaded.doc.topic, loaded.doc.id);
    return true;
  }

  async reopenTopic(topic: string): Promise<boolean> {
    const loaded = await this.persistence.loadByTopic(this.userId, topic, { directed: this.directed });
    if (!loaded) return false;
    this.restore(loaded.graph, loaded.doc.topic, loaded.doc.id);
    return true;
  }

  /** Make `label` the node the user is looking at. */
  select(label: string): void {
    this.tracker.activate(label);
  }

  async expand(label: string, mode: ExpansionMode = 'manual'): Promise<ExpansionOutcome> {
    const delta = await this.scheduler.expand(label, mode);
    if (delta.addedNodes.length === 0 && delta.addedEdges.length === 0) {
      return { delta, saved: null };
    }
    return { delta, ...(await this.persistIfEnabled()) };
  }

  setAutoExpand(enabled: boolean): void {
    this.scheduler.setAutoExpand(enabled);
  }

  isAutoExpandEnabled(): boolean {
    return this.scheduler.isAutoExpandEnabled();
  }

  /** Each step's save completes before the next step starts. */
  async runAutoExpand(maxSteps?: number): Promise<AutoExpandOutcome> {
    const saveErrors: PersistenceError[] = [];
    const report = await this.scheduler.runAutoExpand({
      maxSteps,
      afterStep: async () => {
        const result = await this.persistIfEnabled();
        if (result.saveError) saveErrors.push(result.saveError);
      },
    });
    return { ...report, saveErrors };
  }

  /** Cascade-remove a node and its descendants. Returns the removed labels. */
  async remove(label: string): Promise<{ removed: string[] } & PersistResult> {
    const removed = this.graph.removeNode(label);
    if (removed.length === 0) return { removed, saved: null };
    return { removed, ...(await this.persistIfEnabled()) };
  }

  /** Markdown explanation of a node; counts as visiting it. */
  async explain(label: string): Promise<string> {
    if (!this.graph.hasNode(label)) throw new UnknownNodeError(label);
    this.tracker.activate(label);
    return this.explorer.getDetailedExplanation(label);
  }

  async save(): Promise<SaveOutcome> {
    const topic = this.requireTopic();
    const outcome = await this.persistence.save(this.graph, this.userId, topic, true);
    this.treeId = outcome.treeId;
    return outcome;
  }

  /** Log a cumulative session snapshot, if the dwell threshold has been passed. */
  async recordSession(): Promise<SessionRecord | null> {
    const topic = this.requireTopic();
    if (!this.treeId) {
      this.treeId = (await this.save()).treeId;
    }
    return this.recorder.record(this.graph, this.tracker, topic, this.userId, this.treeId);
  }

  /** Stop the clock and record what was explored. */
  async end(): Promise<SessionRecord | null> {
    this.tracker.deactivate();
    this.scheduler.setAutoExpand(false);
    if (!this.topic) return null;
    return this.recordSession();
  }

  getGraph(): GraphStore {
    return this.graph;
  }

  getTracker(): TimeTracker {
    return this.tracker;
  }

  getScheduler(): ExpansionScheduler {
    return this.scheduler;
  }

  getTopic(): string | null {
    return this.topic;
  }

  getTreeId(): string | null {
    return this.treeId;
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      userId: this.userId,
      topic: this.topic,
      treeId: this.treeId,
      activeLabel: this.tracker.activeLabel(),
      totalSeconds: this.tracker.totalElapsed(),
      stats: this.graph.getStats(),
      pending: this.scheduler.state.pending(),
    };
  }

  private restore(graph: GraphStore, topic: string, treeId: string): void {
    this.tracker.deactivate();
    this.attach(graph, topic, treeId);

    // Anything that already has children was expanded in an earlier session
    for (const node of graph.nodes()) {
      if (node.attributes.parent !== undefined && graph.hasNode(node.attributes.parent)) {
        this.scheduler.state.markExpanded(node.attributes.parent);
      }
    }

    const root = graph.root()?.label ?? (graph.hasNode(topic) ? topic : undefined);
    if (root) this.tracker.activate(root);
    this.log.info(`Reopened "${topic}" (${graph.nodeCount} nodes, ${graph.edgeCount} edges)`);
  }

  private attach(graph: GraphStore, topic: string, treeId: string | null): void {
    this.graph = graph;
    this.topic = topic;
    this.treeId = treeId;
    this.tracker = this.createTracker(graph);
    this.scheduler = this.createScheduler(graph);
  }

  private createTracker(graph: GraphStore): TimeTracker {
    const tracker = new TimeTracker({
      now: this.now,
      hasLabel: label => graph.hasNode(label),
      removedTime: this.settings.removedTime,
    });
    graph.onNodesRemoved(labels => tracker.forget(labels));
    return tracker;
  }

  private createScheduler(graph: GraphStore): ExpansionScheduler {
    return new ExpansionScheduler(graph, {
      explorer: this.explorer,
      palette: this.settings.palette,
      nodeSizes: this.settings.nodeSizes,
      depth: this.settings.explorationDepth,
      autoCount: this.settings.autoExpandCount,
      maxAutoLevel: this.settings.maxAutoLevel,
      timeoutMs: this.settings.expansionTimeoutMs,
      correlationId: this.sessionId,
      logger: this.log,
    });
  }

  private async persistIfEnabled(): Promise<PersistResult> {
    if (!this.autoSave || !this.topic) return { saved: null };
    try {
      return { saved: await this.save() };
    } catch (err) {
      if (err instanceof PersistenceError) return { saved: null, saveError: err };
      throw err;
    }
  }

  private requireTopic(): string {
    if (!this.topic) throw new Error('No topic is being explored');
    return this.topic;
  }
}
