/**
 * Expansion scheduling
 *
 * Turns concept lists from the AI collaborator into child nodes:
 * - never expands the same label twice
 * - never creates a second node for a label already in the graph
 *   (an existing label gets a cross-link edge instead)
 * - validates the whole response before mutating anything, so a failed
 *   call leaves the graph exactly as it was
 *
 * Auto-expand is a plain FIFO queue of freshly created labels, which grows
 * the graph breadth-first until the queue drains or a stop condition hits.
 */

import { DEFAULT_NODE_SIZES, DEFAULT_PALETTE } from '../config.js';
import { ExpansionFailedError, UnknownNodeError, describeError } from '../errors.js';
import {
  ConceptListSchema, SubtopicExplorationSchema, TopicExplorationSchema,
  type AIExplorer
} from '../types/explorer.js';
import type { ExpansionDelta, NodeAttributes, NodeType } from '../types/graph.js';
import { generateNodeId } from '../utils/ids.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { GraphStore } from './graph-store.js';

export type ExpansionMode = 'manual' | 'auto';

interface PlannedChild {
  name: string;
  relation: string;
  summary: string;
  type: NodeType;
  edgeTitle: string;
}

interface ExpansionPlan {
  children: PlannedChild[];
  rootUpdate?: { summary: string; key_points?: string[] };
}

export interface ExpansionSchedulerOptions {
  explorer: AIExplorer;
  palette?: string[];
  nodeSizes?: Record<NodeType, number>;
  /** Depth passed to exploreTopic when the root is expanded (1-3). */
  depth?: number;
  /** How many concepts auto-expand asks for per node. */
  autoCount?: number;
  /** Auto-expand never creates nodes deeper than this level. */
  maxAutoLevel?: number;
  /** Bound on each AI call; 0 disables. */
  timeoutMs?: number;
  correlationId?: string;
  logger?: Logger;
}

export interface AutoExpandOptions {
  maxSteps?: number;
  /** Awaited after every successful step, before the next one starts. */
  afterStep?: (delta: ExpansionDelta) => Promise<void> | void;
}

export interface AutoExpandReport {
  steps: number;
  deltas: ExpansionDelta[];
  failed: ExpansionFailedError[];
  remaining: number;
}

/** Expanded-set plus the pending auto-expand queue. */
export class ExpansionState {
  private expanded: Set<string> = new Set();
  private queue: string[] = [];

  isExpanded(label: string): boolean {
    return this.expanded.has(label);
  }

  markExpanded(label: string): void {
    this.expanded.add(label);
  }

  /** False when the label is already queued or already expanded. */
  enqueue(label: string): boolean {
    if (this.expanded.has(label) || this.queue.includes(label)) return false;
    this.queue.push(label);
    return true;
  }

  dequeue(): string | undefined {
    return this.queue.shift();
  }

  pending(): string[] {
    return [...this.queue];
  }

  expandedLabels(): string[] {
    return Array.from(this.expanded);
  }

  forget(labels: Iterable<string>): void {
    const gone = new Set(labels);
    for (const label of gone) this.expanded.delete(label);
    this.queue = this.queue.filter(label => !gone.has(label));
  }

  clearQueue(): void {
    this.queue = [];
  }
}

export class ExpansionScheduler {
  readonly state = new ExpansionState();
  private autoExpand = false;
  private readonly explorer: AIExplorer;
  private readonly palette: string[];
  private readonly nodeSizes: Record<NodeType, number>;
  private readonly depth: number;
  private readonly autoCount: number;
  private readonly maxAutoLevel: number;
  private readonly timeoutMs: number;
  private readonly correlationId: string;
  private readonly log: Logger;

  constructor(private readonly graph: GraphStore, options: ExpansionSchedulerOptions) {
    this.explorer = options.explorer;
    this.palette = options.palette && options.palette.length > 0 ? options.palette : DEFAULT_PALETTE;
    this.nodeSizes = options.nodeSizes ?? DEFAULT_NODE_SIZES;
    this.depth = options.depth ?? 1;
    this.autoCount = options.autoCount ?? 3;
    this.maxAutoLevel = options.maxAutoLevel ?? 3;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.correlationId = options.correlationId ?? 'local';
    this.log = options.logger ?? createLogger('Expansion');

    graph.onNodesRemoved(labels => this.state.forget(labels));
  }

  /** Display color for a level; cycles through the palette. */
  colorForLevel(level: number): string {
    return this.palette[level % this.palette.length];
  }

  isAutoExpandEnabled(): boolean {
    return this.autoExpand;
  }

  /**
   * Turning auto-expand on seeds the queue with every un-expanded node,
   * shallowest first. Turning it off drops the queue.
   */
  setAutoExpand(enabled: boolean): void {
    this.autoExpand = enabled;
    if (!enabled) {
      this.state.clearQueue();
      return;
    }
    const candidates = this.graph.nodes()
      .filter(node => !this.state.isExpanded(node.label))
      .sort((a, b) => a.attributes.level - b.attributes.level);
    for (const node of candidates) {
      this.enqueueIfEligible(node.label, node.attributes.level);
    }
  }

  /**
   * Expand `label` once. Already-expanded labels return an empty delta.
   * Throws UnknownNodeError for absent labels and ExpansionFailedError when
   * the collaborator fails; in both cases nothing is mutated.
   */
  async expand(label: string, mode: ExpansionMode = 'manual'): Promise<ExpansionDelta> {
    const node = this.graph.getNode(label);
    if (!node) throw new UnknownNodeError(label);

    if (this.state.isExpanded(label)) {
      return { label, addedNodes: [], addedEdges: [] };
    }

    let plan: ExpansionPlan;
    try {
      plan = await this.fetchPlan(label, node, mode);
    } catch (err) {
      const failure = err instanceof ExpansionFailedError
        ? err
        : new ExpansionFailedError(label, describeError(err), err);
      this.log.event('expansion.failed', this.correlationId, { label, mode, reason: failure.message });
      throw failure;
    }

    // The node may have been removed while we were waiting on the collaborator.
    const current = this.graph.getNode(label);
    if (!current || this.state.isExpanded(label)) {
      return { label, addedNodes: [], addedEdges: [] };
    }

    const delta = this.apply(label, current, plan);
    this.state.markExpanded(label);

    if (this.autoExpand) {
      for (const added of delta.addedNodes) {
        this.enqueueIfEligible(added, current.level + 1);
      }
    }

    this.log.event('expansion.completed', this.correlationId, {
      label,
      mode,
      addedNodes: delta.addedNodes.length,
      addedEdges: delta.addedEdges.length,
    });
    return delta;
  }

  /**
   * Expand the head of the queue. Skips labels that were removed or expanded
   * meanwhile. Returns null when nothing is left to do.
   */
  async step(): Promise<ExpansionDelta | null> {
    let next = this.state.dequeue();
    while (next !== undefined) {
      const node = this.graph.getNode(next);
      if (node && !this.state.isExpanded(next) && node.level < this.maxAutoLevel) {
        return this.expand(next, 'auto');
      }
      next = this.state.dequeue();
    }
    return null;
  }

  /**
   * Drain the queue one step at a time. Failed labels are reported and
   * stay un-expanded; they are not re-queued.
   */
  async runAutoExpand(options: AutoExpandOptions = {}): Promise<AutoExpandReport> {
    const maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;
    const report: AutoExpandReport = { steps: 0, deltas: [], failed: [], remaining: 0 };

    while (this.autoExpand && report.steps < maxSteps) {
      let delta: ExpansionDelta | null;
      try {
        delta = await this.step();
      } catch (err) {
        if (!(err instanceof ExpansionFailedError)) throw err;
        report.steps++;
        report.failed.push(err);
        continue;
      }
      if (delta === null) break;

      report.steps++;
      report.deltas.push(delta);
      if (options.afterStep) await options.afterStep(delta);
    }

    report.remaining = this.state.pending().length;
    return report;
  }

  private enqueueIfEligible(label: string, level: number): void {
    if (level >= this.maxAutoLevel) return;
    this.state.enqueue(label);
  }

  private async fetchPlan(label: string, node: NodeAttributes, mode: ExpansionMode): Promise<ExpansionPlan> {
    if (node.type === 'root') {
      const raw = await withTimeout(this.explorer.exploreTopic(label, this.depth), this.timeoutMs);
      const parsed = TopicExplorationSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ExpansionFailedError(label, `malformed topic exploration: ${parsed.error.message}`, parsed.error);
      }

      const children: PlannedChild[] = parsed.data.related_concepts.map((c): PlannedChild => ({
        name: c.name,
        relation: c.relation,
        summary: c.summary,
        type: 'concept',
        edgeTitle: c.relation,
      }));
      for (const sub of parsed.data.subtopics ?? []) {
        children.push({
          name: sub.name,
          relation: 'subtopic',
          summary: sub.summary,
          type: 'subtopic',
          edgeTitle: 'subtopic',
        });
      }
      return this.requireConcepts(label, {
        children,
        rootUpdate: { summary: parsed.data.summary, key_points: parsed.data.key_points },
      });
    }

    if (mode === 'manual') {
      const mainTopic = this.graph.root()?.label ?? label;
      const raw = await withTimeout(this.explorer.exploreSubtopic(mainTopic, label), this.timeoutMs);
      const parsed = SubtopicExplorationSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ExpansionFailedError(label, `malformed subtopic exploration: ${parsed.error.message}`, parsed.error);
      }
      return this.requireConcepts(label, {
        children: parsed.data.related_concepts.map((c): PlannedChild => ({
          name: c.name,
          relation: c.relation,
          summary: c.summary,
          type: 'sub-concept',
          edgeTitle: c.relation,
        })),
      });
    }

    const raw = await withTimeout(this.explorer.getRelatedConcepts(label, this.autoCount), this.timeoutMs);
    const parsed = ConceptListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExpansionFailedError(label, `malformed concept list: ${parsed.error.message}`, parsed.error);
    }
    return this.requireConcepts(label, {
      children: parsed.data.map((c): PlannedChild => ({
        name: c.name,
        relation: c.relation,
        summary: c.summary,
        type: 'sub-concept',
        edgeTitle: c.relation,
      })),
    });
  }

  // An empty list is what a degraded collaborator returns on failure.
  private requireConcepts(label: string, plan: ExpansionPlan): ExpansionPlan {
    if (plan.children.length === 0) {
      throw new ExpansionFailedError(label, 'no concepts returned');
    }
    return plan;
  }

  private apply(label: string, parent: NodeAttributes, plan: ExpansionPlan): ExpansionDelta {
    const delta: ExpansionDelta = { label, addedNodes: [], addedEdges: [] };
    const level = parent.level + 1;
    const color = this.colorForLevel(level);
    const seen = new Set<string>([label]);

    if (plan.rootUpdate) {
      this.graph.addNode(label, {
        summary: plan.rootUpdate.summary,
        title: plan.rootUpdate.summary,
        key_points: plan.rootUpdate.key_points,
      });
    }

    for (const child of plan.children) {
      if (seen.has(child.name)) continue;
      seen.add(child.name);

      if (this.graph.hasNode(child.name)) {
        // Cross-link only; the existing node keeps its level and parent
        if (!this.graph.hasEdge(label, child.name)) {
          this.graph.addEdge(label, child.name, { title: child.edgeTitle });
          delta.addedEdges.push({ source: label, target: child.name });
        }
        continue;
      }

      this.graph.addNode(child.name, {
        node_id: generateNodeId(),
        type: child.type,
        level,
        parent: label,
        size: this.nodeSizes[child.type],
        color,
        title: child.summary,
        summary: child.summary,
        relation: child.relation,
      });
      this.graph.addEdge(label, child.name, { title: child.edgeTitle });
      delta.addedNodes.push(child.name);
      delta.addedEdges.push({ source: label, target: child.name });
    }

    return delta;
  }
}
