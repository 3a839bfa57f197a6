/**
 * Per-node dwell time
 *
 * Exactly one label is "active" at a time and accrues wall-clock time.
 * Switching labels flushes the running delta into the outgoing label.
 * All values are reported in seconds.
 */

import type { RemovedTimePolicy } from '../config.js';
import { UnknownNodeError } from '../errors.js';

export type Clock = () => number;

export type TrackerState =
  | { kind: 'idle' }
  | { kind: 'active'; label: string; since: number };

export interface TimeTrackerOptions {
  /** Milliseconds since epoch. Defaults to Date.now. */
  now?: Clock;
  /** Validity check against the graph; unknown labels are rejected by `activate`. */
  hasLabel?: (label: string) => boolean;
  /** What happens to a removed label's time. Defaults to 'discard'. */
  removedTime?: RemovedTimePolicy;
}

export class TimeTracker {
  private accumulated: Map<string, number> = new Map();   // ms
  private state: TrackerState = { kind: 'idle' };
  private retainedMs = 0;
  private readonly now: Clock;
  private readonly hasLabel?: (label: string) => boolean;
  private readonly removedTime: RemovedTimePolicy;

  constructor(options: TimeTrackerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.hasLabel = options.hasLabel;
    this.removedTime = options.removedTime ?? 'discard';
  }

  activate(label: string): void {
    if (this.hasLabel && !this.hasLabel(label)) {
      throw new UnknownNodeError(label);
    }
    if (this.state.kind === 'active' && this.state.label === label) return;

    const now = this.now();
    this.flush(now);
    if (!this.accumulated.has(label)) {
      this.accumulated.set(label, 0);
    }
    this.state = { kind: 'active', label, since: now };
  }

  deactivate(): void {
    this.flush(this.now());
    this.state = { kind: 'idle' };
  }

  /** Read-only: stored time plus the running activation, if any. */
  elapsed(label: string): number {
    let ms = this.accumulated.get(label) ?? 0;
    if (this.state.kind === 'active' && this.state.label === label) {
      ms += Math.max(0, this.now() - this.state.since);
    }
    return ms / 1000;
  }

  totalElapsed(): number {
    let total = this.retainedMs / 1000;
    for (const label of this.accumulated.keys()) {
      total += this.elapsed(label);
    }
    return total;
  }

  /**
   * Drop labels removed from the graph. If the active label goes, the tracker
   * becomes idle without flushing; under 'retain' the running delta and the
   * stored total still count towards `totalElapsed`.
   */
  forget(labels: Iterable<string>): void {
    for (const label of labels) {
      if (this.state.kind === 'active' && this.state.label === label) {
        if (this.removedTime === 'retain') {
          this.retainedMs += Math.max(0, this.now() - this.state.since);
        }
        this.state = { kind: 'idle' };
      }
      if (this.removedTime === 'retain') {
        this.retainedMs += this.accumulated.get(label) ?? 0;
      }
      this.accumulated.delete(label);
    }
  }

  getState(): TrackerState {
    return { ...this.state };
  }

  activeLabel(): string | null {
    return this.state.kind === 'active' ? this.state.label : null;
  }

  knownLabels(): string[] {
    return Array.from(this.accumulated.keys());
  }

  /** Labels that have accrued any time so far, in first-seen order. */
  exploredLabels(): string[] {
    return this.knownLabels().filter(label => this.elapsed(label) > 0);
  }

  private flush(now: number): void {
    if (this.state.kind !== 'active') return;
    const { label, since } = this.state;
    const delta = Math.max(0, now - since);
    this.accumulated.set(label, (this.accumulated.get(label) ?? 0) + delta);
  }
}
