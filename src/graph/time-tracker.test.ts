import { beforeEach, describe, expect, it } from 'vitest';
import { UnknownNodeError } from '../errors.js';
import { TimeTracker } from './time-tracker.js';

describe('TimeTracker', () => {
  let t: number;
  const now = () => t;

  beforeEach(() => {
    t = 0;
  });

  it('splits time between labels as focus moves', () => {
    const tracker = new TimeTracker({ now });

    tracker.activate('A');
    t = 10_000;
    tracker.activate('B');
    t = 15_000;
    tracker.activate('A');
    t = 20_000;
    tracker.deactivate();

    expect(tracker.elapsed('A')).toBe(15);
    expect(tracker.elapsed('B')).toBe(5);
    expect(tracker.totalElapsed()).toBe(20);
    expect(tracker.exploredLabels()).toEqual(['A', 'B']);
    expect(tracker.getState()).toEqual({ kind: 'idle' });
  });

  it('includes the running activation without flushing it', () => {
    const tracker = new TimeTracker({ now });

    tracker.activate('A');
    t = 4_000;
    expect(tracker.elapsed('A')).toBe(4);
    expect(tracker.getState()).toEqual({ kind: 'active', label: 'A', since: 0 });
  });

  it('ignores re-activating the active label', () => {
    const tracker = new TimeTracker({ now });

    tracker.activate('A');
    t = 3_000;
    tracker.activate('A');
    t = 5_000;
    expect(tracker.elapsed('A')).toBe(5);
  });

  it('rejects labels the graph does not know', () => {
    const tracker = new TimeTracker({ now, hasLabel: label => label === 'A' });

    tracker.activate('A');
    expect(() => tracker.activate('Ghost')).toThrow(UnknownNodeError);
    expect(tracker.activeLabel()).toBe('A');
  });

  it('discards the time of forgotten labels by default', () => {
    const tracker = new TimeTracker({ now });

    tracker.activate('A');
    t = 10_000;
    tracker.activate('B');
    t = 12_000;
    tracker.forget(['B']);

    expect(tracker.activeLabel()).toBeNull();
    expect(tracker.knownLabels()).toEqual(['A']);
    expect(tracker.totalElapsed()).toBe(10);
  });

  it('keeps forgotten time in the total under the retain policy', () => {
    const tracker = new TimeTracker({ now, removedTime: 'retain' });

    tracker.activate('A');
    t = 10_000;
    tracker.activate('B');
    t = 12_000;
    tracker.forget(['A', 'B']);
    t = 20_000;

    expect(tracker.knownLabels()).toEqual([]);
    expect(tracker.elapsed('A')).toBe(0);
    expect(tracker.totalElapsed()).toBe(12);
  });

  it('never goes negative when the clock steps back', () => {
    const tracker = new TimeTracker({ now });

    t = 5_000;
    tracker.activate('A');
    t = 1_000;
    tracker.deactivate();
    expect(tracker.elapsed('A')).toBe(0);
    expect(tracker.exploredLabels()).toEqual([]);
  });
});
