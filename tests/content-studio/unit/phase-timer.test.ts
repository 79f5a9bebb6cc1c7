import { describe, expect, it } from 'vitest';

import { PhaseTimer } from '../../../src/ai/content/phase-timer';
import { createMockClock } from '../../../src/ai/content/types';

describe('PhaseTimer', () => {
  it('records the time between start and end', () => {
    const timer = new PhaseTimer(createMockClock(1000, 250));

    timer.start('research');

    expect(timer.end('research')).toBe(250);
    expect(timer.getDuration('research')).toBe(250);
  });

  it('records 0 for a phase that never started', () => {
    const timer = new PhaseTimer(createMockClock(1000, 250));

    expect(timer.end('seo')).toBe(0);
  });

  it('treats a start time of 0 as valid', () => {
    const timer = new PhaseTimer(createMockClock(0, 40));

    timer.start('writing');

    expect(timer.end('writing')).toBe(40);
  });

  it('times a restarted phase from its latest start', () => {
    const timer = new PhaseTimer(createMockClock(0, 10));

    timer.start('editing');
    timer.start('editing');

    expect(timer.end('editing')).toBe(10);
  });

  it('reports every phase, with 0 for those that did not run', () => {
    const timer = new PhaseTimer(createMockClock(0, 100));

    timer.start('research');
    timer.end('research');
    timer.start('creative');
    timer.end('creative');

    expect(timer.getDurations()).toEqual({
      research: 100,
      writing: 0,
      editing: 0,
      seo: 0,
      creative: 100,
      history: 0,
    });
  });

  it('returns a copy of the durations', () => {
    const timer = new PhaseTimer(createMockClock(0, 100));
    const before = timer.getDurations();

    timer.start('seo');
    timer.end('seo');

    expect(before.seo).toBe(0);
  });
});
