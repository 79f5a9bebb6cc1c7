import { describe, expect, it, vi } from 'vitest';

import { ProgressTracker } from '../../../src/ai/content/progress-tracker';

describe('ProgressTracker', () => {
  it('knows whether a callback was given', () => {
    expect(new ProgressTracker().hasCallback).toBe(false);
    expect(new ProgressTracker(vi.fn()).hasCallback).toBe(true);
  });

  it.each([
    ['research', 'Researching topic'],
    ['writing', 'Writing first draft'],
    ['editing', 'Reviewing and improving draft'],
    ['seo', 'Optimizing for search'],
    ['creative', 'Brainstorming headlines'],
    ['history', 'Recording to history'],
  ] as const)('starts %s at 0%% with its default message', (phase, message) => {
    const callback = vi.fn();

    new ProgressTracker(callback).startPhase(phase);

    expect(callback).toHaveBeenCalledWith(phase, 0, message);
  });

  it('uses a custom start message when given', () => {
    const callback = vi.fn();

    new ProgressTracker(callback).startPhase('seo', 'Checking keywords');

    expect(callback).toHaveBeenCalledWith('seo', 0, 'Checking keywords');
  });

  it('completes a phase at 100%', () => {
    const callback = vi.fn();

    new ProgressTracker(callback).completePhase('writing', 'Wrote 900 words');

    expect(callback).toHaveBeenCalledWith('writing', 100, 'Wrote 900 words');
  });

  it('reports intermediate progress', () => {
    const callback = vi.fn();

    new ProgressTracker(callback).report('editing', 50, 'Review complete');

    expect(callback).toHaveBeenCalledWith('editing', 50, 'Review complete');
  });

  it('does nothing without a callback', () => {
    const tracker = new ProgressTracker();

    expect(() => {
      tracker.startPhase('research');
      tracker.completePhase('research', 'done');
    }).not.toThrow();
  });
});
