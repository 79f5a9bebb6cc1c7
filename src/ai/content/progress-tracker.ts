/**
 * Progress Tracker
 *
 * Reports pipeline progress through an optional callback with consistent
 * start/complete percentages and default messages.
 */

import type { ContentGenerationPhase, ContentProgressCallback } from './types';

const DEFAULT_START_MESSAGES: Readonly<Record<ContentGenerationPhase, string>> = {
  research: 'Researching topic',
  writing: 'Writing first draft',
  editing: 'Reviewing and improving draft',
  seo: 'Optimizing for search',
  creative: 'Brainstorming headlines',
  history: 'Recording to history',
};

/**
 * @example
 * const tracker = new ProgressTracker(onProgress);
 * tracker.startPhase('research');
 * tracker.completePhase('research', 'Found 5 key facts');
 */
export class ProgressTracker {
  constructor(private readonly onProgress?: ContentProgressCallback) {}

  /**
   * Reports 0% for a phase.
   */
  startPhase(phase: ContentGenerationPhase, message?: string): void {
    this.onProgress?.(phase, 0, message ?? DEFAULT_START_MESSAGES[phase]);
  }

  /**
   * Reports 100% for a phase.
   */
  completePhase(phase: ContentGenerationPhase, message: string): void {
    this.onProgress?.(phase, 100, message);
  }

  report(phase: ContentGenerationPhase, progress: number, message?: string): void {
    this.onProgress?.(phase, progress, message);
  }

  get hasCallback(): boolean {
    return this.onProgress !== undefined;
  }
}
