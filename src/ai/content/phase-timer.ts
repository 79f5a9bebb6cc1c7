/**
 * Per-phase wall-clock durations for one pipeline run.
 */

import { systemClock, type Clock, type ContentGenerationPhase } from './types';

/** Milliseconds per phase; phases that did not run report 0 */
export type PhaseDurations = Readonly<Record<ContentGenerationPhase, number>>;

export class PhaseTimer {
  private readonly started = new Map<ContentGenerationPhase, number>();
  private readonly durations: Record<ContentGenerationPhase, number> = {
    research: 0,
    writing: 0,
    editing: 0,
    seo: 0,
    creative: 0,
    history: 0,
  };

  constructor(private readonly clock: Clock = systemClock) {}

  start(phase: ContentGenerationPhase): void {
    this.started.set(phase, this.clock.now());
  }

  /**
   * Records and returns the phase duration. Ending a phase that never started records 0.
   */
  end(phase: ContentGenerationPhase): number {
    const startedAt = this.started.get(phase);
    this.started.delete(phase);
    const duration = startedAt === undefined ? 0 : this.clock.now() - startedAt;
    this.durations[phase] = duration;
    return duration;
  }

  getDuration(phase: ContentGenerationPhase): number {
    return this.durations[phase];
  }

  getDurations(): PhaseDurations {
    return { ...this.durations };
  }
}
