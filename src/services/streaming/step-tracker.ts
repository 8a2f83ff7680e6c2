// ═══════════════════════════════════════════════════════════════════════════════
// STEP TRACKER — Six-Step Progress Reporting over a SearchEventLog
// ═══════════════════════════════════════════════════════════════════════════════

import type { RestaurantRecommendation } from '../food-search/types.js';
import type { SearchEventLog } from './event-log.js';
import { SEARCH_STEPS, type StepId, type StepProgress, type StepState, type StepStatus } from './types.js';

/**
 * What a running turn reports while it works.
 */
export interface TurnEmitter {
  stepStart(step: StepId): void;
  stepDone(step: StepId): void;
  stepError(step: StepId, message: string): void;
  restaurant(recommendation: RestaurantRecommendation, position: number): void;
}

export function initialSteps(): StepState[] {
  return SEARCH_STEPS.map((step): StepState => ({ id: step.id, label: step.label, status: 'pending' }));
}

export class StepTracker implements TurnEmitter {
  private readonly statuses = new Map<StepId, StepStatus>(
    SEARCH_STEPS.map((step): [StepId, StepStatus] => [step.id, 'pending'])
  );

  constructor(private readonly log: SearchEventLog) {}

  stepStart(step: StepId): void {
    this.statuses.set(step, 'running');
    this.log.emit({ type: 'step_start', data: this.snapshot(step) });
  }

  stepDone(step: StepId): void {
    this.statuses.set(step, 'done');
    this.log.emit({ type: 'step_done', data: this.snapshot(step) });
  }

  stepError(step: StepId, message: string): void {
    this.statuses.set(step, 'error');
    this.log.emit({ type: 'step_error', data: { ...this.snapshot(step), message } });
  }

  restaurant(recommendation: RestaurantRecommendation, position: number): void {
    this.log.emit({ type: 'restaurant', data: { position, restaurant: recommendation } });
  }

  /**
   * The step currently running, if any.
   */
  current(): StepId | undefined {
    for (const [id, status] of this.statuses) {
      if (status === 'running') return id;
    }
    return undefined;
  }

  progress(): number {
    const done = [...this.statuses.values()].filter(status => status === 'done').length;
    return Math.round((done / SEARCH_STEPS.length) * 100);
  }

  snapshot(step: StepId): StepProgress {
    return {
      step,
      progress: this.progress(),
      steps: SEARCH_STEPS.map(
        (s): StepState => ({ id: s.id, label: s.label, status: this.statuses.get(s.id) ?? 'pending' })
      ),
    };
  }
}
