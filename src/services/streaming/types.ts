// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH EVENTS — What a Turn Streams to Its Subscribers
// ═══════════════════════════════════════════════════════════════════════════════

import type { FollowUpType, RestaurantRecommendation, TurnStatus } from '../food-search/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STEPS
// ─────────────────────────────────────────────────────────────────────────────────

export const SEARCH_STEPS = [
  { id: 'step1', label: 'Understanding your request' },
  { id: 'step2', label: 'Gathering posts' },
  { id: 'step3', label: 'Reading comments' },
  { id: 'step4', label: 'Cross-checking recommendations' },
  { id: 'step5', label: 'Looking up addresses' },
  { id: 'step6', label: 'Putting it together' },
] as const;

export type StepId = (typeof SEARCH_STEPS)[number]['id'];

export type StepStatus = 'pending' | 'running' | 'done' | 'error';

export interface StepState {
  readonly id: StepId;
  readonly label: string;
  readonly status: StepStatus;
}

export interface StepProgress {
  readonly step: StepId;
  /** Completed steps / total × 100, rounded */
  readonly progress: number;
  readonly steps: readonly StepState[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

export type SearchEventType =
  | 'step_start'
  | 'step_done'
  | 'step_error'
  | 'progress'
  | 'restaurant'
  | 'result'
  | 'error'
  | 'done';

export interface TurnResultSummary {
  readonly summary: string;
  readonly total: number;
  readonly filtered: number;
  readonly status: TurnStatus;
  readonly action: FollowUpType;
  readonly questions?: readonly string[];
}

/**
 * Everything that goes into the log. Heartbeats are not logged.
 */
export type SearchEventPayload =
  | { readonly type: 'step_start' | 'step_done'; readonly data: StepProgress }
  | { readonly type: 'step_error'; readonly data: StepProgress & { readonly message: string } }
  | {
      readonly type: 'restaurant';
      readonly data: { readonly position: number; readonly restaurant: RestaurantRecommendation };
    }
  | { readonly type: 'result'; readonly data: TurnResultSummary }
  | { readonly type: 'error'; readonly data: { readonly code: string; readonly message: string } }
  | { readonly type: 'done'; readonly data: { readonly turnId?: number } };

export type SearchEvent = SearchEventPayload & {
  /** Position in the session's log, from 0 */
  readonly index: number;
  readonly timestamp: string;
};

export type DeliveredEvent = SearchEvent & { readonly replayed: boolean };

export interface HeartbeatEvent {
  readonly type: 'progress';
  readonly data: { readonly heartbeat: true };
  readonly timestamp: string;
  readonly replayed: false;
}

export type StreamItem = DeliveredEvent | HeartbeatEvent;

export function isTerminalEvent(event: { readonly type: SearchEventType }): boolean {
  return event.type === 'done' || event.type === 'error';
}
