// ═══════════════════════════════════════════════════════════════════════════════
// EVIDENCE GATHERER — Four-Phase Progressive Document Search
// ═══════════════════════════════════════════════════════════════════════════════
//
// Phases run in order (phase 3 reads the titles phases 1–2 found); queries
// inside a phase run concurrently up to `phaseConcurrency`. Every document
// is kept once per run, keyed by source id. A query that fails or times out
// contributes nothing and the run continues.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_SEARCH_POLICY, type SearchPolicy } from '../../../config/search.js';
import { getLogger } from '../../../observability/logging/index.js';
import { mapWithConcurrency, withTimeout } from '../concurrency.js';
import type { DocumentSource } from '../sources/document-source.js';
import type { SearchIntent, SourceDocument } from '../types.js';
import { QueryPlanner, type SearchPhase } from './query-plan.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface QueryOutcome {
  readonly phase: SearchPhase | 'expand';
  readonly query: string;
  readonly newDocuments: number;
  readonly failed: boolean;
  readonly totalDocuments: number;
}

export interface GatherResult {
  readonly documents: readonly SourceDocument[];
  readonly queries: readonly QueryOutcome[];
  readonly phases: readonly (SearchPhase | 'expand')[];
  /** True when fast mode cut the run short */
  readonly stoppedEarly: boolean;
}

export interface GatherOptions {
  /** Ids that must not come back (documents already used by an earlier turn) */
  readonly excludeIds?: ReadonlySet<string>;
  readonly onQuery?: (outcome: QueryOutcome) => void;
}

const logger = getLogger({ component: 'evidence-gatherer' });

// ─────────────────────────────────────────────────────────────────────────────────
// RUN STATE
// ─────────────────────────────────────────────────────────────────────────────────

class GatherRun {
  readonly documents: SourceDocument[] = [];
  readonly queries: QueryOutcome[] = [];
  readonly phases: (SearchPhase | 'expand')[] = [];
  private readonly seenIds: Set<string>;
  stoppedEarly = false;

  constructor(
    private readonly policy: SearchPolicy,
    private readonly options: GatherOptions
  ) {
    this.seenIds = new Set(options.excludeIds);
  }

  shouldStop(): boolean {
    const stop = !this.policy.deepSearch && this.documents.length >= this.policy.fastModeLimit;
    if (stop) this.stoppedEarly = true;
    return stop;
  }

  /** Keep unseen documents; returns how many were new */
  accept(documents: readonly SourceDocument[]): number {
    let added = 0;
    for (const document of documents) {
      if (!document.id || this.seenIds.has(document.id)) continue;
      this.seenIds.add(document.id);
      this.documents.push(document);
      added++;
    }
    return added;
  }

  record(outcome: Omit<QueryOutcome, 'totalDocuments'>): void {
    const full = { ...outcome, totalDocuments: this.documents.length };
    this.queries.push(full);
    this.options.onQuery?.(full);
  }

  result(): GatherResult {
    return { documents: this.documents, queries: this.queries, phases: this.phases, stoppedEarly: this.stoppedEarly };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// GATHERER
// ─────────────────────────────────────────────────────────────────────────────────

export class EvidenceGatherer {
  private readonly planner: QueryPlanner;

  constructor(
    private readonly source: DocumentSource,
    private readonly policy: SearchPolicy = DEFAULT_SEARCH_POLICY,
    planner?: QueryPlanner
  ) {
    this.planner = planner ?? new QueryPlanner(policy);
  }

  /**
   * Full evidence pool for a fresh search.
   */
  async gather(intent: SearchIntent, options: GatherOptions = {}): Promise<GatherResult> {
    const run = new GatherRun(this.policy, options);

    await this.runPhase(run, 'broad', this.planner.broad(intent));
    if (run.shouldStop()) return run.result();

    await this.runPhase(run, 'hidden_gems', this.planner.hiddenGems(intent));
    if (run.shouldStop()) return run.result();

    const candidates = this.planner.extractCandidateNames(run.documents);
    if (candidates.length > 0) {
      await this.runPhase(run, 'verification', this.planner.verification(intent, candidates));
      if (run.shouldStop()) return run.result();
    }

    const categoryQueries = this.planner.category(intent);
    if (categoryQueries.length > 0) {
      await this.runPhase(run, 'category', categoryQueries);
    }

    logger.info('Evidence gathered', {
      location: intent.location,
      documents: run.documents.length,
      queries: run.queries.length,
      failed: run.queries.filter(q => q.failed).length,
    });

    return run.result();
  }

  /**
   * Narrower second pass for an "expand" turn. Never returns documents
   * listed in `excludeIds`.
   */
  async gatherExpansion(intent: SearchIntent, options: GatherOptions = {}): Promise<GatherResult> {
    const run = new GatherRun(this.policy, options);
    await this.runPhase(run, 'expand', this.planner.expand(intent));
    return run.result();
  }

  private async runPhase(run: GatherRun, phase: SearchPhase | 'expand', queries: readonly string[]): Promise<void> {
    run.phases.push(phase);
    logger.debug('Phase started', { phase, queries: queries.length });

    await mapWithConcurrency(queries, this.policy.phaseConcurrency, async query => {
      if (run.shouldStop()) return;

      const documents = await this.runQuery(query);
      const newDocuments = documents === null ? 0 : run.accept(documents);
      run.record({ phase, query, newDocuments, failed: documents === null });
    });
  }

  /**
   * null on failure or timeout; the run carries on either way.
   */
  private async runQuery(query: string): Promise<readonly SourceDocument[] | null> {
    try {
      const result = await withTimeout(
        this.source.search(query, { limit: this.policy.perQueryLimit, sort: this.policy.sort }),
        this.policy.queryTimeoutMs,
        `query "${query}"`
      );

      if (!result.ok) {
        logger.warn('Query failed', { query, code: result.error.code, message: result.error.message });
        return null;
      }
      return result.value;
    } catch (error) {
      logger.warn('Query aborted', { query, error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}
