// ═══════════════════════════════════════════════════════════════════════════════
// QUERY PLAN — Query Templates for the Four Evidence-Gathering Phases
// ═══════════════════════════════════════════════════════════════════════════════
//
// Phase 1  broad net         location + food + "locals / old establishment"
// Phase 2  hidden gems       hole-in-the-wall, back-alley qualifiers
// Phase 3  verification      location + up to two candidate names from titles
// Phase 4  category dive     only when the intent names a specific food type
//
// Templates live in data/search-qualifiers.json.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_SEARCH_POLICY, type SearchPolicy } from '../../../config/search.js';
import type { SearchIntent, SourceDocument } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// QUALIFIERS
// ─────────────────────────────────────────────────────────────────────────────────

const QualifiersSchema = z.object({
  defaultFood: z.string().min(1),
  broad: z.array(z.string().min(1)).min(1),
  requirement: z.string().min(1),
  hiddenGems: z.array(z.string().min(1)).min(1),
  verification: z.string().min(1),
  categoryDeepDive: z.array(z.string().min(1)),
  expand: z.array(z.string().min(1)).min(1),
  shopMarkers: z.array(z.string().min(1)).min(1),
  titleSeparators: z.array(z.string().min(1)),
});

export type SearchQualifiers = z.infer<typeof QualifiersSchema>;

let cachedQualifiers: SearchQualifiers | null = null;

export function loadSearchQualifiers(): SearchQualifiers {
  if (!cachedQualifiers) {
    const path = new URL('../../../../data/search-qualifiers.json', import.meta.url);
    cachedQualifiers = QualifiersSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  }
  return cachedQualifiers;
}

function fill(template: string, values: Record<string, string>): string {
  return template
    .replace(/\{(\w+)\}/g, (_, name: string) => values[name] ?? '')
    .replace(/\s+/g, ' ')
    .trim();
}

// ─────────────────────────────────────────────────────────────────────────────────
// PHASE QUERIES
// ─────────────────────────────────────────────────────────────────────────────────

export type SearchPhase = 'broad' | 'hidden_gems' | 'verification' | 'category';

export class QueryPlanner {
  constructor(
    private readonly policy: SearchPolicy = DEFAULT_SEARCH_POLICY,
    private readonly qualifiers: SearchQualifiers = loadSearchQualifiers()
  ) {}

  /**
   * Generic templates first. When the intent carries requirements, the last
   * slot under the cap always goes to one of them.
   */
  broad(intent: SearchIntent): string[] {
    const cap = this.policy.phase1QueryCap;
    const values = { location: intent.location, food: intent.foodType ?? this.qualifiers.defaultFood };
    const generic = this.qualifiers.broad.map(template => fill(template, values));
    const specific = intent.requirements
      .slice(0, 2)
      .map(requirement => fill(this.qualifiers.requirement, { ...values, requirement }));

    const genericSlots = Math.max(0, Math.min(generic.length, cap - Math.min(specific.length, 1)));
    return [...generic.slice(0, genericSlots), ...specific].slice(0, cap);
  }

  hiddenGems(intent: SearchIntent): string[] {
    return this.qualifiers.hiddenGems
      .map(template => fill(template, { location: intent.location }))
      .slice(0, this.policy.phase2QueryCap);
  }

  /**
   * Location plus candidate names, two per query.
   */
  verification(intent: SearchIntent, candidateNames: readonly string[]): string[] {
    const names = candidateNames.slice(0, this.policy.phase3VerifyCap);
    const queries: string[] = [];

    for (let i = 0; i < names.length; i += 2) {
      queries.push(fill(this.qualifiers.verification, { location: intent.location, names: names.slice(i, i + 2).join(' ') }));
    }

    return queries;
  }

  /**
   * Empty unless the intent names a specific food type.
   */
  category(intent: SearchIntent): string[] {
    const food = intent.foodType?.trim();
    if (!food || food.toLowerCase() === this.qualifiers.defaultFood.toLowerCase()) return [];

    return this.qualifiers.categoryDeepDive.map(template => fill(template, { location: intent.location, food }));
  }

  /**
   * Narrower queries for an "expand" turn.
   */
  expand(intent: SearchIntent): string[] {
    const base = intent.foodType ? `${intent.location} ${intent.foodType}` : intent.location;
    return this.qualifiers.expand.map(qualifier => `${base} ${qualifier}`);
  }

  /**
   * Candidate shop names from titles: tokens carrying a shop marker,
   * 2–10 characters long, first-seen order, deduplicated.
   */
  extractCandidateNames(documents: readonly SourceDocument[]): string[] {
    const names: string[] = [];
    const markers = this.qualifiers.shopMarkers.map(marker => marker.toLowerCase());

    for (const document of documents) {
      let title = document.title;
      for (const separator of this.qualifiers.titleSeparators) {
        title = title.split(separator).join(' ');
      }

      for (const token of title.split(/\s+/)) {
        const lower = token.toLowerCase();
        if (token.length < 2 || token.length > 10) continue;
        if (!markers.some(marker => lower.includes(marker))) continue;
        if (!names.includes(token)) names.push(token);
      }
    }

    return names.slice(0, this.policy.phase3NameCap);
  }
}
