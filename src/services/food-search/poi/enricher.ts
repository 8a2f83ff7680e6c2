// ═══════════════════════════════════════════════════════════════════════════════
// POI ENRICHER — Address, Phone, Rating and Display Fields per Recommendation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Lookups are cached by shop name, misses included. A failed lookup never
// drops a recommendation: it is emitted with basic display fields instead.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getLogger } from '../../../observability/logging/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import { normalizeShopName } from '../scoring/engine.js';
import { getJson } from '../sources/http.js';
import type { RestaurantEnrichment, RestaurantRecommendation } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTRACT
// ─────────────────────────────────────────────────────────────────────────────────

export type PoiErrorCode = 'POI_UNAVAILABLE' | 'POI_FAILED' | 'POI_MALFORMED';

export interface PoiRecord {
  readonly name: string;
  readonly address?: string;
  readonly phone?: string;
  readonly rating?: number;
  readonly photos: readonly string[];
  readonly businessArea?: string;
}

export interface PoiClient {
  /** null when nothing matched */
  lookup(name: string, cityHint: string): AsyncAppResult<PoiRecord | null, PoiErrorCode>;
}

const logger = getLogger({ component: 'poi-enricher' });

// ─────────────────────────────────────────────────────────────────────────────────
// HTTP CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

const PoiSchema = z.object({
  name: z.string(),
  address: z.string().optional().catch(undefined),
  tel: z.string().optional().catch(undefined),
  rating: z.coerce.number().min(0).max(5).optional().catch(undefined),
  photos: z
    .array(z.union([z.string(), z.object({ url: z.string() }).transform(photo => photo.url)]))
    .catch([]),
  business_area: z.string().optional().catch(undefined),
});

const PoiSearchResponseSchema = z.object({
  pois: z.array(z.unknown()).default([]),
});

export interface HttpPoiClientOptions {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
}

export class HttpPoiClient implements PoiClient {
  constructor(private readonly options: HttpPoiClientOptions) {}

  async lookup(name: string, cityHint: string): AsyncAppResult<PoiRecord | null, PoiErrorCode> {
    const base = this.options.baseUrl.endsWith('/') ? this.options.baseUrl : `${this.options.baseUrl}/`;
    const url = new URL('place/search', base);
    url.searchParams.set('keywords', name);
    if (cityHint) url.searchParams.set('city', cityHint);
    if (this.options.apiKey) url.searchParams.set('key', this.options.apiKey);

    const response = await getJson(url.toString(), { timeoutMs: this.options.timeoutMs });
    if (!response.ok) {
      return err(appError('POI_FAILED', response.error.message, { cause: response.error.cause }));
    }

    const parsed = PoiSearchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(appError('POI_MALFORMED', 'POI response has no result list'));
    }

    for (const entry of parsed.data.pois) {
      const poi = PoiSchema.safeParse(entry);
      if (poi.success) {
        return ok({
          name: poi.data.name,
          address: poi.data.address,
          phone: poi.data.tel,
          rating: poi.data.rating,
          photos: poi.data.photos.slice(0, 5),
          businessArea: poi.data.business_area,
        });
      }
    }

    return ok(null);
  }
}

/**
 * Used when no POI service is configured: every lookup is a miss.
 */
export class NoopPoiClient implements PoiClient {
  async lookup(): AsyncAppResult<PoiRecord | null, PoiErrorCode> {
    return ok(null);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

export function trustScore(confidence: number): number {
  return Math.round(confidence * 100) / 10;
}

function basicEnrichment(recommendation: RestaurantRecommendation): RestaurantEnrichment {
  const highlights = recommendation.features.slice(0, 5);
  return {
    photos: [],
    tags: highlights,
    pros: highlights,
    cons: [],
    mustTry: [],
    avoid: [],
    trustScore: trustScore(recommendation.confidence),
  };
}

export function applyPoi(recommendation: RestaurantRecommendation, poi: PoiRecord | null): RestaurantRecommendation {
  const enrichment = basicEnrichment(recommendation);
  if (!poi) return { ...recommendation, enrichment };

  return {
    ...recommendation,
    location: poi.address ?? recommendation.location,
    enrichment: {
      ...enrichment,
      address: poi.address,
      phone: poi.phone,
      rating: poi.rating,
      photos: poi.photos,
      businessArea: poi.businessArea,
    },
  };
}

/**
 * Lookup names to try, most specific first: as given, without a trailing
 * "(branch)" part, without a leading city name.
 */
export function nameVariants(name: string, cityHint: string): string[] {
  const variants = [name.trim()];

  const withoutBranch = name.replace(/\s*[(（][^)）]*[)）]\s*$/, '').trim();
  variants.push(withoutBranch);

  if (cityHint && withoutBranch.startsWith(cityHint)) {
    variants.push(withoutBranch.slice(cityHint.length).trim());
  }

  return [...new Set(variants)].filter(variant => variant.length > 0);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENRICHER
// ─────────────────────────────────────────────────────────────────────────────────

export class PoiEnricher {
  private readonly cache = new Map<string, PoiRecord | null>();

  constructor(private readonly client: PoiClient) {}

  async enrich(recommendation: RestaurantRecommendation, cityHint: string): Promise<RestaurantRecommendation> {
    const key = normalizeShopName(recommendation.name);
    if (this.cache.has(key)) {
      return applyPoi(recommendation, this.cache.get(key) ?? null);
    }

    for (const variant of nameVariants(recommendation.name, cityHint)) {
      const result = await this.client.lookup(variant, cityHint);
      if (!result.ok) {
        logger.warn('POI lookup failed, using basic fields', {
          name: recommendation.name,
          code: result.error.code,
        });
        return applyPoi(recommendation, null);
      }

      if (result.value) {
        this.cache.set(key, result.value);
        return applyPoi(recommendation, result.value);
      }
    }

    this.cache.set(key, null);
    return applyPoi(recommendation, null);
  }

  cacheSize(): number {
    return this.cache.size;
  }
}
