// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED SHAPES — Zod Schemas for Records Read Back from the Store
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const SearchIntentSchema = z.object({
  location: z.string(),
  foodType: z.string().optional(),
  requirements: z.array(z.string()),
  excludeKeywords: z.array(z.string()),
});

const MenuItemNoteSchema = z.object({
  name: z.string(),
  reason: z.string().optional(),
});

export const RestaurantRecommendationSchema = z.object({
  name: z.string(),
  location: z.string().optional(),
  features: z.array(z.string()),
  sourceDocumentIds: z.array(z.string()),
  confidence: z.number(),
  classification: z.object({
    verdict: z.enum(['genuine', 'likely_genuine', 'unknown', 'likely_promoted', 'promoted']),
    confidence: z.number(),
    reasons: z.array(z.string()),
    hasLocalSignal: z.boolean(),
  }),
  isRecommended: z.boolean(),
  filterReason: z.string().optional(),
  enrichment: z
    .object({
      address: z.string().optional(),
      phone: z.string().optional(),
      rating: z.number().optional(),
      photos: z.array(z.string()),
      businessArea: z.string().optional(),
      tags: z.array(z.string()),
      pros: z.array(z.string()),
      cons: z.array(z.string()),
      mustTry: z.array(MenuItemNoteSchema),
      avoid: z.array(MenuItemNoteSchema),
      trustScore: z.number(),
    })
    .optional(),
});

/**
 * Parse a stored JSON string. Anything unreadable counts as missing.
 */
export function parseStored<S extends z.ZodTypeAny>(schema: S, raw: string | null): z.infer<S> | null {
  if (raw === null) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
