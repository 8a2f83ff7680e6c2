// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORY KEYWORDS — Food Category → Matching Keywords
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const CategoryTableSchema = z.record(z.array(z.string().min(1)).min(1));

export type CategoryTable = Readonly<Record<string, readonly string[]>>;

let cachedTable: CategoryTable | null = null;

export function loadCategoryTable(): CategoryTable {
  if (!cachedTable) {
    const path = new URL('../../../data/category-keywords.json', import.meta.url);
    cachedTable = CategoryTableSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  }
  return cachedTable;
}

/**
 * Keywords that count as a match for a category. Unknown categories match
 * on themselves.
 */
export function keywordsFor(category: string, table: CategoryTable = loadCategoryTable()): string[] {
  const key = category.trim().toLowerCase();
  const keywords = table[key] ?? table[category.trim()] ?? [];
  return [...new Set([key, ...keywords.map(keyword => keyword.toLowerCase())])].filter(Boolean);
}

/**
 * Categories whose keywords appear in any of the texts.
 */
export function detectCategories(texts: readonly string[], table: CategoryTable = loadCategoryTable()): string[] {
  const haystack = texts.join('\n').toLowerCase();
  return Object.entries(table)
    .filter(([, keywords]) => keywords.some(keyword => haystack.includes(keyword.toLowerCase())))
    .map(([category]) => category);
}
