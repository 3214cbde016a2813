/**
 * Keyword Categorizer
 *
 * Assigns a spending category from vendor name and notes using a
 * category → language → keywords table supplied at construction.
 * Keywords of every language count the same, so "KFC", "khana" and
 * "کھانا" all point at Food.
 *
 * Scoring logic (per category, "Other" excluded):
 * - Keyword in the vendor name: +10 points
 * - Keyword only in vendor + notes: +5 points
 * - Every matched keyword also counts once toward `matches`
 *
 * Best category by (points, matches); earlier table entries win full ties.
 * confidence = min(0.95, 0.6 + 0.1 × matches + 0.01 × points)
 * No match at all → ("Other", 0.3)
 */

import { z } from 'zod';
import {
  CATEGORY_CONFIDENCE,
  CATEGORY_POINTS,
  FALLBACK_CATEGORY,
  FALLBACK_CATEGORY_CONFIDENCE,
  MAX_ALTERNATIVE_CATEGORIES,
} from './constants';
import { round2 } from './rounding';
import type { CategorizationResult, CategoryKeywordTable, CategorySuggestion } from './types';

export const CategoryKeywordTableSchema = z.record(
  z.string().min(1),
  z.record(z.string().min(1), z.array(z.string().min(1)))
);

interface CategoryScore {
  category: string;
  points: number;
  matches: number;
  keywords: string[];
}

export class Categorizer {
  private readonly keywordsByCategory: Map<string, string[]>;

  constructor(private readonly table: CategoryKeywordTable) {
    this.keywordsByCategory = new Map();

    for (const [category, languages] of Object.entries(table)) {
      const keywords = new Set<string>();
      for (const list of Object.values(languages)) {
        for (const keyword of list) {
          const folded = keyword.trim().toLowerCase();
          if (folded) keywords.add(folded);
        }
      }
      this.keywordsByCategory.set(category, [...keywords]);
    }
  }

  /**
   * Every category name in table order, including the fallback.
   */
  getCategories(): string[] {
    const categories = Object.keys(this.table);
    return categories.includes(FALLBACK_CATEGORY) ? categories : [...categories, FALLBACK_CATEGORY];
  }

  /**
   * @example
   * categorizer.categorize('KFC Johar Town') // { category: 'Food', confidence: 0.8 }
   * categorizer.categorize('ABC Traders')    // { category: 'Other', confidence: 0.3 }
   */
  categorize(vendor: string | null | undefined, notes?: string | null): CategorizationResult {
    const [best] = this.rank(vendor, notes);

    if (!best) {
      return { category: FALLBACK_CATEGORY, confidence: FALLBACK_CATEGORY_CONFIDENCE };
    }

    return { category: best.category, confidence: this.confidenceFor(best) };
  }

  /**
   * categorize() plus the keywords behind the decision and the
   * runner-up categories that also matched.
   */
  suggestCategory(vendor: string | null | undefined, notes?: string | null): CategorySuggestion {
    const [best, ...others] = this.rank(vendor, notes);

    if (!best) {
      return {
        category: FALLBACK_CATEGORY,
        confidence: FALLBACK_CATEGORY_CONFIDENCE,
        reasoning: 'No strong matches found',
        matchedKeywords: [],
        alternativeCategories: [],
      };
    }

    return {
      category: best.category,
      confidence: this.confidenceFor(best),
      reasoning: `Matched keywords: ${best.keywords.join(', ')}`,
      matchedKeywords: best.keywords,
      alternativeCategories: others
        .slice(0, MAX_ALTERNATIVE_CATEGORIES)
        .map((score) => score.category),
    };
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Categories with at least one match, best first.
   */
  private rank(vendor: string | null | undefined, notes: string | null | undefined): CategoryScore[] {
    const vendorText = (vendor ?? '').toLowerCase();
    const combinedText = `${vendorText} ${(notes ?? '').toLowerCase()}`;

    const scores: CategoryScore[] = [];

    for (const [category, keywords] of this.keywordsByCategory) {
      if (category === FALLBACK_CATEGORY) {
        continue;
      }

      const score: CategoryScore = { category, points: 0, matches: 0, keywords: [] };

      for (const keyword of keywords) {
        if (vendorText.includes(keyword)) {
          score.points += CATEGORY_POINTS.VENDOR;
        } else if (combinedText.includes(keyword)) {
          score.points += CATEGORY_POINTS.NOTES;
        } else {
          continue;
        }
        score.matches += 1;
        score.keywords.push(keyword);
      }

      if (score.matches > 0) {
        scores.push(score);
      }
    }

    // Array.prototype.sort is stable, so full ties keep table order
    return scores.sort((a, b) => b.points - a.points || b.matches - a.matches);
  }

  private confidenceFor(score: CategoryScore): number {
    const raw =
      CATEGORY_CONFIDENCE.BASE +
      CATEGORY_CONFIDENCE.PER_MATCH * score.matches +
      CATEGORY_CONFIDENCE.PER_POINT * score.points;

    return round2(Math.min(CATEGORY_CONFIDENCE.MAX, raw));
  }
}

export default Categorizer;
