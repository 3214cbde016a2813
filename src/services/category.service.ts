/**
 * Category Service
 *
 * Thin wrapper around the configured categorizer.
 */

import { categorizer } from '../config';
import type { CategorySuggestion } from '../reconciliation';

export function listCategories(): string[] {
  return categorizer.getCategories();
}

export function suggestCategory(vendor: string, notes?: string): CategorySuggestion {
  return categorizer.suggestCategory(vendor, notes);
}

export const categoryService = {
  listCategories,
  suggestCategory,
};

export default categoryService;
