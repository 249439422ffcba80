import type { Category } from '../../domain/entities/Category.js';

export interface CategoryMatcherPort {
  /**
   * Picks a category for a description. `suggested` is a category name proposed upstream
   * (for example by the model) and is used when no pattern matches.
   */
  match(description: string, categories: Category[], suggested?: string): Category | undefined;
}
