import type { Category } from '../../../domain/entities/Category.js';
import type { CategoryMatcherPort } from '../../../application/ports/CategoryMatcherPort.js';

interface Rule {
  test: (input: string) => boolean;
  category: Category;
}

const compile = (category: Category): Rule | null => {
  if (!category.identificationRegex) {
    return null;
  }

  try {
    const pattern = new RegExp(category.identificationRegex, 'i');
    return { test: (desc) => pattern.test(desc), category };
  } catch (error) {
    console.warn(`⚠️ Skipping category "${category.name}" with invalid pattern`, {
      pattern: category.identificationRegex,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return null;
  }
};

export class RegexCategoryMatcher implements CategoryMatcherPort {
  match(description: string, categories: Category[], suggested?: string): Category | undefined {
    const active = categories.filter((category) => category.isActive);
    const rules = active.map(compile).filter((rule): rule is Rule => rule !== null);
    const rule = rules.find((candidate) => candidate.test(description));

    if (rule) {
      return rule.category;
    }

    // Fall back to the category name the model proposed, if one exists.
    const wanted = suggested?.trim().toLowerCase();
    return wanted ? active.find((category) => category.name.toLowerCase() === wanted) : undefined;
  }
}
