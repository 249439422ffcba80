import { randomUUID } from 'node:crypto';
import type { Category } from '../../domain/entities/Category.js';
import { BadRequestError, ConflictError, NotFoundError } from '../../domain/errors/AppError.js';
import type { CategoryCreateDTO, CategoryFilterDTO, CategoryUpdateDTO } from '../dto/LedgerDTO.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import { matchesSearch, newestFirst, paginate, systemClock, type Clock } from './LedgerSupport.js';

const assertValidPattern = (pattern: string | undefined): void => {
  if (!pattern) {
    return;
  }

  try {
    new RegExp(pattern, 'i');
  } catch (error) {
    throw new BadRequestError('identificationRegex is not a valid regular expression', {
      identificationRegex: pattern,
      reason: error instanceof Error ? error.message : 'Unknown error',
    });
  }
};

export class CategoryService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(input: CategoryCreateDTO): Promise<Category> {
    assertValidPattern(input.identificationRegex);
    await this.assertNameAvailable(input.name);

    const category: Category = {
      id: randomUUID(),
      name: input.name,
      identificationRegex: input.identificationRegex,
      color: input.color,
      description: input.description,
      isActive: true,
      createdBy: input.createdBy,
      createdAt: this.clock(),
    };

    await this.storage.categories.save(category);
    console.log('🏷️ Category created', { id: category.id, name: category.name });
    return category;
  }

  async get(id: string): Promise<Category> {
    const category = await this.storage.categories.findById(id);
    if (!category) {
      throw new NotFoundError(`Category with ID ${id} not found`, { categoryId: id });
    }
    return category;
  }

  async list(query: PageQueryDTO, filter: CategoryFilterDTO = {}): Promise<PageDTO<Category>> {
    const categories = await this.storage.categories.findAll(
      (category) =>
        (filter.is_active === undefined || category.isActive === filter.is_active) &&
        matchesSearch(filter.search, category.name, category.description),
    );

    return paginate(newestFirst(categories, (category) => category.createdAt), query);
  }

  async listActive(): Promise<Category[]> {
    return this.storage.categories.findAll((category) => category.isActive);
  }

  async update(id: string, input: CategoryUpdateDTO): Promise<Category> {
    const category = await this.get(id);
    assertValidPattern(input.identificationRegex);

    if (input.name !== undefined && input.name.toLowerCase() !== category.name.toLowerCase()) {
      await this.assertNameAvailable(input.name, id);
    }

    const updated: Category = { ...category, ...input, updatedAt: this.clock() };
    await this.storage.categories.save(updated);
    return updated;
  }

  /** Soft delete: sets isActive=false so existing entries keep their category. */
  async delete(id: string, deletedBy?: string): Promise<void> {
    const category = await this.get(id);
    await this.storage.categories.save({
      ...category,
      isActive: false,
      updatedAt: this.clock(),
      updatedBy: deletedBy ?? category.updatedBy,
    });
  }

  private async assertNameAvailable(name: string, exceptId?: string): Promise<void> {
    const wanted = name.toLowerCase();
    const clashes = await this.storage.categories.findAll(
      (category) => category.id !== exceptId && category.name.toLowerCase() === wanted,
    );
    if (clashes.length > 0) {
      throw new ConflictError(`Category with name "${name}" already exists`, { name });
    }
  }
}
