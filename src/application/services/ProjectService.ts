import { randomUUID } from 'node:crypto';
import type { Project } from '../../domain/entities/Project.js';
import { ConflictError, NotFoundError } from '../../domain/errors/AppError.js';
import type { ProjectCreateDTO, ProjectFilterDTO, ProjectUpdateDTO } from '../dto/LedgerDTO.js';
import type { PageDTO, PageQueryDTO } from '../dto/PaginationDTO.js';
import type { LedgerStoragePort } from '../ports/LedgerStoragePort.js';
import { matchesSearch, newestFirst, paginate, systemClock, type Clock } from './LedgerSupport.js';

export class ProjectService {
  constructor(
    private readonly storage: LedgerStoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async create(input: ProjectCreateDTO): Promise<Project> {
    await this.assertNameAvailable(input.name);

    const project: Project = {
      id: randomUUID(),
      name: input.name,
      developerName: input.developerName,
      investorName: input.investorName,
      remarks: input.remarks,
      isActivated: true,
      createdBy: input.createdBy,
      createdAt: this.clock(),
    };

    await this.storage.projects.save(project);
    console.log('🏗️ Project created', { id: project.id, name: project.name });
    return project;
  }

  async get(id: string): Promise<Project> {
    const project = await this.storage.projects.findById(id);
    if (!project) {
      throw new NotFoundError(`Project with ID ${id} not found`, { projectId: id });
    }
    return project;
  }

  async list(query: PageQueryDTO, filter: ProjectFilterDTO = {}): Promise<PageDTO<Project>> {
    const projects = await this.storage.projects.findAll(
      (project) =>
        (filter.is_activated === undefined || project.isActivated === filter.is_activated) &&
        matchesSearch(filter.search, project.name, project.developerName, project.investorName),
    );

    return paginate(newestFirst(projects, (project) => project.createdAt), query);
  }

  async update(id: string, input: ProjectUpdateDTO): Promise<Project> {
    const project = await this.get(id);

    if (input.name !== undefined && input.name !== project.name) {
      await this.assertNameAvailable(input.name);
    }

    const updated: Project = { ...project, ...input, updatedAt: this.clock() };
    await this.storage.projects.save(updated);
    return updated;
  }

  /** Soft delete: the project stays readable with isActivated=false. */
  async delete(id: string, deletedBy?: string): Promise<void> {
    const project = await this.get(id);
    await this.storage.projects.save({
      ...project,
      isActivated: false,
      updatedAt: this.clock(),
      updatedBy: deletedBy ?? project.updatedBy,
    });
    console.log('🗑️ Project deactivated', { id });
  }

  private async assertNameAvailable(name: string): Promise<void> {
    const clashes = await this.storage.projects.findAll((project) => project.name === name);
    if (clashes.length > 0) {
      throw new ConflictError(`Project with name "${name}" already exists`, { name });
    }
  }
}
