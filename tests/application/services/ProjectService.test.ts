import { beforeEach, describe, expect, it } from 'vitest';
import { ConflictError, NotFoundError } from '../../../src/domain/errors/AppError.js';
import { createLedger, FIRST_PAGE, type Ledger } from '../../support/ledgerFixtures.js';

describe('ProjectService', () => {
  let ledger: Ledger;

  const createProject = (name: string, developerName = 'North Build') =>
    ledger.projects.create({ name, developerName, investorName: 'Harbor Capital', createdBy: 'tester' });

  beforeEach(() => {
    ledger = createLedger();
  });

  it('creates an activated project stamped by the clock', async () => {
    const project = await createProject('Riverside Towers');

    expect(project).toMatchObject({
      name: 'Riverside Towers',
      isActivated: true,
      createdBy: 'tester',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    await expect(ledger.projects.get(project.id)).resolves.toEqual(project);
  });

  it('rejects a duplicate name', async () => {
    await createProject('Riverside Towers');

    await expect(createProject('Riverside Towers')).rejects.toThrowError(
      new ConflictError('Project with name "Riverside Towers" already exists'),
    );
  });

  it('reports a missing project', async () => {
    await expect(ledger.projects.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(ledger.projects.get('missing')).rejects.toThrowError('Project with ID missing not found');
  });

  it('lists newest first with search and activation filters', async () => {
    const first = await createProject('Riverside Towers');
    const second = await createProject('Hilltop Villas', 'South Homes');
    await ledger.projects.delete(first.id, 'admin');

    const all = await ledger.projects.list(FIRST_PAGE);
    const active = await ledger.projects.list(FIRST_PAGE, { is_activated: true });
    const bySearch = await ledger.projects.list(FIRST_PAGE, { search: 'south' });

    expect(all.items.map((project) => project.id)).toEqual([second.id, first.id]);
    expect(active.items.map((project) => project.id)).toEqual([second.id]);
    expect(bySearch.items.map((project) => project.id)).toEqual([second.id]);
  });

  it('soft-deletes by deactivating', async () => {
    const project = await createProject('Riverside Towers');

    await ledger.projects.delete(project.id, 'admin');

    await expect(ledger.projects.get(project.id)).resolves.toMatchObject({
      isActivated: false,
      updatedBy: 'admin',
    });
  });

  it('checks the name only when it changes', async () => {
    const project = await createProject('Riverside Towers');
    await createProject('Hilltop Villas');

    const renamed = await ledger.projects.update(project.id, { name: 'Riverside Towers', remarks: 'phase 2' });

    expect(renamed.remarks).toBe('phase 2');
    expect(renamed.updatedAt).toBe('2024-01-01T00:00:02.000Z');
    await expect(ledger.projects.update(project.id, { name: 'Hilltop Villas' })).rejects.toBeInstanceOf(ConflictError);
  });
});
