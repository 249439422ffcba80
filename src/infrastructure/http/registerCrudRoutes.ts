import type { Request, RequestHandler, Response, Router } from 'express';
import type { z } from 'zod';
import { PageQuerySchema, type PageDTO, type PageQueryDTO } from '../../application/dto/PaginationDTO.js';

export const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export interface CrudResource<TEntity, TCreate, TUpdate, TFilter> {
  createSchema: z.ZodType<TCreate, z.ZodTypeDef, unknown>;
  updateSchema: z.ZodType<TUpdate, z.ZodTypeDef, unknown>;
  filterSchema: z.ZodType<TFilter, z.ZodTypeDef, unknown>;
  create(input: TCreate): Promise<TEntity>;
  get(id: string): Promise<TEntity>;
  list(query: PageQueryDTO, filter: TFilter): Promise<PageDTO<TEntity>>;
  update(id: string, input: TUpdate): Promise<TEntity>;
  remove(id: string): Promise<void>;
}

/**
 * POST, GET list, GET by id, PATCH and DELETE for one resource path.
 */
export const registerCrudRoutes = <TEntity, TCreate, TUpdate, TFilter>(
  router: Router,
  path: string,
  resource: CrudResource<TEntity, TCreate, TUpdate, TFilter>,
): void => {
  router.post(
    path,
    asyncRoute(async (req, res) => {
      const created = await resource.create(resource.createSchema.parse(req.body));
      res.status(201).json(created);
    }),
  );

  router.get(
    path,
    asyncRoute(async (req, res) => {
      const page = await resource.list(PageQuerySchema.parse(req.query), resource.filterSchema.parse(req.query));
      res.json(page);
    }),
  );

  router.get(
    `${path}/:id`,
    asyncRoute(async (req, res) => {
      res.json(await resource.get(req.params.id));
    }),
  );

  router.patch(
    `${path}/:id`,
    asyncRoute(async (req, res) => {
      res.json(await resource.update(req.params.id, resource.updateSchema.parse(req.body)));
    }),
  );

  router.delete(
    `${path}/:id`,
    asyncRoute(async (req, res) => {
      await resource.remove(req.params.id);
      res.status(204).end();
    }),
  );
};
