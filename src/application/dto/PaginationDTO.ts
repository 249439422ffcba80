import { z } from 'zod';

export const PageQuerySchema = z
  .object({
    page: z.coerce.number().int().default(1),
    page_size: z.coerce.number().int().default(10),
  })
  .transform(({ page, page_size }) => ({ page, pageSize: page_size }));

export type PageQueryDTO = z.output<typeof PageQuerySchema>;

export interface PageDTO<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
