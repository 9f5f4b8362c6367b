import { z } from 'zod/v4';

export const QueryParamsSchema = z
  .object({
    year: z.number().int().min(1870).max(2100),
    actorName: z.string().min(1),
    productionCompany: z.string().min(1),
    dateFrom: z.iso.date(),
    dateTo: z.iso.date(),
  })
  .refine((params) => params.dateFrom <= params.dateTo, {
    message: 'dateFrom must not be after dateTo',
    path: ['dateFrom'],
  });

export type QueryParams = z.infer<typeof QueryParamsSchema>;
export type QueryParameterName = keyof QueryParams;

export const DEFAULT_QUERY_PARAMS: QueryParams = {
  year: 2019,
  actorName: 'Tom Hanks',
  productionCompany: 'Marvel Studios',
  dateFrom: '2018-01-01',
  dateTo: '2018-12-31',
};

export interface AnalyticalQueryDefinition {
  /** `Q01` .. `Q50`. */
  id: string;
  segment: number;
  label: string;
  parameters: readonly QueryParameterName[];
  sql: string;
}

export const QueryCellSchema = z.union([z.string(), z.number(), z.null()]);
export type QueryCell = z.infer<typeof QueryCellSchema>;

export const QueryRowSchema = z.record(z.string(), QueryCellSchema);
export type QueryRow = z.infer<typeof QueryRowSchema>;

export interface QueryResult {
  id: string;
  segment: number;
  label: string;
  columns: string[];
  rows: QueryRow[];
}
