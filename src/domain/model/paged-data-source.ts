import { ExportDataQuery } from './export-data-request';

/**
 * Paginated cursor over the records of one export type.
 *
 * An instance belongs to the request or job that created it. `fetchPage`
 * advances internal paging state, so calls must not overlap.
 */
export interface PagedDataSource<T = unknown> {
  readonly pageSize: number;

  /** Next page of records; an empty page means the source is drained */
  fetchPage(): Promise<ReadonlyArray<T>>;

  /** Best-known total; exact once computed */
  getTotalCount(): Promise<number>;
}

export type DataSourceFactory<T = unknown> = (query: ExportDataQuery) => PagedDataSource<T>;
