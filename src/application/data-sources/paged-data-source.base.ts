import { ExportDataQuery } from '../../domain/model/export-data-request';
import { PagedDataSource } from '../../domain/model/paged-data-source';
import { DataSourceError } from '../../domain/errors/export.errors';

export const DEFAULT_PAGE_SIZE = 50;

/**
 * Skip/take cursor shared by data sources that can count and slice their records.
 *
 * Subclasses only answer "how many" and "give me this slice"; paging state,
 * count caching and error wrapping live here.
 */
export abstract class PagedDataSourceBase<T> implements PagedDataSource<T> {
  readonly pageSize: number;

  private offset: number;
  private totalCount?: number;
  private drained = false;

  protected constructor(
    protected readonly typeName: string,
    protected readonly query: ExportDataQuery,
  ) {
    this.offset = Math.max(0, query.skip ?? 0);
    this.pageSize = query.take !== undefined && query.take > 0 ? query.take : DEFAULT_PAGE_SIZE;
  }

  protected abstract fetchSlice(skip: number, take: number): Promise<ReadonlyArray<T>>;

  protected abstract count(): Promise<number>;

  async fetchPage(): Promise<ReadonlyArray<T>> {
    if (this.drained) {
      return [];
    }

    let items: ReadonlyArray<T>;
    try {
      items = await this.fetchSlice(this.offset, this.pageSize);
    } catch (error) {
      throw DataSourceError.wrap(this.typeName, error);
    }

    this.offset += items.length;
    if (items.length < this.pageSize) {
      this.drained = true;
    }
    return items;
  }

  async getTotalCount(): Promise<number> {
    if (this.totalCount === undefined) {
      try {
        this.totalCount = await this.count();
      } catch (error) {
        throw DataSourceError.wrap(this.typeName, error);
      }
    }
    return this.totalCount;
  }
}
