import { ExportDataQuery } from '../../domain/model/export-data-request';
import { DataSourceFactory } from '../../domain/model/paged-data-source';
import { PagedDataSourceBase } from './paged-data-source.base';

/**
 * Pages over records already held in memory.
 * `keyword` and `objectIds` narrow the records when an accessor for them is given.
 */
export class InMemoryPagedDataSource<T> extends PagedDataSourceBase<T> {
  private readonly records: ReadonlyArray<T>;

  constructor(
    typeName: string,
    query: ExportDataQuery,
    records: ReadonlyArray<T>,
    options: InMemoryDataSourceOptions<T> = {},
  ) {
    super(typeName, query);
    this.records = InMemoryPagedDataSource.filter(records, query, options);
  }

  static factory<T>(
    typeName: string,
    loadRecords: () => ReadonlyArray<T>,
    options: InMemoryDataSourceOptions<T> = {},
  ): DataSourceFactory<T> {
    return (query) => new InMemoryPagedDataSource(typeName, query, loadRecords(), options);
  }

  protected async fetchSlice(skip: number, take: number): Promise<ReadonlyArray<T>> {
    return this.records.slice(skip, skip + take);
  }

  protected async count(): Promise<number> {
    return this.records.length;
  }

  private static filter<T>(
    records: ReadonlyArray<T>,
    query: ExportDataQuery,
    options: InMemoryDataSourceOptions<T>,
  ): ReadonlyArray<T> {
    let result = records;

    const { objectIds, keyword } = query;
    const { idOf, textOf } = options;

    if (objectIds && objectIds.length > 0 && idOf) {
      const wanted = new Set(objectIds);
      result = result.filter((record) => wanted.has(idOf(record)));
    }

    if (keyword && textOf) {
      const needle = keyword.toLowerCase();
      result = result.filter((record) => textOf(record).toLowerCase().includes(needle));
    }

    return result;
  }
}

export interface InMemoryDataSourceOptions<T> {
  idOf?: (record: T) => string;
  textOf?: (record: T) => string;
}
