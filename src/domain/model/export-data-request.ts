/**
 * Query handed to a type's data source factory.
 * Only paging is understood by the core; everything else belongs to the type.
 */
export interface ExportDataQuery {
  readonly skip?: number;
  readonly take?: number;
  readonly keyword?: string;
  readonly objectIds?: ReadonlyArray<string>;
  readonly [key: string]: unknown;
}

export interface ExportDataRequest {
  readonly exportTypeName: string;
  readonly dataQuery: ExportDataQuery;
  /** Export provider to write with; the first registered provider when omitted */
  readonly providerName?: string;
  /** Provider-specific settings, passed through untouched */
  readonly providerConfig?: Readonly<Record<string, unknown>>;
}
