import { ExportDataQuery } from './export-data-request';
import { DataSourceFactory } from './paged-data-source';
import { Principal } from './principal';

/**
 * Per-type authorization policy, evaluated before any data is touched.
 */
export type ExportDataPolicy = (
  principal: Principal,
  query: ExportDataQuery,
) => boolean | Promise<boolean>;

export interface ExportedTypeDefinition<T = unknown> {
  /** Logical name, e.g. `Catalog.Product`; unique within the registry */
  readonly typeName: string;
  readonly requiredPermission: string;
  readonly dataSourceFactory: DataSourceFactory<T>;
  /** Replaces the default "principal holds requiredPermission" policy */
  readonly authorizationPolicy?: ExportDataPolicy;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Serializable view of a definition, as listed to clients.
 */
export interface ExportedTypeDescriptor {
  readonly typeName: string;
  readonly requiredPermission: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}
