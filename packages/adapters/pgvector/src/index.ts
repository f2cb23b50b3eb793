export { PgMetadataStore, type PgMetadataStoreOptions } from './metadataStore';
export { PgVectorIndex, toVectorLiteral, type PgVectorIndexOptions } from './vectorIndex';
export { metadataDdl, scopeFieldDdl, tableNames, vectorDdl, type PgTables } from './schema';
export {
  SqlParams,
  fromPgPool,
  isTransientPgError,
  runQuery,
  scopeFilterSql,
  whereSql,
  type SqlClient,
  type SqlPool,
  type SqlResult
} from './sql';
