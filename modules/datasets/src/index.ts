// Table
export { Table } from './table/table'
export type { ColumnInfo, RowRecord, TableSource } from './table/table'
export { inferColumn, formatCell, uniqueColumnNames, MISSING_VALUE_MARKERS } from './table/column-types'
export type { CellValue, ColumnKind, ColumnDtype, TypedColumn } from './table/column-types'

// Loader
export { loadTable, DecodeFailure, FALLBACK_ENCODINGS } from './loader/encoding-loader'
export type { EncodingDetector, DecodeAttempt, LoadTableOptions } from './loader/encoding-loader'
export { parseCsv } from './loader/csv-parser'
export type { ParsedCsv } from './loader/csv-parser'

// Queries
export {
  summarize, head, filterRows, uniqueValues, requireColumn, DEFAULT_HEAD_ROWS, FILTER_RESULT_LIMIT,
} from './query/dataset-queries'
export type { DatasetSummary, UniqueValues } from './query/dataset-queries'
export { describe, describeNumbers, describeText } from './query/describe'
export type { NumericStats, TextStats, DatasetStats } from './query/describe'

// Storage
export type { ObjectStorage } from './storage/object-storage'
export { SupabaseStorage, DEFAULT_BUCKET } from './storage/supabase-storage'
export { MemoryStorage } from './storage/memory-storage'
export { fetchTable, listTenantDatasets } from './storage/dataset-service'

// Schemas
export {
  datasetQuerySchema, headQuerySchema, filterQuerySchema, columnParamsSchema, docsParamsSchema, parseRequest,
} from './schemas/dataset-request'
export type { DatasetQuery, HeadQuery, FilterQuery } from './schemas/dataset-request'

// Docs
export { buildApiDocs, EXAMPLE_DATASET, API_KEY_PLACEHOLDER } from './docs/api-docs'
export type { ApiDocs, EndpointDoc } from './docs/api-docs'
