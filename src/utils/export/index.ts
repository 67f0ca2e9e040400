/**
 * Lifecycle export: CSV tables and JSON records
 */

export {
  LIFECYCLE_CSV_COLUMNS,
  toLifecycleTable,
  toLifecycleCsv,
  exportLifecyclesToCsv,
} from './lifecycle-exporter.js';

export {
  BlockLifecycleSchema,
  LifecycleDeserializationError,
  serializeLifecycle,
  deserializeLifecycle,
} from './lifecycle-serializer.js';
