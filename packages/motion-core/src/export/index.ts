export {
  RECORD_COLUMNS,
  SPRING_DAMPER_COLUMNS,
  toColumns,
  toCsv,
  type ColumnName,
  type SpringDamperColumnName,
  type RecordColumns,
} from './columns.js';
