/**
 * Output module - serialization and export of pipeline results.
 */

export {
  serializeJson,
  serializeOutput,
  serializeLedger,
  serializeReport,
  writeTextFile,
  type SerializeOptions,
} from './serialize.js';

export {
  buildAnomalyReport,
  ANOMALY_REPORT_VERSION,
  type AnomalyInput,
  type AnomalyReport,
  type DocumentCheckGap,
  type DocumentSubtotalMismatch,
} from './anomalies.js';

export {
  exportCsv,
  exportRecordsCsv,
  exportCsvByDocument,
  type CsvExportOptions,
  type SplitCsvResult,
} from './csv-exporter.js';
