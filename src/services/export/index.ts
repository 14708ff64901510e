/**
 * Export services
 */

export {
  exportLedger,
  exportAggregation,
  writeExport,
  escapeCsvField,
  EXPORT_FORMATS,
  ENTRY_CSV_COLUMNS,
} from './exporter.js';
export type { ExportFormat } from './exporter.js';
