export { ExportService, ExportServiceOptions } from './export.service';
export {
  COLUMN_COUNT,
  EventNameLookup,
  formatDateTime,
  formatHeader,
  formatRow,
  parseCsvLine,
  quoteField,
  transactionRows,
} from './export.format';
export { EXPORT_LABELS, ExportLabels } from './export.labels';
export { ExportController } from './export.controller';
export { createExportRoutes } from './export.routes';
