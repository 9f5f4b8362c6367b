export { buildQueryErrorCsv, buildQueryResultCsv, toCsv, toCsvValue } from './csv.ts';
export {
  QueryReportExportResultSchema,
  REPORT_FORMATS,
  exportQueryReport,
  type ExportQueryReportInput,
  type ExportedFile,
  type QueryReportExportResult,
  type ReportFormat,
} from './query-report.ts';
