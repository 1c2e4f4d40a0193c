export { JsonExporter, toJsonResult, type JsonOutput, type JsonOutputOptions, type JsonResult, type ExportMetadata } from './json.js';
export { CsvExporter, escapeCsvField } from './csv.js';
export { exportRecords, renderRecords, defaultExportName } from './writer.js';
