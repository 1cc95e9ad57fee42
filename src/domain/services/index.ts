/**
 * Domain Services Module
 *
 * - Extraction: repository metadata, stargazers, forkers and enrichment
 * - Export: JSON document round trip for extraction results
 */

export {
  ExtractionService,
  MAX_CONCURRENCY,
  type ExtractionServiceOptions,
} from './ExtractionService.js';

export {
  ExportFormatError,
  EXPORT_FORMAT_VERSION,
  toExportDocument,
  serializeExtraction,
  parseExtraction,
  writeExtractionFile,
  readExtractionFile,
  type ExportDocument,
} from './ExportService.js';
