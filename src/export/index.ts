/**
 * Export Module
 *
 * @module export
 */

export {
  writeDataset,
  renderDataset,
  serializeRecord,
  escapeCsvField,
  formatFloat,
  buildDatasetFileName,
  buildDatasetPath,
  DatasetWriteError,
  type DatasetWriteResult,
} from './dataset-writer.js';
