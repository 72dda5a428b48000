// Main exports for the data-ingestion package

// Field normalizers
export {
  DEFAULT_DATE,
  normalizeDate,
  normalizeNumeric,
  extractYear,
  stripDigits,
  stripPunctuation,
  emailDomain,
  toBoolean,
  parseQuantity,
  isMissing
} from './validation/DataNormalizer';

// Dataset model and pipeline stages
export * from './dataset/TabularDataset';
export * from './dataset/stages';

// Cleaners and dispatch
export {
  CLEANERS,
  cleanByIdentity,
  resolveDatasetKind,
  listDatasetIdentities,
  runCleaner,
  customersCleaner,
  customerSocialCleaner,
  salesCleaner,
  returnsCleaner,
  productsCleaner
} from './cleaners';
export type { DatasetCleaner } from './cleaners';
export { CleaningPipeline } from './validation/CleaningPipeline';
export type { CleaningResult } from './validation/CleaningPipeline';

// CSV codec
export { CsvParser } from './parsers/CsvParser';
export type { CsvParserOptions } from './parsers/CsvParser';
export { toCsv } from './parsers/CsvWriter';
export type { CsvWriterOptions } from './parsers/CsvWriter';

// Storage, orchestration and entry point
export { StorageService } from './storage/StorageService';
export type { ObjectStore, StorageConfig } from './storage/StorageService';
export { ETLOrchestrator, SUCCESS_BODY } from './workers/ETLOrchestrator';
export type { ETLOrchestratorOptions, ETLRunSummary } from './workers/ETLOrchestrator';
export { parseStorageEvent } from './workers/storageEvent';
export type { SourceObject } from './workers/storageEvent';
export { handler } from './handler';

// Configuration, logging and errors
export { loadConfig } from './utils/config';
export type { PipelineConfig } from './utils/config';
export { default as logger } from './utils/logger';
export type { Logger } from './utils/logger';
export * from './utils/errorUtils';
