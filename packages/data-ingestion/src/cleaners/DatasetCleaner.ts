import type { DatasetKind, TabularDataset } from '@retail-etl/types';
import { runStages, Stage } from '../dataset/stages';
import defaultLogger, { Logger } from '../utils/logger';

/**
 * A named, fixed list of stages for one dataset kind.
 */
export interface DatasetCleaner {
  kind: DatasetKind;
  label: string;
  stages: readonly Stage[];
}

export function runCleaner(
  cleaner: DatasetCleaner,
  dataset: TabularDataset,
  logger: Logger = defaultLogger
): TabularDataset {
  logger.info(`Cleaning ${cleaner.label} data`, { kind: cleaner.kind });
  const cleaned = runStages(dataset, cleaner.stages, `the ${cleaner.label} cleaner`);
  logger.info(`Data cleaning complete for ${cleaner.label} data`, { kind: cleaner.kind });
  return cleaned;
}
