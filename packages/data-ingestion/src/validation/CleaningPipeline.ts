import type { DatasetKind, DatasetShape, TabularDataset } from '@retail-etl/types';
import { cleanByIdentity, resolveDatasetKind } from '../cleaners';
import { shapeOf } from '../dataset/TabularDataset';
import defaultLogger, { Logger } from '../utils/logger';
import { getErrorMessage, getErrorStack } from '../utils/errorUtils';

export interface CleaningResult {
  dataset: TabularDataset;
  kind: DatasetKind | null;
  inputShape: DatasetShape;
  outputShape: DatasetShape;
  durationMs: number;
}

/**
 * Boundary of the cleaning engine: dataset + identity in, cleaned dataset out.
 * Stateless; the logger is the only collaborator.
 */
export class CleaningPipeline {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  clean(dataset: TabularDataset, identity: string): CleaningResult {
    const startTime = Date.now();
    const inputShape = shapeOf(dataset);
    const kind = resolveDatasetKind(identity);

    this.logger.info('Initializing data cleanup', { identity, kind, ...inputShape });

    try {
      const cleaned = cleanByIdentity(dataset, identity, this.logger);
      const outputShape = shapeOf(cleaned);

      this.logger.info('Data cleaning complete', {
        identity,
        rows: outputShape.rows,
        columns: outputShape.columns,
        droppedRows: inputShape.rows - outputShape.rows
      });

      return {
        dataset: cleaned,
        kind,
        inputShape,
        outputShape,
        durationMs: Date.now() - startTime
      };
    } catch (error) {
      this.logger.error('Data cleaning failed', {
        identity,
        kind,
        error: getErrorMessage(error),
        stack: getErrorStack(error)
      });
      throw error;
    }
  }
}

export default CleaningPipeline;
