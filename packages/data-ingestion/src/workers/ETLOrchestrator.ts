import type { HandlerResponse } from '@retail-etl/types';
import type { TableLoader } from '@retail-etl/database';
import { CsvParser } from '../parsers/CsvParser';
import { toCsv } from '../parsers/CsvWriter';
import type { ObjectStore } from '../storage/StorageService';
import { CleaningPipeline } from '../validation/CleaningPipeline';
import { parseStorageEvent } from './storageEvent';
import defaultLogger, { Logger } from '../utils/logger';
import { ObjectNotFoundError, getErrorMessage, getErrorStack } from '../utils/errorUtils';

export interface ETLOrchestratorOptions {
  storage: ObjectStore;
  loader: TableLoader;
  targetBucket: string;
  sourceEncoding?: BufferEncoding;
  logger?: Logger;
}

export interface ETLRunSummary {
  identity: string;
  tableName: string;
  targetKey: string;
  rows: number;
  columns: number;
}

export const SUCCESS_BODY = 'Data cleaned and uploaded to Redshift successfully.';

/**
 * ETL Orchestrator: storage event -> raw CSV -> cleaned CSV in the processed
 * bucket -> warehouse COPY. All I/O collaborators are injected.
 */
export class ETLOrchestrator {
  private readonly storage: ObjectStore;
  private readonly loader: TableLoader;
  private readonly targetBucket: string;
  private readonly csvParser: CsvParser;
  private readonly cleaningPipeline: CleaningPipeline;
  private readonly logger: Logger;

  constructor(options: ETLOrchestratorOptions) {
    this.storage = options.storage;
    this.loader = options.loader;
    this.targetBucket = options.targetBucket;
    this.logger = options.logger ?? defaultLogger;
    this.csvParser = new CsvParser({ encoding: options.sourceEncoding ?? 'latin1' });
    this.cleaningPipeline = new CleaningPipeline({ logger: this.logger });
  }

  /**
   * Handle one storage notification. Never throws: failures become a 500
   * response and outputs already written stay where they are.
   */
  async processEvent(event: unknown): Promise<HandlerResponse> {
    this.logger.info('ETL run triggered', { event });

    try {
      const summary = await this.run(event);
      this.logger.info('ETL run completed', { ...summary });
      return { statusCode: 200, body: SUCCESS_BODY };
    } catch (error) {
      this.logger.error('Error occurred', { error: getErrorMessage(error), stack: getErrorStack(error) });
      return { statusCode: 500, body: `Error processing data: ${getErrorMessage(error)}` };
    }
  }

  async run(event: unknown): Promise<ETLRunSummary> {
    const source = parseStorageEvent(event);
    this.logger.info('Source object resolved', { bucket: source.bucket, key: source.key });

    if (!(await this.storage.exists(source.bucket, source.key))) {
      throw new ObjectNotFoundError(source.bucket, source.key);
    }

    const raw = await this.storage.getObjectBytes(source.bucket, source.key);
    this.logger.info('Successfully read file from storage', { key: source.key, bytes: raw.length });

    const dataset = await this.csvParser.parse(raw);
    this.logger.info('CSV file loaded', { columns: dataset.columns });

    const { dataset: cleaned, outputShape } = this.cleaningPipeline.clean(dataset, source.identity);

    const targetKey = `${source.tableName}_processed.csv`;
    await this.storage.putObject(this.targetBucket, targetKey, toCsv(cleaned));
    this.logger.info('Cleaned data uploaded', { bucket: this.targetBucket, key: targetKey });

    await this.loader.copyFromS3(source.tableName, { bucket: this.targetBucket, key: targetKey });

    return {
      identity: source.identity,
      tableName: source.tableName,
      targetKey,
      rows: outputShape.rows,
      columns: outputShape.columns
    };
  }
}

export default ETLOrchestrator;
