import type { HandlerResponse } from '@retail-etl/types';
import { WarehouseLoader, createWarehousePool } from '@retail-etl/database';
import { ETLOrchestrator } from './workers/ETLOrchestrator';
import { StorageService } from './storage/StorageService';
import { loadConfig } from './utils/config';
import logger from './utils/logger';
import { getErrorMessage } from './utils/errorUtils';

let orchestrator: ETLOrchestrator | undefined;

// Built on first use so a warm runtime reuses the clients
function getOrchestrator(): ETLOrchestrator {
  if (!orchestrator) {
    const config = loadConfig();
    logger.level = config.logLevel;

    orchestrator = new ETLOrchestrator({
      storage: new StorageService({ region: config.region }),
      loader: new WarehouseLoader(createWarehousePool(config.warehouse), {
        iamRoleArn: config.warehouse.iamRoleArn,
        logger
      }),
      targetBucket: config.targetBucket,
      sourceEncoding: config.sourceEncoding,
      logger
    });
  }
  return orchestrator;
}

/**
 * Storage-notification entry point.
 */
export async function handler(event: unknown): Promise<HandlerResponse> {
  try {
    return await getOrchestrator().processEvent(event);
  } catch (error) {
    logger.error('ETL handler initialisation failed', { error: getErrorMessage(error) });
    return { statusCode: 500, body: `Error processing data: ${getErrorMessage(error)}` };
  }
}
