import { DatasetIdentity, DatasetKind, TabularDataset } from '@retail-etl/types';
import { DatasetCleaner, runCleaner } from './DatasetCleaner';
import { customersCleaner } from './CustomersCleaner';
import { customerSocialCleaner } from './CustomerSocialCleaner';
import { salesCleaner } from './SalesCleaner';
import { returnsCleaner } from './ReturnsCleaner';
import { productsCleaner } from './ProductsCleaner';
import defaultLogger, { Logger } from '../utils/logger';

// One cleaner per kind; a kind without an entry does not compile
export const CLEANERS: Readonly<Record<DatasetKind, DatasetCleaner>> = {
  [DatasetKind.CUSTOMERS]: customersCleaner,
  [DatasetKind.CUSTOMER_SOCIAL]: customerSocialCleaner,
  [DatasetKind.SALES]: salesCleaner,
  [DatasetKind.RETURNS]: returnsCleaner,
  [DatasetKind.PRODUCTS]: productsCleaner
};

const IDENTITY_KINDS: Readonly<Record<DatasetIdentity, DatasetKind>> = {
  [DatasetIdentity.CUSTOMERS]: DatasetKind.CUSTOMERS,
  [DatasetIdentity.CUSTOMERS_NEW]: DatasetKind.CUSTOMER_SOCIAL,
  [DatasetIdentity.SALES_2015]: DatasetKind.SALES,
  [DatasetIdentity.SALES_2016]: DatasetKind.SALES,
  [DatasetIdentity.SALES_2017]: DatasetKind.SALES,
  [DatasetIdentity.RETURNS]: DatasetKind.RETURNS,
  [DatasetIdentity.PRODUCTS]: DatasetKind.PRODUCTS
};

function isDatasetIdentity(identity: string): identity is DatasetIdentity {
  return Object.prototype.hasOwnProperty.call(IDENTITY_KINDS, identity);
}

export function listDatasetIdentities(): DatasetIdentity[] {
  return Object.values(DatasetIdentity);
}

/**
 * Kind for a source base name, or null when the file needs no cleaning.
 */
export function resolveDatasetKind(identity: string): DatasetKind | null {
  return isDatasetIdentity(identity) ? IDENTITY_KINDS[identity] : null;
}

/**
 * Run the cleaner registered for `identity`. Unknown identities are not an
 * error: the input dataset is returned as is.
 */
export function cleanByIdentity(
  dataset: TabularDataset,
  identity: string,
  logger: Logger = defaultLogger
): TabularDataset {
  const kind = resolveDatasetKind(identity);
  if (kind === null) {
    logger.info('No cleaning required for file', { identity });
    return dataset;
  }

  logger.info('Cleaning data for file', { identity, kind });
  return runCleaner(CLEANERS[kind], dataset, logger);
}

export { runCleaner };
export type { DatasetCleaner };
export { customersCleaner, customerSocialCleaner, salesCleaner, returnsCleaner, productsCleaner };
