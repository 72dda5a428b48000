import { DatasetKind } from '@retail-etl/types';
import type { DatasetCleaner } from './DatasetCleaner';
import { dropMissing, fillMissing, oneHotExpand } from '../dataset/stages';

export const SOCIAL_MEDIA_COLUMN = 'Social Media Accounts';
export const NO_SOCIAL_MEDIA = 'NoSocialMedia';

/**
 * Output is `CustomerKey` plus one boolean column per network seen in this
 * file, so the column set changes with the input.
 */
export const customerSocialCleaner: DatasetCleaner = {
  kind: DatasetKind.CUSTOMER_SOCIAL,
  label: 'customer social media',
  stages: [
    dropMissing('CustomerKey'),
    fillMissing(SOCIAL_MEDIA_COLUMN, NO_SOCIAL_MEDIA),
    oneHotExpand(SOCIAL_MEDIA_COLUMN, ', ', ['CustomerKey'])
  ]
};
