import { DatasetKind } from '@retail-etl/types';
import type { DatasetCleaner } from './DatasetCleaner';
import {
  dropMissing,
  mapColumn,
  renameColumn,
  replaceValues,
  setConstant
} from '../dataset/stages';
import {
  emailDomain,
  normalizeDate,
  normalizeNumeric,
  stripDigits,
  stripPunctuation,
  toBoolean
} from '../validation/DataNormalizer';

export const EDUCATION_LEVEL = 'College Degree';

export const customersCleaner: DatasetCleaner = {
  kind: DatasetKind.CUSTOMERS,
  label: 'customers',
  stages: [
    // Source export truncates the header
    renameColumn('LastNa', 'LastName', { ifPresent: true }),
    setConstant('EducationLevel', EDUCATION_LEVEL),
    replaceValues('MaritalStatus', { M: 'Married', S: 'Single' }),
    replaceValues('Prefix', { MrR: 'MR' }),
    mapColumn('FirstName', stripDigits),
    mapColumn('Occupation', stripPunctuation),
    mapColumn('EmailAddress', emailDomain),
    mapColumn('BirthDate', normalizeDate),
    mapColumn('CustomerKey', normalizeNumeric),
    mapColumn('HomeOwner', toBoolean),
    dropMissing('CustomerKey')
  ]
};
