import { z } from 'zod';
import type { StorageEvent } from '@retail-etl/types';
import { InvalidEventError } from '../utils/errorUtils';

const StorageEventSchema = z.object({
  Records: z.array(z.object({
    s3: z.object({
      bucket: z.object({ name: z.string().min(1) }),
      object: z.object({ key: z.string().min(1) })
    })
  })).min(1)
});

export interface SourceObject {
  bucket: string;
  key: string;
  /** Base name of the object, e.g. `sales_2016.csv` */
  identity: string;
  /** Identity up to its first dot, e.g. `sales_2016` */
  tableName: string;
}

// Notification keys are URL-encoded with '+' for spaces
function decodeObjectKey(key: string): string {
  try {
    return decodeURIComponent(key.replace(/\+/g, ' '));
  } catch {
    return key;
  }
}

/**
 * Pull the source object out of the first record of a storage notification.
 */
export function parseStorageEvent(event: unknown): SourceObject {
  const parsed = StorageEventSchema.safeParse(event);
  if (!parsed.success) {
    throw new InvalidEventError(
      `Invalid storage event: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      { issues: parsed.error.issues.length }
    );
  }

  const record: StorageEvent['Records'][number] = parsed.data.Records[0];
  const key = decodeObjectKey(record.s3.object.key);
  const identity = key.split('/').pop() ?? key;
  const tableName = identity.split('.')[0];

  if (!identity || !tableName) {
    throw new InvalidEventError(`Cannot derive a table name from object key "${key}"`, { key });
  }

  return { bucket: record.s3.bucket.name, key, identity, tableName };
}
