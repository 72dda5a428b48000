import type { CopySource, TableLoader } from '@retail-etl/database';
import { ETLOrchestrator, SUCCESS_BODY } from '../ETLOrchestrator';
import { parseStorageEvent } from '../storageEvent';
import type { ObjectStore } from '../../storage/StorageService';
import { InvalidEventError } from '../../utils/errorUtils';

class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();

  async exists(bucket: string, key: string): Promise<boolean> {
    return this.objects.has(`${bucket}/${key}`);
  }

  async getObjectBytes(bucket: string, key: string): Promise<Buffer> {
    const body = this.objects.get(`${bucket}/${key}`);
    if (!body) {
      throw new Error(`no object ${bucket}/${key}`);
    }
    return body;
  }

  async putObject(bucket: string, key: string, body: string | Buffer): Promise<void> {
    this.objects.set(`${bucket}/${key}`, typeof body === 'string' ? Buffer.from(body) : body);
  }
}

function storageEvent(bucket: string, key: string) {
  return { Records: [{ s3: { bucket: { name: bucket }, object: { key } } }] };
}

describe('parseStorageEvent', () => {
  it('should derive identity and table name from the object key', () => {
    expect(parseStorageEvent(storageEvent('raw', 'uploads/2017/sales_2017.csv'))).toEqual({
      bucket: 'raw',
      key: 'uploads/2017/sales_2017.csv',
      identity: 'sales_2017.csv',
      tableName: 'sales_2017'
    });
  });

  it('should decode URL-encoded keys', () => {
    expect(parseStorageEvent(storageEvent('raw', 'new+files/returns%20copy.csv')).identity).toBe('returns copy.csv');
  });

  it('should reject events without records', () => {
    expect(() => parseStorageEvent({ Records: [] })).toThrow(InvalidEventError);
    expect(() => parseStorageEvent({})).toThrow(InvalidEventError);
  });
});

describe('ETLOrchestrator', () => {
  let storage: InMemoryObjectStore;
  let copyFromS3: jest.Mock<Promise<void>, [string, CopySource]>;
  let orchestrator: ETLOrchestrator;

  beforeEach(() => {
    storage = new InMemoryObjectStore();
    copyFromS3 = jest.fn<Promise<void>, [string, CopySource]>().mockResolvedValue(undefined);
    const loader: TableLoader = { copyFromS3 };
    orchestrator = new ETLOrchestrator({ storage, loader, targetBucket: 'processed' });
  });

  it('should clean the file, write it to the target bucket and load it', async () => {
    storage.objects.set(
      'raw/returns.csv',
      Buffer.from('ReturnDate,TerritoryKey,ProductKey,ReturnQuantity\n10/18/2015,9,312,1\n01/18/2016,10,310,0\n')
    );

    const response = await orchestrator.processEvent(storageEvent('raw', 'returns.csv'));

    expect(response).toEqual({ statusCode: 200, body: SUCCESS_BODY });
    expect(storage.objects.get('processed/returns_processed.csv')?.toString()).toBe('2015-10-18,9,312,1\n');
    expect(copyFromS3).toHaveBeenCalledTimes(1);
    expect(copyFromS3).toHaveBeenCalledWith('returns', { bucket: 'processed', key: 'returns_processed.csv' });
  });

  it('should pass unknown files through unchanged', async () => {
    storage.objects.set('raw/inventory.csv', Buffer.from('sku,count\nA-1,3\n'));

    const summary = await orchestrator.run(storageEvent('raw', 'inventory.csv'));

    expect(summary).toEqual({
      identity: 'inventory.csv',
      tableName: 'inventory',
      targetKey: 'inventory_processed.csv',
      rows: 1,
      columns: 2
    });
    expect(storage.objects.get('processed/inventory_processed.csv')?.toString()).toBe('A-1,3\n');
  });

  it('should not write rows for blank lines in the source', async () => {
    storage.objects.set('raw/inventory.csv', Buffer.from('sku,count\nA-1,3\n\nB-2,4\n\n'));

    const summary = await orchestrator.run(storageEvent('raw', 'inventory.csv'));

    expect(summary.rows).toBe(2);
    expect(storage.objects.get('processed/inventory_processed.csv')?.toString()).toBe('A-1,3\nB-2,4\n');
  });

  it('should answer 500 without writing when the object does not exist', async () => {
    const response = await orchestrator.processEvent(storageEvent('raw', 'customers.csv'));

    expect(response).toEqual({
      statusCode: 500,
      body: 'Error processing data: File customers.csv not found in bucket raw'
    });
    expect(storage.objects.size).toBe(0);
    expect(copyFromS3).not.toHaveBeenCalled();
  });

  it('should answer 500 and skip the load when cleaning fails', async () => {
    storage.objects.set('raw/products.csv', Buffer.from('ProductKey\n1\n'));

    const response = await orchestrator.processEvent(storageEvent('raw', 'products.csv'));

    expect(response.statusCode).toBe(500);
    expect(response.body).toMatch(/^Error processing data: Column "ProductSubcategoryKey" is required/);
    expect(storage.objects.has('processed/products_processed.csv')).toBe(false);
    expect(copyFromS3).not.toHaveBeenCalled();
  });

  it('should report warehouse failures after the processed file was written', async () => {
    storage.objects.set('raw/inventory.csv', Buffer.from('sku\nA-1\n'));
    copyFromS3.mockRejectedValueOnce(new Error('connection refused'));

    const response = await orchestrator.processEvent(storageEvent('raw', 'inventory.csv'));

    expect(response).toEqual({ statusCode: 500, body: 'Error processing data: connection refused' });
    expect(storage.objects.has('processed/inventory_processed.csv')).toBe(true);
  });

  it('should answer 500 for a malformed event', async () => {
    const response = await orchestrator.processEvent({ Records: 'nope' });

    expect(response.statusCode).toBe(500);
    expect(response.body).toMatch(/^Error processing data: Invalid storage event/);
  });
});
