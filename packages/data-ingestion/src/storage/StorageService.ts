/**
 * Storage Service for S3 object access
 * Reads raw exports and writes processed files for the warehouse loader
 */

import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import { ObjectNotFoundError } from '../utils/errorUtils';

export interface StorageConfig {
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

/**
 * What the ETL orchestrator needs from object storage.
 */
export interface ObjectStore {
  exists(bucket: string, key: string): Promise<boolean>;
  getObjectBytes(bucket: string, key: string): Promise<Buffer>;
  putObject(bucket: string, key: string, body: string | Buffer, contentType?: string): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.name === 'NotFound' || error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

export class StorageService implements ObjectStore {
  private s3Client: S3Client;

  constructor(config: StorageConfig, client?: S3Client) {
    // Credentials come from the execution role / default provider chain
    this.s3Client = client ?? new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle || false
    });
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.s3Client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async getObjectBytes(bucket: string, key: string): Promise<Buffer> {
    try {
      const response = await this.s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new ObjectNotFoundError(bucket, key);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(bucket, key);
      }
      throw error;
    }
  }

  async putObject(bucket: string, key: string, body: string | Buffer, contentType = 'text/csv'): Promise<void> {
    await this.s3Client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType
    }));
  }
}
