import { z } from 'zod';
import { ConfigurationError } from './errorUtils';

// Configuration schema
const EnvSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  TARGET_BUCKET: z.string().min(1).default('e-commerce-processed'),
  SOURCE_ENCODING: z.enum(['latin1', 'utf8', 'ascii']).default('latin1'),
  REDSHIFT_HOST: z.string().min(1),
  REDSHIFT_PORT: z.coerce.number().int().min(1).max(65535).default(5439),
  REDSHIFT_DATABASE: z.string().min(1),
  REDSHIFT_USER: z.string().min(1),
  REDSHIFT_PASSWORD: z.string().min(1),
  REDSHIFT_IAM_ROLE_ARN: z.string().startsWith('arn:'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info')
});

export interface PipelineConfig {
  region: string;
  targetBucket: string;
  sourceEncoding: BufferEncoding;
  logLevel: string;
  warehouse: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    iamRoleArn: string;
  };
}

/**
 * Read and validate pipeline configuration from environment variables.
 * Throws ConfigurationError naming every invalid or missing key.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    throw new ConfigurationError(`Invalid configuration: ${keys.join(', ')}`, keys);
  }

  const values = parsed.data;
  return {
    region: values.AWS_REGION,
    targetBucket: values.TARGET_BUCKET,
    sourceEncoding: values.SOURCE_ENCODING,
    logLevel: values.LOG_LEVEL,
    warehouse: {
      host: values.REDSHIFT_HOST,
      port: values.REDSHIFT_PORT,
      database: values.REDSHIFT_DATABASE,
      user: values.REDSHIFT_USER,
      password: values.REDSHIFT_PASSWORD,
      iamRoleArn: values.REDSHIFT_IAM_ROLE_ARN
    }
  };
}
