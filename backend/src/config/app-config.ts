import { CorruptMetadataPolicy } from '../interfaces/document.interface';
import { ConfigurationError } from '../utils/application-error';
import { createErrorContext } from '../utils/error-context';

export type StorageConfig =
  | { driver: 'memory' }
  | {
      driver: 's3';
      bucketName: string;
      region: string;
      keyPrefix?: string;
      endpoint?: string;
      forcePathStyle: boolean;
    };

export interface AppConfig {
  serviceName: string;
  storage: StorageConfig;
  corruptMetadataPolicy: CorruptMetadataPolicy;
}

const CORRUPT_METADATA_POLICIES: readonly CorruptMetadataPolicy[] = ['fail-fast', 'skip'];

function configError(message: string, variable: string): ConfigurationError {
  return new ConfigurationError(message, createErrorContext('LOAD_CONFIG', undefined, undefined, { variable }));
}

function parseBoolean(value: string | undefined, variable: string): boolean {
  if (value === undefined || value === '') {
    return false;
  }
  if (value === 'true' || value === 'false') {
    return value === 'true';
  }
  throw configError(`${variable} must be 'true' or 'false'`, variable);
}

function parseCorruptMetadataPolicy(value: string | undefined): CorruptMetadataPolicy {
  if (!value) {
    return 'fail-fast';
  }
  const policy = CORRUPT_METADATA_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw configError(
      `CORRUPT_METADATA_POLICY must be one of: ${CORRUPT_METADATA_POLICIES.join(', ')}`,
      'CORRUPT_METADATA_POLICY'
    );
  }
  return policy;
}

function parseStorageConfig(env: NodeJS.ProcessEnv): StorageConfig {
  const driver = env.OBJECT_STORE_DRIVER || 's3';

  if (driver === 'memory') {
    return { driver: 'memory' };
  }

  if (driver !== 's3') {
    throw configError(`OBJECT_STORE_DRIVER must be 's3' or 'memory', got '${driver}'`, 'OBJECT_STORE_DRIVER');
  }

  const bucketName = env.DOCUMENTS_BUCKET_NAME;
  if (!bucketName) {
    throw configError('DOCUMENTS_BUCKET_NAME is required for the s3 object store', 'DOCUMENTS_BUCKET_NAME');
  }

  return {
    driver: 's3',
    bucketName,
    region: env.AWS_REGION || 'us-east-1',
    keyPrefix: env.DOCUMENTS_KEY_PREFIX || undefined,
    endpoint: env.S3_ENDPOINT || undefined,
    forcePathStyle: parseBoolean(env.S3_FORCE_PATH_STYLE, 'S3_FORCE_PATH_STYLE'),
  };
}

/**
 * Read service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    serviceName: env.SERVICE_NAME || 'transaction-documents',
    storage: parseStorageConfig(env),
    corruptMetadataPolicy: parseCorruptMetadataPolicy(env.CORRUPT_METADATA_POLICY),
  };
}
