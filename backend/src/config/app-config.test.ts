import { loadConfig } from './app-config';
import { ConfigurationError } from '../utils/application-error';

describe('loadConfig', () => {
  it('should build an s3 configuration with defaults', () => {
    const config = loadConfig({ DOCUMENTS_BUCKET_NAME: 'test-bucket' });

    expect(config).toEqual({
      serviceName: 'transaction-documents',
      storage: {
        driver: 's3',
        bucketName: 'test-bucket',
        region: 'us-east-1',
        keyPrefix: undefined,
        endpoint: undefined,
        forcePathStyle: false,
      },
      corruptMetadataPolicy: 'fail-fast',
    });
  });

  it('should read every s3 setting', () => {
    const config = loadConfig({
      OBJECT_STORE_DRIVER: 's3',
      DOCUMENTS_BUCKET_NAME: 'test-bucket',
      DOCUMENTS_KEY_PREFIX: 'documents',
      AWS_REGION: 'eu-west-3',
      S3_ENDPOINT: 'http://localhost:9000',
      S3_FORCE_PATH_STYLE: 'true',
      CORRUPT_METADATA_POLICY: 'skip',
      SERVICE_NAME: 'documents-api',
    });

    expect(config).toEqual({
      serviceName: 'documents-api',
      storage: {
        driver: 's3',
        bucketName: 'test-bucket',
        region: 'eu-west-3',
        keyPrefix: 'documents',
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      },
      corruptMetadataPolicy: 'skip',
    });
  });

  it('should not require a bucket for the memory driver', () => {
    expect(loadConfig({ OBJECT_STORE_DRIVER: 'memory' }).storage).toEqual({ driver: 'memory' });
  });

  it('should require a bucket for the s3 driver', () => {
    expect(() => loadConfig({})).toThrow('DOCUMENTS_BUCKET_NAME is required for the s3 object store');
  });

  it.each([
    [{ OBJECT_STORE_DRIVER: 'ftp' }, "OBJECT_STORE_DRIVER must be 's3' or 'memory', got 'ftp'"],
    [{ DOCUMENTS_BUCKET_NAME: 'b', S3_FORCE_PATH_STYLE: 'yes' }, "S3_FORCE_PATH_STYLE must be 'true' or 'false'"],
    [{ OBJECT_STORE_DRIVER: 'memory', CORRUPT_METADATA_POLICY: 'ignore' }, 'CORRUPT_METADATA_POLICY must be one of: fail-fast, skip'],
  ])('should reject %p', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });

  it('should raise ConfigurationError naming the variable', () => {
    const error = (() => {
      try {
        loadConfig({ OBJECT_STORE_DRIVER: 'ftp' });
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.code).toBe('CONFIGURATION_INVALID');
      expect(error.context.metadata).toEqual({ variable: 'OBJECT_STORE_DRIVER' });
    }
  });
});
