import type { StorageConfig } from '../interfaces/storage';

export const DEFAULT_REGION = 'us-east-1';

/**
 * S3 client settings from the environment. Credentials are left to the
 * SDK's default provider chain.
 */
export function getStorageConfig(
  env: NodeJS.ProcessEnv = process.env,
): StorageConfig {
  const region =
    env.AWS_REGION?.trim() || env.AWS_DEFAULT_REGION?.trim() || DEFAULT_REGION;
  const endpoint = env.KEYFISHER_S3_ENDPOINT?.trim() || undefined;

  return {
    region,
    endpoint,
    forcePathStyle: endpoint !== undefined,
  };
}
