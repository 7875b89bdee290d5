import type { S3Client } from "@aws-sdk/client-s3";
import type { FastifyBaseLogger } from "fastify";
import type { AppConfig } from "./config.js";
import type { AppContext } from "./routes.js";
import { BucketManager } from "./s3.js";
import { VaultClient } from "./vault.js";

type ContextSettings = Pick<
  AppConfig,
  | "VAULT_ADDR"
  | "VAULT_SERVICE_TOKEN"
  | "VAULT_KV_MOUNT"
  | "VAULT_KV_PATH"
  | "AWS_REGION"
  | "S3_ENDPOINT"
  | "S3_FORCE_PATH_STYLE"
>;

export type ContextDependencies = {
  fetch?: typeof fetch;
  s3Client?: S3Client;
};

/**
 * Authenticates to Vault, reads the AWS credentials once and builds the
 * bucket manager from them. Any failure here must stop the process.
 */
export const createAppContext = async (
  settings: ContextSettings,
  logger: FastifyBaseLogger,
  dependencies: ContextDependencies = {},
): Promise<AppContext> => {
  logger.info(
    {
      vaultAddress: settings.VAULT_ADDR,
      vaultMount: settings.VAULT_KV_MOUNT,
      vaultPath: settings.VAULT_KV_PATH,
      region: settings.AWS_REGION,
    },
    "Initializing application context",
  );

  const vaultClient = await VaultClient.connect({
    address: settings.VAULT_ADDR,
    token: settings.VAULT_SERVICE_TOKEN,
    mount: settings.VAULT_KV_MOUNT,
    path: settings.VAULT_KV_PATH,
    logger,
    fetch: dependencies.fetch,
  });

  const credentials = await vaultClient.getAwsCredentials();

  const bucketManager = new BucketManager({
    credentials,
    region: settings.AWS_REGION,
    endpoint: settings.S3_ENDPOINT,
    forcePathStyle: settings.S3_FORCE_PATH_STYLE,
    logger,
    client: dependencies.s3Client,
  });

  logger.info("Vault client and bucket manager initialized");

  return { bucketManager };
};
