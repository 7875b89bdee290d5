import {
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  ListBucketsCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  S3Client,
  type ObjectIdentifier,
} from "@aws-sdk/client-s3";
import type { FastifyBaseLogger } from "fastify";
import { BucketLock } from "./bucket-lock.js";
import {
  BucketOperationError,
  getProviderErrorCode,
  getProviderErrorMessage,
  toErrorMessage,
} from "./errors.js";
import { trackLatency } from "./observability.js";
import type {
  AwsCredentials,
  BucketDeletionState,
  BucketDescriptor,
  EmptyBucketResult,
} from "./types.js";

/** Region in which S3 rejects an explicit location constraint. */
export const DEFAULT_S3_REGION = "us-east-1";

export type BucketManagerOptions = {
  credentials: AwsCredentials;
  region: string;
  logger: FastifyBaseLogger;
  endpoint?: string;
  forcePathStyle?: boolean;
  client?: S3Client;
};

export type DeleteBucketOptions = {
  onStateChange?: (state: BucketDeletionState) => void;
};

const createFailureReasons: Record<string, string> = {
  BucketAlreadyExists: "already exists and is owned by another account",
  AccessDenied: "access denied for the configured credentials",
  InvalidAccessKeyId: "the configured AWS credentials are invalid",
  SignatureDoesNotMatch: "the configured AWS credentials are invalid",
};

const toObjectIdentifiers = (
  entries: { Key?: string; VersionId?: string }[] | undefined,
  withVersion: boolean,
): ObjectIdentifier[] => {
  const identifiers: ObjectIdentifier[] = [];

  for (const entry of entries ?? []) {
    if (!entry.Key) {
      continue;
    }

    identifiers.push(
      withVersion ? { Key: entry.Key, VersionId: entry.VersionId } : { Key: entry.Key },
    );
  }

  return identifiers;
};

export class BucketManager {
  readonly region: string;
  private readonly client: S3Client;
  private readonly logger: FastifyBaseLogger;
  private readonly lock = new BucketLock();

  constructor(options: BucketManagerOptions) {
    this.region = options.region;
    this.logger = options.logger;

    const { accessKeyId, secretAccessKey, sessionToken } = options.credentials;
    if (sessionToken) {
      this.logger.info("Initializing S3 client with temporary STS credentials");
    } else {
      this.logger.info("Initializing S3 client with static AWS credentials");
    }

    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        endpoint: options.endpoint,
        forcePathStyle: options.forcePathStyle,
        credentials: sessionToken
          ? { accessKeyId, secretAccessKey, sessionToken }
          : { accessKeyId, secretAccessKey },
      });
  }

  /**
   * Creates `bucketName` in the configured region. Resolves to `false` instead
   * of throwing when the provider refuses; the cause is only logged.
   */
  async createBucket(bucketName: string): Promise<boolean> {
    return this.lock.run(bucketName, () => this.createBucketUnlocked(bucketName));
  }

  private async createBucketUnlocked(bucketName: string): Promise<boolean> {
    this.logger.info({ bucket: bucketName, region: this.region }, "Creating S3 bucket");

    const command =
      this.region === DEFAULT_S3_REGION
        ? new CreateBucketCommand({ Bucket: bucketName })
        : new CreateBucketCommand({
            Bucket: bucketName,
            CreateBucketConfiguration: { LocationConstraint: this.region },
          });

    try {
      await trackLatency("s3.create_bucket", () => this.client.send(command), {
        bucket: bucketName,
      });
      this.logger.info({ bucket: bucketName }, "S3 bucket created");
      return true;
    } catch (error) {
      const code = getProviderErrorCode(error);

      if (!code) {
        this.logger.error({ err: error, bucket: bucketName }, "Unexpected error creating S3 bucket");
        return false;
      }

      if (code === "BucketAlreadyOwnedByYou") {
        this.logger.warn(
          { bucket: bucketName },
          "S3 bucket already exists and is owned by you; treating as created",
        );
        return true;
      }

      this.logger.error(
        {
          bucket: bucketName,
          region: this.region,
          code,
          providerMessage: getProviderErrorMessage(error),
        },
        `Failed to create S3 bucket: ${createFailureReasons[code] ?? "provider error"}`,
      );
      return false;
    }
  }

  /** Single unpaginated ListBuckets call. */
  async listBuckets(): Promise<BucketDescriptor[]> {
    const response = await trackLatency("s3.list_buckets", () =>
      this.client.send(new ListBucketsCommand({})),
    );

    const buckets = (response.Buckets ?? []).map((bucket) => ({
      Name: bucket.Name ?? "",
      CreationDate: bucket.CreationDate ? bucket.CreationDate.toISOString() : null,
    }));

    this.logger.info({ count: buckets.length }, "Listed S3 buckets");
    return buckets;
  }

  /**
   * Removes live objects, then object versions, then delete markers. Each
   * non-empty set goes out as one DeleteObjects call. Provider errors are
   * rethrown as-is.
   */
  async emptyBucket(bucketName: string): Promise<EmptyBucketResult> {
    this.logger.info({ bucket: bucketName }, "Emptying S3 bucket");

    try {
      const objects = await trackLatency(
        "s3.list_objects_v2",
        () => this.client.send(new ListObjectsV2Command({ Bucket: bucketName })),
        { bucket: bucketName },
      );
      const objectKeys = toObjectIdentifiers(objects.Contents, false);
      await this.deleteIdentifiers(bucketName, objectKeys, "objects");

      const versions = await trackLatency(
        "s3.list_object_versions",
        () => this.client.send(new ListObjectVersionsCommand({ Bucket: bucketName })),
        { bucket: bucketName },
      );
      const versionKeys = toObjectIdentifiers(versions.Versions, true);
      await this.deleteIdentifiers(bucketName, versionKeys, "versions");

      const markerKeys = toObjectIdentifiers(versions.DeleteMarkers, true);
      await this.deleteIdentifiers(bucketName, markerKeys, "delete markers");

      this.logger.info({ bucket: bucketName }, "S3 bucket emptied");

      return {
        objects: objectKeys.length,
        versions: versionKeys.length,
        deleteMarkers: markerKeys.length,
      };
    } catch (error) {
      const code = getProviderErrorCode(error);
      if (code) {
        this.logger.error(
          { bucket: bucketName, code, providerMessage: getProviderErrorMessage(error) },
          "Provider error while emptying S3 bucket",
        );
      } else {
        this.logger.error({ err: error, bucket: bucketName }, "Unexpected error emptying S3 bucket");
      }
      throw error;
    }
  }

  private async deleteIdentifiers(
    bucketName: string,
    identifiers: ObjectIdentifier[],
    label: string,
  ): Promise<void> {
    if (!identifiers.length) {
      return;
    }

    const response = await trackLatency(
      "s3.delete_objects",
      () =>
        this.client.send(
          new DeleteObjectsCommand({
            Bucket: bucketName,
            Delete: { Objects: identifiers },
          }),
        ),
      { bucket: bucketName, batch_size: identifiers.length },
    );

    // DeleteObjects answers 200 even when individual keys were refused.
    const failures = (response.Errors ?? []).map((failure) => ({
      key: failure.Key,
      versionId: failure.VersionId,
      code: failure.Code,
      providerMessage: failure.Message,
    }));

    if (failures.length) {
      this.logger.error(
        { bucket: bucketName, failures },
        `Failed to delete ${failures.length} of ${identifiers.length} ${label}`,
      );
    }

    this.logger.info(
      { bucket: bucketName, count: identifiers.length - failures.length },
      `Deleted ${label}`,
    );
  }

  /**
   * Empties and then deletes `bucketName`. Rejects with a
   * {@link BucketOperationError} on any failure; nothing is retried.
   */
  async deleteBucket(bucketName: string, options: DeleteBucketOptions = {}): Promise<void> {
    return this.lock.run(bucketName, () => this.deleteBucketUnlocked(bucketName, options));
  }

  private async deleteBucketUnlocked(
    bucketName: string,
    options: DeleteBucketOptions,
  ): Promise<void> {
    const transition = (state: BucketDeletionState): void => {
      this.logger.debug({ bucket: bucketName, state }, "Bucket deletion state changed");
      options.onStateChange?.(state);
    };

    transition("requested");

    try {
      transition("emptying");
      await this.emptyBucket(bucketName);
      transition("emptied");

      transition("deleting");
      await trackLatency(
        "s3.delete_bucket",
        () => this.client.send(new DeleteBucketCommand({ Bucket: bucketName })),
        { bucket: bucketName },
      );
      transition("deleted");
      this.logger.info({ bucket: bucketName }, "S3 bucket deleted");
    } catch (error) {
      transition("failed");
      throw this.toDeletionError(bucketName, error);
    }
  }

  private toDeletionError(bucketName: string, error: unknown): BucketOperationError {
    const code = getProviderErrorCode(error);

    if (!code) {
      this.logger.error({ err: error, bucket: bucketName }, "Unexpected error deleting S3 bucket");
      return new BucketOperationError(
        "InternalError",
        `An unexpected error occurred: ${toErrorMessage(error)}`,
      );
    }

    const providerMessage = getProviderErrorMessage(error);
    this.logger.error({ bucket: bucketName, code, providerMessage }, "Failed to delete S3 bucket");

    switch (code) {
      case "NoSuchBucket":
        return new BucketOperationError("NotFound", `Bucket '${bucketName}' not found.`, code);
      case "AccessDenied":
        return new BucketOperationError(
          "Forbidden",
          `Access denied to delete bucket '${bucketName}'. Check AWS permissions.`,
          code,
        );
      case "BucketNotEmpty":
        return new BucketOperationError(
          "Conflict",
          `Bucket '${bucketName}' is not empty after emptying attempt. Manual verification needed.`,
          code,
        );
      default:
        return new BucketOperationError(
          "InternalError",
          `AWS error during deletion: Code=${code}, Message=${providerMessage}`,
          code,
        );
    }
  }
}
