import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { generateUniqueBucketName } from "./bucket-name.js";
import { AppError } from "./errors.js";
import { sentryCountMetric } from "./observability.js";
import type { BucketManager } from "./s3.js";

export type AppContext = {
  bucketManager: BucketManager;
};

const createBucketSchema = z.object({
  bucket_name: z.string().trim().min(1),
});

const bucketNameParamsSchema = z.object({
  bucket_name: z.string().min(1),
});

const messageResponse = {
  type: "object",
  properties: { message: { type: "string" } },
  required: ["message"],
} as const;

const bucketNameProperty = {
  type: "string",
  minLength: 1,
  description: "Name of the S3 bucket",
} as const;

// Fastify validation only documents the inputs; zod produces the 400s.
const routeSchemas = {
  root: {
    summary: "Welcome message",
    response: { 200: messageResponse },
  },
  health: {
    summary: "Liveness check",
    response: {
      200: { type: "object", properties: { status: { type: "string" } }, required: ["status"] },
    },
  },
  generateName: {
    summary: "Suggest a unique, S3-compliant bucket name",
    response: {
      200: {
        type: "object",
        properties: { suggested_bucket_name: { type: "string" } },
        required: ["suggested_bucket_name"],
      },
    },
  },
  createBucket: {
    summary: "Create an S3 bucket in the configured region",
    body: {
      type: "object",
      properties: { bucket_name: bucketNameProperty },
      required: ["bucket_name"],
    },
    response: { 200: messageResponse },
  },
  listBuckets: {
    summary: "List the S3 buckets of the account",
    response: {
      200: {
        type: "object",
        properties: {
          buckets: {
            type: "array",
            items: {
              type: "object",
              properties: {
                Name: { type: "string" },
                CreationDate: { type: ["string", "null"], format: "date-time" },
              },
              required: ["Name", "CreationDate"],
            },
          },
        },
        required: ["buckets"],
      },
    },
  },
  deleteBucket: {
    summary: "Empty and delete an S3 bucket",
    params: {
      type: "object",
      properties: { bucket_name: bucketNameProperty },
      required: ["bucket_name"],
    },
    response: { 200: messageResponse },
  },
};

export const registerBucketRoutes = (app: FastifyInstance, context: AppContext): void => {
  const { bucketManager } = context;

  app.get("/", { schema: routeSchemas.root }, async (request) => {
    request.log.info("Accessed root endpoint");
    return { message: "Welcome to the bucket keeper API. Use /docs for API documentation." };
  });

  app.get("/health", { schema: routeSchemas.health }, async () => {
    return { status: "ok" };
  });

  app.get("/generate-unique-bucket-name", { schema: routeSchemas.generateName }, async (request) => {
    const suggestedName = generateUniqueBucketName();
    request.log.info({ bucket: suggestedName }, "Generated unique bucket name suggestion");
    return { suggested_bucket_name: suggestedName };
  });

  app.post(
    "/create-s3-bucket",
    { schema: routeSchemas.createBucket, attachValidation: true },
    async (request) => {
      const parsed = createBucketSchema.safeParse(request.body);

      if (!parsed.success) {
        throw new AppError("Invalid create bucket payload", 400, true);
      }

      const bucketName = parsed.data.bucket_name;
      request.log.info({ bucket: bucketName }, "Received request to create S3 bucket");

      const created = await bucketManager.createBucket(bucketName);
      sentryCountMetric("buckets.create", 1, { result: created ? "success" : "failure" });

      if (!created) {
        throw new AppError(
          `Failed to create bucket '${bucketName}'. Check logs for details.`,
          500,
          true,
        );
      }

      return {
        message: `Bucket '${bucketName}' creation initiated successfully in region '${bucketManager.region}'.`,
      };
    },
  );

  app.get("/list-s3-buckets", { schema: routeSchemas.listBuckets }, async () => {
    const buckets = await bucketManager.listBuckets();
    return { buckets };
  });

  app.delete(
    "/delete-s3-bucket/:bucket_name",
    { schema: routeSchemas.deleteBucket, attachValidation: true },
    async (request) => {
      const parsed = bucketNameParamsSchema.safeParse(request.params);

      if (!parsed.success) {
        throw new AppError("Invalid bucket name", 400, true);
      }

      const bucketName = parsed.data.bucket_name;
      request.log.info({ bucket: bucketName }, "Received request to delete S3 bucket");

      try {
        await bucketManager.deleteBucket(bucketName);
        sentryCountMetric("buckets.delete", 1, { result: "success" });
      } catch (error) {
        sentryCountMetric("buckets.delete", 1, { result: "failure" });
        throw error;
      }

      return { message: `S3 bucket '${bucketName}' deleted successfully.` };
    },
  );
};
