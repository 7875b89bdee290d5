import { describe, it, expect } from "vitest";
import { config, envSchema } from "../src/server/config.js";

describe("config", () => {
  describe("config values", () => {
    it("should read the test environment", () => {
      expect(config.NODE_ENV).toBe("test");
      expect(config.VAULT_SERVICE_TOKEN).toBe("test-token");
      expect(config.AWS_REGION).toBe("us-east-1");
    });

    it("should leave Sentry disabled without a DSN", () => {
      expect(config.SENTRY_DSN).toBeUndefined();
    });
  });

  describe("envSchema", () => {
    it("should apply defaults", () => {
      const parsed = envSchema.parse({});

      expect(parsed).toMatchObject({
        NODE_ENV: "development",
        HOST: "0.0.0.0",
        PORT: 8000,
        LOG_LEVEL: "info",
        VAULT_ADDR: "http://127.0.0.1:8200",
        VAULT_KV_MOUNT: "secrets",
        VAULT_KV_PATH: "aws/credentials",
        AWS_REGION: "us-east-1",
        S3_FORCE_PATH_STYLE: false,
        SENTRY_ENABLE_LOGS: true,
      });
      expect(parsed.VAULT_SERVICE_TOKEN).toBeUndefined();
    });

    it("should treat a blank token as missing", () => {
      expect(envSchema.parse({ VAULT_SERVICE_TOKEN: "  " }).VAULT_SERVICE_TOKEN).toBeUndefined();
    });

    it("should parse boolean-like flags", () => {
      expect(envSchema.parse({ S3_FORCE_PATH_STYLE: "yes" }).S3_FORCE_PATH_STYLE).toBe(true);
      expect(envSchema.parse({ S3_FORCE_PATH_STYLE: "off" }).S3_FORCE_PATH_STYLE).toBe(false);
    });

    it("should reject an invalid port", () => {
      expect(envSchema.safeParse({ PORT: "not-a-port" }).success).toBe(false);
    });

    it("should reject a malformed Vault address", () => {
      expect(envSchema.safeParse({ VAULT_ADDR: "vault" }).success).toBe(false);
    });
  });
});
