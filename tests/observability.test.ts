import { describe, it, expect } from "vitest";
import { sanitizeAttributes, trackLatency } from "../src/server/observability.js";

describe("observability", () => {
  describe("sanitizeAttributes", () => {
    it("should redact credentials at any depth", () => {
      expect(
        sanitizeAttributes({
          bucket: "alpha",
          access_key: "AK1",
          nested: { secretAccessKey: "SK1", count: 2 },
          list: [{ "X-Vault-Token": "test-token" }, "plain"],
        }),
      ).toEqual({
        bucket: "alpha",
        access_key: "[REDACTED]",
        nested: { secretAccessKey: "[REDACTED]", count: 2 },
        list: [{ "X-Vault-Token": "[REDACTED]" }, "plain"],
      });
    });
  });

  describe("trackLatency", () => {
    it("should return the result of the call", async () => {
      await expect(trackLatency("s3.list_buckets", async () => "done")).resolves.toBe("done");
    });

    it("should rethrow the original failure", async () => {
      const failure = new Error("boom");

      await expect(
        trackLatency("vault.read_secret", async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);
    });
  });
});
