import { vi } from "vitest";

// Set up required environment variables for tests BEFORE any imports
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "silent";
process.env.VAULT_ADDR = "http://127.0.0.1:8200";
process.env.VAULT_SERVICE_TOKEN = "test-token";
process.env.VAULT_KV_MOUNT = "secrets";
process.env.VAULT_KV_PATH = "aws/credentials";
process.env.AWS_REGION = "us-east-1";
delete process.env.SENTRY_DSN;
delete process.env.S3_ENDPOINT;

// An invalid configuration must fail the test instead of ending the run.
vi.spyOn(process, "exit").mockImplementation((code) => {
  throw new Error(`process.exit(${String(code)}) called during tests`);
});
