import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import {
  AuthenticationError,
  ConfigurationError,
  IncompleteCredentialsError,
  SecretStoreError,
  toErrorMessage,
  type SecretStoreErrorKind,
} from "./errors.js";
import { trackLatency } from "./observability.js";
import type { AwsCredentials } from "./types.js";

export type VaultClientOptions = {
  address: string;
  token: string | undefined;
  mount: string;
  path: string;
  logger: FastifyBaseLogger;
  fetch?: typeof fetch;
};

type VaultRequestTarget = "token_lookup" | "secret";

const vaultErrorBodySchema = z.object({
  errors: z.array(z.string()).default([]),
});

const kvV2ReadSchema = z.object({
  data: z.object({
    data: z.record(z.unknown()).nullable(),
  }),
});

const readNonEmptyString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === "string" && value.trim() ? value : undefined;
};

const getCauseCode = (error: unknown): string | undefined => {
  if (!(error instanceof Error) || !error.cause || typeof error.cause !== "object") {
    return undefined;
  }

  const code = "code" in error.cause ? error.cause.code : undefined;
  return typeof code === "string" ? code : undefined;
};

/**
 * Reads AWS credentials from a Vault KV v2 secret over Vault's HTTP API.
 * Use {@link VaultClient.connect}, which verifies the token before returning.
 */
export class VaultClient {
  readonly address: string;
  readonly mount: string;
  readonly path: string;
  private readonly token: string;
  private readonly logger: FastifyBaseLogger;
  private readonly fetchImpl: typeof fetch;

  private constructor(options: VaultClientOptions & { token: string }) {
    this.address = options.address.replace(/\/+$/, "");
    this.mount = options.mount;
    this.path = options.path;
    this.token = options.token;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  static async connect(options: VaultClientOptions): Promise<VaultClient> {
    const token = options.token?.trim();

    if (!token) {
      options.logger.error("VAULT_SERVICE_TOKEN is not set. Cannot initialize Vault client.");
      throw new ConfigurationError("VAULT_SERVICE_TOKEN must be provided.");
    }

    const client = new VaultClient({ ...options, token });
    await client.verifyToken();
    options.logger.info({ address: client.address }, "Authenticated to Vault");
    return client;
  }

  /** Path of the secret as Vault's KV v2 HTTP API addresses it. */
  get secretPath(): string {
    return `${this.mount}/data/${this.path}`;
  }

  async getAwsCredentials(): Promise<AwsCredentials> {
    this.logger.info({ path: this.secretPath }, "Reading AWS credentials from Vault");

    const response = await this.request("read_secret", `/v1/${this.secretPath}`);

    if (!response.ok) {
      throw await this.toSecretStoreError(response, "secret");
    }

    const body: unknown = await response.json().catch(() => null);
    const parsed = kvV2ReadSchema.safeParse(body);

    if (!parsed.success || !parsed.data.data.data) {
      this.logger.error(
        { path: this.secretPath },
        "No data found at Vault path or secret structure is unexpected",
      );
      throw new IncompleteCredentialsError(
        `Failed to retrieve data from Vault path: ${this.secretPath}`,
      );
    }

    const secret = parsed.data.data.data;
    const accessKeyId = readNonEmptyString(secret, "access_key");
    const secretAccessKey = readNonEmptyString(secret, "secret_access_key");

    if (!accessKeyId || !secretAccessKey) {
      this.logger.error(
        { path: this.secretPath },
        "AWS credentials from Vault are incomplete (missing access_key or secret_access_key)",
      );
      throw new IncompleteCredentialsError("Incomplete AWS credentials retrieved from Vault.");
    }

    const sessionToken =
      readNonEmptyString(secret, "session_token") ?? readNonEmptyString(secret, "security_token");

    this.logger.info({ path: this.secretPath }, "Retrieved AWS credentials from Vault");

    return sessionToken
      ? { accessKeyId, secretAccessKey, sessionToken }
      : { accessKeyId, secretAccessKey };
  }

  private async verifyToken(): Promise<void> {
    const response = await this.request("lookup_self", "/v1/auth/token/lookup-self");

    if (response.status === 401 || response.status === 403) {
      this.logger.error("Failed to authenticate to Vault. Check VAULT_SERVICE_TOKEN validity.");
      throw new AuthenticationError("Failed to authenticate to Vault with service token.");
    }

    if (!response.ok) {
      throw await this.toSecretStoreError(response, "token_lookup");
    }

    await response.body?.cancel();
  }

  private async request(operation: string, urlPath: string): Promise<Response> {
    try {
      return await trackLatency(
        `vault.${operation}`,
        () =>
          this.fetchImpl(`${this.address}${urlPath}`, {
            method: "GET",
            headers: {
              "X-Vault-Token": this.token,
            },
          }),
        { address: this.address },
      );
    } catch (error) {
      if (getCauseCode(error) === "ECONNREFUSED") {
        this.logger.error({ address: this.address }, "Vault connection refused");
        throw new SecretStoreError(
          "ConnectionRefused",
          `Vault connection refused. Is Vault running and accessible at ${this.address}?`,
        );
      }

      this.logger.error({ err: error, address: this.address }, "Vault request failed");
      throw new SecretStoreError(
        "GenericBackendError",
        `Internal error while fetching from Vault: ${toErrorMessage(error)}`,
      );
    }
  }

  private async toSecretStoreError(
    response: Response,
    target: VaultRequestTarget,
  ): Promise<SecretStoreError> {
    const body: unknown = await response.json().catch(() => ({}));
    const parsed = vaultErrorBodySchema.safeParse(body);
    const backendErrors = parsed.success ? parsed.data.errors : [];

    const [kind, hint] =
      target === "secret"
        ? this.classifySecretRead(response.status)
        : this.classifyTokenLookup(response.status);
    this.logger.error(
      { status: response.status, kind, backendErrors, target, address: this.address },
      "Vault returned an error",
    );

    return new SecretStoreError(kind, hint, backendErrors);
  }

  private classifyTokenLookup(status: number): [SecretStoreErrorKind, string] {
    if (status === 404) {
      return [
        "PathNotFound",
        `Vault token lookup endpoint not found at ${this.address}. Check VAULT_ADDR.`,
      ];
    }

    return ["GenericBackendError", `Vault error: HTTP ${status}.`];
  }

  private classifySecretRead(status: number): [SecretStoreErrorKind, string] {
    switch (status) {
      case 403:
        return [
          "PermissionDenied",
          `Permission denied. Check that VAULT_SERVICE_TOKEN has 'read' capability on '${this.secretPath}'.`,
        ];
      case 401:
        return ["Unauthorized", "Vault authentication failed (token may be expired or invalid)."];
      case 404:
        return [
          "PathNotFound",
          `Vault path '${this.secretPath}' not found. Check the path and mount point.`,
        ];
      default:
        return ["GenericBackendError", `Vault error: HTTP ${status}.`];
    }
  }
}
