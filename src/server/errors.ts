export class AppError extends Error {
  statusCode: number;
  exposeDetails: boolean;

  constructor(message: string, statusCode = 500, exposeDetails = false) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.exposeDetails = exposeDetails;
  }
}

/** A required setting is missing. Raised before any network call. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, 401);
  }
}

export class IncompleteCredentialsError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export type SecretStoreErrorKind =
  | "PermissionDenied"
  | "ConnectionRefused"
  | "Unauthorized"
  | "PathNotFound"
  | "GenericBackendError";

export class SecretStoreError extends AppError {
  readonly kind: SecretStoreErrorKind;
  readonly hint: string;
  readonly backendErrors: string[];

  constructor(kind: SecretStoreErrorKind, hint: string, backendErrors: string[] = []) {
    super(backendErrors.length ? `${hint} (${backendErrors.join("; ")})` : hint, 502);
    this.kind = kind;
    this.hint = hint;
    this.backendErrors = backendErrors;
  }
}

export type BucketErrorKind = "NotFound" | "Forbidden" | "Conflict" | "InternalError";

const bucketErrorStatus: Record<BucketErrorKind, number> = {
  NotFound: 404,
  Forbidden: 403,
  Conflict: 409,
  InternalError: 500,
};

export class BucketOperationError extends AppError {
  readonly kind: BucketErrorKind;
  readonly providerCode?: string;

  constructor(kind: BucketErrorKind, message: string, providerCode?: string) {
    super(message, bucketErrorStatus[kind], true);
    this.kind = kind;
    this.providerCode = providerCode;
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error";
};

type ProviderErrorCandidate = {
  name?: unknown;
  Code?: unknown;
  code?: unknown;
  message?: unknown;
  $metadata?: unknown;
};

const asProviderCandidate = (error: unknown): ProviderErrorCandidate | null => {
  if (!error || typeof error !== "object") {
    return null;
  }

  return error;
};

/**
 * Machine-readable error code of an AWS SDK exception, or undefined when the
 * value did not come from the provider.
 */
export const getProviderErrorCode = (error: unknown): string | undefined => {
  const candidate = asProviderCandidate(error);

  if (!candidate || !("$metadata" in candidate)) {
    return undefined;
  }

  for (const value of [candidate.Code, candidate.code, candidate.name]) {
    if (typeof value === "string" && value) {
      return value;
    }
  }

  return undefined;
};

export const getProviderErrorMessage = (error: unknown): string => {
  const candidate = asProviderCandidate(error);

  if (candidate && typeof candidate.message === "string" && candidate.message) {
    return candidate.message;
  }

  return toErrorMessage(error);
};
