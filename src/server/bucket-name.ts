import { randomInt } from "node:crypto";

export const BUCKET_NAME_PREFIX = "my-app-s3-kv2";

const SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const SUFFIX_LENGTH = 6;

const pad = (value: number, width = 2): string => `${value}`.padStart(width, "0");

// Local time, YYYYMMDDHHMMSS.
export const formatBucketTimestamp = (date: Date): string => {
  return [
    pad(date.getFullYear(), 4),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join("");
};

export const randomBucketSuffix = (): string => {
  let suffix = "";

  for (let i = 0; i < SUFFIX_LENGTH; i += 1) {
    suffix += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  }

  return suffix;
};

/**
 * Suggests an S3-safe bucket name: lowercase, hyphen separated, no
 * underscores.
 */
export const generateUniqueBucketName = (
  now: Date = new Date(),
  suffix: string = randomBucketSuffix(),
): string => {
  return `${BUCKET_NAME_PREFIX}-${formatBucketTimestamp(now)}-${suffix}`
    .toLowerCase()
    .replace(/_/g, "-");
};
