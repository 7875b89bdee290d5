export type AwsCredentials = {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
};

export type BucketDescriptor = {
  Name: string;
  CreationDate: string | null;
};

export type EmptyBucketResult = {
  objects: number;
  versions: number;
  deleteMarkers: number;
};

export type BucketDeletionState =
  | "requested"
  | "emptying"
  | "emptied"
  | "deleting"
  | "deleted"
  | "failed";

export type ApiErrorShape = {
  error: string;
  details?: string;
};
