import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client
} from "@aws-sdk/client-s3";
import { ObjectNotFoundError, type ObjectStorage } from "../../ports/ObjectStorage";

export type S3ClientOptions = {
  region: string;
  endpoint?: string;
};

/**
 * Path-style addressing is switched on for custom endpoints (MinIO, localstack).
 */
export const createS3Client = (options: S3ClientOptions): S3Client =>
  new S3Client({
    region: options.region,
    ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {})
  });

const readHttpStatus = (error: object): number | undefined => {
  if (!("$metadata" in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
};

export const isMissingObjectError = (error: unknown): boolean => {
  if (error instanceof NoSuchKey || error instanceof NotFound) return true;
  if (typeof error !== "object" || error === null) return false;
  if (readHttpStatus(error) === 404) return true;
  const name = "name" in error ? error.name : undefined;
  return name === "NoSuchKey" || name === "NotFound";
};

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string
  ) {}

  async readObject(key: string): Promise<string> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        throw new ObjectNotFoundError(key);
      }
      return await response.Body.transformToString("utf-8");
    } catch (err) {
      if (isMissingObjectError(err)) throw new ObjectNotFoundError(key);
      throw err;
    }
  }

  async writeObject(key: string, body: string, contentType = "text/csv"): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType
      })
    );
  }

  async objectExists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isMissingObjectError(err)) return false;
      throw err;
    }
  }

  async listObjects(prefix: string, maxKeys = 1000): Promise<string[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, MaxKeys: maxKeys })
    );
    return (response.Contents ?? [])
      .map((entry) => entry.Key)
      .filter((key): key is string => typeof key === "string");
  }
}
