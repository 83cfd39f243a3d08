export class ObjectNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Object not found: ${key}`);
    this.name = "ObjectNotFoundError";
    this.key = key;
  }
}

/**
 * Keys are relative to one bucket, the dataset location of this pipeline.
 */
export interface ObjectStorage {
  readonly bucket: string;
  readObject(key: string): Promise<string>;
  writeObject(key: string, body: string, contentType?: string): Promise<void>;
  objectExists(key: string): Promise<boolean>;
  listObjects(prefix: string, maxKeys?: number): Promise<string[]>;
}
