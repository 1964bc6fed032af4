import { GetObjectCommand, S3Client, S3ServiceException } from "@aws-sdk/client-s3";
import type { Logger } from "pino";

export interface ObjectStoreLocation {
  bucket: string;
  key: string;
}

export class ObjectNotFoundError extends Error {
  constructor(readonly location: ObjectStoreLocation) {
    super(`Object not found: s3://${location.bucket}/${location.key}`);
    this.name = "ObjectNotFoundError";
  }
}

/** Bucket/key addressed blob storage. */
export interface ObjectStore {
  getObject(location: ObjectStoreLocation): Promise<Buffer>;
}

/**
 * Split `s3://bucket/some/key.jpg` into bucket and key.
 * Returns null when either part is missing.
 */
export function parseObjectStoreUri(uri: string): ObjectStoreLocation | null {
  if (!/^s3:\/\//i.test(uri)) {
    return null;
  }
  const rest = uri.slice("s3://".length);
  const slash = rest.indexOf("/");
  if (slash <= 0 || slash === rest.length - 1) {
    return null;
  }
  return { bucket: rest.slice(0, slash), key: rest.slice(slash + 1) };
}

export interface S3ObjectStoreOptions {
  region?: string;
  endpoint?: string;
}

/**
 * S3 (or S3-compatible) store. Credentials come from the AWS default provider
 * chain (env vars, shared config, instance role).
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(options: S3ObjectStoreOptions, private readonly logger: Logger) {
    this.client = new S3Client({
      ...(options.region && { region: options.region }),
      ...(options.endpoint && { endpoint: options.endpoint, forcePathStyle: true }),
    });
    this.logger.info(
      { region: options.region ?? "(default chain)", endpoint: options.endpoint ?? null },
      "S3 object store client initialized",
    );
  }

  async getObject(location: ObjectStoreLocation): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
      );
      if (!response.Body) {
        throw new Error(`Empty body for s3://${location.bucket}/${location.key}`);
      }
      const bytes = await response.Body.transformToByteArray();
      return Buffer.from(bytes);
    } catch (error) {
      if (error instanceof S3ServiceException && (error.name === "NoSuchKey" || error.name === "NotFound")) {
        throw new ObjectNotFoundError(location);
      }
      throw error;
    }
  }

  destroy(): void {
    this.client.destroy();
  }
}
