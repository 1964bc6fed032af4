/**
 * Image Source Resolver
 *
 * Turns an image reference into decoded pixels. Supported references:
 * - http(s)://host/path        fetched with a bounded timeout
 * - s3://bucket/key            fetched from the configured object store
 * - file:///abs/path.jpg       read from local disk (file://localhost/... too)
 * - /abs/path.jpg, rel/a.png   bare filesystem paths
 *
 * Transport problems and corrupt image bytes surface as different
 * SourceError reasons. Nothing is retried here.
 */

import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";
import axios, { type AxiosInstance } from "axios";
import sharp from "sharp";
import type { Logger } from "pino";
import type { ResolvedImage } from "../../domain/inference";
import { SourceError, errorMessage } from "../../domain/errors";
import { ObjectNotFoundError, parseObjectStoreUri, type ObjectStore } from "./objectStore";

// Two characters minimum, so `C:\images\a.png` stays a drive path
const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]+):/;

export type SourceKind = "http" | "object-store" | "file";

export interface ImageSourceResolverOptions {
  http: AxiosInstance;
  objectStore: ObjectStore | null;
  fetchTimeoutMs: number;
  logger: Logger;
}

/**
 * Classify a reference by scheme. Strings without a `scheme:` prefix are
 * filesystem paths. Returns null for schemes we do not handle.
 */
export function sourceKindOf(uri: string): SourceKind | null {
  const match = SCHEME_PATTERN.exec(uri);
  if (!match) return "file";
  switch (match[1].toLowerCase()) {
    case "http":
    case "https":
      return "http";
    case "s3":
      return "object-store";
    case "file":
      return "file";
    default:
      return null;
  }
}

export class ImageSourceResolver {
  private readonly http: AxiosInstance;
  private readonly objectStore: ObjectStore | null;
  private readonly fetchTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ImageSourceResolverOptions) {
    this.http = options.http;
    this.objectStore = options.objectStore;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.logger = options.logger.child({ component: "image-source" });
  }

  async resolve(uri: string): Promise<ResolvedImage> {
    const bytes = await this.fetchBytes(uri);
    return decodeImage(uri, bytes);
  }

  async fetchBytes(uri: string): Promise<Buffer> {
    const kind = sourceKindOf(uri);
    switch (kind) {
      case "http":
        return this.fetchHttp(uri);
      case "object-store":
        return this.fetchObject(uri);
      case "file":
        return this.readFile(uri);
      case null:
        throw new SourceError(uri, "unsupported_scheme", `Unsupported image source scheme: ${uri}`);
    }
  }

  private async fetchHttp(uri: string): Promise<Buffer> {
    try {
      new URL(uri);
    } catch {
      throw new SourceError(uri, "malformed_uri", `Malformed URL: ${uri}`);
    }

    const started = Date.now();
    try {
      const response = await this.http.get<ArrayBuffer>(uri, {
        responseType: "arraybuffer",
        timeout: this.fetchTimeoutMs,
      });
      const bytes = Buffer.from(response.data);
      this.logger.debug({ uri, bytes: bytes.length, ms: Date.now() - started }, "Fetched remote image");
      return bytes;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) {
          throw new SourceError(uri, "not_found", `HTTP 404 fetching ${uri}`, { cause: error });
        }
        const detail =
          status !== undefined
            ? `HTTP ${status}`
            : error.code === "ECONNABORTED" || error.code === "ETIMEDOUT"
              ? `timed out after ${this.fetchTimeoutMs}ms`
              : error.message;
        throw new SourceError(uri, "transport", `Failed to fetch ${uri}: ${detail}`, { cause: error });
      }
      throw new SourceError(uri, "transport", `Failed to fetch ${uri}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async fetchObject(uri: string): Promise<Buffer> {
    if (!this.objectStore) {
      throw new SourceError(uri, "unsupported_scheme", "Object store support is disabled (ENABLE_S3=false)");
    }
    const location = parseObjectStoreUri(uri);
    if (!location) {
      throw new SourceError(uri, "malformed_uri", `Expected s3://bucket/key, got ${uri}`);
    }
    try {
      return await this.objectStore.getObject(location);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        throw new SourceError(uri, "not_found", error.message, { cause: error });
      }
      throw new SourceError(uri, "transport", `Object store fetch failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async readFile(uri: string): Promise<Buffer> {
    let filePath = uri;
    if (/^file:/i.test(uri)) {
      try {
        // accepts file:///p and file://localhost/p, rejects remote hosts
        filePath = fileURLToPath(new URL(uri));
      } catch (error) {
        throw new SourceError(uri, "malformed_uri", `Malformed file URI: ${uri}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }
    if (filePath.length === 0) {
      throw new SourceError(uri, "malformed_uri", "Empty file path");
    }

    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new SourceError(uri, "not_found", `No such file: ${filePath}`, { cause: error });
      }
      throw new SourceError(uri, "transport", `Failed to read ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Decode image bytes into 3-channel sRGB raw pixels.
 */
export async function decodeImage(source: string, encoded: Buffer): Promise<ResolvedImage> {
  if (encoded.length === 0) {
    throw new SourceError(source, "decode", "Image payload is empty");
  }
  try {
    const image = sharp(encoded, { failOn: "error" });
    const metadata = await image.metadata();
    const { data, info } = await image
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      source,
      encoded,
      format: metadata.format ?? "unknown",
      width: info.width,
      height: info.height,
      channels: info.channels,
      pixels: data,
    };
  } catch (error) {
    throw new SourceError(source, "decode", `Cannot decode image: ${errorMessage(error)}`, { cause: error });
  }
}
