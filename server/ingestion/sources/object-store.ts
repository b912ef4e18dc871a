import axios, { AxiosInstance } from "axios";
import { S3Client, GetObjectCommand, NoSuchKey } from "@aws-sdk/client-s3";

/**
 * Read-only access to the open-data JSON documents.
 *
 * Two backends: the S3 bucket itself, or any HTTP mirror of it (public bucket
 * website endpoint, raw repository URL). Both report per-key misses as a
 * ResourceError so callers can skip one resource and carry on.
 */

export type ResourceErrorKind = "not_found" | "malformed" | "unavailable";

export class ResourceError extends Error {
  constructor(
    readonly key: string,
    readonly kind: ResourceErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ResourceError";
  }
}

export interface ObjectStore {
  /** Human-readable origin, used as the sync log source */
  readonly location: string;
  getJson(key: string): Promise<unknown>;
}

export function parseJsonResource(key: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    throw new ResourceError(key, "malformed", `Invalid JSON in ${key}: ${errorMsg}`, { cause: error });
  }
}

export function expectArray(key: string, data: unknown): unknown[] {
  if (!Array.isArray(data)) {
    throw new ResourceError(key, "malformed", `Expected a JSON array in ${key}`);
  }
  return data;
}

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;
  readonly location: string;

  constructor(private readonly bucket: string, region: string, client?: S3Client) {
    this.client = client ?? new S3Client({ region });
    this.location = `s3://${bucket}`;
  }

  async getJson(key: string): Promise<unknown> {
    let body: string | undefined;
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      body = await response.Body?.transformToString("utf-8");
    } catch (error) {
      if (error instanceof NoSuchKey) {
        throw new ResourceError(key, "not_found", `Object ${key} not found in ${this.location}`, { cause: error });
      }
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new ResourceError(key, "unavailable", `Failed to read ${key}: ${errorMsg}`, { cause: error });
    }

    if (body === undefined) {
      throw new ResourceError(key, "malformed", `Object ${key} has no body`);
    }
    return parseJsonResource(key, body);
  }
}

export class HttpObjectStore implements ObjectStore {
  private client: AxiosInstance;
  readonly location: string;

  constructor(baseUrl: string, client?: AxiosInstance) {
    this.location = baseUrl;
    this.client = client ?? axios.create({
      baseURL: baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
    });
  }

  async getJson(key: string): Promise<unknown> {
    let body: unknown;
    try {
      // Keep the raw text so malformed JSON is reported per key
      const response = await this.client.get<unknown>(key, {
        responseType: "text",
        transformResponse: (data: unknown) => data,
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response && error.response.status === 404) {
        throw new ResourceError(key, "not_found", `Object ${key} not found at ${this.location}`, { cause: error });
      }
      const errorMsg = error instanceof Error ? error.message : String(error);
      throw new ResourceError(key, "unavailable", `Failed to fetch ${key}: ${errorMsg}`, { cause: error });
    }

    if (typeof body !== "string") {
      throw new ResourceError(key, "malformed", `Object ${key} did not return text`);
    }
    return parseJsonResource(key, body);
  }
}

export function createObjectStore(config: {
  driver: "s3" | "http";
  bucket: string | null;
  baseUrl: string | null;
  region: string;
}): ObjectStore {
  if (config.driver === "http") {
    if (!config.baseUrl) throw new Error("HTTP object store needs a base URL");
    return new HttpObjectStore(config.baseUrl);
  }
  if (!config.bucket) throw new Error("S3 object store needs a bucket name");
  return new S3ObjectStore(config.bucket, config.region);
}
