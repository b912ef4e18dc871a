import { ResourceError, parseJsonResource, type ObjectStore } from "../../ingestion/sources/object-store";

/**
 * In-process stand-in for the blob store. Keys that were never put resolve to
 * a not_found ResourceError, like a missing S3 object.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly location = "memory://open-data";
  readonly requests: string[] = [];
  private readonly objects = new Map<string, string>();
  private readonly failures = new Map<string, Error>();

  constructor(private readonly delayMs: (key: string) => number = () => 0) {}

  putJson(key: string, value: unknown): this {
    this.objects.set(key, JSON.stringify(value));
    return this;
  }

  putRaw(key: string, body: string): this {
    this.objects.set(key, body);
    return this;
  }

  failWith(key: string, error: Error): this {
    this.failures.set(key, error);
    return this;
  }

  async getJson(key: string): Promise<unknown> {
    this.requests.push(key);
    const delay = this.delayMs(key);
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const failure = this.failures.get(key);
    if (failure) throw failure;

    const body = this.objects.get(key);
    if (body === undefined) {
      throw new ResourceError(key, "not_found", `Object ${key} not found`);
    }
    return parseJsonResource(key, body);
  }
}
