/**
 * ObjectStore - bucket/key storage the pipeline reads from and writes to
 *
 * In-memory implementation included for tests and local runs.
 */

export type ObjectBody = string | Uint8Array;

export interface ObjectStore {
  /** Open an object for reading. Chunks arrive in order. */
  openObject(location: string, key: string): Promise<AsyncIterable<Uint8Array>>;
  /** Store an object, replacing any existing one under the same key. */
  putObject(
    location: string,
    key: string,
    body: ObjectBody,
    contentType?: string
  ): Promise<void>;
  deleteObject(location: string, key: string): Promise<void>;
}

export class ObjectNotFoundError extends Error {
  constructor(location: string, key: string) {
    super(`object "${key}" not found in "${location}"`);
    this.name = "ObjectNotFoundError";
  }
}

interface StoredObject {
  body: Uint8Array;
  contentType?: string;
}

export class InMemoryObjectStore implements ObjectStore {
  private objects = new Map<string, StoredObject>();

  constructor(private chunkSize: number = 64 * 1024) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunk size must be a positive integer, got ${chunkSize}`);
    }
  }

  async openObject(location: string, key: string): Promise<AsyncIterable<Uint8Array>> {
    const stored = this.objects.get(this.path(location, key));
    if (!stored) {
      throw new ObjectNotFoundError(location, key);
    }
    return chunked(stored.body, this.chunkSize);
  }

  async putObject(
    location: string,
    key: string,
    body: ObjectBody,
    contentType?: string
  ): Promise<void> {
    this.objects.set(this.path(location, key), {
      body: toBytes(body),
      contentType,
    });
  }

  async deleteObject(location: string, key: string): Promise<void> {
    this.objects.delete(this.path(location, key));
  }

  seed(location: string, key: string, body: ObjectBody): void {
    this.objects.set(this.path(location, key), { body: toBytes(body) });
  }

  /** Decoded body of a stored object, or undefined when absent */
  read(location: string, key: string): string | undefined {
    const stored = this.objects.get(this.path(location, key));
    return stored ? new TextDecoder().decode(stored.body) : undefined;
  }

  contentType(location: string, key: string): string | undefined {
    return this.objects.get(this.path(location, key))?.contentType;
  }

  keys(location: string): string[] {
    const prefix = `${location}/`;
    return Array.from(this.objects.keys())
      .filter((path) => path.startsWith(prefix))
      .map((path) => path.slice(prefix.length))
      .sort();
  }

  private path(location: string, key: string): string {
    return `${location}/${key}`;
  }
}

function toBytes(body: ObjectBody): Uint8Array {
  return typeof body === "string" ? new TextEncoder().encode(body) : new Uint8Array(body);
}

async function* chunked(bytes: Uint8Array, size: number): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}
