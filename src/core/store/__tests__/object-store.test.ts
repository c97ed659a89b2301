/**
 * InMemoryObjectStore tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { InMemoryObjectStore, ObjectNotFoundError } from "../object-store";

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<number[]> {
  const sizes: number[] = [];
  for await (const chunk of chunks) {
    sizes.push(chunk.length);
  }
  return sizes;
}

describe("InMemoryObjectStore", () => {
  let store: InMemoryObjectStore;

  beforeEach(() => {
    store = new InMemoryObjectStore(4);
  });

  it("should stream a stored object in fixed-size chunks", async () => {
    store.seed("uploads", "cities.txt", "abcdefghij");

    expect(await collect(await store.openObject("uploads", "cities.txt"))).toEqual([4, 4, 2]);
  });

  it("should fail to open a missing object", async () => {
    await expect(store.openObject("uploads", "missing.txt")).rejects.toThrow(ObjectNotFoundError);
    await expect(store.openObject("uploads", "missing.txt")).rejects.toThrow(
      'object "missing.txt" not found in "uploads"'
    );
  });

  it("should overwrite an existing key and keep the content type", async () => {
    await store.putObject("rankings", "highest_wind.csv", "old", "text/plain");
    await store.putObject("rankings", "highest_wind.csv", "City,Wind Speed\n", "text/csv");

    expect(store.read("rankings", "highest_wind.csv")).toBe("City,Wind Speed\n");
    expect(store.contentType("rankings", "highest_wind.csv")).toBe("text/csv");
  });

  it("should keep locations apart", async () => {
    await store.putObject("uploads", "a.txt", "1");
    await store.putObject("rankings", "b.csv", "2");

    expect(store.keys("uploads")).toEqual(["a.txt"]);
    expect(store.keys("rankings")).toEqual(["b.csv"]);
  });

  it("should reject a chunk size below one", () => {
    expect(() => new InMemoryObjectStore(0)).toThrow(RangeError);
    expect(() => new InMemoryObjectStore(-4)).toThrow(
      "chunk size must be a positive integer, got -4"
    );
    expect(() => new InMemoryObjectStore(1.5)).toThrow(RangeError);
  });

  it("should delete objects", async () => {
    store.seed("uploads", "cities.txt", "Oslo");

    await store.deleteObject("uploads", "cities.txt");

    expect(store.read("uploads", "cities.txt")).toBeUndefined();
    expect(store.keys("uploads")).toEqual([]);
  });
});
