import fs from "fs";
import os from "os";
import path from "path";
import {
  DuplicateIdError,
  EmbeddingError,
  IndexQueryError,
  IndexWriteError,
  InvalidArgumentError,
  StorageError,
  StorageInitError,
} from "../src/errors";
import { DocumentStore, NO_DOCUMENTS_FOUND } from "../src/services/documentStore";
import { HashingEmbeddingProvider, type EmbeddingProvider } from "../src/services/embeddings";
import type { VectorIndex } from "../src/services/vectorStore";
import type { SearchHit, StoredDocument } from "../src/types";

const PROTOCOL = "The Model Context Protocol enables tool use.";
const BANANAS = "Bananas are a good source of potassium.";
const HARBOR = "Sailing across the harbor at dawn is peaceful.";

const HEADER = "Retrieved Documents:\n" + "-".repeat(50) + "\n";

class FailingEmbeddings implements EmbeddingProvider {
  readonly model = "failing";
  async embed(): Promise<number[]> {
    throw new Error("provider offline");
  }
  async embedMany(): Promise<number[][]> {
    throw new Error("provider offline");
  }
}

class ShortEmbeddings implements EmbeddingProvider {
  readonly model = "short";
  async embed(): Promise<number[]> {
    return [1, 0];
  }
  async embedMany(): Promise<number[][]> {
    return [[1, 0]];
  }
}

/** In-memory index whose operations can be made to fail. */
class FlakyIndex implements VectorIndex {
  readonly kind = "flaky";
  records = new Map<string, StoredDocument>();
  failWrites = false;
  failQueries = false;
  failCounts = false;
  failDeletes = false;

  async open(): Promise<void> {}
  async upsert(records: StoredDocument[]): Promise<void> {
    if (this.failWrites) throw new Error("disk full");
    records.forEach((r) => this.records.set(r.id, r));
  }
  async existingIds(ids: string[]): Promise<string[]> {
    return ids.filter((id) => this.records.has(id));
  }
  async query(): Promise<SearchHit[]> {
    if (this.failQueries) throw new Error("index offline");
    return [];
  }
  async count(): Promise<number> {
    if (this.failCounts) throw new StorageError("storage offline");
    return this.records.size;
  }
  async deleteCollection(): Promise<void> {
    if (this.failDeletes) throw new Error("permission denied");
    this.records.clear();
  }
  async close(): Promise<void> {}
}

describe("DocumentStore", () => {
  let dir: string;
  let embeddings: HashingEmbeddingProvider;

  const open = () => DocumentStore.initialize({ persistDir: dir, embeddings });

  beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "docstore-"));
    embeddings = new HashingEmbeddingProvider(256);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("initialize", () => {
    test("should create an empty collection", async () => {
      const store = await open();
      expect(await store.stats()).toEqual({ collectionName: "documents", documentCount: 0, persistDir: dir });
      expect(store.backend).toBe("local");
      expect(fs.existsSync(path.join(dir, "documents.json"))).toBe(true);
    });

    test("should be idempotent and keep stored documents", async () => {
      const first = await open();
      await first.add([PROTOCOL, BANANAS], ["a", "b"]);

      const second = await open();
      expect((await second.stats()).documentCount).toBe(2);
      const hits = await second.search("potassium bananas", 1);
      expect(hits.map((h) => h.id)).toEqual(["b"]);
    });

    test("should fail with StorageInitError when the location is not a directory", async () => {
      const file = path.join(dir, "occupied");
      fs.writeFileSync(file, "not a directory");
      await expect(
        DocumentStore.initialize({ persistDir: path.join(file, "store"), embeddings })
      ).rejects.toBeInstanceOf(StorageInitError);
    });

    test("should refuse a collection built with another embedding model", async () => {
      const store = await open();
      await store.add([PROTOCOL], ["a"]);
      await expect(
        DocumentStore.initialize({ persistDir: dir, embeddings: new HashingEmbeddingProvider(128) })
      ).rejects.toThrow("Collection documents was built with embedding model hashing-256, not hashing-128");
    });
  });

  describe("add", () => {
    test("should reject an empty batch", async () => {
      const store = await open();
      await expect(store.add([])).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    test("should reject ids and metadata of the wrong length", async () => {
      const store = await open();
      await expect(store.add([PROTOCOL, BANANAS], ["a"])).rejects.toThrow("Expected 2 ids, got 1");
      await expect(store.add([PROTOCOL], undefined, [{}, {}])).rejects.toThrow(
        "Expected 1 metadata entries, got 2"
      );
      expect((await store.stats()).documentCount).toBe(0);
    });

    test("should reject ids repeated within a batch", async () => {
      const store = await open();
      const error = await store.add([PROTOCOL, BANANAS, HARBOR], ["x", "y", "x"]).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(DuplicateIdError);
      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error instanceof DuplicateIdError && error.ids).toEqual(["x"]);
    });

    test("should reject ids that are already stored without overwriting them", async () => {
      const store = await open();
      await store.add([PROTOCOL], ["a"], [{ source: "first" }]);

      await expect(store.add([BANANAS], ["a"])).rejects.toThrow("Document ids already exist: a");

      const [hit] = await store.search("Model Context Protocol", 1);
      expect(hit).toMatchObject({ id: "a", document: PROTOCOL, metadata: { source: "first" } });
      expect((await store.stats()).documentCount).toBe(1);
    });

    test("should default metadata to an unknown source", async () => {
      const store = await open();
      await store.add([BANANAS], ["b"]);
      const [hit] = await store.search("bananas", 1);
      expect(hit.metadata).toEqual({ source: "unknown" });
    });

    test("should generate sequential ids across calls", async () => {
      const store = await open();
      await store.add([PROTOCOL, BANANAS]);
      await store.add([HARBOR]);
      expect(await store.findExistingIds(["doc_0", "doc_1", "doc_2"])).toEqual(["doc_0", "doc_1", "doc_2"]);
    });

    test("should skip generated ids that are already taken", async () => {
      const store = await open();
      await store.add([PROTOCOL], ["doc_1"]);
      // Count is 1, so a per-call counter would produce doc_1 again
      await store.add([BANANAS, HARBOR]);

      expect((await store.stats()).documentCount).toBe(3);
      expect(await store.findExistingIds(["doc_0", "doc_1", "doc_2", "doc_3"])).toEqual(["doc_1", "doc_2", "doc_3"]);
      const [hit] = await store.search("harbor at dawn", 1);
      expect(hit.id).toBe("doc_3");
    });

    test("should write nothing when embedding fails", async () => {
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings: new FailingEmbeddings() });
      const error = await store.add([PROTOCOL, BANANAS], ["a", "b"]).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error instanceof Error && error.message).toBe("Embedding with failing failed: provider offline");
      expect((await store.stats()).documentCount).toBe(0);
    });

    test("should write nothing when the provider returns too few vectors", async () => {
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings: new ShortEmbeddings() });
      await expect(store.add([PROTOCOL, BANANAS])).rejects.toThrow(
        "Embedding provider returned 1 vectors for 2 inputs"
      );
      expect((await store.stats()).documentCount).toBe(0);
    });

    test("should surface index write failures as IndexWriteError", async () => {
      const index = new FlakyIndex();
      index.failWrites = true;
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });

      const error = await store.add([PROTOCOL], ["a"]).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexWriteError);
      expect(error instanceof Error && error.message).toBe("Unable to write documents: disk full");
      expect(index.records.size).toBe(0);
    });

    test("should report a failing count while generating ids as IndexWriteError", async () => {
      const index = new FlakyIndex();
      index.failCounts = true;
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });

      const error = await store.add([PROTOCOL]).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexWriteError);
      expect(error instanceof Error && error.message).toBe("Unable to count documents: storage offline");
      expect(index.records.size).toBe(0);
    });
  });

  describe("search", () => {
    test("should return an empty list for an empty collection", async () => {
      const store = await open();
      expect(await store.search("anything", 3)).toEqual([]);
    });

    test("should order hits by distance and break ties by id", async () => {
      const store = await open();
      await store.add([HARBOR, BANANAS, PROTOCOL], ["c", "b", "a"]);

      const hits = await store.search("Model Context Protocol", 3);
      expect(hits.map((h) => h.id)).toEqual(["a", "b", "c"]);
      expect(hits[0].distance).toBeCloseTo(1 - Math.sqrt(3 / 7), 6);
      expect(hits[1].distance).toBe(1);
      expect(hits[2].distance).toBe(1);
    });

    test("should return a document for its own text at distance zero", async () => {
      const store = await open();
      await store.add([PROTOCOL, BANANAS, HARBOR], ["a", "b", "c"]);
      const [hit] = await store.search(PROTOCOL, 1);
      expect(hit.id).toBe("a");
      expect(hit.distance).toBeCloseTo(0, 10);
    });

    test("should truncate to the collection size", async () => {
      const store = await open();
      await store.add([PROTOCOL, BANANAS], ["a", "b"]);
      expect(await store.search("tool", 10)).toHaveLength(2);
    });

    test("should reject a blank query or a bad result count", async () => {
      const store = await open();
      await store.add([PROTOCOL], ["a"]);
      await expect(store.search("   ", 3)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(store.search("tool", 0)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(store.search("tool", 1.5)).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    test("should surface index query failures as IndexQueryError", async () => {
      const index = new FlakyIndex();
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });
      await store.add([PROTOCOL], ["a"]);
      index.failQueries = true;

      const error = await store.search("tool", 1).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexQueryError);
      expect(error instanceof Error && error.message).toBe("Similarity search failed: index offline");
    });

    test("should report a failing count as IndexQueryError", async () => {
      const index = new FlakyIndex();
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });
      index.failCounts = true;

      const error = await store.search("tool", 1).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(IndexQueryError);
      expect(error instanceof Error && error.message).toBe("Unable to count documents: storage offline");
    });
  });

  describe("searchFormatted", () => {
    test("should return the sentinel when nothing matches", async () => {
      const store = await open();
      expect(await store.searchFormatted("anything", 3)).toBe(NO_DOCUMENTS_FOUND);
    });

    test("should render numbered blocks with content and source", async () => {
      const store = await open();
      await store.add([BANANAS], ["b"], [{ source: "fruit.txt" }]);
      expect(await store.searchFormatted("potassium", 1)).toBe(
        `${HEADER}\n[Document 1]\nContent: ${BANANAS}\nSource: fruit.txt\n`
      );
    });

    test("should render unknown when no source was given", async () => {
      const store = await open();
      await store.add([BANANAS], ["b"], [{ type: "fact" }]);
      expect(await store.searchFormatted("potassium", 1)).toBe(
        `${HEADER}\n[Document 1]\nContent: ${BANANAS}\nSource: unknown\n`
      );
    });

    test("should clip long content and long sources", async () => {
      const store = await open();
      const text = "word ".repeat(200);
      await store.add([text], ["long"], [{ source: "s".repeat(150) }]);

      const formatted = await store.searchFormatted("word", 1);
      expect(formatted).toBe(
        `${HEADER}\n[Document 1]\nContent: ${text.slice(0, 500)}...\nSource: ${"s".repeat(100)}...\n`
      );
    });
  });

  describe("stats", () => {
    test("should report a failing count as StorageError", async () => {
      const index = new FlakyIndex();
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });
      index.failCounts = true;

      const error = await store.stats().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(StorageError);
      expect(error instanceof Error && error.message).toBe("storage offline");
    });
  });

  describe("excerpt clipping", () => {
    test("should not split a character outside the basic plane", async () => {
      const store = await open();
      const text = "a".repeat(499) + "\u{1F600}" + "tail";
      await store.add([text], ["emoji"], [{ source: "chat" }]);

      const formatted = await store.searchFormatted("tail", 1);
      expect(formatted).toBe(
        `${HEADER}\n[Document 1]\nContent: ${"a".repeat(499)}\u{1F600}...\nSource: chat\n`
      );
    });
  });

  describe("deleteCollection", () => {
    test("should remove every document and allow reuse", async () => {
      const store = await open();
      await store.add([PROTOCOL, BANANAS], ["a", "b"]);

      await store.deleteCollection();
      expect((await store.stats()).documentCount).toBe(0);
      expect(await store.search("tool", 3)).toEqual([]);

      await store.add([HARBOR], ["a"]);
      expect((await store.stats()).documentCount).toBe(1);
    });

    test("should fail with StorageError when storage is inaccessible", async () => {
      const index = new FlakyIndex();
      const store = await DocumentStore.initialize({ persistDir: dir, embeddings, index });
      await store.add([PROTOCOL], ["a"]);
      index.failDeletes = true;

      const error = await store.deleteCollection().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(StorageError);
      expect(error instanceof Error && error.message).toBe("Unable to delete documents: permission denied");
      expect(index.records.size).toBe(1);
    });

    test("should be idempotent", async () => {
      const store = await open();
      await store.deleteCollection();
      await expect(store.deleteCollection()).resolves.toBeUndefined();
    });
  });
});
