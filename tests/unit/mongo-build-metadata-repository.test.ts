import type { Db } from "mongodb";
import { MongoNetworkError } from "mongodb";
import { MongoBuildMetadataRepository } from "../../src/infrastructure/mongo/MongoBuildMetadataRepository";
import type { BuildMetadataDoc } from "../../src/core/build-metadata/buildMetadata.types";

const fastRetry = { retries: 2, minDelayMs: 1, maxDelayMs: 2 };
const ref = { buildId: "build-1", partitionId: 4 };

type StubCollection = {
  createIndex: jest.Mock;
  insertOne: jest.Mock;
  findOne: jest.Mock;
  updateOne: jest.Mock;
};

const createStubCollection = (): StubCollection => ({
  createIndex: jest.fn().mockResolvedValue("idx"),
  insertOne: jest.fn().mockResolvedValue({ acknowledged: true }),
  findOne: jest.fn().mockResolvedValue(null),
  updateOne: jest.fn().mockResolvedValue({ matchedCount: 1, modifiedCount: 1 })
});

const createRepo = (col: StubCollection) => {
  const collection = jest.fn().mockReturnValue(col);
  const db = { collection } as unknown as Db;
  return { repo: new MongoBuildMetadataRepository(db, fastRetry), collection };
};

describe("MongoBuildMetadataRepository", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("creates indexes once and caches the collection", async () => {
    const col = createStubCollection();
    const { repo, collection } = createRepo(col);

    await repo.findByBuild(ref);
    await repo.findByBuild(ref);

    expect(collection).toHaveBeenCalledTimes(1);
    expect(collection).toHaveBeenCalledWith("build_metadata");
    expect(col.createIndex.mock.calls).toEqual([
      [{ buildId: 1, partitionId: 1 }, { unique: true }],
      [{ projectId: 1 }, {}]
    ]);
  });

  it("shares one index build between concurrent first calls", async () => {
    const col = createStubCollection();
    col.createIndex.mockImplementation(
      () => new Promise((resolve) => setTimeout(() => resolve("idx"), 5))
    );
    const { repo, collection } = createRepo(col);

    await Promise.all([
      repo.saveTimeout(ref, { value: 60, source: "job" }),
      repo.saveTimeout({ buildId: "build-2", partitionId: 4 }, { value: 120, source: "project" }),
      repo.findByBuild(ref)
    ]);

    expect(collection).toHaveBeenCalledTimes(1);
    expect(col.createIndex).toHaveBeenCalledTimes(2);
    expect(col.updateOne).toHaveBeenCalledTimes(2);
  });

  it("retries the index build on the next call after a failure", async () => {
    const col = createStubCollection();
    col.createIndex.mockRejectedValueOnce(new Error("index build interrupted"));
    const { repo, collection } = createRepo(col);

    await expect(repo.findByBuild(ref)).rejects.toThrow("index build interrupted");
    await expect(repo.findByBuild(ref)).resolves.toBeNull();

    expect(collection).toHaveBeenCalledTimes(2);
    expect(col.createIndex.mock.calls).toEqual([
      [{ buildId: 1, partitionId: 1 }, { unique: true }],
      [{ buildId: 1, partitionId: 1 }, { unique: true }],
      [{ projectId: 1 }, {}]
    ]);
    expect(col.findOne).toHaveBeenCalledTimes(1);
  });

  it("looks up records by build and partition", async () => {
    const col = createStubCollection();
    const stored: BuildMetadataDoc = { _id: "m1", ...ref, projectId: "p1", timeoutSource: "job", timeout: 60 };
    col.findOne.mockResolvedValue(stored);
    const { repo } = createRepo(col);

    await expect(repo.findByBuild(ref)).resolves.toBe(stored);
    expect(col.findOne).toHaveBeenCalledWith({ buildId: "build-1", partitionId: 4 });
  });

  it("writes only the timeout value and source", async () => {
    const col = createStubCollection();
    const { repo } = createRepo(col);

    await expect(repo.saveTimeout(ref, { value: 1800, source: "runner" })).resolves.toBe(true);
    expect(col.updateOne).toHaveBeenCalledWith(
      { buildId: "build-1", partitionId: 4 },
      { $set: { timeout: 1800, timeoutSource: "runner" } }
    );
  });

  it("reports a missing record when nothing matched", async () => {
    const col = createStubCollection();
    col.updateOne.mockResolvedValue({ matchedCount: 0, modifiedCount: 0 });
    const { repo } = createRepo(col);

    await expect(repo.saveTimeout(ref, { value: 60, source: "job" })).resolves.toBe(false);
  });

  it("retries transient network errors on write", async () => {
    const col = createStubCollection();
    col.updateOne
      .mockRejectedValueOnce(new MongoNetworkError("connection reset"))
      .mockResolvedValueOnce({ matchedCount: 1, modifiedCount: 1 });
    const { repo } = createRepo(col);

    await expect(repo.saveTimeout(ref, { value: 60, source: "job" })).resolves.toBe(true);
    expect(col.updateOne).toHaveBeenCalledTimes(2);

    const logged = JSON.parse(String(warnSpy.mock.calls[0]?.[0])) as Record<string, unknown>;
    expect(logged).toEqual({
      event: "db.retry",
      operation: "build_metadata.save_timeout",
      error: "MongoNetworkError",
      attempt: 1,
      maxAttempts: 3
    });
  });

  it("does not retry non-transient write errors", async () => {
    const col = createStubCollection();
    col.insertOne.mockRejectedValue(new Error("document failed validation"));
    const { repo } = createRepo(col);
    const doc: BuildMetadataDoc = { _id: "m2", ...ref, projectId: "p1", timeoutSource: "unknown" };

    await expect(repo.insert(doc)).rejects.toThrow("document failed validation");
    expect(col.insertOne).toHaveBeenCalledTimes(1);
    expect(col.insertOne).toHaveBeenCalledWith(doc);
  });
});
