import type { Collection, Db } from "mongodb";
import type { BuildMetadataDoc, BuildMetadataRepository, BuildRef } from "../../ports/BuildMetadataRepository";
import type { ResolvedTimeout } from "../../core/timeout/timeout.types";
import { mongoCollections, mongoIndexes } from "./mongo.indexes";
import { defaultWriteRetryOptions, type MongoWriteRetryOptions, withWriteRetry } from "./mongo.retry";

const byBuild = (ref: BuildRef) => ({ buildId: ref.buildId, partitionId: ref.partitionId });

/**
 * Mongo repository keyed by (buildId, partitionId).
 */
export class MongoBuildMetadataRepository implements BuildMetadataRepository {
  private collectionPromise?: Promise<Collection<BuildMetadataDoc>>;

  constructor(
    private readonly db: Db,
    private readonly retryOptions: MongoWriteRetryOptions = defaultWriteRetryOptions,
    private readonly collectionName: string = mongoCollections.buildMetadata
  ) {}

  // Concurrent first calls share one index build; a failed build is retried on the next call.
  private getCollection(): Promise<Collection<BuildMetadataDoc>> {
    if (!this.collectionPromise) {
      this.collectionPromise = this.prepareCollection().catch((err: unknown) => {
        this.collectionPromise = undefined;
        throw err;
      });
    }
    return this.collectionPromise;
  }

  private async prepareCollection(): Promise<Collection<BuildMetadataDoc>> {
    const col = this.db.collection<BuildMetadataDoc>(this.collectionName);

    // Index creation is idempotent and guarantees one metadata record per build partition.
    for (const idx of mongoIndexes.buildMetadataCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    return col;
  }

  async insert(doc: BuildMetadataDoc): Promise<void> {
    const col = await this.getCollection();
    await withWriteRetry("build_metadata.insert", () => col.insertOne(doc), this.retryOptions);
  }

  async findByBuild(ref: BuildRef): Promise<BuildMetadataDoc | null> {
    const col = await this.getCollection();
    return col.findOne(byBuild(ref));
  }

  async saveTimeout(ref: BuildRef, timeout: ResolvedTimeout): Promise<boolean> {
    const col = await this.getCollection();
    const res = await withWriteRetry(
      "build_metadata.save_timeout",
      () => col.updateOne(byBuild(ref), { $set: { timeout: timeout.value, timeoutSource: timeout.source } }),
      this.retryOptions
    );
    return (res.matchedCount ?? 0) > 0;
  }
}
