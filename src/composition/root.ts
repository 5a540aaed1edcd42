import type { BuildRef } from "../core/build-metadata/buildMetadata.types";
import { refreshBuildTimeouts } from "../application/build-timeouts/refreshBuildTimeouts.usecase";
import type { TimeoutRefreshSummary } from "../application/build-timeouts/timeout.error-handler";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoBuildMetadataRepository } from "../infrastructure/mongo/MongoBuildMetadataRepository";
import { MongoTimeoutInputsReader } from "../infrastructure/mongo/MongoTimeoutInputsReader";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export const runTimeoutRefresh = async (refs: BuildRef[]): Promise<TimeoutRefreshSummary> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const client = await createMongoClient({
    mongoUri: env.MONGO_URI,
    serverSelectionTimeoutMs: runtime.serverSelectionTimeoutMs
  });

  try {
    const db = client.db(env.MONGO_DB_NAME);
    const repo = new MongoBuildMetadataRepository(db, runtime.writeRetry);
    const inputs = new MongoTimeoutInputsReader(db);
    return await refreshBuildTimeouts({ inputs, repo, config: runtime.refreshConfig }, refs);
  } finally {
    await client.close();
  }
};
