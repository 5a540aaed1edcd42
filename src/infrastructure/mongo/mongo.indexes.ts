import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlanEntry = {
  keys: IndexSpecification;
  options: CreateIndexesOptions;
};

/**
 * Index plan (applied lazily by the repositories on first use):
 * - unique: { buildId: 1, partitionId: 1 } on build metadata
 * - optional: { projectId: 1 } for per-project maintenance queries
 */
export const mongoIndexes: Record<"buildMetadataCollection", IndexPlanEntry[]> = {
  buildMetadataCollection: [
    { keys: { buildId: 1, partitionId: 1 }, options: { unique: true } },
    { keys: { projectId: 1 }, options: {} }
  ]
};

export const mongoCollections = {
  buildMetadata: "build_metadata",
  builds: "builds",
  projects: "projects",
  runners: "runners"
} as const;
