import { randomUUID } from "crypto";
import type { BuildMetadataDoc, BuildRef, NewBuildMetadata } from "./buildMetadata.types";

export class InvalidBuildMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidBuildMetadataError";
  }
}

const parseBuildRef = (build: NewBuildMetadata["build"] | null | undefined): BuildRef & { projectId: string } => {
  if (build == null) {
    throw new InvalidBuildMetadataError("Invalid build metadata: missing build");
  }

  const buildId = build.buildId.trim();
  if (buildId.length === 0) {
    throw new InvalidBuildMetadataError("Invalid build metadata: buildId is empty");
  }

  if (!Number.isSafeInteger(build.partitionId) || build.partitionId < 0) {
    throw new InvalidBuildMetadataError("Invalid build metadata: partitionId must be a non-negative integer");
  }

  return { buildId, partitionId: build.partitionId, projectId: build.projectId };
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

/**
 * Builds a fresh metadata record for a build:
 * - the project defaults to the build's own project
 * - the timeout starts unresolved (`unknown` source, no value)
 * - assigns UUIDv4 to `_id`
 */
export const createBuildMetadata = (input: NewBuildMetadata): BuildMetadataDoc => {
  const build = parseBuildRef(input.build);
  const projectId = normalizeOptionalString(input.projectId) ?? normalizeOptionalString(build.projectId);
  if (!projectId) {
    throw new InvalidBuildMetadataError("Invalid build metadata: missing projectId");
  }

  const doc: BuildMetadataDoc = {
    _id: randomUUID(),
    buildId: build.buildId,
    partitionId: build.partitionId,
    projectId,
    timeoutSource: "unknown"
  };

  if (input.interruptible != null) doc.interruptible = input.interruptible;
  if (input.hasExposedArtifacts != null) doc.hasExposedArtifacts = input.hasExposedArtifacts;
  if (input.configOptions) doc.configOptions = input.configOptions;
  if (input.configVariables) doc.configVariables = input.configVariables;

  return doc;
};
