import type { BuildMetadataDoc, NewBuildMetadata } from "../../core/build-metadata/buildMetadata.types";
import { createBuildMetadata } from "../../core/build-metadata/createBuildMetadata";
import type { BuildMetadataRepository } from "../../ports/BuildMetadataRepository";
import { wrapRepositoryFailure } from "./timeout.error-handler";

export const registerBuildMetadata = async (
  deps: { repo: BuildMetadataRepository },
  input: NewBuildMetadata
): Promise<BuildMetadataDoc> => {
  const doc = createBuildMetadata(input);
  try {
    await deps.repo.insert(doc);
  } catch (error) {
    throw wrapRepositoryFailure(error, { buildId: doc.buildId, partitionId: doc.partitionId });
  }
  return doc;
};
