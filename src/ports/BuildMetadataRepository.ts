import type { BuildMetadataDoc, BuildRef } from "../core/build-metadata/buildMetadata.types";
import type { ResolvedTimeout } from "../core/timeout/timeout.types";

export type { BuildMetadataDoc, BuildRef };

export interface BuildMetadataRepository {
  insert(doc: BuildMetadataDoc): Promise<void>;
  findByBuild(ref: BuildRef): Promise<BuildMetadataDoc | null>;
  /** Resolves to false when no metadata record exists for the build. */
  saveTimeout(ref: BuildRef, timeout: ResolvedTimeout): Promise<boolean>;
}
