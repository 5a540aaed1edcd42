import type { BuildRef } from "../core/build-metadata/buildMetadata.types";

export type BuildTimeoutContext = {
  projectId: string;
  runnerId?: string;
  jobTimeout?: number; // from the job's own config options
};

/**
 * Read side of the data each timeout resolution depends on.
 * Every lookup may hit the database; callers should not repeat them.
 */
export interface TimeoutInputsReader {
  findBuild(ref: BuildRef): Promise<BuildTimeoutContext | null>;
  findProjectTimeout(projectId: string): Promise<number | undefined>;
  findRunnerMaximumTimeout(runnerId: string): Promise<number | undefined>;
}
