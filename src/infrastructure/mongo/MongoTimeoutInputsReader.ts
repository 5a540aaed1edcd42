import type { Collection, Db } from "mongodb";
import type { BuildRef } from "../../core/build-metadata/buildMetadata.types";
import type { BuildTimeoutContext, TimeoutInputsReader } from "../../ports/TimeoutInputsReader";
import { mongoCollections } from "./mongo.indexes";

export type BuildDoc = {
  _id: string;
  partitionId: number;
  projectId: string;
  runnerId?: string | null;
  options?: { jobTimeout?: unknown } | null;
};

export type ProjectDoc = {
  _id: string;
  buildTimeout?: number | null;
};

export type RunnerDoc = {
  _id: string;
  maximumTimeout?: number | null;
};

const finiteNumberOrUndefined = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

export const toBuildTimeoutContext = (build: BuildDoc): BuildTimeoutContext => {
  const context: BuildTimeoutContext = { projectId: build.projectId };
  if (build.runnerId) context.runnerId = build.runnerId;

  const jobTimeout = finiteNumberOrUndefined(build.options?.jobTimeout);
  if (jobTimeout !== undefined) context.jobTimeout = jobTimeout;

  return context;
};

/**
 * Reads the three timeout sources of a build: its job options, its project and its runner.
 * Projections keep each lookup to the one field it needs.
 */
export class MongoTimeoutInputsReader implements TimeoutInputsReader {
  private readonly builds: Collection<BuildDoc>;
  private readonly projects: Collection<ProjectDoc>;
  private readonly runners: Collection<RunnerDoc>;

  constructor(db: Db) {
    this.builds = db.collection<BuildDoc>(mongoCollections.builds);
    this.projects = db.collection<ProjectDoc>(mongoCollections.projects);
    this.runners = db.collection<RunnerDoc>(mongoCollections.runners);
  }

  async findBuild(ref: BuildRef): Promise<BuildTimeoutContext | null> {
    const build = await this.builds.findOne(
      { _id: ref.buildId, partitionId: ref.partitionId },
      { projection: { projectId: 1, runnerId: 1, options: 1 } }
    );
    return build ? toBuildTimeoutContext(build) : null;
  }

  async findProjectTimeout(projectId: string): Promise<number | undefined> {
    const project = await this.projects.findOne({ _id: projectId }, { projection: { buildTimeout: 1 } });
    return finiteNumberOrUndefined(project?.buildTimeout);
  }

  async findRunnerMaximumTimeout(runnerId: string): Promise<number | undefined> {
    const runner = await this.runners.findOne({ _id: runnerId }, { projection: { maximumTimeout: 1 } });
    return finiteNumberOrUndefined(runner?.maximumTimeout);
  }
}
