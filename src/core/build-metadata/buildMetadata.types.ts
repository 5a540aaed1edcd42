import type { TimeoutSource } from "../timeout/timeout.types";

export type BuildRef = {
  buildId: string;
  partitionId: number;
};

export type ConfigVariable = {
  key: string;
  value?: string | null;
};

export type ConfigOptions = Record<string, unknown> & {
  manualConfirmation?: unknown;
};

export type BuildMetadataDoc = {
  _id: string;          // UUIDv4
  buildId: string;
  partitionId: number;
  projectId: string;
  timeout?: number;     // seconds
  timeoutSource: TimeoutSource;
  interruptible?: boolean;
  hasExposedArtifacts?: boolean;
  configOptions?: ConfigOptions;
  configVariables?: ConfigVariable[];
};

export type NewBuildMetadata = {
  build: BuildRef & { projectId: string };
  projectId?: string;
  interruptible?: boolean;
  hasExposedArtifacts?: boolean;
  configOptions?: ConfigOptions;
  configVariables?: ConfigVariable[];
};
