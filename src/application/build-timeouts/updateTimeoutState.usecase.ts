import type { BuildMetadataDoc, BuildRef } from "../../core/build-metadata/buildMetadata.types";
import { resolveTimeout } from "../../core/timeout/resolveTimeout";
import type { ResolvedTimeout, TimeoutInputs } from "../../core/timeout/timeout.types";
import type { BuildMetadataRepository } from "../../ports/BuildMetadataRepository";
import type { BuildTimeoutContext, TimeoutInputsReader } from "../../ports/TimeoutInputsReader";
import {
  buildNotFound,
  metadataNotFound,
  type TimeoutSkipCode,
  wrapLookupFailure,
  wrapRepositoryFailure
} from "./timeout.error-handler";

export type TimeoutStateOutcome =
  | { status: "updated"; timeout: ResolvedTimeout }
  | { status: "skipped"; reason: TimeoutSkipCode };

export type TimeoutStateDeps = {
  inputs: TimeoutInputsReader;
  repo: BuildMetadataRepository;
};

// The project default only matters when the job has no timeout of its own.
// It comes from the metadata record's project, which may differ from the build's.
const gatherTimeoutInputs = async (
  inputs: TimeoutInputsReader,
  build: BuildTimeoutContext,
  metadata: BuildMetadataDoc
): Promise<TimeoutInputs> => {
  const [projectTimeout, runnerMaximumTimeout] = await Promise.all([
    build.jobTimeout === undefined ? inputs.findProjectTimeout(metadata.projectId) : Promise.resolve(undefined),
    build.runnerId === undefined ? Promise.resolve(undefined) : inputs.findRunnerMaximumTimeout(build.runnerId)
  ]);

  return { jobTimeout: build.jobTimeout, projectTimeout, runnerMaximumTimeout };
};

/**
 * Resolves the effective timeout of one build and stores it on the build's metadata.
 * Leaves stored state untouched when no timeout source is configured.
 */
export const updateTimeoutState = async (deps: TimeoutStateDeps, ref: BuildRef): Promise<TimeoutStateOutcome> => {
  let build: BuildTimeoutContext | null;
  let metadata: BuildMetadataDoc | null;
  try {
    [build, metadata] = await Promise.all([deps.inputs.findBuild(ref), deps.repo.findByBuild(ref)]);
  } catch (error) {
    throw wrapLookupFailure(error, ref);
  }
  if (!build) throw buildNotFound(ref);
  if (!metadata) throw metadataNotFound(ref);

  let timeoutInputs: TimeoutInputs;
  try {
    timeoutInputs = await gatherTimeoutInputs(deps.inputs, build, metadata);
  } catch (error) {
    throw wrapLookupFailure(error, ref);
  }

  const timeout = resolveTimeout(timeoutInputs);
  if (!timeout) {
    return { status: "skipped", reason: "no_candidates" };
  }

  let saved: boolean;
  try {
    saved = await deps.repo.saveTimeout(ref, timeout);
  } catch (error) {
    throw wrapRepositoryFailure(error, ref);
  }
  if (!saved) throw metadataNotFound(ref);

  return { status: "updated", timeout };
};
