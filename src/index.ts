export {
  resolveTimeout,
  selectMostRestrictive,
  jobTimeoutCandidate,
  projectTimeoutCandidate,
  runnerTimeoutCandidate
} from "./core/timeout/resolveTimeout";
export type {
  CandidateTimeoutSource,
  ResolvedTimeout,
  TimeoutCandidate,
  TimeoutInputs,
  TimeoutSource
} from "./core/timeout/timeout.types";
export { createBuildMetadata, InvalidBuildMetadataError } from "./core/build-metadata/createBuildMetadata";
export { manualConfirmationMessage } from "./core/build-metadata/manualConfirmation";
export type { BuildMetadataDoc, BuildRef, NewBuildMetadata } from "./core/build-metadata/buildMetadata.types";
export { updateTimeoutState } from "./application/build-timeouts/updateTimeoutState.usecase";
export { refreshBuildTimeouts } from "./application/build-timeouts/refreshBuildTimeouts.usecase";
export { registerBuildMetadata } from "./application/build-timeouts/registerBuildMetadata.usecase";
export { TimeoutUpdateError } from "./application/build-timeouts/timeout.error-handler";
