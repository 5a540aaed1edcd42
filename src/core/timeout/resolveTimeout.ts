import type { ResolvedTimeout, TimeoutCandidate, TimeoutInputs } from "./timeout.types";

/**
 * Timeout precedence for a CI job:
 * - a job-level timeout overrides the project default, whatever their values
 * - the runner maximum caps whichever of the two was picked
 * - the shortest remaining candidate wins; on a tie the job/project one is kept
 *
 * Returns `undefined` when no candidate is present, meaning the stored
 * timeout state must stay as it is.
 */
export const jobTimeoutCandidate = (value: number | null | undefined): TimeoutCandidate | undefined =>
  typeof value === "number" ? { value, source: "job" } : undefined;

export const projectTimeoutCandidate = (value: number | null | undefined): TimeoutCandidate | undefined =>
  typeof value === "number" && value !== 0 ? { value, source: "project" } : undefined;

// A runner without a positive maximum imposes no cap.
export const runnerTimeoutCandidate = (value: number | null | undefined): TimeoutCandidate | undefined =>
  typeof value === "number" && value > 0 ? { value, source: "runner" } : undefined;

export const selectMostRestrictive = (
  candidates: ReadonlyArray<TimeoutCandidate | undefined>
): TimeoutCandidate | undefined => {
  let winner: TimeoutCandidate | undefined;
  for (const candidate of candidates) {
    if (!candidate) continue;
    // strict comparison keeps the earlier candidate on ties
    if (!winner || candidate.value < winner.value) {
      winner = candidate;
    }
  }
  return winner;
};

export const resolveTimeout = (inputs: TimeoutInputs): ResolvedTimeout | undefined => {
  const jobOrProject = jobTimeoutCandidate(inputs.jobTimeout) ?? projectTimeoutCandidate(inputs.projectTimeout);
  const winner = selectMostRestrictive([jobOrProject, runnerTimeoutCandidate(inputs.runnerMaximumTimeout)]);
  if (!winner) return undefined;

  return { value: winner.value, source: winner.source };
};
