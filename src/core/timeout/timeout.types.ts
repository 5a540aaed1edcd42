export type CandidateTimeoutSource = "project" | "runner" | "job";

/** `unknown` marks a record whose timeout has never been resolved. */
export type TimeoutSource = CandidateTimeoutSource | "unknown";

export type TimeoutCandidate = Readonly<{
  value: number; // seconds
  source: CandidateTimeoutSource;
}>;

export type ResolvedTimeout = Readonly<{
  value: number;
  source: TimeoutSource;
}>;

export type TimeoutInputs = {
  jobTimeout?: number | null;
  projectTimeout?: number | null;
  runnerMaximumTimeout?: number | null;
};
