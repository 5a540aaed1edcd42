import type { BuildRef } from "../../core/build-metadata/buildMetadata.types";

export type TimeoutSkipCode = "no_candidates";
export type TimeoutFailureCode =
  | "build_not_found"
  | "metadata_not_found"
  | "input_lookup_failed"
  | "repository_write_failed";

export type TimeoutErrorContext = BuildRef;

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

const describeBuild = (context: TimeoutErrorContext) =>
  `build=${context.buildId}, partition=${context.partitionId}`;

export class TimeoutUpdateError extends Error {
  readonly code: TimeoutFailureCode;
  readonly context: TimeoutErrorContext;

  constructor(args: { code: TimeoutFailureCode; message: string; context: TimeoutErrorContext; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "TimeoutUpdateError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const buildNotFound = (context: TimeoutErrorContext) =>
  new TimeoutUpdateError({
    code: "build_not_found",
    message: `Build not found: ${describeBuild(context)}`,
    context
  });

export const metadataNotFound = (context: TimeoutErrorContext) =>
  new TimeoutUpdateError({
    code: "metadata_not_found",
    message: `Build metadata not found: ${describeBuild(context)}`,
    context
  });

export const wrapLookupFailure = (reason: unknown, context: TimeoutErrorContext) =>
  new TimeoutUpdateError({
    code: "input_lookup_failed",
    message: `Timeout input lookup failed at ${describeBuild(context)}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

export const wrapRepositoryFailure = (reason: unknown, context: TimeoutErrorContext) =>
  new TimeoutUpdateError({
    code: "repository_write_failed",
    message: `Repository write failed at ${describeBuild(context)}: ${toErrorMessage(reason)}`,
    context,
    cause: unwrapCause(reason)
  });

/** Anything that is not a TimeoutUpdateError escaped the use case unclassified. */
export const classifyRefreshFailure = (reason: unknown, context: TimeoutErrorContext): TimeoutUpdateError =>
  reason instanceof TimeoutUpdateError ? reason : wrapLookupFailure(reason, context);

export type TimeoutRefreshSummary = {
  total: number;
  updated: number;
  skipped: number;
  failed: number;
  failedByCode: Partial<Record<TimeoutFailureCode, number>>;
};

export const createRefreshSummaryTracker = () => {
  let total = 0;
  let updated = 0;
  let skipped = 0;
  const failedByCode: Partial<Record<TimeoutFailureCode, number>> = {};

  return {
    addUpdated: () => {
      total += 1;
      updated += 1;
    },
    addSkipped: () => {
      total += 1;
      skipped += 1;
    },
    addFailed: (code: TimeoutFailureCode) => {
      total += 1;
      failedByCode[code] = (failedByCode[code] ?? 0) + 1;
      return failedByCode[code] ?? 0;
    },
    summary: (): TimeoutRefreshSummary => ({
      total,
      updated,
      skipped,
      failed: Object.values(failedByCode).reduce((sum, count) => sum + (count ?? 0), 0),
      failedByCode: { ...failedByCode }
    })
  };
};
