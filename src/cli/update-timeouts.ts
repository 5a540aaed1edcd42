import { runTimeoutRefresh } from "../composition/root";
import type { BuildRef } from "../core/build-metadata/buildMetadata.types";

type ErrorContext = Partial<{
  buildId: string;
  partitionId: number;
  failed: number;
  total: number;
}>;

type CliErrorEnvelope = {
  event: "timeouts.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  stack?: string;
};

export class CliUsageError extends Error {
  readonly code = "invalid_arguments";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export class TimeoutRefreshIncompleteError extends Error {
  readonly code = "refresh_incomplete";
  readonly context: { failed: number; total: number };

  constructor(failed: number, total: number) {
    super(`Timeout refresh failed for ${failed} of ${total} builds`);
    this.name = "TimeoutRefreshIncompleteError";
    this.context = { failed, total };
  }
}

const numericContextKeys = ["partitionId", "failed", "total"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.buildId === "string") {
    sanitizedContext.buildId = value.buildId;
  }
  for (const key of numericContextKeys) {
    const raw = value[key];
    if (typeof raw === "number" && Number.isFinite(raw)) {
      sanitizedContext[key] = raw;
    }
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

// Build ids are opaque and may contain ":", so the partition is taken after the last one.
const buildRefPattern = /^(\S+):(\d+)$/;

/** Parses `<buildId>:<partitionId>` arguments. */
export const parseBuildRefs = (args: string[]): BuildRef[] => {
  if (args.length === 0) {
    throw new CliUsageError("Usage: update-timeouts <buildId>:<partitionId> [...]");
  }

  return args.map((arg) => {
    const match = buildRefPattern.exec(arg.trim());
    const partitionId = match ? Number(match[2]) : Number.NaN;
    if (!match || !Number.isSafeInteger(partitionId)) {
      throw new CliUsageError(`Invalid build reference "${arg}", expected <buildId>:<partitionId>`);
    }
    return { buildId: match[1], partitionId };
  });
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "timeouts.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeUpdateTimeoutsCli = async (args: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const summary = await runTimeoutRefresh(parseBuildRefs(args));
    if (summary.failed > 0) {
      throw new TimeoutRefreshIncompleteError(summary.failed, summary.total);
    }
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeUpdateTimeoutsCli();
}
