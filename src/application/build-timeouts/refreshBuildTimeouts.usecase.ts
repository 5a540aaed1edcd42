import type { BuildRef } from "../../core/build-metadata/buildMetadata.types";
import { mapWithConcurrency } from "../../shared/concurrency/limiter";
import type { RefreshConfigInput } from "./refresh.config";
import { resolveRefreshConfig } from "./refresh.config";
import {
  classifyRefreshFailure,
  createRefreshSummaryTracker,
  type TimeoutRefreshSummary
} from "./timeout.error-handler";
import { type TimeoutStateDeps, updateTimeoutState } from "./updateTimeoutState.usecase";

/**
 * Refreshes the effective timeout of many builds with bounded concurrency.
 * A failing build is logged and counted; the others still run.
 */
export const refreshBuildTimeouts = async (
  deps: TimeoutStateDeps & { config?: RefreshConfigInput },
  refs: BuildRef[]
): Promise<TimeoutRefreshSummary> => {
  const config = resolveRefreshConfig(deps.config);
  const summaryTracker = createRefreshSummaryTracker();

  await mapWithConcurrency(refs, config.concurrency, async (ref) => {
    try {
      const outcome = await updateTimeoutState(deps, ref);
      if (outcome.status === "updated") {
        summaryTracker.addUpdated();
        console.log(JSON.stringify({
          event: "timeouts.updated",
          ...ref,
          timeout: outcome.timeout.value,
          timeoutSource: outcome.timeout.source
        }));
        return;
      }

      summaryTracker.addSkipped();
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "timeouts.skipped", ...ref, reason: outcome.reason }));
    } catch (reason) {
      const error = classifyRefreshFailure(reason, ref);
      const failedCount = summaryTracker.addFailed(error.code);
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "timeouts.build_failed",
        ...ref,
        code: error.code,
        message: error.message,
        failedCount
      }));
    }
  });

  const summary = summaryTracker.summary();
  console.log(JSON.stringify({ event: "timeouts.refresh_completed", ...summary }));
  return summary;
};
