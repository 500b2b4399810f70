import { UnreachableTaskError } from "../core/errors";
import { Logger } from "../core/logger";
import type { ScheduleResult, SchedulerConfig, WorkflowModel } from "../core/state";
import { allocateTasks } from "./allocator";
import { computeMetrics } from "./metrics";
import { resolveSchedulerConfig } from "./policy";
import { selectTasks } from "./selector";

export type ScheduleOptions = {
  config?: Partial<SchedulerConfig>;
  logger?: Logger;
};

export function scheduleWorkflow(
  model: WorkflowModel,
  options: ScheduleOptions = {}
): ScheduleResult {
  const config = resolveSchedulerConfig(options.config);
  const logger = options.logger ?? new Logger();

  logger.debug("phase I: task selection", { tasks: model.graph.tasks.size });
  const { queue, unreachable } = selectTasks(model);

  if (unreachable.length > 0) {
    if (config.onUnreachable === "fail") {
      throw new UnreachableTaskError(unreachable);
    }
    logger.warn("dropping tasks that never became ready", {
      tasks: unreachable,
    });
  }

  logger.debug("phase II: resource allocation", {
    queue,
    vmAvailability: config.vmAvailability,
  });
  const state = allocateTasks(model, queue, {
    vmAvailability: config.vmAvailability,
    logger: logger.child("allocator"),
  });

  const metrics = computeMetrics(model, state.allocation, state.eft);
  logger.info("workflow scheduled", { ...metrics });

  return {
    queue,
    allocation: state.allocation,
    est: state.est,
    eft: state.eft,
    placements: state.placements,
    unscheduled: unreachable,
    metrics,
  };
}
