import type { TaskGraph, TaskId } from "./task";
import type { Topology, VmId } from "./resources";
import type { CommunicationTimes, ExecutionTimeTable, PlacementTable } from "./tables";
import type { ScheduleMetrics } from "./metrics";
import type { UnreachablePolicy, VmAvailability } from "../engine/policy";

export interface SchedulerConfig {
  onUnreachable: UnreachablePolicy;
  vmAvailability: VmAvailability;
}

export type WorkflowModel = {
  graph: TaskGraph;
  topology: Topology;
  executionTimes: ExecutionTimeTable;
  communicationTimes: CommunicationTimes;
};

// VM -> tasks in assignment order (not necessarily execution order)
export type Allocation = ReadonlyMap<VmId, readonly TaskId[]>;

export type ScheduleResult = {
  queue: readonly TaskId[];
  allocation: Allocation;
  est: PlacementTable;
  eft: PlacementTable;

  // VM chosen for every scheduled task except the broadcast entry task
  placements: ReadonlyMap<TaskId, VmId>;

  // tasks that never became ready and were dropped
  unscheduled: readonly TaskId[];

  metrics: ScheduleMetrics;
};
