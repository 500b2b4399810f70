import type { ScheduleMetrics } from "../core/metrics";
import type { VmId } from "../core/resources";
import type { Allocation, WorkflowModel } from "../core/state";
import { bestCaseTime, executionTime, type PlacementTable } from "../core/tables";

export function makespan(eft: PlacementTable): number {
  return eft.values().reduce((max, value) => Math.max(max, value), 0);
}

/** Sum of execution times of the tasks assigned to each VM that has any. */
export function vmLoads(
  model: WorkflowModel,
  allocation: Allocation
): Map<VmId, number> {
  const loads = new Map<VmId, number>();
  for (const [vm, tasks] of allocation) {
    if (tasks.length === 0) continue;

    let load = 0;
    for (const task of tasks) {
      load += executionTime(model.executionTimes, task, vm);
    }
    loads.set(vm, load);
  }
  return loads;
}

// average load / maximum load, as a percentage
export function loadBalancing(loads: ReadonlyMap<VmId, number>): number {
  if (loads.size === 0) return 0;

  const values = [...loads.values()];
  const max = Math.max(...values);
  // every load is zero, hence equal
  if (max === 0) return 100;

  const average = values.reduce((sum, v) => sum + v, 0) / values.length;
  return (average / max) * 100;
}

// best-case baseline used only for normalisation, not a feasible schedule
export function sequentialTime(model: WorkflowModel): number {
  let total = 0;
  for (const id of model.graph.tasks.keys()) {
    total += bestCaseTime(model.executionTimes, id, model.topology.vms);
  }
  return total;
}

export function speedup(sequential: number, span: number): number {
  return span === 0 ? 0 : sequential / span;
}

export function efficiency(speed: number, vmCount: number): number {
  return vmCount === 0 ? 0 : (speed / vmCount) * 100;
}

export function resourceUtilization(
  loads: ReadonlyMap<VmId, number>,
  span: number
): number {
  if (span === 0 || loads.size === 0) return 0;

  let busy = 0;
  for (const load of loads.values()) busy += load;

  return (busy / (span * loads.size)) * 100;
}

export function computeMetrics(
  model: WorkflowModel,
  allocation: Allocation,
  eft: PlacementTable
): ScheduleMetrics {
  const span = makespan(eft);
  const loads = vmLoads(model, allocation);
  const sequential = model.topology.vms.length === 0 ? 0 : sequentialTime(model);
  const speed = speedup(sequential, span);

  return {
    makespan: span,
    loadBalancing: loadBalancing(loads),
    sequentialTime: sequential,
    speedup: speed,
    efficiency: efficiency(speed, model.topology.vms.length),
    resourceUtilization: resourceUtilization(loads, span),
  };
}
