import { InvalidDocumentError } from "../core/errors";
import { Logger } from "../core/logger";
import { sameServer, type VmId } from "../core/resources";
import type { WorkflowModel } from "../core/state";
import {
  communicationTime,
  executionTime,
  PlacementTable,
} from "../core/tables";
import type { Task, TaskId } from "../core/task";
import type { VmAvailability } from "./policy";

export type AllocationState = {
  allocation: Map<VmId, TaskId[]>;
  est: PlacementTable;
  eft: PlacementTable;
  placements: Map<TaskId, VmId>;
};

export type AllocateOptions = {
  vmAvailability?: VmAvailability;
  logger?: Logger;
};

export function createAllocationState(model: WorkflowModel): AllocationState {
  const allocation = new Map<VmId, TaskId[]>();
  for (const vm of model.topology.vms) allocation.set(vm.id, []);

  return {
    allocation,
    est: new PlacementTable(),
    eft: new PlacementTable(),
    placements: new Map(),
  };
}

function record(
  state: AllocationState,
  task: TaskId,
  vm: VmId,
  est: number,
  eft: number
) {
  state.est.set(task, vm, est);
  state.eft.set(task, vm, eft);

  const list = state.allocation.get(vm);
  if (list) list.push(task);
  else state.allocation.set(vm, [task]);
}

/**
 * Time at which the output of `dep` is available to `task` on `vm`.
 * The entry task runs on every VM, so its local copy is always used.
 */
function dependencyReadyTime(
  model: WorkflowModel,
  state: AllocationState,
  dep: TaskId,
  task: TaskId,
  vm: VmId
): number {
  if (dep === model.graph.entry) return state.eft.get(dep, vm) ?? 0;

  const depVm = state.placements.get(dep);
  const finish = depVm === undefined ? undefined : state.eft.get(dep, depVm);
  if (depVm === undefined || finish === undefined) {
    throw new Error(`Dependency "${dep}" of "${task}" has not been placed yet`);
  }

  const delay = sameServer(model.topology, vm, depVm)
    ? 0
    : communicationTime(model.communicationTimes, dep, task);

  return finish + delay;
}

function vmFreeAt(state: AllocationState, vm: VmId): number {
  let free = 0;
  for (const placed of state.allocation.get(vm) ?? []) {
    free = Math.max(free, state.eft.get(placed, vm) ?? 0);
  }
  return free;
}

export function earliestStartTime(
  model: WorkflowModel,
  state: AllocationState,
  task: Task,
  vm: VmId,
  availability: VmAvailability = "shared"
): number {
  let start = 0;
  for (const dep of task.dependencies) {
    start = Math.max(
      start,
      dependencyReadyTime(model, state, dep, task.id, vm)
    );
  }

  // "shared" deliberately leaves VM overlap unconstrained
  if (availability === "serial") start = Math.max(start, vmFreeAt(state, vm));

  return start;
}

/**
 * Phase II. The entry task is broadcast to every VM with EST 0. Every other
 * task, in queue order, goes to the VM with the smallest EFT; ties go to the
 * VM enumerated first. Nothing is revisited once placed.
 */
export function allocateTasks(
  model: WorkflowModel,
  queue: readonly TaskId[],
  options: AllocateOptions = {}
): AllocationState {
  const { vmAvailability = "shared", logger = new Logger() } = options;
  const { graph, topology, executionTimes } = model;

  if (topology.vms.length === 0 && queue.length > 0) {
    throw new InvalidDocumentError(["topology has no virtual machines"]);
  }

  const state = createAllocationState(model);

  for (const id of queue) {
    if (id === graph.entry) {
      for (const vm of topology.vms) {
        record(state, id, vm.id, 0, executionTime(executionTimes, id, vm.id));
      }
      logger.debug("entry task broadcast", { task: id });
      continue;
    }

    const task = graph.tasks.get(id);
    if (!task) throw new Error(`Queued task "${id}" is not in the task graph`);

    let best: { vm: VmId; est: number; eft: number } | null = null;

    for (const vm of topology.vms) {
      const est = earliestStartTime(model, state, task, vm.id, vmAvailability);
      const eft = est + executionTime(executionTimes, id, vm.id);

      if (best === null || eft < best.eft) best = { vm: vm.id, est, eft };
    }

    if (best === null) continue;

    record(state, id, best.vm, best.est, best.eft);
    state.placements.set(id, best.vm);
    logger.debug("task placed", { task: id, ...best });
  }

  return state;
}
