import { MissingExecutionEntryError } from "./errors";
import type { VmId, VirtualMachine } from "./resources";
import type { TaskId } from "./task";

export type ExecutionTimeTable = ReadonlyMap<TaskId, ReadonlyMap<VmId, number>>;

// source task -> destination task -> delay
export type CommunicationTimes = ReadonlyMap<TaskId, ReadonlyMap<TaskId, number>>;

export function executionTime(
  table: ExecutionTimeTable,
  task: TaskId,
  vm: VmId
): number {
  const row = table.get(task);
  if (!row) throw new MissingExecutionEntryError(task);

  const time = row.get(vm);
  if (time === undefined) throw new MissingExecutionEntryError(task, vm);

  return time;
}

/** Fastest execution of `task` on any of `vms`, ignoring contention and communication. */
export function bestCaseTime(
  table: ExecutionTimeTable,
  task: TaskId,
  vms: readonly VirtualMachine[]
): number {
  let best = Infinity;
  for (const vm of vms) {
    best = Math.min(best, executionTime(table, task, vm.id));
  }
  return best;
}

export function communicationTime(
  times: CommunicationTimes,
  source: TaskId,
  destination: TaskId
): number {
  return times.get(source)?.get(destination) ?? 0;
}

export type PlacementEntry = {
  task: TaskId;
  vm: VmId;
  value: number;
};

/**
 * Table keyed by a (task, VM) pair. Each key is written at most once and
 * entries iterate in the order they were recorded.
 */
export class PlacementTable {
  private readonly rows = new Map<TaskId, Map<VmId, number>>();
  private readonly recorded: PlacementEntry[] = [];

  set(task: TaskId, vm: VmId, value: number): void {
    let row = this.rows.get(task);
    if (!row) {
      row = new Map();
      this.rows.set(task, row);
    }
    if (row.has(vm)) {
      throw new Error(`Placement ${task}@${vm} is already recorded`);
    }
    row.set(vm, value);
    this.recorded.push({ task, vm, value });
  }

  get(task: TaskId, vm: VmId): number | undefined {
    return this.rows.get(task)?.get(vm);
  }

  has(task: TaskId, vm: VmId): boolean {
    return this.rows.get(task)?.has(vm) ?? false;
  }

  forTask(task: TaskId): ReadonlyMap<VmId, number> {
    return this.rows.get(task) ?? new Map();
  }

  entries(): readonly PlacementEntry[] {
    return this.recorded;
  }

  values(): number[] {
    return this.recorded.map((e) => e.value);
  }

  get size(): number {
    return this.recorded.length;
  }
}
