import { sameServer } from "../core/resources";
import type { ScheduleResult, WorkflowModel } from "../core/state";
import { communicationTime, executionTime } from "../core/tables";
import type { TaskId } from "../core/task";

export type ScheduleViolation =
  | { kind: "placement"; task: TaskId; count: number }
  | { kind: "entry-missing"; task: TaskId; vm: string }
  | { kind: "finish-time"; task: TaskId; vm: string; est: number; eft: number; ect: number }
  | { kind: "precedence"; task: TaskId; dependency: TaskId; est: number; readyAt: number };

/**
 * Re-checks a finished schedule against the model. VM overlap is not
 * reported: under "shared" availability it is allowed.
 */
export function verifySchedule(
  model: WorkflowModel,
  result: ScheduleResult
): ScheduleViolation[] {
  const { graph, topology } = model;
  const violations: ScheduleViolation[] = [];
  const unscheduled = new Set(result.unscheduled);

  const counts = new Map<TaskId, number>();
  for (const tasks of result.allocation.values()) {
    for (const task of tasks) {
      if (task === graph.entry) continue;
      counts.set(task, (counts.get(task) ?? 0) + 1);
    }
  }

  for (const id of graph.tasks.keys()) {
    if (id === graph.entry || unscheduled.has(id)) continue;
    const count = counts.get(id) ?? 0;
    if (count !== 1) violations.push({ kind: "placement", task: id, count });
  }

  if (!unscheduled.has(graph.entry)) {
    for (const vm of topology.vms) {
      const onVm = result.allocation.get(vm.id) ?? [];
      if (!onVm.includes(graph.entry) || result.est.get(graph.entry, vm.id) !== 0) {
        violations.push({ kind: "entry-missing", task: graph.entry, vm: vm.id });
      }
    }
  }

  for (const { task, vm, value: est } of result.est.entries()) {
    const eft = result.eft.get(task, vm) ?? NaN;
    const ect = executionTime(model.executionTimes, task, vm);
    if (eft !== est + ect) {
      violations.push({ kind: "finish-time", task, vm, est, eft, ect });
    }
  }

  for (const [id, vm] of result.placements) {
    const task = graph.tasks.get(id);
    const est = result.est.get(id, vm);
    if (!task || est === undefined) continue;

    for (const dep of task.dependencies) {
      const depVm = dep === graph.entry ? vm : result.placements.get(dep);
      if (depVm === undefined) continue;

      const finish = result.eft.get(dep, depVm) ?? Infinity;
      const delay = sameServer(topology, vm, depVm)
        ? 0
        : communicationTime(model.communicationTimes, dep, id);
      const readyAt = finish + delay;

      if (est < readyAt) {
        violations.push({ kind: "precedence", task: id, dependency: dep, est, readyAt });
      }
    }
  }

  return violations;
}
