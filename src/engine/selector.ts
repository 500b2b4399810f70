import { MissingExecutionEntryError } from "../core/errors";
import type { WorkflowModel } from "../core/state";
import { bestCaseTime } from "../core/tables";
import { compareTaskIds, type Task, type TaskId } from "../core/task";

export type SelectionResult = {
  queue: TaskId[];
  // tasks left over when no remaining task was ready, in document order
  unreachable: TaskId[];
};

function isReady(task: Task, entry: TaskId, selected: ReadonlySet<TaskId>) {
  if (task.id === entry) return true;
  return task.dependencies.every((dep) => selected.has(dep));
}

/**
 * Phase I. Repeatedly takes the ready task with the smallest best-case
 * execution time over all VMs; equal times fall back to task id order.
 * Stops as soon as nothing left is ready.
 */
export function selectTasks(model: WorkflowModel): SelectionResult {
  const { graph, topology, executionTimes } = model;

  for (const id of graph.tasks.keys()) {
    if (!executionTimes.has(id)) throw new MissingExecutionEntryError(id);
  }

  const bestCase = new Map<TaskId, number>();
  for (const id of graph.tasks.keys()) {
    bestCase.set(id, bestCaseTime(executionTimes, id, topology.vms));
  }

  const remaining = new Map(graph.tasks);
  const selected = new Set<TaskId>();
  const queue: TaskId[] = [];

  while (remaining.size > 0) {
    let next: { id: TaskId; time: number } | null = null;

    for (const task of remaining.values()) {
      if (!isReady(task, graph.entry, selected)) continue;

      const time = bestCase.get(task.id) ?? Infinity;
      if (
        next === null ||
        time < next.time ||
        (time === next.time && compareTaskIds(task.id, next.id) < 0)
      ) {
        next = { id: task.id, time };
      }
    }

    if (next === null) break;

    queue.push(next.id);
    selected.add(next.id);
    remaining.delete(next.id);
  }

  return { queue, unreachable: [...remaining.keys()] };
}
