export type TaskId = string;

export type TaskRole = "entry" | "exit" | "inner";

export type Task = {
  id: TaskId;
  role: TaskRole;
  dependencies: readonly TaskId[];
};

export type TaskGraph = {
  // document order
  tasks: ReadonlyMap<TaskId, Task>;
  entry: TaskId;
  exit: TaskId;
};

/**
 * Fixed total order over task identifiers: plain UTF-16 code unit comparison,
 * independent of locale and of the order tasks were discovered in.
 */
export function compareTaskIds(a: TaskId, b: TaskId): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
