import { z } from "zod";
import {
  InvalidDocumentError,
  MalformedDependencyError,
  MissingExecutionEntryError,
} from "../core/errors";
import { createTopology, type VmId } from "../core/resources";
import type { WorkflowModel } from "../core/state";
import type { CommunicationTimes, ExecutionTimeTable } from "../core/tables";
import type { Task, TaskId, TaskRole } from "../core/task";

const duration = z.number().finite().nonnegative();

export const workflowDocumentSchema = z.object({
  tasks: z.array(z.string().min(1)),
  entry_task: z.string().min(1),
  exit_task: z.string().min(1),
  dependencies: z.record(z.array(z.string())).default({}),
  // keyed "source-destination"
  communication_times: z.record(duration).default({}),
  cloud_servers: z.array(
    z.object({
      id: z.string().min(1),
      vms: z.array(z.string().min(1)),
    })
  ),
  ect_table: z.record(z.record(duration)),
});

export type WorkflowDocument = z.input<typeof workflowDocumentSchema>;

function duplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  }
  return [...repeated];
}

function own<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Every way of cutting a "source-destination" key at one dash into two non-empty ids. */
export function splitCommunicationKey(key: string): Array<[TaskId, TaskId]> {
  const splits: Array<[TaskId, TaskId]> = [];
  for (let at = key.indexOf("-"); at !== -1; at = key.indexOf("-", at + 1)) {
    const source = key.slice(0, at);
    const destination = key.slice(at + 1);
    if (source !== "" && destination !== "") splits.push([source, destination]);
  }
  return splits;
}

/**
 * Validates a parsed workflow document and builds the read-only model the
 * scheduler works on. Every structural problem aborts the load.
 */
export function loadModel(document: unknown): WorkflowModel {
  const parsed = workflowDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidDocumentError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  const doc = parsed.data;

  const issues: string[] = [];
  for (const id of duplicates(doc.tasks)) issues.push(`duplicate task "${id}"`);
  for (const id of duplicates(doc.cloud_servers.map((s) => s.id))) {
    issues.push(`duplicate cloud server "${id}"`);
  }
  for (const id of duplicates(doc.cloud_servers.flatMap((s) => s.vms))) {
    issues.push(`duplicate VM "${id}"`);
  }

  const known = new Set(doc.tasks);
  if (!known.has(doc.entry_task)) {
    issues.push(`entry task "${doc.entry_task}" is not in the task list`);
  }
  if (!known.has(doc.exit_task)) {
    issues.push(`exit task "${doc.exit_task}" is not in the task list`);
  }

  const communication = new Map<TaskId, Map<TaskId, number>>();
  const edges: Array<[TaskId, TaskId, number]> = [];
  for (const [key, time] of Object.entries(doc.communication_times)) {
    // task ids may contain dashes: keep the cut whose sides are both tasks
    const splits = splitCommunicationKey(key);
    const matches = splits.filter(([s, d]) => known.has(s) && known.has(d));

    if (matches.length === 1) {
      edges.push([matches[0][0], matches[0][1], time]);
    } else if (matches.length > 1) {
      issues.push(`communication key "${key}" is ambiguous`);
    } else if (splits.length === 1) {
      // unknown endpoints are reported as a malformed dependency below
      edges.push([splits[0][0], splits[0][1], time]);
    } else {
      issues.push(`communication key "${key}" is not "source-destination"`);
    }
  }

  if (issues.length > 0) throw new InvalidDocumentError(issues);

  for (const [task, deps] of Object.entries(doc.dependencies)) {
    for (const dep of deps) {
      if (!known.has(task) || !known.has(dep)) {
        throw new MalformedDependencyError(task, dep);
      }
    }
  }
  for (const [source, destination, time] of edges) {
    if (!known.has(source) || !known.has(destination)) {
      throw new MalformedDependencyError(destination, source);
    }

    let row = communication.get(source);
    if (!row) {
      row = new Map();
      communication.set(source, row);
    }
    row.set(destination, time);
  }

  const topology = createTopology(
    doc.cloud_servers.map((s) => ({ id: s.id, vms: s.vms }))
  );
  if (topology.vms.length === 0) {
    throw new InvalidDocumentError(["cloud_servers declare no VMs"]);
  }

  const executionTimes = new Map<TaskId, ReadonlyMap<VmId, number>>();
  for (const id of doc.tasks) {
    const row = own(doc.ect_table, id);
    if (row === undefined) throw new MissingExecutionEntryError(id);

    const times = new Map<VmId, number>();
    for (const vm of topology.vms) {
      const time = own(row, vm.id);
      if (time === undefined) throw new MissingExecutionEntryError(id, vm.id);
      times.set(vm.id, time);
    }
    executionTimes.set(id, times);
  }

  const tasks = new Map<TaskId, Task>();
  for (const id of doc.tasks) {
    const role: TaskRole =
      id === doc.entry_task ? "entry" : id === doc.exit_task ? "exit" : "inner";
    tasks.set(id, { id, role, dependencies: [...(own(doc.dependencies, id) ?? [])] });
  }

  return {
    graph: { tasks, entry: doc.entry_task, exit: doc.exit_task },
    topology,
    executionTimes: executionTimes satisfies ExecutionTimeTable,
    communicationTimes: communication satisfies CommunicationTimes,
  };
}

export function parseWorkflowDocument(json: string): WorkflowModel {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidDocumentError([`not valid JSON: ${reason}`]);
  }
  return loadModel(document);
}
