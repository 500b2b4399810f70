import type { TaskId } from "./task";
import type { VmId } from "./resources";

export type SchedulingErrorCode =
  | "MISSING_EXECUTION_ENTRY"
  | "MALFORMED_DEPENDENCY"
  | "UNREACHABLE_TASK"
  | "INVALID_DOCUMENT"
  | "INVALID_CONFIG";

export class SchedulingError extends Error {
  readonly code: SchedulingErrorCode;

  constructor(code: SchedulingErrorCode, message: string) {
    super(message);
    this.name = "SchedulingError";
    this.code = code;
  }
}

export class MissingExecutionEntryError extends SchedulingError {
  readonly task: TaskId;
  readonly vm?: VmId;

  constructor(task: TaskId, vm?: VmId) {
    super(
      "MISSING_EXECUTION_ENTRY",
      vm === undefined
        ? `No execution times recorded for task "${task}"`
        : `No execution time recorded for task "${task}" on VM "${vm}"`
    );
    this.name = "MissingExecutionEntryError";
    this.task = task;
    this.vm = vm;
  }
}

export class MalformedDependencyError extends SchedulingError {
  readonly task: TaskId;
  readonly dependency: TaskId;

  constructor(task: TaskId, dependency: TaskId) {
    super(
      "MALFORMED_DEPENDENCY",
      `Dependency "${dependency}" -> "${task}" names an unknown task`
    );
    this.name = "MalformedDependencyError";
    this.task = task;
    this.dependency = dependency;
  }
}

export class UnreachableTaskError extends SchedulingError {
  readonly tasks: readonly TaskId[];

  constructor(tasks: readonly TaskId[]) {
    super(
      "UNREACHABLE_TASK",
      `Tasks never became ready (cyclic or dangling dependencies): ${tasks.join(", ")}`
    );
    this.name = "UnreachableTaskError";
    this.tasks = tasks;
  }
}

export class InvalidDocumentError extends SchedulingError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_DOCUMENT", `Invalid workflow document: ${issues.join("; ")}`);
    this.name = "InvalidDocumentError";
    this.issues = issues;
  }
}

export class InvalidConfigError extends SchedulingError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_CONFIG", `Invalid scheduler config: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export function isSchedulingError(value: unknown): value is SchedulingError {
  return value instanceof SchedulingError;
}
