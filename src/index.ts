// core
export * from "./core/state";
export * from "./core/task";
export * from "./core/resources";
export * from "./core/tables";
export * from "./core/metrics";
export * from "./core/errors";
export * from "./core/logger";

// engine
export * from "./engine/policy";
export * from "./engine/selector";
export * from "./engine/allocator";
export * from "./engine/metrics";
export * from "./engine/verify";
export * from "./engine/workflow";

// io
export * from "./io/loader";
export * from "./io/report";
export { bootstrap } from "./cli";
export type { CliIO } from "./cli";

// types
export type { WorkflowModel, ScheduleResult, SchedulerConfig } from "./core/state";
export type { Task, TaskGraph, TaskId } from "./core/task";
export type { CloudServer, Topology, VirtualMachine, VmId } from "./core/resources";
export type { ScheduleMetrics } from "./core/metrics";
export type { UnreachablePolicy, VmAvailability } from "./engine/policy";
