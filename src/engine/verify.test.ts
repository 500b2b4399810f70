import { describe, expect, it } from "vitest";
import { chainDocument } from "../__fixtures__/documents";
import type { ScheduleResult, WorkflowModel } from "../core/state";
import { PlacementTable } from "../core/tables";
import { loadModel } from "../io/loader";
import { computeMetrics } from "./metrics";
import { verifySchedule } from "./verify";

type Row = [task: string, vm: string, est: number, eft: number];

function handBuilt(
  model: WorkflowModel,
  rows: Row[],
  allocation: Record<string, string[]>
): ScheduleResult {
  const est = new PlacementTable();
  const eft = new PlacementTable();
  const placements = new Map<string, string>();
  for (const [task, vm, start, finish] of rows) {
    est.set(task, vm, start);
    eft.set(task, vm, finish);
    if (task !== model.graph.entry) placements.set(task, vm);
  }
  const alloc = new Map(Object.entries(allocation));

  return {
    queue: [],
    allocation: alloc,
    est,
    eft,
    placements,
    unscheduled: [],
    metrics: computeMetrics(model, alloc, eft),
  };
}

const entryRows: Row[] = [
  ["A", "vm1", 0, 0],
  ["A", "vm2", 0, 0],
];

describe("verifySchedule", () => {
  const model = loadModel(chainDocument());

  it("accepts a consistent schedule", () => {
    const result = handBuilt(
      model,
      [...entryRows, ["B", "vm1", 0, 4], ["C", "vm1", 4, 7]],
      { vm1: ["A", "B", "C"], vm2: ["A"] }
    );
    expect(verifySchedule(model, result)).toEqual([]);
  });

  it("reports a start that ignores cross-server communication", () => {
    const result = handBuilt(
      model,
      [...entryRows, ["B", "vm1", 0, 4], ["C", "vm2", 4, 9]],
      { vm1: ["A", "B"], vm2: ["A", "C"] }
    );
    expect(verifySchedule(model, result)).toEqual([
      { kind: "precedence", task: "C", dependency: "B", est: 4, readyAt: 6 },
    ]);
  });

  it("reports a finish time that does not add up", () => {
    const result = handBuilt(
      model,
      [...entryRows, ["B", "vm1", 0, 5], ["C", "vm1", 5, 8]],
      { vm1: ["A", "B", "C"], vm2: ["A"] }
    );
    expect(verifySchedule(model, result)).toEqual([
      { kind: "finish-time", task: "B", vm: "vm1", est: 0, eft: 5, ect: 4 },
    ]);
  });

  it("reports missing entry copies and missing placements", () => {
    const result = handBuilt(
      model,
      [["A", "vm1", 0, 0], ["B", "vm1", 0, 4]],
      { vm1: ["A", "B"], vm2: [] }
    );
    expect(verifySchedule(model, result)).toEqual([
      { kind: "placement", task: "C", count: 0 },
      { kind: "entry-missing", task: "A", vm: "vm2" },
    ]);
  });
});
