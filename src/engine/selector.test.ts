import { describe, expect, it } from "vitest";
import {
  chainDocument,
  cyclicDocument,
  diamondDocument,
} from "../__fixtures__/documents";
import { MissingExecutionEntryError } from "../core/errors";
import { loadModel } from "../io/loader";
import { selectTasks } from "./selector";

describe("selectTasks", () => {
  it("orders a chain by precedence", () => {
    const { queue, unreachable } = selectTasks(loadModel(chainDocument()));
    expect(queue).toEqual(["A", "B", "C"]);
    expect(unreachable).toEqual([]);
  });

  it("picks the ready task with the smallest best-case time first", () => {
    // P's fastest VM takes 2, Q's takes 3
    const { queue } = selectTasks(loadModel(diamondDocument()));
    expect(queue).toEqual(["E", "P", "Q", "X"]);
  });

  it("breaks equal best-case times by task id, not document order", () => {
    const model = loadModel({
      tasks: ["start", "zeta", "alpha", "Beta"],
      entry_task: "start",
      exit_task: "zeta",
      dependencies: {},
      cloud_servers: [{ id: "s1", vms: ["v1"] }],
      ect_table: {
        start: { v1: 1 },
        zeta: { v1: 1 },
        alpha: { v1: 1 },
        Beta: { v1: 1 },
      },
    });

    // upper case sorts before lower case
    expect(selectTasks(model).queue).toEqual(["Beta", "alpha", "start", "zeta"]);
  });

  it("treats the entry task as ready even when it lists dependencies", () => {
    const doc = chainDocument();
    const model = loadModel({ ...doc, dependencies: { ...doc.dependencies, A: ["C"] } });
    expect(selectTasks(model).queue).toEqual(["A", "B", "C"]);
  });

  it("stops early and reports tasks that never become ready", () => {
    const { queue, unreachable } = selectTasks(loadModel(cyclicDocument()));
    expect(queue).toEqual(["A", "D"]);
    expect(unreachable).toEqual(["B", "C"]);
  });

  it("fails before any placement when a task has no execution times", () => {
    const model = loadModel(chainDocument());
    const executionTimes = new Map(model.executionTimes);
    executionTimes.delete("B");

    expect(() => selectTasks({ ...model, executionTimes })).toThrow(
      MissingExecutionEntryError
    );
  });

  it("leaves the execution-time table untouched", () => {
    const model = loadModel(diamondDocument());
    const before = [...model.executionTimes].map(([t, row]) => [t, [...row]]);

    selectTasks(model);

    expect([...model.executionTimes].map(([t, row]) => [t, [...row]])).toEqual(before);
  });
});
