import type { WorkflowDocument } from "../io/loader";

// A -> B -> C across two single-VM servers
export function chainDocument(): WorkflowDocument {
  return {
    tasks: ["A", "B", "C"],
    entry_task: "A",
    exit_task: "C",
    dependencies: { B: ["A"], C: ["B"] },
    communication_times: { "B-C": 2 },
    cloud_servers: [
      { id: "server1", vms: ["vm1"] },
      { id: "server2", vms: ["vm2"] },
    ],
    ect_table: {
      A: { vm1: 0, vm2: 0 },
      B: { vm1: 4, vm2: 6 },
      C: { vm1: 3, vm2: 5 },
    },
  };
}

// E fans out to P and Q, which join into X
export function diamondDocument(): WorkflowDocument {
  return {
    tasks: ["E", "P", "Q", "X"],
    entry_task: "E",
    exit_task: "X",
    dependencies: { P: ["E"], Q: ["E"], X: ["P", "Q"] },
    communication_times: { "E-P": 10, "P-X": 3, "Q-X": 1 },
    cloud_servers: [
      { id: "s1", vms: ["a1", "a2"] },
      { id: "s2", vms: ["b1"] },
    ],
    ect_table: {
      E: { a1: 1, a2: 1, b1: 1 },
      P: { a1: 5, a2: 5, b1: 2 },
      Q: { a1: 3, a2: 4, b1: 6 },
      X: { a1: 2, a2: 2, b1: 2 },
    },
  };
}

// two independent tasks that both prefer v1
export function contendedDocument(): WorkflowDocument {
  return {
    tasks: ["S", "T1", "T2"],
    entry_task: "S",
    exit_task: "T2",
    dependencies: { T1: ["S"], T2: ["S"] },
    cloud_servers: [{ id: "s1", vms: ["v1", "v2"] }],
    ect_table: {
      S: { v1: 0, v2: 0 },
      T1: { v1: 2, v2: 5 },
      T2: { v1: 3, v2: 4 },
    },
  };
}

// B and C wait on each other and never become ready
export function cyclicDocument(): WorkflowDocument {
  return {
    tasks: ["A", "B", "C", "D"],
    entry_task: "A",
    exit_task: "D",
    dependencies: { B: ["A", "C"], C: ["B"], D: ["A"] },
    cloud_servers: [{ id: "s1", vms: ["v1"] }],
    ect_table: {
      A: { v1: 1 },
      B: { v1: 1 },
      C: { v1: 1 },
      D: { v1: 2 },
    },
  };
}
