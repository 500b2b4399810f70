import type { ScheduleResult } from "../core/state";
import type { PlacementTable } from "../core/tables";

function placementLines(table: PlacementTable): string[] {
  return table.entries().map(({ task, vm, value }) => `  ${task} on ${vm}: ${value}`);
}

export function renderReport(result: ScheduleResult): string {
  const { metrics } = result;
  const lines: string[] = ["Task Allocation:"];

  for (const [vm, tasks] of result.allocation) {
    lines.push(`  ${vm}: [${tasks.join(", ")}]`);
  }

  lines.push("", "Earliest Start Times (EST):", ...placementLines(result.est));
  lines.push("", "Earliest Finish Times (EFT):", ...placementLines(result.eft));

  lines.push(
    "",
    "Performance Metrics:",
    `  Makespan: ${metrics.makespan.toFixed(2)}`,
    `  Load Balancing: ${metrics.loadBalancing.toFixed(2)}%`,
    `  Speedup: ${metrics.speedup.toFixed(2)}`,
    `  Efficiency: ${metrics.efficiency.toFixed(2)}%`,
    `  Resource Utilization: ${metrics.resourceUtilization.toFixed(2)}%`
  );

  if (result.unscheduled.length > 0) {
    lines.push("", "Unscheduled Tasks:", `  ${result.unscheduled.join(", ")}`);
  }

  return `${lines.join("\n")}\n`;
}
