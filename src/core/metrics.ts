export type ScheduleMetrics = {
  makespan: number;

  // percentages in [0, 100]
  loadBalancing: number;
  efficiency: number;
  resourceUtilization: number;

  sequentialTime: number;
  speedup: number;
};
