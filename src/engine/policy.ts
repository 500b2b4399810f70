import { z } from "zod";
import { InvalidConfigError } from "../core/errors";
import type { SchedulerConfig } from "../core/state";

// What happens to tasks that never become ready in Phase I.
export type UnreachablePolicy = "drop" | "fail";

// "shared": a task's start ignores other tasks already placed on the same VM.
// "serial": a VM runs one task at a time, so a task cannot start before the
// VM's last recorded finish.
export type VmAvailability = "shared" | "serial";

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  onUnreachable: "drop",
  vmAvailability: "shared",
};

const configOverrideSchema = z
  .object({
    onUnreachable: z.enum(["drop", "fail"]),
    vmAvailability: z.enum(["shared", "serial"]),
  })
  .strict()
  .partial();

export function resolveSchedulerConfig(override?: unknown): SchedulerConfig {
  if (override === undefined) return { ...DEFAULT_SCHEDULER_CONFIG };

  const parsed = configOverrideSchema.safeParse(override);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }

  const {
    onUnreachable = DEFAULT_SCHEDULER_CONFIG.onUnreachable,
    vmAvailability = DEFAULT_SCHEDULER_CONFIG.vmAvailability,
  } = parsed.data;

  return { onUnreachable, vmAvailability };
}
