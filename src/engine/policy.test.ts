import { describe, expect, it } from "vitest";
import { InvalidConfigError } from "../core/errors";
import { DEFAULT_SCHEDULER_CONFIG, resolveSchedulerConfig } from "./policy";

describe("resolveSchedulerConfig", () => {
  it("defaults to dropping unreachable tasks on shared VMs", () => {
    expect(resolveSchedulerConfig()).toEqual({
      onUnreachable: "drop",
      vmAvailability: "shared",
    });
  });

  it("merges a partial override over the defaults", () => {
    expect(resolveSchedulerConfig({ vmAvailability: "serial" })).toEqual({
      onUnreachable: "drop",
      vmAvailability: "serial",
    });
  });

  it("does not hand out the shared default object", () => {
    const config = resolveSchedulerConfig();
    config.onUnreachable = "fail";
    expect(DEFAULT_SCHEDULER_CONFIG.onUnreachable).toBe("drop");
  });

  it("rejects unknown values and keys", () => {
    expect(() => resolveSchedulerConfig({ onUnreachable: "skip" })).toThrow(
      InvalidConfigError
    );
    expect(() => resolveSchedulerConfig({ retries: 3 })).toThrow(InvalidConfigError);
  });

  it("names the offending field", () => {
    try {
      resolveSchedulerConfig({ vmAvailability: 1 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigError);
      if (err instanceof InvalidConfigError) {
        expect(err.code).toBe("INVALID_CONFIG");
        expect(err.issues[0]).toMatch(/^vmAvailability: /);
      }
    }
  });
});
