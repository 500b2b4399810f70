import { readFile, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { isSchedulingError } from "./core/errors";
import { ConsoleSink, Logger } from "./core/logger";
import type { SchedulerConfig } from "./core/state";
import { scheduleWorkflow } from "./engine/workflow";
import { parseWorkflowDocument } from "./io/loader";
import { renderReport } from "./io/report";

const USAGE =
  "usage: minmin-schedule <input.json> [--output <file>] [--fail-unreachable] [--serial-vms] [--verbose]";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const parseCliArgs = (args: string[]) =>
  parseArgs({
    args,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      "fail-unreachable": { type: "boolean", default: false },
      "serial-vms": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });

export const bootstrap = async (
  argv: string[],
  io: CliIO = defaultIO
): Promise<number> => {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv.slice(2));
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    return 1;
  }

  const { values, positionals } = parsed;
  const input = positionals[0];
  if (!input || positionals.length > 1) {
    io.stderr(`${USAGE}\n`);
    return 1;
  }

  const config: SchedulerConfig = {
    onUnreachable: values["fail-unreachable"] ? "fail" : "drop",
    vmAvailability: values["serial-vms"] ? "serial" : "shared",
  };
  const logger = new Logger("minmin", [
    new ConsoleSink(values.verbose ? "debug" : "warn"),
  ]);

  try {
    const json = await readFile(resolve(process.cwd(), input), "utf8");
    const result = scheduleWorkflow(parseWorkflowDocument(json), { config, logger });
    const report = renderReport(result);

    if (values.output) {
      await writeFile(resolve(process.cwd(), values.output), report, "utf8");
    } else {
      io.stdout(report);
    }
    return 0;
  } catch (err) {
    if (isSchedulingError(err)) {
      io.stderr(`${err.code}: ${err.message}\n`);
      return 2;
    }
    throw err;
  }
};
