import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { contendedDocument, cyclicDocument } from "./__fixtures__/documents";
import { bootstrap, type CliIO } from "./cli";

function captureIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
  return { io, out, err };
}

describe("bootstrap", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "minmin-"));
    // keep ConsoleSink warnings out of the test output
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeDocument(name: string, document: unknown) {
    const path = join(dir, name);
    await writeFile(path, JSON.stringify(document), "utf8");
    return path;
  }

  it("prints the report to stdout", async () => {
    const input = await writeDocument("contended.json", contendedDocument());
    const { io, out, err } = captureIO();

    expect(await bootstrap(["node", "minmin-schedule", input], io)).toBe(0);
    expect(err).toEqual([]);
    expect(out.join("")).toContain("  v1: [S, T1, T2]\n");
  });

  it("writes the report to --output and honours --serial-vms", async () => {
    const input = await writeDocument("contended.json", contendedDocument());
    const output = join(dir, "report.txt");
    const { io, out } = captureIO();

    const code = await bootstrap(
      ["node", "minmin-schedule", input, "--serial-vms", "--output", output],
      io
    );

    expect(code).toBe(0);
    expect(out).toEqual([]);
    const report = await readFile(output, "utf8");
    expect(report).toContain("  v2: [S, T2]\n");
    expect(report).toContain("  Makespan: 4.00\n");
  });

  it("exits with 2 on a scheduling error", async () => {
    const input = await writeDocument("cyclic.json", cyclicDocument());
    const { io, err } = captureIO();

    const code = await bootstrap(
      ["node", "minmin-schedule", input, "--fail-unreachable"],
      io
    );

    expect(code).toBe(2);
    expect(err.join("")).toMatch(/^UNREACHABLE_TASK: /);
  });

  it("exits with 1 on bad usage", async () => {
    const { io, err } = captureIO();

    expect(await bootstrap(["node", "minmin-schedule"], io)).toBe(1);
    expect(await bootstrap(["node", "minmin-schedule", "a.json", "--bogus"], io)).toBe(1);
    expect(err).toHaveLength(2);
  });
});
