import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import chalk from "chalk";
import { CommanderError } from "commander";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { listRatioPresets } from "../src/catalog.js";
import { CONFIG_FILE } from "../src/config.js";
import { createProgram } from "../src/program.js";

describe("aspectfit command line", () => {
  let workspace: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "aspectfit-cli-"));
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  async function run(args: string[]) {
    await createProgram({ cwd: workspace }).parseAsync(args, { from: "user" });
  }

  function writeConfig(value: unknown) {
    fs.writeFileSync(path.join(workspace, CONFIG_FILE), JSON.stringify(value, null, 2));
  }

  function printedReport(): unknown {
    expect(log).toHaveBeenCalledTimes(1);
    return JSON.parse(String(log.mock.calls[0][0]));
  }

  it("prints the run report for a valid crop under --json", async () => {
    await run(["--json", "crop", "1920", "1080"]);

    expect(process.exitCode).toBe(0);
    expect(error).not.toHaveBeenCalled();
    expect(printedReport()).toMatchObject({
      version: "1.0",
      mode: "crop",
      source: { width: 1920, height: 1080 },
      result: { width: 1920, height: 1080, ratioWidth: 16, ratioHeight: 9 },
      rerunCommand: `aspectfit crop 1920 1080 --presets ${listRatioPresets().join(",")}`,
      errors: [],
      warnings: [],
    });
  });

  it("prints only the result label under --quiet", async () => {
    await run(["--quiet", "rescale", "1000", "900", "--force", "1:1"]);

    expect(process.exitCode).toBe(0);
    expect(log.mock.calls).toEqual([["900x900 (1:1)"]]);
    expect(error).not.toHaveBeenCalled();
  });

  it("reports a bad dimension as a coded error under --json", async () => {
    await run(["--json", "crop", "abc", "1080"]);

    expect(process.exitCode).toBe(1);
    expect(error).not.toHaveBeenCalled();
    expect(printedReport()).toMatchObject({
      mode: "crop",
      source: null,
      options: null,
      result: null,
      rerunCommand: null,
      errors: [
        {
          code: "INVALID_DIMENSION",
          message:
            'Invalid dimensions: "abc" x "1080". Width and height must be integers of at least 1.',
        },
      ],
    });
  });

  it("prints a bad dimension on stderr without --json", async () => {
    await run(["crop", "0", "1080"]);

    expect(process.exitCode).toBe(1);
    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([
      [
        chalk.red(
          'Invalid dimensions: "0" x "1080". Width and height must be integers of at least 1.'
        ),
      ],
    ]);
  });

  it("reports a malformed forced ratio", async () => {
    await run(["--json", "rescale", "1000", "900", "--force", "16-9"]);

    expect(process.exitCode).toBe(1);
    expect(printedReport()).toMatchObject({
      mode: "rescale",
      errors: [
        {
          code: "INVALID_FORCE_RATIO",
          message: 'Invalid forced ratio: "16-9". Expected W:H, e.g. 16:9.',
        },
      ],
    });
  });

  it("reports a bad config file as CONFIG_ERROR under --json", async () => {
    writeConfig({ bogus: 1 });

    await run(["--json", "crop", "1920", "1080"]);

    expect(process.exitCode).toBe(1);
    expect(error).not.toHaveBeenCalled();
    expect(printedReport()).toMatchObject({
      mode: "crop",
      source: null,
      errors: [
        {
          code: "CONFIG_ERROR",
          message: `Unknown config key "bogus" in ${path.join(workspace, CONFIG_FILE)}.`,
        },
      ],
    });
  });

  it("prints a missing --config file on stderr", async () => {
    await run(["--config", "missing.json", "match", "1024", "1024"]);

    expect(process.exitCode).toBe(1);
    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([
      [chalk.red(`Config file not found: ${path.join(workspace, "missing.json")}`)],
    ]);
  });

  it("takes --json from the config file when an argument is rejected", async () => {
    writeConfig({ json: true });

    await run(["crop", "1920", "1080", "--presets", "5:4"]);

    expect(process.exitCode).toBe(1);
    expect(error).not.toHaveBeenCalled();
    expect(printedReport()).toMatchObject({
      errors: [
        {
          code: "UNKNOWN_PRESET",
          message: `Unknown preset "5:4". Valid: ${listRatioPresets().join(", ")}`,
        },
      ],
    });
  });

  it("rejects --force on match before running", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const parsing = run(["match", "1024", "1024", "--force", "1:1"]);

    await expect(parsing).rejects.toBeInstanceOf(CommanderError);
    await expect(parsing).rejects.toMatchObject({ code: "commander.unknownOption" });
    expect(log).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });
});
