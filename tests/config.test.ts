import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILE, ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "aspectfit-config-"));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  function writeJson(fileName: string, value: unknown) {
    fs.writeFileSync(path.join(workspace, fileName), JSON.stringify(value, null, 2));
  }

  it("returns an empty config when nothing is present", () => {
    expect(loadConfig(workspace)).toEqual({ config: {}, sourcePath: null });
  });

  it("loads aspectfit.config.json", () => {
    writeJson(CONFIG_FILE, {
      ratioPresets: ["1:1", "16:9"],
      customRatios: "21:9",
      quiet: true,
    });

    const loaded = loadConfig(workspace);

    expect(loaded.sourcePath).toBe(path.join(workspace, CONFIG_FILE));
    expect(loaded.config).toEqual({
      ratioPresets: ["1:1", "16:9"],
      customRatios: "21:9",
      quiet: true,
    });
  });

  it("falls back to the aspectfit key in package.json", () => {
    writeJson("package.json", { name: "fixture", aspectfit: { customResolutions: "1280x720" } });

    const loaded = loadConfig(workspace);

    expect(loaded.sourcePath).toBe(`${path.join(workspace, "package.json")}#aspectfit`);
    expect(loaded.config.customResolutions).toBe("1280x720");
  });

  it("ignores a package.json without an aspectfit key", () => {
    writeJson("package.json", { name: "fixture" });
    expect(loadConfig(workspace)).toEqual({ config: {}, sourcePath: null });
  });

  it("prefers an explicit config path", () => {
    writeJson(CONFIG_FILE, { verbose: true });
    writeJson("other.json", { json: true });

    const loaded = loadConfig(workspace, "other.json");

    expect(loaded.sourcePath).toBe(path.join(workspace, "other.json"));
    expect(loaded.config).toEqual({ json: true });
  });

  it("rejects a missing explicit config file", () => {
    expect(() => loadConfig(workspace, "missing.json")).toThrow(
      `Config file not found: ${path.join(workspace, "missing.json")}`
    );
  });

  it("rejects unknown keys", () => {
    writeJson(CONFIG_FILE, { widths: [1, 2] });
    const configPath = path.join(workspace, CONFIG_FILE);

    expect(() => loadConfig(workspace)).toThrow(ConfigError);
    expect(() => loadConfig(workspace)).toThrow(`Unknown config key "widths" in ${configPath}.`);
  });

  it("rejects values of the wrong type", () => {
    writeJson(CONFIG_FILE, { json: "yes" });
    const configPath = path.join(workspace, CONFIG_FILE);

    expect(() => loadConfig(workspace)).toThrow(`Invalid "json" in ${configPath}: expected boolean.`);
  });

  it("rejects preset lists with non-string entries", () => {
    writeJson(CONFIG_FILE, { ratioPresets: ["1:1", 2] });
    const configPath = path.join(workspace, CONFIG_FILE);

    expect(() => loadConfig(workspace)).toThrow(
      `Invalid "ratioPresets" in ${configPath}: expected string at index 1.`
    );
  });

  it("accepts preset keys and the all/none shorthands", () => {
    writeJson(CONFIG_FILE, { ratioPresets: ["all"], resolutionPresets: ["sd15_1:1_512x512", "none"] });

    expect(loadConfig(workspace).config).toEqual({
      ratioPresets: ["all"],
      resolutionPresets: ["sd15_1:1_512x512", "none"],
    });
  });

  it("rejects unknown ratio presets and names the config file", () => {
    writeJson(CONFIG_FILE, { ratioPresets: ["16:9", "5:4"] });
    const configPath = path.join(workspace, CONFIG_FILE);

    expect(() => loadConfig(workspace)).toThrow(ConfigError);
    expect(() => loadConfig(workspace)).toThrow(
      `Invalid "ratioPresets" in ${configPath}: unknown preset "5:4" at index 1.`
    );
  });

  it("rejects unknown resolution presets in package.json", () => {
    writeJson("package.json", { aspectfit: { resolutionPresets: ["1920x1080"] } });
    const sourcePath = `${path.join(workspace, "package.json")}#aspectfit`;

    expect(() => loadConfig(workspace)).toThrow(
      `Invalid "resolutionPresets" in ${sourcePath}: unknown preset "1920x1080" at index 0.`
    );
  });

  it("rejects a config that is not an object", () => {
    writeJson(CONFIG_FILE, ["1:1"]);
    const configPath = path.join(workspace, CONFIG_FILE);

    expect(() => loadConfig(workspace)).toThrow(
      `Invalid config in ${configPath}: expected a JSON object.`
    );
  });

  it("wraps JSON syntax errors", () => {
    fs.writeFileSync(path.join(workspace, CONFIG_FILE), "{ nope");

    expect(() => loadConfig(workspace)).toThrow(
      `Failed to read config file ${path.join(workspace, CONFIG_FILE)}:`
    );
  });
});
