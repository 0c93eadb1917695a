import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  ConfigLoader,
  parsePropertyAssignments,
  resolveLogLevel,
  toPropertyValues,
} from "../../src/core/config/ConfigLoader.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";
import { integerValue, listValue, stringValue, booleanValue } from "../../src/core/properties/PropertyStore.js";
import { makeTempDir, removeTempDir } from "../helpers/workflowFixtures.js";

describe("ConfigLoader", () => {
  let dir: string;
  const loader = new ConfigLoader();

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("returns defaults when no file exists", async () => {
    expect(await loader.load({ cwd: dir })).toEqual({ properties: {} });
  });

  it("reads layerflow.yaml from the current folder", async () => {
    const file = path.join(dir, "layerflow.yaml");
    await fs.writeFile(
      file,
      ["logLevel: debug", "logFile: logs/run.log", "properties:", "  DataFolder: ./data", "  Years: [2020, 2021]"].join(
        "\n",
      ),
    );

    expect(await loader.load({ cwd: dir })).toEqual({
      logLevel: "debug",
      logFile: path.join(dir, "logs", "run.log"),
      properties: { DataFolder: "./data", Years: ["2020", "2021"] },
      configPath: file,
    });
  });

  it("falls back to the user config file", async () => {
    const userFile = path.join(dir, "user", "config.yaml");
    await fs.mkdir(path.dirname(userFile));
    await fs.writeFile(userFile, "logLevel: warn\n");

    const config = await loader.load({ cwd: dir, userConfigFile: userFile });

    expect(config.logLevel).toBe("warn");
    expect(config.configPath).toBe(userFile);
  });

  it("requires an explicit config file to exist", async () => {
    await expect(loader.load({ cwd: dir, explicitPath: "missing.yaml" })).rejects.toMatchObject({
      code: ErrorCode.CONFIG_NOT_FOUND,
      hint: `Check the --config path: ${path.join(dir, "missing.yaml")}`,
    });
  });

  it("reports YAML syntax errors", () => {
    expect(() => loader.parse("properties: [unclosed", "/cfg/layerflow.yaml")).toThrow(
      expect.objectContaining({ code: ErrorCode.CONFIG_PARSE_FAILED, message: "Configuration file is not valid YAML" }),
    );
  });

  it("lists every schema problem", () => {
    try {
      loader.parse("logLevel: loud\ncolor: true\n", "/cfg/layerflow.yaml");
      expect.unreachable("parse should throw");
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.CONFIG_INVALID, message: "Invalid configuration" });
      expect(error).toHaveProperty("details.issues");
    }
  });

  it("treats an empty file as defaults", () => {
    expect(loader.parse("", "/cfg/layerflow.yaml")).toEqual({
      logLevel: undefined,
      logFile: undefined,
      properties: {},
      configPath: "/cfg/layerflow.yaml",
    });
  });
});

describe("config helpers", () => {
  it("converts configured properties to typed values", () => {
    expect(toPropertyValues({ A: "x", B: 3, C: 1.5, D: true, E: ["a", "b"] })).toEqual(
      new Map([
        ["A", stringValue("x")],
        ["B", integerValue(3)],
        ["C", stringValue("1.5")],
        ["D", booleanValue(true)],
        ["E", listValue(["a", "b"])],
      ]),
    );
  });

  it("parses Name=Value assignments, keeping later equals signs", () => {
    expect(parsePropertyAssignments(["Year=2024", " Filter = a=b"])).toEqual(
      new Map([
        ["Year", stringValue("2024")],
        ["Filter", stringValue(" a=b")],
      ]),
    );
  });

  it("rejects an assignment without a name", () => {
    expect(() => parsePropertyAssignments(["=oops"])).toThrow('Invalid property assignment "=oops"');
  });

  it("prefers the environment log level over the config", () => {
    expect(resolveLogLevel({ properties: {}, logLevel: "warn" }, { LAYERFLOW_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(resolveLogLevel({ properties: {}, logLevel: "warn" }, { LAYERFLOW_LOG_LEVEL: "chatty" })).toBe("warn");
    expect(resolveLogLevel({ properties: {} }, {})).toBe("info");
  });
});
