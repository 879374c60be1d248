import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig, loadDotenv, resolveOutputFormat } from "./Config.js";
import { defaultFormatter, plainFormatter } from "../formatting/AnsiFormatter.js";
import { jsonFormatter } from "../formatting/JsonFormatter.js";

describe("loadConfig", () => {
  let tmpDir: string;
  let envFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tracing-config-test-"));
    envFile = path.join(tmpDir, ".env");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should fall back to the defaults with an empty environment", () => {
    const config = loadConfig({ dotenvPath: false, env: {} });

    expect(config.level).toBe("warning");
    expect(config.formatter).toBe(defaultFormatter);
  });

  it("should read level and format from the environment", () => {
    const config = loadConfig({
      dotenvPath: false,
      env: { TRACING_LOG: "Info", TRACING_LOG_FORMAT: "json" },
    });

    expect(config.level).toBe("info");
    expect(config.formatter).toBe(jsonFormatter);
  });

  it("should honor custom variable names", () => {
    const config = loadConfig({
      dotenvPath: false,
      levelVar: "APP_LOG",
      formatVar: "APP_LOG_FORMAT",
      env: { APP_LOG: "trace", APP_LOG_FORMAT: "plain", TRACING_LOG: "error" },
    });

    expect(config.level).toBe("trace");
    expect(config.formatter).toBe(plainFormatter);
  });

  it("should load variables from a .env file", () => {
    fs.writeFileSync(envFile, "TRACING_LOG=debug\nTRACING_LOG_FORMAT=json\n");
    const env: NodeJS.ProcessEnv = {};

    const config = loadConfig({ dotenvPath: envFile, env });

    expect(config.level).toBe("debug");
    expect(config.formatter).toBe(jsonFormatter);
    expect(env.TRACING_LOG).toBe("debug");
  });

  it("should not override variables already set", () => {
    fs.writeFileSync(envFile, "TRACING_LOG=debug\n");

    const config = loadConfig({ dotenvPath: envFile, env: { TRACING_LOG: "error" } });

    expect(config.level).toBe("error");
  });

  it("should ignore a missing .env file", () => {
    const config = loadConfig({ dotenvPath: path.join(tmpDir, "missing.env"), env: {} });

    expect(config.level).toBe("warning");
  });

  it("should keep the default level for unrecognized values", () => {
    const config = loadConfig({ dotenvPath: false, env: { TRACING_LOG: "loud" } });

    expect(config.level).toBe("warning");
  });
});

describe("loadDotenv", () => {
  it("should parse quoted values and comments", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tracing-dotenv-test-"));
    const envFile = path.join(tmpDir, ".env");
    fs.writeFileSync(envFile, '# comment\nNAME="quoted value"\nEMPTY=\n');
    const env: NodeJS.ProcessEnv = {};

    try {
      loadDotenv(envFile, env);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }

    expect(env).toEqual({ NAME: "quoted value", EMPTY: "" });
  });
});

describe("resolveOutputFormat", () => {
  it("should normalize case and whitespace", () => {
    expect(resolveOutputFormat({ FMT: " JSON " }, "FMT")).toBe("json");
  });

  it("should fall back to pretty for unknown or missing values", () => {
    expect(resolveOutputFormat({ FMT: "xml" }, "FMT")).toBe("pretty");
    expect(resolveOutputFormat({}, "FMT")).toBe("pretty");
  });

  it("should turn pretty into plain under NO_COLOR", () => {
    expect(resolveOutputFormat({ NO_COLOR: "1" }, "FMT")).toBe("plain");
    expect(resolveOutputFormat({ NO_COLOR: "1", FMT: "json" }, "FMT")).toBe("json");
    expect(resolveOutputFormat({ NO_COLOR: "" }, "FMT")).toBe("pretty");
  });
});
