import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  ConfigError,
  configFromEnv,
  validateConfig,
  loadConfigFile,
  loadConfig,
  runOptionsFromConfig,
  asciiWhitespace,
  noWhitespace,
  run,
  seq,
} from "../index.js";

const tempDirs: string[] = [];

function tempDir(files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cutparse-config-"));
  tempDirs.push(dir);
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), content);
  }
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("configFromEnv", () => {
  it("reads CUTPARSE_* variables", () => {
    expect(configFromEnv({ CUTPARSE_WHITESPACE: "ASCII", CUTPARSE_TRACE: "1" })).toEqual({
      whitespace: "ascii",
      trace: true,
    });
    expect(configFromEnv({ CUTPARSE_TRACE: "false" })).toEqual({ trace: false });
  });

  it("ignores unrelated variables", () => {
    expect(configFromEnv({ HOME: "/home/test" })).toEqual({});
  });

  it("rejects unusable values", () => {
    expect(() => configFromEnv({ CUTPARSE_TRACE: "sometimes" })).toThrow(ConfigError);
    expect(() => configFromEnv({ CUTPARSE_WHITESPACE: "tabs" })).toThrow(
      'environment: whitespace must be one of unicode, ascii, none, got "tabs"',
    );
  });
});

describe("validateConfig", () => {
  it("keeps known keys", () => {
    expect(validateConfig({ whitespace: "none", trace: true, other: 1 }, "test")).toEqual({
      whitespace: "none",
      trace: true,
    });
  });

  it("rejects non-objects", () => {
    expect(() => validateConfig([], "test")).toThrow("test: configuration must be an object");
    expect(() => validateConfig("ascii", "test")).toThrow(ConfigError);
  });
});

describe("loadConfigFile", () => {
  it("reads an rc file", () => {
    const dir = tempDir({ ".cutparserc.json": JSON.stringify({ whitespace: "none" }) });
    const { config, filepath } = loadConfigFile(dir);
    expect(config).toEqual({ whitespace: "none" });
    expect(filepath).toBe(path.join(dir, ".cutparserc.json"));
  });

  it("reads the cutparse key of package.json", () => {
    const dir = tempDir({ "package.json": JSON.stringify({ name: "fixture", cutparse: { trace: true } }) });
    expect(loadConfigFile(dir).config).toEqual({ trace: true });
  });

  it("returns nothing when no file exists", () => {
    expect(loadConfigFile(tempDir())).toEqual({ config: {} });
  });

  it("ignores cutparse.config.mjs", () => {
    const dir = tempDir({ "cutparse.config.mjs": "export default { trace: true };\n" });
    expect(loadConfigFile(dir)).toEqual({ config: {} });
  });

  it("wraps an unreadable file in a ConfigError", () => {
    const dir = tempDir({ ".cutparserc.json": "{ not json" });
    expect(() => loadConfigFile(dir)).toThrow(ConfigError);
    expect(() => loadConfigFile(dir)).toThrow(`Failed to load cutparse config from ${dir}`);
  });

  it("rejects invalid values with the file path", () => {
    const dir = tempDir({ ".cutparserc.json": JSON.stringify({ trace: "yes" }) });
    expect(() => loadConfigFile(dir)).toThrow(`${path.join(dir, ".cutparserc.json")}: trace must be a boolean, got "yes"`);
  });
});

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({ searchFrom: tempDir(), env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it("lets the environment override the file", () => {
    const dir = tempDir({ ".cutparserc.json": JSON.stringify({ whitespace: "none", trace: false }) });
    expect(loadConfig({ searchFrom: dir, env: { CUTPARSE_TRACE: "true" } })).toEqual({
      whitespace: "none",
      trace: true,
    });
  });
});

describe("runOptionsFromConfig", () => {
  it("maps the whitespace mode to a policy", () => {
    expect(runOptionsFromConfig({ whitespace: "ascii", trace: false })).toEqual({
      whitespace: asciiWhitespace,
      trace: undefined,
    });
    expect(runOptionsFromConfig({ whitespace: "none", trace: false }).whitespace).toBe(noWhitespace);
  });

  it("writes trace lines when tracing is on", () => {
    const lines: string[] = [];
    const options = runOptionsFromConfig({ whitespace: "unicode", trace: true }, (line) => lines.push(line));
    run(seq("a"), "a", options);
    expect(lines).toEqual(['  "a" @0 "a" found "a"', 'seq() @0 "a" found "a"']);
  });
});
