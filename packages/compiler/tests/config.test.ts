import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  defineConfig,
  loadConfig,
  loadConfigFromEnv,
  normalizeConfig,
} from "../src/index.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "hostmark-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe("loadConfig", () => {
  it("returns an empty config when no file exists", () => {
    expect(loadConfig(dir, {})).toEqual({ config: {}, filepath: undefined });
  });

  it("reads .hostmarkrc.json", () => {
    const file = write(".hostmarkrc.json", JSON.stringify({ factory: "jsx.h", fragment: null }));
    expect(loadConfig(dir, {})).toEqual({ config: { factory: "jsx.h", fragment: null }, filepath: file });
  });

  it("reads the hostmark key of package.json", () => {
    const file = write("package.json", JSON.stringify({ name: "app", hostmark: { fragment: "Fragment" } }));
    expect(loadConfig(dir, {})).toEqual({ config: { fragment: "Fragment" }, filepath: file });
  });

  it("skips a package.json without a hostmark key", () => {
    write("package.json", JSON.stringify({ name: "app" }));
    const file = write("hostmark.config.json", JSON.stringify({ importSource: "./jsx.js" }));
    expect(loadConfig(dir, {})).toEqual({ config: { importSource: "./jsx.js" }, filepath: file });
  });

  it("treats an empty file as an empty config", () => {
    const file = write(".hostmarkrc", "");
    expect(loadConfig(dir, {})).toEqual({ config: {}, filepath: file });
  });

  it("lets the environment override the file", () => {
    write(".hostmarkrc.json", JSON.stringify({ factory: "jsx.h", verbose: false }));
    const { config } = loadConfig(dir, { HOSTMARK_FACTORY: "React.createElement" });
    expect(config).toEqual({ factory: "React.createElement", verbose: false });
  });

  it("rejects invalid files with their path", () => {
    const file = write(".hostmarkrc.json", JSON.stringify({ factory: "not a name" }));
    expect(() => loadConfig(dir, {})).toThrow(`${file}: 'factory' must be a dotted identifier path`);
  });
});

describe("loadConfigFromEnv", () => {
  it("parses every variable", () => {
    expect(
      loadConfigFromEnv({
        HOSTMARK_FACTORY: "jsx.h",
        HOSTMARK_FRAGMENT: "null",
        HOSTMARK_IMPORT_SOURCE: "./jsx.js",
        HOSTMARK_VERBOSE: "1",
      })
    ).toEqual({ factory: "jsx.h", fragment: null, importSource: "./jsx.js", verbose: true });
  });

  it("reads any other verbose value as false", () => {
    expect(loadConfigFromEnv({ HOSTMARK_VERBOSE: "0" })).toEqual({ verbose: false });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfigFromEnv({ PATH: "/bin", HOSTMARK: "x" })).toEqual({});
  });
});

describe("normalizeConfig", () => {
  it("keeps valid settings", () => {
    const config = defineConfig({ factory: "h", fragment: "ui.Fragment", verbose: true });
    expect(normalizeConfig(config)).toEqual(config);
  });

  it.each([
    [[], "configuration must be an object"],
    [{ fragment: 1 }, "'fragment' must be a dotted identifier path"],
    [{ importSource: "" }, "'importSource' must be a non-empty string"],
    [{ verbose: "yes" }, "'verbose' must be a boolean"],
    [{ jsx: true }, "unknown option 'jsx'"],
  ])("rejects %j", (raw, message) => {
    expect(() => normalizeConfig(raw)).toThrow(new ConfigError(message));
  });
});
