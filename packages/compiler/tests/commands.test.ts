import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HELP, runCli, type CliIO } from "../src/index.js";

interface MemoryIO extends CliIO {
  out: string[];
  err: string[];
  written: Map<string, string>;
}

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

/** Sources are kept in memory; the working directory is real so config lookup finds nothing. */
function memoryIO(files: Record<string, string>, env: NodeJS.ProcessEnv = {}): MemoryIO {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "hostmark-cli-"));
  dirs.push(cwd);
  const sources = new Map(Object.entries(files));
  const io: MemoryIO = {
    cwd,
    env,
    out: [],
    err: [],
    written: new Map(),
    stdout: (text) => io.out.push(text),
    stderr: (text) => io.err.push(text),
    readFile: (file) => sources.get(path.relative(cwd, file)),
    writeFile: (file, content) => io.written.set(path.relative(cwd, file), content),
  };
  return io;
}

describe("runCli", () => {
  it("prints help", () => {
    const io = memoryIO({});
    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out).toEqual([HELP]);
    expect(runCli(["expand", "-h"], io)).toBe(0);
  });

  it("rejects unknown commands", () => {
    const io = memoryIO({});
    expect(runCli(["build"], io)).toBe(1);
    expect(io.err).toEqual(["Unknown command: build\nUsage: hostmark <expand|check> [options] <files...>"]);
  });

  it("rejects unknown options", () => {
    const io = memoryIO({ "view.js": "" });
    expect(runCli(["expand", "view.js", "--watch"], io)).toBe(1);
    expect(io.err).toEqual(["Unknown option: --watch"]);
  });

  describe("expand", () => {
    it("prints the lowered module", () => {
      const io = memoryIO({ "view.js": `const v = <br />;\n` });
      expect(runCli(["expand", "view.js"], io)).toBe(0);
      expect(io.out).toEqual([`const v = h("br", {}, []);\n`]);
    });

    it("applies naming flags", () => {
      const io = memoryIO({ "view.js": `const v = <></>;\n` });
      const code = runCli(["expand", "view.js", "--fragment", "Fragment", "--import-source", "./jsx.js"], io);
      expect(code).toBe(0);
      expect(io.out).toEqual([`import { h, Fragment } from "./jsx.js";\nconst v = h(Fragment, {}, []);\n`]);
    });

    it("writes the output and its source map", () => {
      const io = memoryIO({ "view.js": `const v = <br />;\n` });
      expect(runCli(["expand", "view.js", "--out", "dist/view.js", "--map"], io)).toBe(0);
      expect(io.written.get(path.join("dist", "view.js"))).toBe(
        `const v = h("br", {}, []);\n//# sourceMappingURL=view.js.map\n`
      );
      const map: unknown = JSON.parse(io.written.get(path.join("dist", "view.js.map")) ?? "null");
      expect(map).toMatchObject({ version: 3, sources: ["view.js"] });
      expect(io.out).toEqual([]);
    });

    it("needs --out for --map", () => {
      const io = memoryIO({ "view.js": "" });
      expect(runCli(["expand", "view.js", "--map"], io)).toBe(1);
      expect(io.err).toEqual(["--map requires --out"]);
    });

    it("reports a missing file", () => {
      const io = memoryIO({});
      expect(runCli(["expand", "nope.js"], io)).toBe(1);
      expect(io.err).toEqual(["File not found: nope.js"]);
    });

    it("reports syntax errors with their location", () => {
      const io = memoryIO({ "view.js": `const v = <div></span>;\n` });
      expect(runCli(["expand", "view.js"], io)).toBe(1);
      expect(io.err).toEqual(["view.js:1:16: mismatched closing tag: expected </div> but found </span>"]);
    });

    it("reads the config file, then the environment, then flags", () => {
      const io = memoryIO({ "view.js": `const v = <br />;` }, { HOSTMARK_FRAGMENT: "F" });
      fs.writeFileSync(path.join(io.cwd, ".hostmarkrc.json"), JSON.stringify({ factory: "jsx.h" }));

      expect(runCli(["expand", "view.js"], io)).toBe(0);
      expect(runCli(["expand", "view.js", "--factory", "make"], io)).toBe(0);
      expect(io.out).toEqual([`const v = jsx.h("br", {}, []);`, `const v = make("br", {}, []);`]);
    });

    it("reports invalid config", () => {
      const io = memoryIO({ "view.js": "" });
      const file = path.join(io.cwd, ".hostmarkrc.json");
      fs.writeFileSync(file, JSON.stringify({ verbose: "yes" }));
      expect(runCli(["expand", "view.js"], io)).toBe(1);
      expect(io.err).toEqual([`${file}: 'verbose' must be a boolean`]);
    });
  });

  describe("check", () => {
    it("passes clean files", () => {
      const io = memoryIO({ "a.js": `export const a = <p>"a"</p>;`, "b.js": `export const b = 1 < 2;` });
      expect(runCli(["check", "a.js", "b.js"], io)).toBe(0);
      expect(io.out).toEqual(["2 file(s) ok"]);
    });

    it("reports the first error of each failing file", () => {
      const io = memoryIO({
        "a.js": `export const a = <p>"a"</p>;`,
        "b.js": `x = <p>hello</p>;\ny = <p></i>;`,
      });
      expect(runCli(["check", "a.js", "b.js", "c.js"], io)).toBe(1);
      expect(io.err).toEqual([
        "b.js:1:8: text content must be a quoted string literal, found 'hello'",
        "File not found: c.js",
        "2 of 3 file(s) failed",
      ]);
    });

    it("needs at least one file", () => {
      const io = memoryIO({});
      expect(runCli(["check"], io)).toBe(1);
      expect(io.err).toEqual(["check needs at least one file"]);
    });
  });
});
