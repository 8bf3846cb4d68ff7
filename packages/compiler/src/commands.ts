/**
 * hostmark CLI commands
 *
 * Usage:
 *   hostmark expand src/view.js
 *   hostmark expand src/view.js --out dist/view.js --map
 *   hostmark check src/a.js src/b.js
 */

import * as fs from "fs";
import * as path from "path";
import { isMarkupSyntaxError } from "@hostmark/syntax";
import { loadConfig, ConfigError, type HostmarkConfig } from "./config.js";
import { transform, type TransformOptions } from "./transform.js";

/** Everything the commands touch outside the process. */
export interface CliIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Returns undefined when the file does not exist. */
  readFile(file: string): string | undefined;
  writeFile(file: string, content: string): void;
}

export const nodeIO: CliIO = {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (file) => (fs.existsSync(file) ? fs.readFileSync(file, "utf-8") : undefined),
  writeFile: (file, content) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  },
};

interface CliOptions {
  command: "expand" | "check" | "help";
  files: string[];
  out?: string;
  map: boolean;
  flags: HostmarkConfig;
}

class UsageError extends Error {}

export const HELP = `
hostmark - Markup literals for JavaScript

USAGE:
  hostmark <command> [options]

COMMANDS:
  expand <file>        Print the module with every markup literal lowered
  check <files...>     Report markup syntax errors without writing anything

OPTIONS:
  -o, --out <path>          Write the expanded module to a file (expand)
  --map                     Also write <out>.map (expand, needs --out)
  --factory <name>          Element constructor (default: h)
  --fragment <name>         Fragment tag; "null" for a null tag (default)
  --import-source <module>  Import the factory from this module
  -v, --verbose             Enable verbose logging
  -h, --help                Show this help message

EXAMPLES:
  hostmark expand src/view.js
  hostmark expand src/view.js --out dist/view.js --map
  hostmark check src/*.js
`;

function parseArgs(args: string[]): CliOptions {
  const first = args[0];
  if (first === undefined || first === "--help" || first === "-h") {
    return { command: "help", files: [], map: false, flags: {} };
  }
  if (first !== "expand" && first !== "check") {
    throw new UsageError(`Unknown command: ${first}\nUsage: hostmark <expand|check> [options] <files...>`);
  }

  const options: CliOptions = { command: first, files: [], map: false, flags: {} };

  const value = (i: number, flag: string): string => {
    const next = args[i];
    if (next === undefined || next.startsWith("-")) {
      throw new UsageError(`${flag} needs a value`);
    }
    return next;
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out" || arg === "-o") {
      options.out = value(++i, arg);
    } else if (arg === "--map") {
      options.map = true;
    } else if (arg === "--factory") {
      options.flags.factory = value(++i, arg);
    } else if (arg === "--fragment") {
      const name = value(++i, arg);
      options.flags.fragment = name === "null" ? null : name;
    } else if (arg === "--import-source") {
      options.flags.importSource = value(++i, arg);
    } else if (arg === "--verbose" || arg === "-v") {
      options.flags.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      return { command: "help", files: [], map: false, flags: {} };
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      options.files.push(arg);
    }
  }

  if (options.command === "expand" && options.files.length !== 1) {
    throw new UsageError("expand takes exactly one file");
  }
  if (options.command === "check" && options.files.length === 0) {
    throw new UsageError("check needs at least one file");
  }
  if (options.map && !options.out) {
    throw new UsageError("--map requires --out");
  }
  return options;
}

/**
 * Run the CLI with `args` (without the node and script paths) and return the
 * exit code.
 */
export function runCli(args: string[], io: CliIO = nodeIO): number {
  try {
    const options = parseArgs(args);
    if (options.command === "help") {
      io.stdout(HELP);
      return 0;
    }

    const { config } = loadConfig(io.cwd, io.env);
    const transformOptions: TransformOptions = { ...config, ...options.flags };

    return options.command === "expand"
      ? runExpand(options, transformOptions, io)
      : runCheck(options.files, transformOptions, io);
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigError || isMarkupSyntaxError(error)) {
      io.stderr(error.message);
      return 1;
    }
    throw error;
  }
}

function readSource(file: string, io: CliIO): string | undefined {
  const source = io.readFile(path.resolve(io.cwd, file));
  if (source === undefined) {
    io.stderr(`File not found: ${file}`);
  }
  return source;
}

function runExpand(options: CliOptions, transformOptions: TransformOptions, io: CliIO): number {
  const [file] = options.files;
  const source = readSource(file, io);
  if (source === undefined) return 1;

  const result = transform(source, { ...transformOptions, fileName: file });

  if (!options.out) {
    io.stdout(result.code);
    return 0;
  }

  const outPath = path.resolve(io.cwd, options.out);
  if (options.map && result.map) {
    const mapName = `${path.basename(outPath)}.map`;
    io.writeFile(`${outPath}.map`, result.map.toString());
    const code = result.code.endsWith("\n") ? result.code : `${result.code}\n`;
    io.writeFile(outPath, `${code}//# sourceMappingURL=${mapName}\n`);
  } else {
    io.writeFile(outPath, result.code);
  }

  if (transformOptions.verbose) {
    console.log(`[hostmark] Wrote ${options.out}`);
  }
  return 0;
}

function runCheck(files: string[], transformOptions: TransformOptions, io: CliIO): number {
  let failed = 0;
  for (const file of files) {
    const source = readSource(file, io);
    if (source === undefined) {
      failed++;
      continue;
    }
    try {
      transform(source, { ...transformOptions, fileName: file });
    } catch (error) {
      if (!isMarkupSyntaxError(error)) throw error;
      io.stderr(error.message);
      failed++;
    }
  }

  if (failed > 0) {
    io.stderr(`${failed} of ${files.length} file(s) failed`);
    return 1;
  }
  io.stdout(`${files.length} file(s) ok`);
  return 0;
}
