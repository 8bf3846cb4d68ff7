/**
 * @hostmark/compiler - Lower markup literals in whole modules
 *
 * @example
 * ```typescript
 * import { transform, loadConfig } from "@hostmark/compiler";
 *
 * const { config } = loadConfig();
 * const result = transform(source, { ...config, fileName: "view.js" });
 * if (result.changed) {
 *   fs.writeFileSync("view.out.js", result.code);
 * }
 * ```
 *
 * @packageDocumentation
 */

export { transform, type TransformOptions, type TransformResult } from "./transform.js";
export {
  loadConfig,
  loadConfigFile,
  loadConfigFromEnv,
  normalizeConfig,
  defineConfig,
  ConfigError,
  type HostmarkConfig,
  type LoadedConfig,
} from "./config.js";
export { runCli, nodeIO, HELP, type CliIO } from "./commands.js";
