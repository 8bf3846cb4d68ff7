#!/usr/bin/env node

/**
 * hostmark CLI -- expand and check markup literals
 *
 * Usage:
 *   hostmark expand <file> [--out <file>] [--map] [--verbose]
 *   hostmark check <files...>
 */

import { runCli } from "./commands.js";

process.exitCode = runCli(process.argv.slice(2));
