#!/usr/bin/env node
/**
 * HAR timing analyzer — command-line entry point.
 */

import { runCli } from "./cli.js";

process.exitCode = runCli(process.argv.slice(2));
