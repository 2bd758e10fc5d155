/**
 * Command-line front end: `har-timing <har-file> [--export <output.json>] [--top <n>]`.
 *
 * Prints the text report to stdout and optionally writes the JSON export. Every failure is
 * fatal: message on stderr, exit code 1.
 */

import { Command, CommanderError } from "commander";
import { ConfigError, resolveAnalyzerConfig, type AnalyzerConfig } from "./config.js";
import { HarAnalysisError, toError } from "./errors.js";
import { AnalysisSession } from "./har/session.js";
import { writeExportDocument } from "./report/export.js";
import { renderReport } from "./report/text.js";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function createProgram(io: CliIO): Command {
  return new Command()
    .name("har-timing")
    .description("Summarize request timings from an HTTP Archive (HAR) file")
    .version("1.0.0")
    .argument("<har-file>", "HAR file to analyze")
    // A bare --export (no path) is ignored rather than rejected.
    .option("--export [output]", "also write the analysis as JSON to this path")
    .option("--top <n>", "number of slowest requests to list", "10")
    .addHelpText(
      "after",
      "\nExample:\n  har-timing mywebsite.har\n  har-timing mywebsite.har --export results.json\n",
    )
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    });
}

function parseArgs(argv: string[], io: CliIO): AnalyzerConfig {
  const program = createProgram(io);
  program.parse(argv, { from: "user" });
  const opts = program.opts<{ export?: string | true; top: string }>();
  return resolveAnalyzerConfig({
    harFile: program.args[0],
    exportFile: typeof opts.export === "string" ? opts.export : undefined,
    top: opts.top,
  });
}

/**
 * Run the analyzer and return the process exit code. `argv` excludes the node binary and
 * script path.
 */
export function runCli(argv: string[], io: CliIO = processIO): number {
  let config: AnalyzerConfig;
  try {
    config = parseArgs(argv, io);
  } catch (e) {
    // Commander has already written its own message (or the help/version text).
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof ConfigError) {
      io.stderr(`Error: ${e.message}\n`);
      return 1;
    }
    throw e;
  }

  try {
    const session = AnalysisSession.fromFile(config.harFile);
    const result = session.analyze(config.top);
    io.stdout(renderReport(result));

    if (config.exportFile) {
      writeExportDocument(result, config.exportFile);
      io.stdout(`Analysis exported to: ${config.exportFile}\n`);
    }
    return 0;
  } catch (e) {
    if (e instanceof HarAnalysisError) {
      io.stderr(`${e.message}\n`);
    } else {
      io.stderr(`Fatal error: ${toError(e)}\n`);
    }
    return 1;
  }
}
