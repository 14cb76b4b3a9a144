import type { FlowgenConfig, ParseErrorPolicy } from "../config.js";
import { ConfigurationError } from "../errors.js";

export interface CliOptions {
  datasetDir: string;
  outputDir: string;
  topologyPath: string;
  parseErrors: ParseErrorPolicy;
}

export const USAGE = `Usage: ddosflowgen --dataset=<dir> --outdir=<dir> [--topology=<file>] [--skip-bad-lines]

  --dataset=<dir>     noise dataset directory containing files: inbound, outbound
  --outdir=<dir>      directory to create for the per-vantage-point results
  --topology=<file>   topology JSON (default: FLOWGEN_TOPOLOGY or the bundled mixed-big)
  --skip-bad-lines    log and skip malformed noise lines instead of aborting`;

const VALUE_FLAGS = ["dataset", "outdir", "topology"];
const SWITCHES = ["skip-bad-lines", "help"];

/** Returns null when help was requested. */
export function parseCliArgs(argv: readonly string[], config: FlowgenConfig): CliOptions | null {
  for (const arg of argv) {
    const name = arg.replace(/^--/, "").split("=")[0];
    const known = arg.includes("=") ? VALUE_FLAGS.includes(name) : SWITCHES.includes(name);
    if (!arg.startsWith("--") || !known) {
      throw new ConfigurationError(`Unknown argument "${arg}"\n\n${USAGE}`);
    }
  }

  if (argv.includes("--help")) {
    return null;
  }

  const datasetDir = flagValue(argv, "dataset") ?? config.datasetDir;
  const outputDir = flagValue(argv, "outdir") ?? config.outputDir;

  if (!datasetDir) {
    throw new ConfigurationError(
      "Must use --dataset to specify the path of noise dataset. Must contain files: inbound, outbound",
    );
  }
  if (!outputDir) {
    throw new ConfigurationError(
      "Must use --outdir to specify the path that will store the generated outputs, one pair of files per vantage point",
    );
  }

  return {
    datasetDir,
    outputDir,
    topologyPath: flagValue(argv, "topology") ?? config.topologyPath,
    parseErrors: argv.includes("--skip-bad-lines") ? "skip" : config.parseErrors,
  };
}

function flagValue(argv: readonly string[], name: string): string | undefined {
  const arg = argv.find((a) => a.startsWith(`--${name}=`));
  if (arg === undefined) return undefined;

  const value = arg.substring(name.length + 3);
  if (!value) {
    throw new ConfigurationError(`--${name} needs a value\n\n${USAGE}`);
  }
  return value;
}
