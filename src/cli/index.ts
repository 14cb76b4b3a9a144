#!/usr/bin/env node
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { loadTopology } from "../topology/index.js";
import { generateDataset } from "../pipeline/index.js";
import { USAGE, parseCliArgs } from "./args.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2), getConfig());
  if (!options) {
    console.log(USAGE);
    return;
  }

  const topology = await loadTopology(options.topologyPath);
  const result = await generateDataset({
    ...options,
    topology,
    log: (message) => console.log(message),
  });

  console.log(`\nFlow logs written to ${result.outputDir}`);
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
