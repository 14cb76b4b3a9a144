import type { AttackTopology, Direction } from "../types.js";
import type { ParseErrorPolicy } from "../config.js";
import { readFlowLines, resolveNoisePath } from "../parser/index.js";
import { validateTopology } from "../topology/index.js";
import type { RandomSource } from "../synth/random.js";
import { FlowOrchestrator, type DirectionStats } from "./orchestrator.js";
import { openOutputSinks, withOpenSinks } from "./sinks.js";

export { FlowOrchestrator, formatStats, type DirectionStats } from "./orchestrator.js";
export {
  FileFlowSink,
  MemoryFlowSink,
  closeSinks,
  memorySinks,
  outputFileName,
  withOpenSinks,
  type FlowSink,
  type SinkMap,
} from "./sinks.js";

export interface GenerateOptions {
  datasetDir: string;
  outputDir: string;
  topology: AttackTopology;
  parseErrors?: ParseErrorPolicy;
  random?: RandomSource;
  log?: (message: string) => void;
}

export interface GenerateResult {
  outputDir: string;
  inputs: Record<Direction, string>;
  files: string[];
  directions: DirectionStats[];
}

/**
 * Turn `<datasetDir>/{inbound,outbound}` into one inbound and one outbound
 * flow log per vantage point under a freshly created `outputDir`.
 */
export async function generateDataset(options: GenerateOptions): Promise<GenerateResult> {
  const log = options.log ?? console.error;

  validateTopology(options.topology);
  const inputs: Record<Direction, string> = {
    inbound: resolveNoisePath(options.datasetDir, "inbound"),
    outbound: resolveNoisePath(options.datasetDir, "outbound"),
  };

  const { sinks, files } = openOutputSinks(options.outputDir, options.topology);
  const directions = await withOpenSinks(sinks, log, () => {
    const orchestrator = new FlowOrchestrator(options.topology, sinks, {
      random: options.random,
      parseErrors: options.parseErrors,
      log,
    });
    return orchestrator.run((direction) => readFlowLines(inputs[direction]));
  });
  return { outputDir: options.outputDir, inputs, files, directions };
}
