import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { BenchmarkResult } from "./index.js";

export type BenchmarkOutput = {
  implementation: string;
  timestamp: string;
  env: Record<string, unknown>;
  results: BenchmarkResult[];
};

export function benchmarkOutput(results: BenchmarkResult[], implementation = "helixgraph-ts"): BenchmarkOutput {
  return {
    implementation,
    timestamp: new Date().toISOString(),
    env: {
      node: process.version,
      platform: process.platform,
      arch: process.arch,
      cpu: os.cpus()[0]?.model,
      cores: os.cpus().length,
    },
    results,
  };
}

export async function writeResult(output: BenchmarkOutput, outFile: string): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, JSON.stringify(output, null, 2), "utf-8");
}
