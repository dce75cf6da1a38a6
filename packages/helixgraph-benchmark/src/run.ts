import { parseBenchCliArgs } from "./cli.js";
import { makeWorkload, runBenchmark } from "./index.js";
import type { BenchmarkResult } from "./index.js";
import { benchmarkOutput, writeResult } from "./node.js";
import { benchTiming } from "./timing.js";

async function main() {
  const args = parseBenchCliArgs();
  const timing = benchTiming({ defaultIterations: 5 });
  const results: BenchmarkResult[] = [];

  for (const workload of args.workloads) {
    for (const size of args.sizes) {
      const result = await runBenchmark(makeWorkload(workload, size), timing);
      results.push(result);
      console.log(
        `${result.name}: p50 ${result.p50Ms.toFixed(2)}ms, p95 ${result.p95Ms.toFixed(2)}ms, ${Math.round(result.opsPerSec)} ops/s`
      );
    }
  }

  if (args.outFile) {
    await writeResult(benchmarkOutput(results), args.outFile);
    console.log(`wrote ${args.outFile}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
