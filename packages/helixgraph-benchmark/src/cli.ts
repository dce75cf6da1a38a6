import { Command, InvalidArgumentError } from "commander";

import { DEFAULT_BENCH_SIZES, WORKLOAD_NAMES, isWorkloadName } from "./workloads.js";
import type { WorkloadName } from "./workloads.js";

export type BenchCliArgs = {
  sizes: number[];
  workloads: WorkloadName[];
  outFile?: string;
};

function parseNumberList(raw: string): number[] {
  const parts = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (parts.length === 0) {
    throw new InvalidArgumentError("expected a comma-separated list of positive integers");
  }

  const invalid = parts.filter((p) => !Number.isInteger(Number(p)) || Number(p) <= 0);
  if (invalid.length > 0) {
    throw new InvalidArgumentError(`invalid number(s): ${invalid.join(", ")}`);
  }
  return parts.map((p) => Number(p));
}

function parseWorkloadList(raw: string): WorkloadName[] {
  const vals = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (vals.length === 0) {
    throw new InvalidArgumentError("expected a comma-separated list of workloads");
  }

  const workloads: WorkloadName[] = [];
  const invalid: string[] = [];
  for (const v of vals) {
    if (isWorkloadName(v)) workloads.push(v);
    else invalid.push(v);
  }
  if (invalid.length > 0) {
    throw new InvalidArgumentError(`invalid workload(s): ${invalid.join(", ")} (allowed: ${WORKLOAD_NAMES.join(", ")})`);
  }
  return Array.from(new Set(workloads));
}

export function parseBenchCliArgs(
  opts: {
    argv?: string[];
    defaultSizes?: readonly number[];
    defaultWorkloads?: readonly WorkloadName[];
  } = {}
): BenchCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const defaultSizes = Array.from(opts.defaultSizes ?? DEFAULT_BENCH_SIZES);
  const defaultWorkloads = Array.from(opts.defaultWorkloads ?? WORKLOAD_NAMES);

  const program = new Command()
    .name("helixgraph-bench")
    .description("Helix discussion graph benchmark runner.")
    .exitOverride()
    .option("--out <file>", "write output JSON to file")
    .option("--count <n>", "shorthand for --sizes <n>", (val) => {
      const n = Number(val);
      if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError(`invalid --count value: ${val}`);
      return n;
    })
    .option("--sizes <n1,n2,...>", `comma-separated benchmark sizes (default: ${defaultSizes.join(",")})`, parseNumberList)
    .option("--workload <name>", `single workload (${WORKLOAD_NAMES.join(", ")})`, (val) => {
      if (!isWorkloadName(val)) {
        throw new InvalidArgumentError(`invalid --workload value: ${val} (allowed: ${WORKLOAD_NAMES.join(", ")})`);
      }
      return val;
    })
    .option("--workloads <w1,w2,...>", `comma-separated workloads (allowed: ${WORKLOAD_NAMES.join(", ")})`, parseWorkloadList);

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    out?: string;
    count?: number;
    sizes?: number[];
    workload?: WorkloadName;
    workloads?: WorkloadName[];
  }>();

  const sizes =
    parsed.sizes && parsed.sizes.length > 0 ? parsed.sizes : parsed.count !== undefined ? [parsed.count] : defaultSizes;
  const workloads =
    parsed.workloads && parsed.workloads.length > 0
      ? parsed.workloads
      : parsed.workload
        ? [parsed.workload]
        : defaultWorkloads;

  return { sizes, workloads, ...(parsed.out ? { outFile: parsed.out } : {}) };
}
