export const WORKLOAD_NAMES = ["reply-chain", "fan-out", "replay-log"] as const;
export type WorkloadName = (typeof WORKLOAD_NAMES)[number];

export const DEFAULT_BENCH_SIZES = [100, 1000, 10000] as const;

export function isWorkloadName(value: string): value is WorkloadName {
  return WORKLOAD_NAMES.some((name) => name === value);
}
