function readEnv(name: string): string | undefined {
  const raw = process.env[name];
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}

export function envInt(name: string): number | undefined {
  const raw = readEnv(name);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return NaN;
  if (!(q >= 0 && q <= 1)) throw new Error(`q must be in [0,1], got: ${q}`);
  const sorted = [...values].sort((a, b) => a - b);
  const idx = (sorted.length - 1) * q;
  const lo = sorted[Math.floor(idx)] ?? NaN;
  const hi = sorted[Math.ceil(idx)] ?? NaN;
  const w = idx - Math.floor(idx);
  return w === 0 ? lo : lo * (1 - w) + hi * w;
}
