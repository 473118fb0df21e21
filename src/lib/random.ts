/** mulberry32: 32-bit seeded uniform generator on [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Normal deviates via Box–Muller, one draw per call (the sine twin is discarded). */
export function normalSampler(uniform: () => number, mean = 0, std = 1): () => number {
  return () => {
    const u1 = 1 - uniform();
    const u2 = uniform();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + std * z;
  };
}

/** Evenly spaced values; the last one equals `stop` exactly. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  const out = Array.from({ length: count }, (_, i) => start + i * step);
  out[count - 1] = stop;
  return out;
}
