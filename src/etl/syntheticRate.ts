import { SHORT_RATE_MODEL } from "../config";
import { linspace, mulberry32, normalSampler } from "../lib/random";

export interface RampNoiseModel {
  seed: number;
  start: number;
  end: number;
  noiseStd: number;
}

/**
 * Short-term rate series with no live source: a linear ramp from `start` to
 * `end` plus seeded gaussian noise. Deterministic for a given seed and length.
 */
export function syntheticShortRate(length: number, model: RampNoiseModel = SHORT_RATE_MODEL): number[] {
  const trend = linspace(model.start, model.end, length);
  const noise = normalSampler(mulberry32(model.seed), 0, model.noiseStd);
  return trend.map((t) => t + noise());
}
