/**
 * Measurement plans
 */

import type { MeasurementPlan, ThroughputTrial } from '../types.js';

/** Probe sizes and bursts used when none are given */
export const DEFAULT_PLAN: MeasurementPlan = createPlan(
  [8, 64, 512],
  [
    { count: 16384, size: 64 },
    { count: 4096, size: 256 },
    { count: 1024, size: 1024 },
  ]
);

/**
 * Build an immutable plan, rejecting sizes and counts that make no sense
 */
export function createPlan(
  latencySizes: readonly number[],
  throughputTrials: readonly ThroughputTrial[]
): MeasurementPlan {
  for (const size of latencySizes) {
    assertNonNegativeInteger(size, 'Latency probe size');
  }
  for (const { count, size } of throughputTrials) {
    assertNonNegativeInteger(size, 'Throughput message size');
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Throughput message count must be a positive integer, got ${count}`);
    }
  }

  return Object.freeze({
    latencySizes: Object.freeze([...latencySizes]),
    throughputTrials: Object.freeze(throughputTrials.map((trial) => Object.freeze({ ...trial }))),
  });
}

function assertNonNegativeInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}
