import { roundToPrecision } from './numberUtils.js';

/** DMI delays are expressed in ticks of a tenth of a second. */
export const TICK_MS = 100;

const STATS_PRECISION = 3;

export interface FrameTimingStats {
  averageDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  stdDeviationMs: number;
  fps: number;
}

export interface FrameTimingSource {
  readonly frames: number;
  readonly delays?: readonly number[];
}

/**
 * Frame delays of a state in milliseconds. A state without delays shows each
 * of its frames for one tick.
 */
export function stateFrameDelaysMs(state: FrameTimingSource): number[] {
  const ticks = state.delays ?? Array.from({ length: state.frames }, () => 1);
  return ticks.map((delay) => roundToPrecision(delay * TICK_MS, STATS_PRECISION));
}

export function calculateFrameTimingStats(delaysMs: readonly number[]): FrameTimingStats {
  if (delaysMs.length === 0) {
    return {
      averageDelayMs: 0,
      minDelayMs: 0,
      maxDelayMs: 0,
      stdDeviationMs: 0,
      fps: 0,
    };
  }

  const total = delaysMs.reduce((sum, delay) => sum + delay, 0);
  const average = total / delaysMs.length;
  const min = Math.min(...delaysMs);
  const max = Math.max(...delaysMs);
  const variance =
    delaysMs.reduce((acc, delay) => acc + (delay - average) ** 2, 0) / delaysMs.length;
  const stdDeviation = Math.sqrt(variance);
  const fps = average > 0 ? 1000 / average : 0;

  return {
    averageDelayMs: roundToPrecision(average, STATS_PRECISION),
    minDelayMs: roundToPrecision(min, STATS_PRECISION),
    maxDelayMs: roundToPrecision(max, STATS_PRECISION),
    stdDeviationMs: roundToPrecision(stdDeviation, STATS_PRECISION),
    fps: roundToPrecision(fps, STATS_PRECISION),
  };
}
