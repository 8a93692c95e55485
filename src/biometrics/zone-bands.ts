import type { Discipline, ZoneNumber } from '../types/training.types'

/**
 * Policy constants mapping a training zone onto a band of the discipline's
 * scalar. These are coaching conventions, not derived values.
 */

export const ZONES: readonly ZoneNumber[] = [1, 2, 3, 4, 5]

export const ZONE_NAMES: Record<ZoneNumber, string> = {
  1: 'Recovery',
  2: 'Endurance',
  3: 'Tempo',
  4: 'Threshold',
  5: 'VO2 Max',
}

/** Fraction of max HR (or of HR reserve under Karvonen). */
export const HEART_RATE_BANDS: Record<ZoneNumber, readonly [number, number]> = {
  1: [0.5, 0.6],
  2: [0.6, 0.75],
  3: [0.75, 0.85],
  4: [0.85, 0.95],
  5: [0.95, 1.0],
}

/** Fraction of FTP. Ceilings are 55/75/90/105/120 %. */
export const BIKE_POWER_BANDS: Record<ZoneNumber, readonly [number, number]> = {
  1: [0.45, 0.55],
  2: [0.56, 0.75],
  3: [0.76, 0.9],
  4: [0.91, 1.05],
  5: [1.06, 1.2],
}

/** A bound on run pace: seconds added to threshold pace, or a fraction of it. */
export type PaceBound = { offsetSeconds: number } | { pct: number }

/** [slow, fast] bounds around threshold pace (sec/mile); slower = more seconds. */
export const RUN_PACE_BANDS: Record<ZoneNumber, readonly [PaceBound, PaceBound]> = {
  1: [{ offsetSeconds: 150 }, { offsetSeconds: 120 }],
  2: [{ offsetSeconds: 90 }, { offsetSeconds: 60 }],
  3: [{ offsetSeconds: 45 }, { offsetSeconds: 20 }],
  4: [{ offsetSeconds: 0 }, { pct: 0.95 }],
  5: [{ pct: 0.95 }, { pct: 0.85 }],
}

/** [slow, fast] fraction of CSS (sec/100m). */
export const SWIM_PACE_BANDS: Record<ZoneNumber, readonly [number, number]> = {
  1: [1.25, 1.15],
  2: [1.15, 1.05],
  3: [1.05, 1.0],
  4: [1.05, 0.95],
  5: [0.95, 0.85],
}

export function resolvePaceBound(thresholdPace: number, bound: PaceBound): number {
  return 'pct' in bound ? thresholdPace * bound.pct : thresholdPace + bound.offsetSeconds
}

/**
 * Zone a template percentage falls into, used when the scalar it refers to
 * is missing. Pace percentages are inverted (100 % of CSS is threshold-ish).
 */
export function zoneForPercentage(kind: 'ftp' | 'css' | 'thresholdPace', pct: number): ZoneNumber {
  if (kind === 'ftp') {
    for (const zone of ZONES) {
      if (pct <= BIKE_POWER_BANDS[zone][1]) return zone
    }
    return 5
  }
  // pace: higher pct = slower = easier
  if (pct >= 1.15) return 1
  if (pct >= 1.05) return 2
  if (pct > 1.0) return 3
  if (pct >= 0.95) return 4
  return 5
}

export const SCALAR_FOR_DISCIPLINE: Record<Discipline, 'ftp' | 'css' | 'thresholdPace'> = {
  swim: 'css',
  bike: 'ftp',
  run: 'thresholdPace',
}
