import type { HeartRateZone, ZoneNumber } from '../types/training.types'

export type ScalarKind = 'ftp' | 'css' | 'thresholdPace'

/** The user's physiological scalars; any of them may be unknown. */
export type ScalarSet = {
  ftp?: number | null
  css?: number | null
  thresholdPace?: number | null
  heartRateZones?: readonly HeartRateZone[]
}

export type MaterializeOptions = {
  intensityScalar?: number
  durationScale?: number
  zoneCap?: ZoneNumber | null
}
