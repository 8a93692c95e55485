import type { Biometrics, HeartRateZone } from '../types/training.types'

export type ScalarPatch = Partial<
  Pick<
    Biometrics,
    'criticalSwimSpeed' | 'functionalThresholdPower' | 'thresholdRunPace' | 'maxHeartRate' | 'restingHeartRate'
  >
>

export type ApplyScalarsOptions = {
  /** Planned workouts before this week keep their structure. */
  fromWeek: number
}

export type ApplyScalarsResult = {
  biometrics: Biometrics
  heartRateZones: HeartRateZone[]
  rematerializedWorkoutIds: string[]
}
